// src/mapping/config-parser.ts

import { SIGNAL_KIND_NAMES, parseSignalKind } from '../constants/constants.js';
import { ConfigError } from '../errors.js';
import type { MessageDefinition, SignalDefinition } from '../types/signal-types.js';
import { isValidIdentifier, parseIdentifier } from '../utils/utils.js';

type RawObject = Record<string, unknown>;

export interface ConfigSections {
  messageDefinitions: unknown[];
  mappings: unknown[];
}

export interface ParsedMappingGroup {
  id: number;
  entries: Array<{ name: string; destination: string }>;
}

function isRecord(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireRecord(value: unknown, path: string): RawObject {
  if (!isRecord(value)) throw new ConfigError('expected an object', path);
  return value;
}

function requireString(obj: RawObject, key: string, path: string): string {
  const value = obj[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigError(`"${key}" must be a non-empty string`, path);
  }
  return value;
}

function requireInteger(obj: RawObject, key: string, path: string): number {
  const value = obj[key];
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ConfigError(`"${key}" must be an integer`, path);
  }
  return value;
}

function optionalNumber(obj: RawObject, key: string, path: string): number | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigError(`"${key}" must be a finite number`, path);
  }
  return value;
}

function optionalString(obj: RawObject, key: string, path: string): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw new ConfigError(`"${key}" must be a string`, path);
  return value;
}

function requireArray(obj: RawObject, key: string, path: string): unknown[] {
  const value = obj[key];
  if (!Array.isArray(value)) throw new ConfigError(`"${key}" must be an array`, path);
  return value;
}

/**
 * Reads `id` (or the older `can_id`) as an integer or a base-16 string.
 */
function requireIdentifier(obj: RawObject, path: string): number {
  const raw = obj['id'] ?? obj['can_id'];
  if (raw === undefined) throw new ConfigError('"id" is required', path);
  const id = parseIdentifier(raw);
  if (id === undefined || !isValidIdentifier(id)) {
    throw new ConfigError(`"id" ${JSON.stringify(raw)} is not a valid frame identifier`, path);
  }
  return id;
}

/**
 * Splits a payload into its two optional sections.
 * @throws ConfigError when the payload or a section has the wrong shape
 */
export function readConfigSections(payload: unknown): ConfigSections {
  const root = requireRecord(payload, '');
  const sections: ConfigSections = { messageDefinitions: [], mappings: [] };

  if (root['message_definitions'] !== undefined) {
    sections.messageDefinitions = requireArray(root, 'message_definitions', '');
  }
  if (root['mappings'] !== undefined) {
    sections.mappings = requireArray(root, 'mappings', '');
  }
  return sections;
}

function parseSignal(raw: unknown, path: string): SignalDefinition {
  const obj = requireRecord(raw, path);
  const kindName = obj['kind'] ?? obj['type'];
  if (typeof kindName !== 'string') {
    throw new ConfigError('"kind" is required', path);
  }
  const kind = parseSignalKind(kindName);
  if (kind === undefined) {
    throw new ConfigError(
      `unknown kind "${kindName}", expected one of ${SIGNAL_KIND_NAMES.join(', ')}`,
      `${path}.kind`
    );
  }

  const signal: SignalDefinition = {
    name: requireString(obj, 'name', path),
    startBit: requireInteger(obj, 'start_bit', path),
    bitLength: requireInteger(obj, 'bit_length', path),
    kind,
  };

  const scale = optionalNumber(obj, 'scale', path);
  const offset = optionalNumber(obj, 'offset', path);
  const min = optionalNumber(obj, 'min', path);
  const max = optionalNumber(obj, 'max', path);
  const unit = optionalString(obj, 'unit', path);
  const description = optionalString(obj, 'description', path);
  if (scale !== undefined) signal.scale = scale;
  if (offset !== undefined) signal.offset = offset;
  if (min !== undefined) signal.min = min;
  if (max !== undefined) signal.max = max;
  if (unit !== undefined) signal.unit = unit;
  if (description !== undefined) signal.description = description;
  return signal;
}

/**
 * Parses one entry of `message_definitions`.
 * @param path - location used in error messages, e.g. `message_definitions[0]`
 */
export function parseMessageDefinition(raw: unknown, path: string): MessageDefinition {
  const obj = requireRecord(raw, path);
  const id = requireIdentifier(obj, path);
  const name = requireString(obj, 'name', path);
  const dlc = requireInteger(obj, 'dlc', path);

  const signals = new Map<string, SignalDefinition>();
  requireArray(obj, 'signals', path).forEach((rawSignal, index) => {
    const signalPath = `${path}.signals[${index}]`;
    const signal = parseSignal(rawSignal, signalPath);
    if (signals.has(signal.name)) {
      throw new ConfigError(`duplicate signal name "${signal.name}"`, signalPath);
    }
    signals.set(signal.name, signal);
  });

  // fromEntries defines own keys, so names like `__proto__` stay ordinary entries
  const definition: MessageDefinition = { id, name, dlc, signals: Object.fromEntries(signals) };
  const description = optionalString(obj, 'description', path);
  const cycleTime = optionalNumber(obj, 'cycle_time', path);
  if (description !== undefined) definition.description = description;
  if (cycleTime !== undefined) definition.cycleTime = cycleTime;
  return definition;
}

/**
 * Parses one entry of `mappings`. `destination` may also be spelled `vss_path`.
 */
export function parseMappingGroup(raw: unknown, path: string): ParsedMappingGroup {
  const obj = requireRecord(raw, path);
  const id = requireIdentifier(obj, path);

  const entries = requireArray(obj, 'signals', path).map((rawEntry, index) => {
    const entryPath = `${path}.signals[${index}]`;
    const entry = requireRecord(rawEntry, entryPath);
    const name = requireString(entry, 'name', entryPath);
    const destination = entry['destination'] ?? entry['vss_path'];
    if (typeof destination !== 'string' || destination.length === 0) {
      throw new ConfigError('"destination" must be a non-empty string', entryPath);
    }
    return { name, destination };
  });

  return { id, entries };
}
