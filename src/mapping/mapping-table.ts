// src/mapping/mapping-table.ts

import { readFile } from 'fs/promises';
import { FRAME_LIMITS, SIGNAL_LIMITS, parseSignalKind } from '../constants/constants.js';
import { DEFAULT_MAPPING_CONFIG } from '../constants/default-mappings.js';
import { ConfigError } from '../errors.js';
import Logger from '../logger.js';
import type {
  LoadOptions,
  LoadSummary,
  LoggerInstance,
  MappingTableOptions,
  MessageDefinition,
  ResolvedMessageDefinition,
  ResolvedSignalDefinition,
  SignalDefinition,
} from '../types/signal-types.js';
import { formatFrameId, isValidIdentifier } from '../utils/utils.js';
import { parseMappingGroup, parseMessageDefinition, readConfigSections } from './config-parser.js';

/**
 * Immutable state of the table at one instant. Readers keep a reference
 * for the duration of one conversion and never see a half-applied update.
 */
export interface MappingView {
  readonly messages: ReadonlyMap<number, ResolvedMessageDefinition>;
  readonly mappings: ReadonlyMap<number, ReadonlyMap<string, string>>;
}

/**
 * Registry of message layouts (by frame id) and destination paths
 * (by frame id and signal name).
 *
 * Both registries are copy-on-write: each mutation builds new maps and swaps
 * them in, so the decode path reads without locking. Registering an
 * existing id or (id, signal) pair overwrites it.
 */
export class MappingTable {
  private state: MappingView = { messages: new Map(), mappings: new Map() };
  private logger: LoggerInstance;

  constructor(options: MappingTableOptions = {}) {
    const loggerInstance = options.logger ?? new Logger();
    this.logger = loggerInstance.createLogger('MappingTable');
    this.logger.setLevel(options.logLevel ?? 'error');
  }

  /**
   * Validates a message definition and inserts it, replacing any definition
   * with the same id. Signal geometry is checked against `dlc` here rather
   * than at decode time.
   * @throws ConfigError
   */
  registerMessage(definition: MessageDefinition): ResolvedMessageDefinition {
    const resolved = resolveMessage(definition);
    const messages = new Map(this.state.messages);
    const replaced = messages.has(resolved.id);
    messages.set(resolved.id, resolved);
    this.state = { messages, mappings: this.state.mappings };

    this.logger.debug(replaced ? 'Message definition replaced' : 'Message definition registered', {
      frameId: resolved.id,
      name: resolved.name,
      signals: Object.keys(resolved.signals).length,
    });
    return resolved;
  }

  /**
   * Maps a signal of a frame id to a destination path. The message
   * definition does not need to exist; until it does the entry is inert.
   * @throws ConfigError
   */
  addMapping(id: number, signalName: string, destination: string): void {
    if (!isValidIdentifier(id)) {
      throw new ConfigError(`identifier ${String(id)} is outside 0..0x1FFFFFFF`, 'mapping');
    }
    if (typeof signalName !== 'string' || signalName.length === 0) {
      throw new ConfigError('signal name must be a non-empty string', `mapping ${formatFrameId(id)}`);
    }
    if (typeof destination !== 'string' || destination.length === 0) {
      throw new ConfigError(
        'destination must be a non-empty string',
        `mapping ${formatFrameId(id)}.${signalName}`
      );
    }

    const group = new Map(this.state.mappings.get(id));
    group.set(signalName, destination);
    const mappings = new Map(this.state.mappings);
    mappings.set(id, group);
    this.state = { messages: this.state.messages, mappings };

    this.logger.debug('Mapping added', { frameId: id, signal: signalName, destination });
  }

  removeMessage(id: number): boolean {
    if (!this.state.messages.has(id)) return false;
    const messages = new Map(this.state.messages);
    messages.delete(id);
    this.state = { messages, mappings: this.state.mappings };
    return true;
  }

  removeMapping(id: number, signalName: string): boolean {
    const current = this.state.mappings.get(id);
    if (!current?.has(signalName)) return false;

    const group = new Map(current);
    group.delete(signalName);
    const mappings = new Map(this.state.mappings);
    if (group.size === 0) mappings.delete(id);
    else mappings.set(id, group);
    this.state = { messages: this.state.messages, mappings };
    return true;
  }

  clear(): void {
    this.state = { messages: new Map(), mappings: new Map() };
    this.logger.info('Mapping table cleared');
  }

  /**
   * Applies a configuration payload: message definitions first, then mapping
   * groups, one item at a time. On a malformed item a ConfigError is thrown
   * and the items before it stay applied.
   */
  load(payload: unknown, options: LoadOptions = {}): LoadSummary {
    const sections = readConfigSections(payload);
    if ((options.mode ?? 'merge') === 'replace') {
      this.clear();
    }

    const summary: LoadSummary = { messages: 0, mappings: 0 };
    try {
      sections.messageDefinitions.forEach((raw, index) => {
        const path = `message_definitions[${index}]`;
        this.registerParsed(parseMessageDefinition(raw, path), path);
        summary.messages++;
      });

      sections.mappings.forEach((raw, index) => {
        const group = parseMappingGroup(raw, `mappings[${index}]`);
        for (const { name, destination } of group.entries) {
          this.addMapping(group.id, name, destination);
          summary.mappings++;
        }
      });
    } catch (error: unknown) {
      this.logger.error('Configuration load stopped', {
        messages: summary.messages,
        mappings: summary.mappings,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    this.logger.info('Configuration loaded', { ...summary });
    return summary;
  }

  /**
   * Reads a JSON configuration file and applies it with {@link load}.
   */
  async loadFile(path: string, options: LoadOptions = {}): Promise<LoadSummary> {
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (error: unknown) {
      throw new ConfigError(
        `cannot read file: ${error instanceof Error ? error.message : String(error)}`,
        path
      );
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (error: unknown) {
      throw new ConfigError(
        `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
        path
      );
    }
    return this.load(payload, options);
  }

  /**
   * Registers the built-in lamp controller definitions and destinations.
   */
  useDefaults(): LoadSummary {
    return this.load(DEFAULT_MAPPING_CONFIG);
  }

  getMessage(id: number): ResolvedMessageDefinition | undefined {
    return this.state.messages.get(id);
  }

  hasMessage(id: number): boolean {
    return this.state.messages.has(id);
  }

  /**
   * Signal name -> destination for one frame id, as a copy.
   */
  getMappings(id: number): Record<string, string> {
    const group = this.state.mappings.get(id);
    return group ? Object.fromEntries(group) : {};
  }

  hasMappings(id: number): boolean {
    return this.state.mappings.has(id);
  }

  getDestination(id: number, signalName: string): string | undefined {
    return this.state.mappings.get(id)?.get(signalName);
  }

  messageIds(): number[] {
    return [...this.state.messages.keys()].sort((a, b) => a - b);
  }

  get size(): { messages: number; mappings: number } {
    let mappings = 0;
    for (const group of this.state.mappings.values()) mappings += group.size;
    return { messages: this.state.messages.size, mappings };
  }

  /**
   * Current immutable state; later mutations do not affect the returned view.
   */
  view(): MappingView {
    return this.state;
  }

  private registerParsed(definition: MessageDefinition, path: string): void {
    try {
      this.registerMessage(definition);
    } catch (error: unknown) {
      if (error instanceof ConfigError) {
        throw new ConfigError(error.detail, `${path} (${error.path})`);
      }
      throw error;
    }
  }
}

function resolveSignal(
  key: string,
  signal: SignalDefinition,
  dlc: number,
  path: string
): ResolvedSignalDefinition {
  const signalPath = `${path}.signals.${key}`;
  if (signal.name !== key) {
    throw new ConfigError(`signal is registered as "${key}" but named "${signal.name}"`, signalPath);
  }
  if (parseSignalKind(signal.kind) === undefined) {
    throw new ConfigError(`unknown kind "${String(signal.kind)}"`, signalPath);
  }
  if (!Number.isInteger(signal.startBit) || signal.startBit < 0) {
    throw new ConfigError(`start bit ${signal.startBit} must be a non-negative integer`, signalPath);
  }
  if (
    !Number.isInteger(signal.bitLength) ||
    signal.bitLength < SIGNAL_LIMITS.MIN_BIT_LENGTH ||
    signal.bitLength > SIGNAL_LIMITS.MAX_BIT_LENGTH
  ) {
    throw new ConfigError(
      `bit length ${signal.bitLength} is outside ${SIGNAL_LIMITS.MIN_BIT_LENGTH}..${SIGNAL_LIMITS.MAX_BIT_LENGTH}`,
      signalPath
    );
  }
  if (signal.startBit + signal.bitLength > dlc * 8) {
    throw new ConfigError(
      `bits ${signal.startBit}..${signal.startBit + signal.bitLength - 1} do not fit in ${dlc} bytes`,
      signalPath
    );
  }
  for (const field of ['scale', 'offset', 'min', 'max'] as const) {
    const value = signal[field];
    if (value !== undefined && !Number.isFinite(value)) {
      throw new ConfigError(`${field} must be a finite number`, signalPath);
    }
  }
  if (signal.min !== undefined && signal.max !== undefined && signal.min > signal.max) {
    throw new ConfigError(`min ${signal.min} is greater than max ${signal.max}`, signalPath);
  }

  return Object.freeze({
    ...signal,
    scale: signal.scale ?? 1,
    offset: signal.offset ?? 0,
    unit: signal.unit ?? '',
    description: signal.description ?? '',
  });
}

function resolveMessage(definition: MessageDefinition): ResolvedMessageDefinition {
  if (!isValidIdentifier(definition.id)) {
    throw new ConfigError(`identifier ${String(definition.id)} is outside 0..0x1FFFFFFF`, 'message');
  }
  const path = `message ${formatFrameId(definition.id)}`;
  if (typeof definition.name !== 'string' || definition.name.length === 0) {
    throw new ConfigError('name must be a non-empty string', path);
  }
  if (
    !Number.isInteger(definition.dlc) ||
    definition.dlc < 0 ||
    definition.dlc > FRAME_LIMITS.MAX_DATA_LENGTH
  ) {
    throw new ConfigError(`dlc ${String(definition.dlc)} is outside 0..8`, path);
  }

  const signals: Record<string, ResolvedSignalDefinition> = Object.fromEntries(
    Object.entries(definition.signals).map(([key, signal]) => [
      key,
      resolveSignal(key, signal, definition.dlc, path),
    ])
  );

  return Object.freeze({
    id: definition.id,
    name: definition.name,
    dlc: definition.dlc,
    signals: Object.freeze(signals),
    cycleTime: definition.cycleTime ?? 0,
    description: definition.description ?? '',
  });
}
