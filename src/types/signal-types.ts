// src/types/signal-types.ts

import type { SignalKind } from '../constants/constants.js';
import type Logger from '../logger.js';
import type { MappingTable } from '../mapping/mapping-table.js';

// !=============================================================================
// ! Definition model
// !=============================================================================

/** Packed bit-field inside a frame payload */
export interface SignalDefinition {
  name: string;
  /** Frame-relative, bit 0 is the least significant bit of byte 0 */
  startBit: number;
  bitLength: number;
  kind: SignalKind;
  scale?: number;
  offset?: number;
  min?: number;
  max?: number;
  unit?: string;
  description?: string;
}

/** Signal definition with defaults applied, as stored by the mapping table */
export interface ResolvedSignalDefinition extends SignalDefinition {
  scale: number;
  offset: number;
  unit: string;
  description: string;
}

/** Layout of one frame identifier */
export interface MessageDefinition {
  id: number;
  name: string;
  dlc: number;
  signals: Record<string, SignalDefinition>;
  /** Informational, milliseconds */
  cycleTime?: number;
  description?: string;
}

export interface ResolvedMessageDefinition {
  readonly id: number;
  readonly name: string;
  readonly dlc: number;
  readonly signals: Readonly<Record<string, ResolvedSignalDefinition>>;
  readonly cycleTime: number;
  readonly description: string;
}

// !=============================================================================
// ! Frames and values
// !=============================================================================

export interface Frame {
  id: number;
  data: Uint8Array;
  /** Declared payload length; bytes past it are absent */
  dlc: number;
  isExtended?: boolean;
  timestamp?: number;
}

export type SignalValue = number | boolean;

/** Destination path -> decoded value */
export type ConversionResult = Record<string, SignalValue>;

export interface ConversionStatisticsSnapshot {
  received: number;
  converted: number;
  signalsEmitted: number;
  errors: number;
}

/** Counters plus the error history, copied out of the engine's statistics */
export interface ConversionStatisticsDetails extends ConversionStatisticsSnapshot {
  lastError: { message: string; timestamp: string } | null;
  recentErrors: string[];
  /** Percent of received frames that produced values, `null` before the first frame */
  conversionRate: number | null;
  receivedByFrameId: Map<number, number>;
  resetCount: number;
}

// !=============================================================================
// ! Configuration payload
// !=============================================================================

export type ConfigIdentifier = string | number;

export interface SignalConfig {
  name: string;
  start_bit: number;
  bit_length: number;
  kind?: string;
  /** Older spelling of `kind` */
  type?: string;
  scale?: number;
  offset?: number;
  min?: number;
  max?: number;
  unit?: string;
  description?: string;
}

export interface MessageDefinitionConfig {
  id?: ConfigIdentifier;
  /** Older spelling of `id` */
  can_id?: ConfigIdentifier;
  name: string;
  dlc: number;
  description?: string;
  cycle_time?: number;
  signals: SignalConfig[];
}

export interface MappingSignalConfig {
  name: string;
  destination?: string;
  /** Older spelling of `destination` */
  vss_path?: string;
}

export interface MappingGroupConfig {
  id?: ConfigIdentifier;
  can_id?: ConfigIdentifier;
  signals: MappingSignalConfig[];
}

export interface MappingConfig {
  message_definitions?: MessageDefinitionConfig[];
  mappings?: MappingGroupConfig[];
}

export type LoadMode = 'merge' | 'replace';

export interface LoadOptions {
  /** `'merge'` keeps existing entries (last write wins), `'replace'` clears first */
  mode?: LoadMode;
}

export interface LoadSummary {
  messages: number;
  mappings: number;
}

// !=============================================================================
// ! Transport and telemetry seams
// !=============================================================================

export type FrameHandler = (frame: Frame) => void;

/** Anything that delivers received frames through a callback */
export interface FrameSource {
  /** @returns function that detaches the handler */
  onFrame(handler: FrameHandler): () => void;
}

export interface FrameSink {
  send(frame: Frame): Promise<void>;
}

/** Receiver of decoded values, e.g. a vehicle signal broker client */
export interface TelemetrySink {
  setCurrentValues(values: ConversionResult): Promise<void>;
}

// !=============================================================================
// ! Component options
// !=============================================================================

export interface MappingTableOptions {
  logLevel?: LogLevel;
  logger?: Logger;
}

export interface ConversionEngineOptions {
  mappingTable?: MappingTable;
  /** Register the built-in lamp definitions on construction */
  useDefaultMappings?: boolean;
  logLevel?: LogLevel;
  logger?: Logger;
}

export interface FrameBufferOptions {
  logLevel?: LogLevel;
  logger?: Logger;
}

export interface VirtualBusOptions {
  /** Deliver sent frames to this bus's own subscribers, default `true` */
  receiveOwnMessages?: boolean;
  channel?: string;
  logLevel?: LogLevel;
  logger?: Logger;
}

// !=============================================================================
// ! Logging
// !=============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  frameId?: number;
  signal?: string;
  destination?: string;
  logger?: string;
  [key: string]: string | number | boolean | undefined;
}

export type LogField = 'timestamp' | 'level' | 'logger' | 'frameId' | 'signal' | 'destination';

export interface LogRecord {
  level: LogLevel;
  args: unknown[];
  context: LogContext;
}

export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  group(): void;
  groupEnd(): void;
  setLevel(lvl: LogLevel | 'none'): void;
  pause(): void;
  resume(): void;
}
