// src/index.ts

export { default as ConversionEngine } from './conversion-engine.js';
export { FrameBuffer } from './frame-buffer.js';
export { MappingTable } from './mapping/mapping-table.js';
export type { MappingView } from './mapping/mapping-table.js';
export { VirtualBus } from './transport/virtual-bus.js';
export { default as Logger } from './logger.js';

export {
  extractRaw,
  extractSignal,
  insertRaw,
  encodeSignal,
  toPhysical,
} from './codec/bit-codec.js';
export type { DecodeResult, EncodeResult } from './codec/bit-codec.js';
export { decodeMessage, encodeMessage } from './codec/message-codec.js';
export type { DecodedMessage, EncodedMessage, SignalFailure } from './codec/message-codec.js';

export {
  SignalKind,
  FRAME_LIMITS,
  SIGNAL_LIMITS,
  DEFAULT_BUFFER_CAPACITY,
  SIGNAL_KIND_NAMES,
  isSignedKind,
  parseSignalKind,
} from './constants/constants.js';
export { DEFAULT_MAPPING_CONFIG } from './constants/default-mappings.js';

export * from './errors.js';
export * from './types/signal-types.js';
export { ConversionStatistics } from './utils/statistics.js';
export {
  createFrame,
  cloneFrame,
  formatFrame,
  formatFrameId,
  fromBytes,
  parseIdentifier,
  payloadOf,
  toHex,
  validateFrame,
} from './utils/utils.js';
