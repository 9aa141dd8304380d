// src/errors.ts

/**
 * Base class for all signal bridge errors
 */
export class SignalBridgeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SignalBridgeError';
  }
}

// --- Codec errors ---

export type CodecErrorReason = 'Truncated' | 'InvalidGeometry' | 'InvalidValue';

/**
 * Signal placement inside the payload, attached to codec errors
 */
export interface SignalGeometry {
  startBit: number;
  bitLength: number;
}

/**
 * Error class for a signal that cannot be read from a payload.
 * Returned by the codec, never thrown by it.
 */
export class DecodeError extends SignalBridgeError {
  readonly reason: CodecErrorReason;
  readonly startBit: number;
  readonly bitLength: number;

  constructor(reason: CodecErrorReason, geometry: SignalGeometry, detail?: string) {
    super(
      `Cannot decode signal at bit ${geometry.startBit} (length ${geometry.bitLength}): ${detail ?? reason}`
    );
    this.name = 'DecodeError';
    this.reason = reason;
    this.startBit = geometry.startBit;
    this.bitLength = geometry.bitLength;
  }
}

/**
 * Error class for a value that cannot be written into a payload
 */
export class EncodeError extends SignalBridgeError {
  readonly reason: CodecErrorReason;
  readonly startBit: number;
  readonly bitLength: number;

  constructor(reason: CodecErrorReason, geometry: SignalGeometry, detail?: string) {
    super(
      `Cannot encode signal at bit ${geometry.startBit} (length ${geometry.bitLength}): ${detail ?? reason}`
    );
    this.name = 'EncodeError';
    this.reason = reason;
    this.startBit = geometry.startBit;
    this.bitLength = geometry.bitLength;
  }
}

// --- Configuration errors ---

/**
 * Error class for malformed mapping configuration.
 * `path` points at the offending item, e.g. `message_definitions[1].signals[0].kind`.
 */
export class ConfigError extends SignalBridgeError {
  readonly path: string;
  readonly detail: string;

  constructor(detail: string, path: string = '') {
    super(path ? `Invalid configuration at ${path}: ${detail}` : `Invalid configuration: ${detail}`);
    this.name = 'ConfigError';
    this.path = path;
    this.detail = detail;
  }
}

// --- Conversion errors ---

/**
 * Error class for an unexpected failure while converting a frame.
 * Counted and logged by the conversion engine, never propagated.
 */
export class ConversionFault extends SignalBridgeError {
  readonly frameId: number | undefined;
  readonly originalError: unknown;

  constructor(frameId: number | undefined, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(
      frameId === undefined
        ? `Conversion failed: ${detail}`
        : `Conversion of frame 0x${frameId.toString(16)} failed: ${detail}`
    );
    this.name = 'ConversionFault';
    this.frameId = frameId;
    this.originalError = cause;
  }
}

// --- Frame and bus errors ---

/**
 * Error class for a frame that breaks the frame contract (id range, payload size)
 */
export class InvalidFrameError extends SignalBridgeError {
  constructor(message: string) {
    super(`Invalid frame: ${message}`);
    this.name = 'InvalidFrameError';
  }
}

/**
 * Error class for sending on a bus that has been shut down
 */
export class BusClosedError extends SignalBridgeError {
  constructor(channel: string) {
    super(`Bus "${channel}" is shut down`);
    this.name = 'BusClosedError';
  }
}
