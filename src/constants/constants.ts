// src/constants/constants.ts

/**
 * Signal kinds. Values are the spellings used in mapping configuration files.
 */
export enum SignalKind {
  BOOLEAN = 'boolean',
  UINT8 = 'uint8',
  UINT16 = 'uint16',
  UINT32 = 'uint32',
  INT8 = 'int8',
  INT16 = 'int16',
  INT32 = 'int32',
  FLOAT = 'float',
}

/**
 * Frame limits
 */
export const FRAME_LIMITS = {
  MAX_DATA_LENGTH: 8,
  MAX_STANDARD_ID: 0x7ff,
  MAX_EXTENDED_ID: 0x1fffffff,
} as const;

/**
 * Signal geometry limits
 */
export const SIGNAL_LIMITS = {
  MIN_BIT_LENGTH: 1,
  MAX_BIT_LENGTH: 32,
} as const;

export const DEFAULT_BUFFER_CAPACITY = 1000;

const SIGNED_KINDS: ReadonlySet<SignalKind> = new Set([
  SignalKind.INT8,
  SignalKind.INT16,
  SignalKind.INT32,
]);

export function isSignedKind(kind: SignalKind): boolean {
  return SIGNED_KINDS.has(kind);
}

const KIND_BY_NAME: ReadonlyMap<string, SignalKind> = new Map(
  Object.values(SignalKind).map(kind => [kind, kind] as const)
);

/**
 * Resolves a configuration spelling (`'uint16'`, `'boolean'`, ...) to a {@link SignalKind}.
 * @returns the kind, or `undefined` for an unknown spelling
 */
export function parseSignalKind(name: string): SignalKind | undefined {
  return KIND_BY_NAME.get(name);
}

export const SIGNAL_KIND_NAMES: readonly string[] = Object.values(SignalKind);
