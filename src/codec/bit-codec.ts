// src/codec/bit-codec.ts

import { SIGNAL_LIMITS, SignalKind, isSignedKind } from '../constants/constants.js';
import { DecodeError, EncodeError } from '../errors.js';
import type { CodecErrorReason, SignalGeometry } from '../errors.js';
import type { SignalDefinition, SignalValue } from '../types/signal-types.js';

export type DecodeResult<T> = { ok: true; value: T } | { ok: false; error: DecodeError };
export type EncodeResult<T> = { ok: true; value: T } | { ok: false; error: EncodeError };

interface FieldWindow {
  startByte: number;
  bitOffset: number;
  byteCount: number;
}

/**
 * Locates the bytes a field occupies. Bit numbering is little-endian:
 * bit 0 is the least significant bit of byte 0, bit 8 the LSB of byte 1.
 * @returns the window, or the reason the geometry is unusable
 */
function locateField(
  startBit: number,
  bitLength: number,
  available: number
): FieldWindow | CodecErrorReason {
  if (!Number.isInteger(startBit) || startBit < 0) return 'InvalidGeometry';
  if (
    !Number.isInteger(bitLength) ||
    bitLength < SIGNAL_LIMITS.MIN_BIT_LENGTH ||
    bitLength > SIGNAL_LIMITS.MAX_BIT_LENGTH
  ) {
    return 'InvalidGeometry';
  }

  const startByte = Math.floor(startBit / 8);
  const bitOffset = startBit % 8;
  const byteCount = Math.ceil((bitOffset + bitLength) / 8);
  if (startByte + byteCount > available) return 'Truncated';

  return { startByte, bitOffset, byteCount };
}

function geometryDetail(reason: CodecErrorReason, geometry: SignalGeometry, available: number): string {
  if (reason === 'Truncated') {
    return `needs bytes up to ${Math.ceil((geometry.startBit + geometry.bitLength) / 8)}, payload has ${available}`;
  }
  return `start bit must be a non-negative integer and length an integer in ${SIGNAL_LIMITS.MIN_BIT_LENGTH}..${SIGNAL_LIMITS.MAX_BIT_LENGTH}`;
}

/**
 * Little-endian combine of the window. Up to 5 bytes (40 bits), so plain
 * arithmetic stays exact where 32-bit bitwise operators would not.
 */
function readWindow(data: Uint8Array, window: FieldWindow): number {
  let value = 0;
  for (let i = 0; i < window.byteCount; i++) {
    value += (data[window.startByte + i] ?? 0) * 2 ** (8 * i);
  }
  return value;
}

function writeWindow(data: Uint8Array, window: FieldWindow, value: number): void {
  for (let i = 0; i < window.byteCount; i++) {
    data[window.startByte + i] = Math.floor(value / 2 ** (8 * i)) % 256;
  }
}

/**
 * Reads the raw integer of a bit-field.
 * @param data - payload bytes; only bytes actually present count
 * @param signed - interpret as two's complement within `bitLength` bits
 */
export function extractRaw(
  data: Uint8Array,
  startBit: number,
  bitLength: number,
  signed: boolean = false
): DecodeResult<number> {
  const geometry = { startBit, bitLength };
  const window = locateField(startBit, bitLength, data.length);
  if (typeof window === 'string') {
    return {
      ok: false,
      error: new DecodeError(window, geometry, geometryDetail(window, geometry, data.length)),
    };
  }

  let value = readWindow(data, window);
  // поле ровно по границам байтов: сдвиг и маска не нужны
  if (window.bitOffset !== 0 || bitLength !== window.byteCount * 8) {
    value = Math.floor(value / 2 ** window.bitOffset) % 2 ** bitLength;
  }

  if (signed && value >= 2 ** (bitLength - 1)) {
    value -= 2 ** bitLength;
  }

  return { ok: true, value };
}

/**
 * Applies `raw * scale + offset`, then clamps to `[min, max]`.
 * Clamping always happens after scaling.
 */
export function toPhysical(raw: number, signal: SignalDefinition): number {
  let result = raw * (signal.scale ?? 1) + (signal.offset ?? 0);
  if (signal.min !== undefined) result = Math.max(result, signal.min);
  if (signal.max !== undefined) result = Math.min(result, signal.max);
  return result;
}

/**
 * Decodes one signal: extract, sign-extend, scale/offset, clamp.
 * `boolean` signals produce a boolean, every other kind a number
 * (`float` is a scaled integer field).
 */
export function extractSignal(data: Uint8Array, signal: SignalDefinition): DecodeResult<SignalValue> {
  const raw = extractRaw(data, signal.startBit, signal.bitLength, isSignedKind(signal.kind));
  if (!raw.ok) return raw;

  switch (signal.kind) {
    case SignalKind.BOOLEAN:
      return { ok: true, value: raw.value !== 0 };
    case SignalKind.UINT8:
    case SignalKind.UINT16:
    case SignalKind.UINT32:
    case SignalKind.INT8:
    case SignalKind.INT16:
    case SignalKind.INT32:
    case SignalKind.FLOAT:
      return { ok: true, value: toPhysical(raw.value, signal) };
  }
}

/**
 * Writes a raw integer into a bit-field, leaving the surrounding bits untouched.
 * Negative values are stored as two's complement.
 */
export function insertRaw(
  data: Uint8Array,
  startBit: number,
  bitLength: number,
  raw: number
): EncodeResult<number> {
  const geometry = { startBit, bitLength };
  const window = locateField(startBit, bitLength, data.length);
  if (typeof window === 'string') {
    return {
      ok: false,
      error: new EncodeError(window, geometry, geometryDetail(window, geometry, data.length)),
    };
  }

  const modulus = 2 ** bitLength;
  if (!Number.isInteger(raw) || raw < -(modulus / 2) || raw >= modulus) {
    return {
      ok: false,
      error: new EncodeError(
        'InvalidValue',
        geometry,
        `raw value ${raw} does not fit in ${bitLength} bits`
      ),
    };
  }
  const pattern = raw < 0 ? raw + modulus : raw;

  const scaleFactor = 2 ** window.bitOffset;
  const current = readWindow(data, window);
  const currentField = (Math.floor(current / scaleFactor) % modulus) * scaleFactor;
  writeWindow(data, window, current - currentField + pattern * scaleFactor);

  return { ok: true, value: pattern };
}

/**
 * Converts a physical value back to its raw integer and writes it.
 * Numeric values are clamped to `[min, max]`, unscaled, rounded and then
 * saturated to what `bitLength` can hold.
 * @returns the raw integer that was written
 */
export function encodeSignal(
  data: Uint8Array,
  signal: SignalDefinition,
  value: SignalValue
): EncodeResult<number> {
  const geometry = { startBit: signal.startBit, bitLength: signal.bitLength };
  const numeric = typeof value === 'boolean' ? (value ? 1 : 0) : value;

  if (signal.kind === SignalKind.BOOLEAN) {
    return insertRaw(data, signal.startBit, signal.bitLength, numeric !== 0 ? 1 : 0);
  }

  const scale = signal.scale ?? 1;
  if (!Number.isFinite(numeric) || !Number.isFinite(scale) || scale === 0) {
    return {
      ok: false,
      error: new EncodeError('InvalidValue', geometry, `cannot encode ${String(value)} with scale ${scale}`),
    };
  }

  let physical = numeric;
  if (signal.min !== undefined) physical = Math.max(physical, signal.min);
  if (signal.max !== undefined) physical = Math.min(physical, signal.max);

  const [lowest, highest] = rawRange(signal.bitLength, isSignedKind(signal.kind));
  const raw = Math.min(highest, Math.max(lowest, Math.round((physical - (signal.offset ?? 0)) / scale)));

  const written = insertRaw(data, signal.startBit, signal.bitLength, raw);
  return written.ok ? { ok: true, value: raw } : written;
}

function rawRange(bitLength: number, signed: boolean): [number, number] {
  const modulus = 2 ** bitLength;
  return signed ? [-(modulus / 2), modulus / 2 - 1] : [0, modulus - 1];
}
