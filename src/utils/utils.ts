// src/utils/utils.ts

import { FRAME_LIMITS } from '../constants/constants.js';
import { InvalidFrameError } from '../errors.js';
import type { Frame } from '../types/signal-types.js';

const HEX_TABLE = '0123456789ABCDEF';

/**
 * Создание Uint8Array из чисел
 * @param bytes - переменное число байтов
 */
export function fromBytes(...bytes: number[]): Uint8Array {
  return Uint8Array.from(bytes);
}

/**
 * Converts bytes to space separated upper-case hex pairs (`'01 F4 00'`).
 */
export function toHex(bytes: Uint8Array): string {
  const parts: string[] = [];
  for (const b of bytes) {
    parts.push(HEX_TABLE.charAt((b >> 4) & 0xf) + HEX_TABLE.charAt(b & 0xf));
  }
  return parts.join(' ');
}

/**
 * Formats an identifier the way bus tools print it: `0x100`, `0x18FEF100`.
 */
export function formatFrameId(id: number): string {
  return `0x${id.toString(16).toUpperCase().padStart(3, '0')}`;
}

/**
 * One-line frame dump: `0x101 |   8 | F4 01 00 00 00 00 00 00`
 */
export function formatFrame(frame: Frame): string {
  return `${formatFrameId(frame.id)} | ${String(frame.dlc).padStart(3, ' ')} | ${toHex(payloadOf(frame))}`;
}

/**
 * Parses a frame identifier given either as an integer or as a base-16 string
 * (with or without `0x`).
 * @returns the identifier, or `undefined` when the value is not an identifier
 */
export function parseIdentifier(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= 0 ? value : undefined;
  }
  if (typeof value === 'string') {
    const digits = value.trim().replace(/^0x/i, '');
    if (!/^[0-9a-f]+$/i.test(digits)) return undefined;
    return parseInt(digits, 16);
  }
  return undefined;
}

export function isValidIdentifier(id: number): boolean {
  return Number.isInteger(id) && id >= 0 && id <= FRAME_LIMITS.MAX_EXTENDED_ID;
}

/**
 * Bytes of the frame that are actually present: the first `dlc` bytes of `data`,
 * or fewer when `data` is shorter.
 */
export function payloadOf(frame: Frame): Uint8Array {
  const length = Math.max(0, Math.min(frame.dlc, frame.data.length));
  return frame.data.subarray(0, length);
}

/**
 * Checks the frame contract. Throws {@link InvalidFrameError}.
 */
export function validateFrame(frame: Frame): void {
  if (!isValidIdentifier(frame.id)) {
    throw new InvalidFrameError(`identifier ${String(frame.id)} is outside 0..0x1FFFFFFF`);
  }
  if (!(frame.data instanceof Uint8Array)) {
    throw new InvalidFrameError('data must be a Uint8Array');
  }
  if (frame.data.length > FRAME_LIMITS.MAX_DATA_LENGTH) {
    throw new InvalidFrameError(`payload of ${frame.data.length} bytes exceeds 8`);
  }
  if (!Number.isInteger(frame.dlc) || frame.dlc < 0 || frame.dlc > FRAME_LIMITS.MAX_DATA_LENGTH) {
    throw new InvalidFrameError(`dlc ${String(frame.dlc)} is outside 0..8`);
  }
}

/**
 * Copies a frame so that later writes to the caller's buffer do not leak in.
 */
export function cloneFrame(frame: Frame): Frame {
  const copy: Frame = { id: frame.id, data: Uint8Array.from(frame.data), dlc: frame.dlc };
  if (frame.isExtended !== undefined) copy.isExtended = frame.isExtended;
  if (frame.timestamp !== undefined) copy.timestamp = frame.timestamp;
  return copy;
}

/**
 * Builds a frame from raw bytes; `dlc` defaults to the byte count and
 * `isExtended` to whether the id needs 29 bits.
 */
export function createFrame(id: number, data: ArrayLike<number>, dlc?: number): Frame {
  const bytes = Uint8Array.from(data);
  return {
    id,
    data: bytes,
    dlc: dlc ?? bytes.length,
    isExtended: id > FRAME_LIMITS.MAX_STANDARD_ID,
  };
}
