// src/codec/message-codec.ts

import { FRAME_LIMITS } from '../constants/constants.js';
import type { DecodeError, EncodeError } from '../errors.js';
import type { Frame, MessageDefinition, SignalValue } from '../types/signal-types.js';
import { encodeSignal, extractSignal } from './bit-codec.js';

export interface SignalFailure<E> {
  signal: string;
  error: E;
}

export interface DecodedMessage {
  /** Signal name -> value, in definition order */
  values: Map<string, SignalValue>;
  failures: SignalFailure<DecodeError>[];
}

/**
 * Decodes every signal of a message definition from a payload.
 * A signal that cannot be decoded is reported in `failures` and the rest
 * of the message is still decoded.
 */
export function decodeMessage(definition: MessageDefinition, payload: Uint8Array): DecodedMessage {
  const values = new Map<string, SignalValue>();
  const failures: SignalFailure<DecodeError>[] = [];

  for (const [name, signal] of Object.entries(definition.signals)) {
    const result = extractSignal(payload, signal);
    if (result.ok) {
      values.set(name, result.value);
    } else {
      failures.push({ signal: name, error: result.error });
    }
  }

  return { values, failures };
}

export interface EncodedMessage {
  frame: Frame;
  failures: SignalFailure<EncodeError>[];
}

/**
 * Builds a frame of `definition.dlc` zeroed bytes and writes the given
 * physical values into it. Signals without a value stay zero; names that
 * are not in the definition are ignored.
 */
export function encodeMessage(
  definition: MessageDefinition,
  values: Record<string, SignalValue>
): EncodedMessage {
  const data = new Uint8Array(Math.min(definition.dlc, FRAME_LIMITS.MAX_DATA_LENGTH));
  const failures: SignalFailure<EncodeError>[] = [];

  for (const [name, value] of Object.entries(values)) {
    if (!Object.hasOwn(definition.signals, name)) continue;
    const signal = definition.signals[name];
    const result = encodeSignal(data, signal, value);
    if (!result.ok) failures.push({ signal: name, error: result.error });
  }

  return {
    frame: {
      id: definition.id,
      data,
      dlc: data.length,
      isExtended: definition.id > FRAME_LIMITS.MAX_STANDARD_ID,
    },
    failures,
  };
}
