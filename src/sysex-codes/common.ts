// src/sysex-codes/common.ts
import { InvalidFrameLengthError } from '../errors.js';
import type { IntWidth } from '../types/stepper-types.js';
import { packInt } from '../utils/int-codec.js';

/** Little-endian field, range-checked */
export function leField(name: string, value: number, width: IntWidth, signed: boolean): Uint8Array {
  return packInt(value, width, 'le', signed, { strict: true, field: name });
}

export function expectPayloadLength(payload: Uint8Array, expected: number): void {
  if (payload.length !== expected) {
    throw new InvalidFrameLengthError(payload.length, expected, payload);
  }
}
