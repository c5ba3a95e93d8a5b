// src/sysex-codes/gripper.ts

import { unpackInt } from '../utils/int-codec.js';
import { expectPayloadLength, leField } from './common.js';

export function buildSetGripperPayload(position: number): Uint8Array {
  return leField('gripper', position, 1, false);
}

export function parseGripperPayload(payload: Uint8Array): number {
  expectPayloadLength(payload, 1);
  return unpackInt(payload, 0, 1, 'le', false);
}
