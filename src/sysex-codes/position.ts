// src/sysex-codes/position.ts

import type { MotorPositionPayload } from '../types/stepper-types.js';
import { unpackInt } from '../utils/int-codec.js';
import { expectPayloadLength, leField } from './common.js';

const PAYLOAD_SIZE = 5;

export function buildGetPositionPayload(motor: number): Uint8Array {
  return leField('motor', motor, 1, false);
}

/**
 * `[motor (u8), position (i32 LE)]`
 */
export function parseMotorPositionPayload(payload: Uint8Array): MotorPositionPayload {
  expectPayloadLength(payload, PAYLOAD_SIZE);
  return {
    motor: unpackInt(payload, 0, 1, 'le', false),
    position: unpackInt(payload, 1, 4, 'le', true),
  };
}
