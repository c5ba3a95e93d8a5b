// src/sysex-codes/motor-speed.ts

import type { MotorSpeedPayload } from '../types/stepper-types.js';
import { unpackInt } from '../utils/int-codec.js';
import { concatUint8Arrays } from '../utils/utils.js';
import { expectPayloadLength, leField } from './common.js';

const PAYLOAD_SIZE = 3;

/**
 * `[motor (u8), speed (i16 LE)]`
 */
export function buildSetSpeedPayload({ motor, speed }: MotorSpeedPayload): Uint8Array {
  return concatUint8Arrays([leField('motor', motor, 1, false), leField('speed', speed, 2, true)]);
}

export function buildGetSpeedPayload(motor: number): Uint8Array {
  return leField('motor', motor, 1, false);
}

/**
 * Parses the reply to both SET_SPEED and GET_SPEED.
 */
export function parseMotorSpeedPayload(payload: Uint8Array): MotorSpeedPayload {
  expectPayloadLength(payload, PAYLOAD_SIZE);
  return {
    motor: unpackInt(payload, 0, 1, 'le', false),
    speed: unpackInt(payload, 1, 2, 'le', true),
  };
}
