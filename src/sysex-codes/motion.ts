// src/sysex-codes/motion.ts

import type { MotorSeekPayload, MotorStepPayload } from '../types/stepper-types.js';
import { unpackInt } from '../utils/int-codec.js';
import { concatUint8Arrays } from '../utils/utils.js';
import { expectPayloadLength, leField } from './common.js';

const STEP_PAYLOAD_SIZE = 5;
const SEEK_PAYLOAD_SIZE = 7;

/**
 * `[motor (u8), steps (u16 LE), speed (i16 LE)]`; the sign of the speed gives the direction.
 */
export function buildSendStepPayload({ motor, steps, speed }: MotorStepPayload): Uint8Array {
  return concatUint8Arrays([
    leField('motor', motor, 1, false),
    leField('steps', steps, 2, false),
    leField('speed', speed, 2, true),
  ]);
}

export function parseSendStepPayload(payload: Uint8Array): MotorStepPayload {
  expectPayloadLength(payload, STEP_PAYLOAD_SIZE);
  return {
    motor: unpackInt(payload, 0, 1, 'le', false),
    steps: unpackInt(payload, 1, 2, 'le', false),
    speed: unpackInt(payload, 3, 2, 'le', true),
  };
}

/**
 * `[motor (u8), position (i32 LE), speed (i16 LE)]`
 */
export function buildSeekPositionPayload({ motor, position, speed }: MotorSeekPayload): Uint8Array {
  return concatUint8Arrays([
    leField('motor', motor, 1, false),
    leField('position', position, 4, true),
    leField('speed', speed, 2, true),
  ]);
}

export function parseSeekPositionPayload(payload: Uint8Array): MotorSeekPayload {
  expectPayloadLength(payload, SEEK_PAYLOAD_SIZE);
  return {
    motor: unpackInt(payload, 0, 1, 'le', false),
    position: unpackInt(payload, 1, 4, 'le', true),
    speed: unpackInt(payload, 5, 2, 'le', true),
  };
}
