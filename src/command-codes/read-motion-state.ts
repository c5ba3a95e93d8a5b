// src/command-codes/read-motion-state.ts

import { buildFrame } from '../framers/bus-framer.js';
import { unpackInt } from '../utils/int-codec.js';
import { readResponseFields } from './common.js';

export function buildReadMotionStateRequest(deviceId: number, opcode: number): Uint8Array {
  return buildFrame(deviceId, opcode);
}

/**
 * Motor speed in RPM, i16 BE. Positive is CCW.
 */
export function parseReadMotorSpeedResponse(
  deviceId: number,
  opcode: number,
  frame: Uint8Array
): number {
  const fields = readResponseFields(deviceId, opcode, frame, 2);
  return unpackInt(fields, 0, 2, 'be', true);
}

/**
 * Pulses received since power-on or the last zeroing, i32 BE.
 */
export function parseReadPositionResponse(
  deviceId: number,
  opcode: number,
  frame: Uint8Array
): number {
  const fields = readResponseFields(deviceId, opcode, frame, 4);
  return unpackInt(fields, 0, 4, 'be', true);
}

/**
 * Difference between target and actual angle in encoder units (0x4000 per turn), i32 BE.
 */
export function parseReadAngleErrorResponse(
  deviceId: number,
  opcode: number,
  frame: Uint8Array
): number {
  const fields = readResponseFields(deviceId, opcode, frame, 4);
  return unpackInt(fields, 0, 4, 'be', true);
}
