// src/command-codes/set-speed.ts

import { buildFrame } from '../framers/bus-framer.js';
import type { MotionCalibration, SpeedModeParams } from '../types/stepper-types.js';
import { normalize } from '../utils/calibration.js';
import { beField, parseStatusResponse, validateSpeed } from './common.js';

/**
 * Builds a speed-mode request: `[opcode, speed+dir (2), acceleration]`.
 * A speed of 0 stops the motor with the given deceleration.
 * @throws FieldRangeError if the normalized speed exceeds 12 bits or acceleration a byte
 */
export function buildSetSpeedRequest(
  deviceId: number,
  opcode: number,
  { speed, direction, acceleration }: SpeedModeParams,
  calibration: MotionCalibration
): Uint8Array {
  const scaled = normalize(speed, calibration);
  validateSpeed(scaled);
  return buildFrame(deviceId, opcode, [
    { kind: 'speed', speed: scaled, direction },
    beField('acceleration', acceleration, 1),
  ]);
}

/**
 * @returns true when the driver accepted the command
 */
export function parseSetSpeedResponse(deviceId: number, opcode: number, frame: Uint8Array): boolean {
  return parseStatusResponse(deviceId, opcode, frame) === 1;
}
