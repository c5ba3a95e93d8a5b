// src/command-codes/send-step.ts

import type { MoveStatus } from '../constants/constants.js';
import { buildFrame } from '../framers/bus-framer.js';
import type { MotionCalibration, RelativeStepParams } from '../types/stepper-types.js';
import { normalize } from '../utils/calibration.js';
import { beField, parseStatusResponse, toMoveStatus, validateSpeed } from './common.js';

const STEPS_WIDTH = 3;

/**
 * Builds a relative move: `[opcode, speed+dir (2), acceleration, steps (u24 BE)]`.
 * Speed and step count are both normalized.
 */
export function buildSendStepRequest(
  deviceId: number,
  opcode: number,
  { speed, direction, acceleration, steps }: RelativeStepParams,
  calibration: MotionCalibration
): Uint8Array {
  const scaledSpeed = normalize(speed, calibration);
  validateSpeed(scaledSpeed);
  return buildFrame(deviceId, opcode, [
    { kind: 'speed', speed: scaledSpeed, direction },
    beField('acceleration', acceleration, 1),
    beField('steps', normalize(steps, calibration), STEPS_WIDTH),
  ]);
}

export function parseSendStepResponse(
  deviceId: number,
  opcode: number,
  frame: Uint8Array
): MoveStatus {
  return toMoveStatus(parseStatusResponse(deviceId, opcode, frame));
}
