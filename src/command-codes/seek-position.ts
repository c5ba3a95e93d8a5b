// src/command-codes/seek-position.ts

import type { MoveStatus } from '../constants/constants.js';
import { buildFrame } from '../framers/bus-framer.js';
import type {
  AbsolutePositionParams,
  AngleMoveParams,
  MotionCalibration,
} from '../types/stepper-types.js';
import { normalize } from '../utils/calibration.js';
import { beField, parseStatusResponse, toMoveStatus, validateSpeed } from './common.js';

const POSITION_WIDTH = 3;

/**
 * Builds an absolute move in steps: `[opcode, speed (u16 BE), acceleration, position (i24 BE)]`.
 * The speed field carries no direction bit; the driver derives it from the target.
 */
export function buildSeekPositionRequest(
  deviceId: number,
  opcode: number,
  { speed, acceleration, position }: AbsolutePositionParams,
  calibration: MotionCalibration
): Uint8Array {
  const scaledSpeed = normalize(speed, calibration);
  validateSpeed(scaledSpeed);
  return buildFrame(deviceId, opcode, [
    beField('speed', scaledSpeed, 2),
    beField('acceleration', acceleration, 1),
    beField('position', normalize(position, calibration), POSITION_WIDTH, true),
  ]);
}

/**
 * Builds a relative (SEND_ANGLE) or absolute (SEEK_POS_BY_ANGLE) move in encoder units.
 * Angles are not normalized.
 */
export function buildAngleMoveRequest(
  deviceId: number,
  opcode: number,
  { speed, acceleration, angle }: AngleMoveParams,
  calibration: MotionCalibration
): Uint8Array {
  const scaledSpeed = normalize(speed, calibration);
  validateSpeed(scaledSpeed);
  return buildFrame(deviceId, opcode, [
    beField('speed', scaledSpeed, 2),
    beField('acceleration', acceleration, 1),
    beField('angle', angle, POSITION_WIDTH, true),
  ]);
}

export function parseMoveResponse(deviceId: number, opcode: number, frame: Uint8Array): MoveStatus {
  return toMoveStatus(parseStatusResponse(deviceId, opcode, frame));
}
