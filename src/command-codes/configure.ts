// src/command-codes/configure.ts

import { WorkMode } from '../constants/constants.js';
import { FieldRangeError } from '../errors.js';
import { buildFrame } from '../framers/bus-framer.js';
import { isIntInRange } from '../utils/utils.js';
import { beField, parseStatusResponse } from './common.js';

const MAX_WORKING_CURRENT = 5200;

export function buildSetWorkModeRequest(deviceId: number, opcode: number, mode: WorkMode): Uint8Array {
  if (!Object.values(WorkMode).includes(mode)) {
    throw new FieldRangeError('workMode', mode, WorkMode.CR_OPEN, WorkMode.SR_VFOC);
  }
  return buildFrame(deviceId, opcode, [beField('workMode', mode, 1)]);
}

/**
 * @param milliamps - working current, u16 BE
 */
export function buildSetWorkingCurrentRequest(
  deviceId: number,
  opcode: number,
  milliamps: number
): Uint8Array {
  if (!isIntInRange(milliamps, 0, MAX_WORKING_CURRENT)) {
    throw new FieldRangeError('workingCurrent', milliamps, 0, MAX_WORKING_CURRENT);
  }
  return buildFrame(deviceId, opcode, [beField('workingCurrent', milliamps, 2)]);
}

export function buildSetMicrostepRequest(
  deviceId: number,
  opcode: number,
  microsteps: number
): Uint8Array {
  return buildFrame(deviceId, opcode, [beField('microsteps', microsteps, 1)]);
}

export function parseConfigureResponse(deviceId: number, opcode: number, frame: Uint8Array): boolean {
  return parseStatusResponse(deviceId, opcode, frame) === 1;
}
