// src/command-codes/read-status.ts

import type { MotorStatus } from '../constants/constants.js';
import { buildFrame } from '../framers/bus-framer.js';
import type { IoStatus } from '../types/stepper-types.js';
import { parseStatusResponse, toMotorStatus } from './common.js';

const IN_2 = 0x01;
const IN_1 = 0x02;
const OUT_1 = 0x04;
const OUT_2 = 0x08;

export function buildReadStatusRequest(deviceId: number, opcode: number): Uint8Array {
  return buildFrame(deviceId, opcode);
}

export function parseQueryStatusResponse(
  deviceId: number,
  opcode: number,
  frame: Uint8Array
): MotorStatus {
  return toMotorStatus(parseStatusResponse(deviceId, opcode, frame));
}

/**
 * IO port flags: bit0 IN_2, bit1 IN_1, bit2 OUT_1, bit3 OUT_2.
 */
export function parseIoStatusResponse(
  deviceId: number,
  opcode: number,
  frame: Uint8Array
): IoStatus {
  const flags = parseStatusResponse(deviceId, opcode, frame);
  return {
    in1: (flags & IN_1) !== 0,
    in2: (flags & IN_2) !== 0,
    out1: (flags & OUT_1) !== 0,
    out2: (flags & OUT_2) !== 0,
  };
}

/**
 * Boolean readouts (enable state, shaft lock) answer 1 for set, 0 for clear.
 */
export function parseFlagResponse(deviceId: number, opcode: number, frame: Uint8Array): boolean {
  return parseStatusResponse(deviceId, opcode, frame) === 1;
}
