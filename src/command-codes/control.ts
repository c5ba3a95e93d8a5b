// src/command-codes/control.ts

import type { HomeStatus } from '../constants/constants.js';
import { buildFrame } from '../framers/bus-framer.js';
import { beField, parseStatusResponse, toHomeStatus } from './common.js';

export function buildEnableMotorRequest(deviceId: number, opcode: number, enable: boolean): Uint8Array {
  return buildFrame(deviceId, opcode, [beField('enable', enable ? 1 : 0, 1)]);
}

/**
 * Emergency stop, set zero, go home and release shaft lock carry no fields.
 */
export function buildControlRequest(deviceId: number, opcode: number): Uint8Array {
  return buildFrame(deviceId, opcode);
}

export function parseControlResponse(deviceId: number, opcode: number, frame: Uint8Array): boolean {
  return parseStatusResponse(deviceId, opcode, frame) === 1;
}

export function parseGoHomeResponse(deviceId: number, opcode: number, frame: Uint8Array): HomeStatus {
  return toHomeStatus(parseStatusResponse(deviceId, opcode, frame));
}
