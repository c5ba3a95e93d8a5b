// src/command-codes/read-encoder.ts

import { buildFrame } from '../framers/bus-framer.js';
import type { EncoderSplitValue } from '../types/stepper-types.js';
import { unpackInt } from '../utils/int-codec.js';
import { readResponseFields } from './common.js';

const SPLIT_WIDTH = 6;
const ADDITIVE_WIDTH = 6;

/**
 * Any encoder read is the bare opcode; the three encoder readouts differ only in the response.
 */
export function buildReadEncoderRequest(deviceId: number, opcode: number): Uint8Array {
  return buildFrame(deviceId, opcode);
}

/**
 * Split encoder value: `carry` (i32 BE, whole turns) and `value` (u16 BE, 0-0x3FFF per turn).
 */
export function parseReadEncoderSplitResponse(
  deviceId: number,
  opcode: number,
  frame: Uint8Array
): EncoderSplitValue {
  const fields = readResponseFields(deviceId, opcode, frame, SPLIT_WIDTH);
  return {
    carry: unpackInt(fields, 0, 4, 'be', true),
    value: unpackInt(fields, 4, 2, 'be', false),
  };
}

/**
 * Additive (0x31) or raw (0x35) encoder value, i48 BE.
 */
export function parseReadEncoderAdditiveResponse(
  deviceId: number,
  opcode: number,
  frame: Uint8Array
): number {
  const fields = readResponseFields(deviceId, opcode, frame, ADDITIVE_WIDTH);
  return unpackInt(fields, 0, 6, 'be', true);
}
