// src/command-codes/common.ts
import { HomeStatus, MAX_SPEED_VALUE, MotorStatus, MoveStatus } from '../constants/constants.js';
import { FieldRangeError, MalformedFrameError, UnexpectedOpcodeError } from '../errors.js';
import { parseResponse } from '../framers/bus-framer.js';
import type { IntWidth, PackedField } from '../types/stepper-types.js';
import { unpackInt } from '../utils/int-codec.js';
import { isIntInRange } from '../utils/utils.js';

/** Big-endian field, packed strictly by buildFrame */
export function beField(
  name: string,
  value: number,
  width: IntWidth,
  signed: boolean = false
): PackedField {
  return { kind: 'int', value, width, order: 'be', signed, name };
}

export function validateSpeed(speed: number): void {
  if (!isIntInRange(speed, 0, MAX_SPEED_VALUE)) {
    throw new FieldRangeError('speed', speed, 0, MAX_SPEED_VALUE);
  }
}

/**
 * Verifies the opcode echo, length and checksum of a response and returns its field bytes.
 * @throws UnexpectedOpcodeError, InvalidFrameLengthError, ChecksumError
 */
export function readResponseFields(
  deviceId: number,
  opcode: number,
  frame: Uint8Array,
  fieldWidth: number
): Uint8Array {
  if (frame.length > 0 && frame[0] !== opcode) {
    throw new UnexpectedOpcodeError(opcode, frame[0]);
  }
  return parseResponse(deviceId, frame, fieldWidth).fields;
}

/**
 * Parses the one-byte status most commands answer with.
 */
export function parseStatusResponse(deviceId: number, opcode: number, frame: Uint8Array): number {
  const fields = readResponseFields(deviceId, opcode, frame, 1);
  return unpackInt(fields, 0, 1);
}

const MOVE_STATUS_MAP = new Map<number, MoveStatus>([
  [0, MoveStatus.FAILED],
  [1, MoveStatus.MOVING],
  [2, MoveStatus.COMPLETED],
  [3, MoveStatus.LIMIT_REACHED],
]);

const MOTOR_STATUS_MAP = new Map<number, MotorStatus>([
  [0, MotorStatus.QUERY_FAILED],
  [1, MotorStatus.STOPPED],
  [2, MotorStatus.ACCELERATING],
  [3, MotorStatus.DECELERATING],
  [4, MotorStatus.FULL_SPEED],
  [5, MotorStatus.HOMING],
  [6, MotorStatus.CALIBRATING],
]);

const HOME_STATUS_MAP = new Map<number, HomeStatus>([
  [0, HomeStatus.FAILED],
  [1, HomeStatus.STARTED],
  [2, HomeStatus.COMPLETED],
]);

function lookupStatus<T>(map: ReadonlyMap<number, T>, code: number, label: string): T {
  const status = map.get(code);
  if (status === undefined) {
    throw new MalformedFrameError(`Unknown ${label} status: ${code}`);
  }
  return status;
}

export function toMoveStatus(code: number): MoveStatus {
  return lookupStatus(MOVE_STATUS_MAP, code, 'move');
}

export function toMotorStatus(code: number): MotorStatus {
  return lookupStatus(MOTOR_STATUS_MAP, code, 'motor');
}

export function toHomeStatus(code: number): HomeStatus {
  return lookupStatus(HOME_STATUS_MAP, code, 'homing');
}
