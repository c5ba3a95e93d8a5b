// src/framers/bus-framer.ts
import {
  MAX_DEVICE_ID,
  MAX_SPEED_VALUE,
  MIN_DEVICE_ID,
  RotationDirection,
} from '../constants/constants.js';
import {
  ChecksumError,
  FieldRangeError,
  InvalidFrameLengthError,
  MalformedFrameError,
} from '../errors.js';
import type {
  BusResponse,
  FrameField,
  SpeedProperties,
} from '../types/stepper-types.js';
import { sum8 } from '../utils/checksum.js';
import { packInt } from '../utils/int-codec.js';
import { concatUint8Arrays, formatHexBytes, isIntInRange, sliceUint8Array } from '../utils/utils.js';

const SPEED_FIELD_SIZE = 2;
/** opcode + checksum */
const FRAME_OVERHEAD = 2;

export function validateDeviceId(deviceId: number): void {
  if (!isIntInRange(deviceId, MIN_DEVICE_ID, MAX_DEVICE_ID)) {
    throw new FieldRangeError('deviceId', deviceId, MIN_DEVICE_ID, MAX_DEVICE_ID);
  }
}

function validateOpcode(opcode: number): void {
  if (!isIntInRange(opcode, 0, 0xff)) {
    throw new FieldRangeError('opcode', opcode, 0, 0xff);
  }
}

/**
 * Checksum of an MKS bus frame: the device id plus every frame byte before the checksum,
 * modulo 256. The device id itself is never part of the frame.
 */
export function busChecksum(deviceId: number, payload: Uint8Array): number {
  return sum8(deviceId, payload);
}

/**
 * Packs speed and direction into two bytes:
 * `[((speed >> 8) & 0x0f) | (direction << 7), speed & 0xff]`.
 * @throws FieldRangeError if the speed does not fit 12 bits
 */
export function packSpeedProperties(speed: number, direction: RotationDirection): Uint8Array {
  if (!isIntInRange(speed, 0, MAX_SPEED_VALUE)) {
    throw new FieldRangeError('speed', speed, 0, MAX_SPEED_VALUE);
  }
  const bytes = new Uint8Array(SPEED_FIELD_SIZE);
  bytes[0] = ((speed >> 8) & 0x0f) | ((direction & 0x01) << 7);
  bytes[1] = speed & 0xff;
  return bytes;
}

export function unpackSpeedProperties(bytes: Uint8Array, offset: number = 0): SpeedProperties {
  if (offset < 0 || offset + SPEED_FIELD_SIZE > bytes.length) {
    throw new MalformedFrameError(`Speed field needs 2 bytes at offset ${offset}`, bytes);
  }
  const hi = bytes[offset];
  const lo = bytes[offset + 1];
  return {
    speed: ((hi & 0x0f) << 8) | lo,
    direction: (hi & 0x80) !== 0 ? RotationDirection.CCW : RotationDirection.CW,
  };
}

function encodeField(field: FrameField): Uint8Array {
  switch (field.kind) {
    case 'speed':
      return packSpeedProperties(field.speed, field.direction);
    case 'int':
      return packInt(field.value, field.width, field.order, field.signed, {
        strict: true,
        field: field.name,
      });
  }
}

/**
 * Builds `[opcode] + fields + [checksum]`.
 * @throws FieldRangeError if the device id, opcode or any field value is out of range
 */
export function buildFrame(
  deviceId: number,
  opcode: number,
  fields: readonly FrameField[] = []
): Uint8Array {
  validateDeviceId(deviceId);
  validateOpcode(opcode);

  const body = concatUint8Arrays([Uint8Array.of(opcode), ...fields.map(encodeField)]);
  return concatUint8Arrays([body, Uint8Array.of(busChecksum(deviceId, body))]);
}

/**
 * Checks the trailing checksum of a frame of any length.
 */
export function verifyChecksum(deviceId: number, frame: Uint8Array): boolean {
  if (frame.length < FRAME_OVERHEAD) return false;
  return busChecksum(deviceId, sliceUint8Array(frame, 0, -1)) === frame[frame.length - 1];
}

/**
 * Validates a response frame and returns its opcode echo and field bytes.
 * @param expectedFieldWidth - bytes between the opcode and the checksum
 * @throws InvalidFrameLengthError (a MalformedFrameError) if the length is not `2 + expectedFieldWidth`
 * @throws ChecksumError if the last byte does not match the recomputed checksum
 */
export function parseResponse(
  deviceId: number,
  frame: Uint8Array,
  expectedFieldWidth: number
): BusResponse {
  const expectedLength = FRAME_OVERHEAD + expectedFieldWidth;
  if (frame.length !== expectedLength) {
    throw new InvalidFrameLengthError(frame.length, expectedLength, frame);
  }

  const received = frame[frame.length - 1];
  const expected = busChecksum(deviceId, sliceUint8Array(frame, 0, -1));
  if (received !== expected) {
    throw new ChecksumError(received, expected);
  }

  return {
    opcode: frame[0],
    fields: sliceUint8Array(frame, 1, -1),
  };
}

/**
 * Formats a frame the way the driver manual prints it, device id first:
 * `formatFrame(1, frame)` gives `'01 F6 01 40 02 3A'`.
 */
export function formatFrame(deviceId: number, frame: Uint8Array): string {
  const id = deviceId.toString(16).toUpperCase().padStart(deviceId > 0xff ? 3 : 2, '0');
  return frame.length > 0 ? `${id} ${formatHexBytes(frame)}` : id;
}
