// src/utils/int-codec.ts

import { FieldRangeError, MalformedFrameError } from '../errors.js';
import type { ByteOrder, IntWidth, PackIntOptions } from '../types/stepper-types.js';

const SUPPORTED_WIDTHS: ReadonlySet<number> = new Set([1, 2, 3, 4, 6]);

function assertWidth(width: number): void {
  if (!SUPPORTED_WIDTHS.has(width)) {
    throw new FieldRangeError('width', width, 1, 6);
  }
}

/**
 * Inclusive bounds of an integer field.
 */
export function intBounds(width: IntWidth, signed: boolean): { min: bigint; max: bigint } {
  const bits = BigInt(width * 8);
  if (signed) {
    return { min: -(1n << (bits - 1n)), max: (1n << (bits - 1n)) - 1n };
  }
  return { min: 0n, max: (1n << bits) - 1n };
}

export function intFitsWidth(value: number | bigint, width: IntWidth, signed: boolean): boolean {
  if (typeof value === 'number' && !Number.isInteger(value)) return false;
  const { min, max } = intBounds(width, signed);
  const v = BigInt(value);
  return v >= min && v <= max;
}

/**
 * Packs an integer into `width` bytes.
 *
 * Little-endian byte i is `(value >> 8i) & 0xff`; big-endian emits the same bytes reversed.
 * Negative values are written in two's complement. Out-of-range values are truncated to the
 * width unless `options.strict` is set, in which case a FieldRangeError is thrown.
 *
 * @throws FieldRangeError for non-integer values, unsupported widths, or (strict) overflow
 */
export function packInt(
  value: number | bigint,
  width: IntWidth,
  order: ByteOrder = 'be',
  signed: boolean = false,
  options: PackIntOptions = {}
): Uint8Array {
  assertWidth(width);
  const field = options.field ?? 'value';
  if (typeof value === 'number' && !Number.isInteger(value)) {
    const { min, max } = intBounds(width, signed);
    throw new FieldRangeError(field, value, min, max);
  }
  if (options.strict && !intFitsWidth(value, width, signed)) {
    const { min, max } = intBounds(width, signed);
    throw new FieldRangeError(field, value, min, max);
  }

  const masked = BigInt.asUintN(width * 8, BigInt(value));
  const bytes = new Uint8Array(width);
  for (let i = 0; i < width; i++) {
    const byte = Number((masked >> BigInt(8 * i)) & 0xffn);
    bytes[order === 'le' ? i : width - 1 - i] = byte;
  }
  return bytes;
}

/**
 * Reads a `width`-byte integer at `offset`. When `signed`, the top bit of the width is the
 * two's-complement sign bit. 48-bit values are returned exactly.
 *
 * @throws MalformedFrameError if the read runs past the end of the buffer
 */
export function unpackInt(
  buffer: Uint8Array,
  offset: number,
  width: IntWidth,
  order: ByteOrder = 'be',
  signed: boolean = false
): number {
  assertWidth(width);
  if (!Number.isInteger(offset) || offset < 0 || offset + width > buffer.length) {
    throw new MalformedFrameError(
      `Cannot read ${width} bytes at offset ${offset} from ${buffer.length}-byte buffer`,
      buffer
    );
  }

  let value = 0;
  for (let i = 0; i < width; i++) {
    const index = order === 'be' ? offset + i : offset + width - 1 - i;
    // multiply instead of shifting: shifts are 32-bit
    value = value * 256 + buffer[index];
  }
  if (signed) {
    const range = 2 ** (width * 8);
    if (value >= range / 2) value -= range;
  }
  return value;
}
