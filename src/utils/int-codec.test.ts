import { describe, it, expect } from 'vitest';
import { packInt, unpackInt, intFitsWidth, intBounds } from './int-codec.js';
import { FieldRangeError, MalformedFrameError } from '../errors.js';
import type { ByteOrder, IntWidth } from '../types/stepper-types.js';

describe('packInt', () => {
  it('writes big-endian and little-endian byte orders', () => {
    expect(Array.from(packInt(0x1234, 2, 'be'))).toEqual([0x12, 0x34]);
    expect(Array.from(packInt(0x1234, 2, 'le'))).toEqual([0x34, 0x12]);
    expect(Array.from(packInt(0x00fa00, 3, 'be'))).toEqual([0x00, 0xfa, 0x00]);
  });

  it('writes negative values in two’s complement', () => {
    expect(Array.from(packInt(-1, 2, 'be', true))).toEqual([0xff, 0xff]);
    expect(Array.from(packInt(-0x4000, 3, 'be', true))).toEqual([0xff, 0xc0, 0x00]);
    expect(Array.from(packInt(-128, 1, 'le', true, { strict: true }))).toEqual([0x80]);
  });

  it('truncates by default and rejects overflow in strict mode', () => {
    expect(Array.from(packInt(0x1ff, 1))).toEqual([0xff]);
    expect(() => packInt(0x1ff, 1, 'be', false, { strict: true })).toThrow(FieldRangeError);
    expect(() => packInt(128, 1, 'be', true, { strict: true })).toThrow(RangeError);
    expect(() => packInt(-1, 2, 'be', false, { strict: true })).toThrow(FieldRangeError);
  });

  it('names the field in range errors', () => {
    expect(() => packInt(300, 1, 'be', false, { strict: true, field: 'acceleration' })).toThrow(
      'acceleration must be 0-255, got 300'
    );
  });

  it('rejects non-integers', () => {
    expect(() => packInt(1.5, 2)).toThrow(FieldRangeError);
  });

  it('packs 48-bit values exactly', () => {
    expect(Array.from(packInt(0x123456789abc, 6, 'be'))).toEqual([
      0x12, 0x34, 0x56, 0x78, 0x9a, 0xbc,
    ]);
    expect(Array.from(packInt(-2, 6, 'be', true))).toEqual([0xff, 0xff, 0xff, 0xff, 0xff, 0xfe]);
    expect(Array.from(packInt(0x7fffffffffffn, 6, 'le', true, { strict: true }))).toEqual([
      0xff, 0xff, 0xff, 0xff, 0xff, 0x7f,
    ]);
  });
});

describe('unpackInt', () => {
  it('reads signed and unsigned values', () => {
    const bytes = Uint8Array.of(0xff, 0x7f);
    expect(unpackInt(bytes, 0, 2, 'le', true)).toBe(0x7fff);
    expect(unpackInt(bytes, 0, 2, 'be', true)).toBe(-129);
    expect(unpackInt(bytes, 0, 2, 'be', false)).toBe(0xff7f);
  });

  it('reads at an offset', () => {
    const bytes = Uint8Array.of(0xaa, 0x00, 0x01, 0x00, 0x00);
    expect(unpackInt(bytes, 1, 4, 'be', true)).toBe(0x10000);
  });

  it('reads 48-bit values exactly', () => {
    expect(unpackInt(Uint8Array.of(0xff, 0xff, 0xff, 0xff, 0xff, 0xfe), 0, 6, 'be', true)).toBe(-2);
    expect(unpackInt(Uint8Array.of(0x12, 0x34, 0x56, 0x78, 0x9a, 0xbc), 0, 6, 'be')).toBe(
      0x123456789abc
    );
  });

  it('fails when the read runs past the buffer', () => {
    expect(() => unpackInt(Uint8Array.of(0x01, 0x02), 1, 2)).toThrow(MalformedFrameError);
  });

  it('inverts packInt across widths and orders', () => {
    const cases: Array<[number, IntWidth, boolean]> = [
      [-0x800000, 3, true],
      [0x7fffff, 3, true],
      [0xffffffff, 4, false],
      [-0x80000000, 4, true],
      [-0x800000000000, 6, true],
      [0xffffffffffff, 6, false],
    ];
    const orders: ByteOrder[] = ['be', 'le'];
    for (const [value, width, signed] of cases) {
      for (const order of orders) {
        expect(unpackInt(packInt(value, width, order, signed), 0, width, order, signed)).toBe(value);
      }
    }
  });
});

describe('intFitsWidth', () => {
  it('checks bounds for the signedness', () => {
    expect(intFitsWidth(0x7fffff, 3, true)).toBe(true);
    expect(intFitsWidth(0x800000, 3, true)).toBe(false);
    expect(intFitsWidth(0x800000, 3, false)).toBe(true);
    expect(intFitsWidth(0.5, 1, false)).toBe(false);
    expect(intBounds(2, true)).toEqual({ min: -32768n, max: 32767n });
  });
});
