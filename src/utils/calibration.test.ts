import { describe, it, expect } from 'vitest';
import { UNCALIBRATED, assertCalibration, normalize } from './calibration.js';
import { FieldRangeError } from '../errors.js';

describe('normalize', () => {
  it('leaves values unchanged without calibration', () => {
    expect(normalize(320, UNCALIBRATED)).toBe(320);
  });

  it('scales and rounds to the nearest integer', () => {
    expect(normalize(20, { normFactor: 16 })).toBe(320);
    expect(normalize(10, { normFactor: 0.25 })).toBe(3);
    expect(normalize(-4000, { normFactor: 1.5 })).toBe(-6000);
  });

  it('rejects factors that are not positive and finite', () => {
    expect(() => assertCalibration({ normFactor: 0 })).toThrow(FieldRangeError);
    expect(() => assertCalibration({ normFactor: Number.NaN })).toThrow(FieldRangeError);
    expect(() => normalize(1, { normFactor: Number.POSITIVE_INFINITY })).toThrow(FieldRangeError);
  });
});
