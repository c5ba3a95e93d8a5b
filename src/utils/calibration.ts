// src/utils/calibration.ts

import { FieldRangeError } from '../errors.js';
import type { MotionCalibration } from '../types/stepper-types.js';

/** Leaves speeds and steps as given */
export const UNCALIBRATED: MotionCalibration = Object.freeze({ normFactor: 1 });

export function assertCalibration(calibration: MotionCalibration): void {
  const { normFactor } = calibration;
  if (!Number.isFinite(normFactor) || normFactor <= 0) {
    throw new FieldRangeError('normFactor', normFactor, Number.MIN_VALUE, Number.MAX_VALUE);
  }
}

/**
 * Scales a speed, step count or step position by the calibration factor.
 * Accelerations and angles are never normalized.
 */
export function normalize(value: number, calibration: MotionCalibration): number {
  assertCalibration(calibration);
  return Math.round(value * calibration.normFactor);
}
