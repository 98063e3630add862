import type { CalibrationState } from '../models/types';

export const DEFAULT_CALIBRATION_WINDOW_S = 4;

export function createCalibration(active = true): CalibrationState {
  return { active, elapsed_s: 0, sum: 0, count: 0, zero_deg: 0 };
}

/**
 * Open a fresh window. The previous zero stays in effect until the
 * window closes.
 */
export function beginCalibration(prev: CalibrationState): CalibrationState {
  return { active: true, elapsed_s: 0, sum: 0, count: 0, zero_deg: prev.zero_deg };
}

export function feedCalibration(
  cal: CalibrationState,
  angle_deg: number,
  dt: number,
  window_s: number = DEFAULT_CALIBRATION_WINDOW_S
): CalibrationState {
  if (!cal.active) return cal;

  const sum = cal.sum + angle_deg;
  const count = cal.count + 1;
  const elapsed_s = cal.elapsed_s + dt;

  if (elapsed_s >= window_s) {
    return {
      active: false,
      elapsed_s,
      sum,
      count,
      zero_deg: sum / Math.max(1, count),
    };
  }

  return { ...cal, sum, count, elapsed_s };
}

export function calibrationProgress(cal: CalibrationState, window_s: number = DEFAULT_CALIBRATION_WINDOW_S): number {
  if (!cal.active) return 100;
  return Math.min(99, (cal.elapsed_s / window_s) * 100);
}
