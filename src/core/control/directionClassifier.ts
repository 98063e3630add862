/**
 * Hysteresis classifier for the commanded direction.
 *
 *   neutral --(angle >= E)--> forward --(angle < X)--> neutral
 *   neutral --(angle <= -E)--> reverse --(angle > -X)--> neutral
 *
 * There is no direct forward <-> reverse edge; the foot has to pass
 * back through the exit band first.
 */

import type { DirectionState } from '../models/types';

export interface HysteresisThresholds {
  enter_deg: number;
  exit_deg: number;
}

export const MOTION_SPEED_THRESHOLD = 8;   // px/s
export const RATE_THRESHOLD_DPS = 1;

export function nextDirection(
  state: DirectionState,
  angle_deg: number,
  thresholds: HysteresisThresholds,
  controllable: boolean = true
): DirectionState {
  if (!controllable) return 'neutral';

  const { enter_deg, exit_deg } = thresholds;

  switch (state) {
    case 'neutral':
      if (angle_deg >= enter_deg) return 'forward';
      if (angle_deg <= -enter_deg) return 'reverse';
      return 'neutral';

    case 'forward':
      return angle_deg < exit_deg ? 'neutral' : 'forward';

    case 'reverse':
      return angle_deg > -exit_deg ? 'neutral' : 'reverse';
  }
}

// Direction the vehicle is actually moving, independent of the command.
export function classifyMotion(speed: number): DirectionState {
  if (speed > MOTION_SPEED_THRESHOLD) return 'forward';
  if (speed < -MOTION_SPEED_THRESHOLD) return 'reverse';
  return 'neutral';
}

export type RateTrend = 'plantar' | 'dorsi' | 'steady';

export function classifyRate(rate_dps: number): RateTrend {
  if (rate_dps > RATE_THRESHOLD_DPS) return 'plantar';
  if (rate_dps < -RATE_THRESHOLD_DPS) return 'dorsi';
  return 'steady';
}
