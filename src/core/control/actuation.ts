import type { Actuation, SessionConfig } from '../models/types';
import { clamp } from '../math/filters';

export type ActuationParams = Pick<
  SessionConfig,
  'deadzone_deg' | 'angleMaxForward_deg' | 'angleMaxReverse_deg' | 'gammaForward' | 'gammaReverse'
>;

export const NO_ACTUATION: Actuation = { throttle: 0, reverse: 0 };

/**
 * Map the calibrated angle to a (throttle, reverse) pair.
 *
 * Positive (plantar) angles drive forward, negative (dorsi) angles reverse.
 * An exponent below 1 makes the curve steep just past the deadzone and
 * flat toward the end of range.
 */
export function mapActuation(angle_deg: number, p: ActuationParams): Actuation {
  const dz = p.deadzone_deg;
  if (!isFinite(angle_deg) || Math.abs(angle_deg) < dz) {
    return NO_ACTUATION;
  }

  const aEff = Math.sign(angle_deg) * (Math.abs(angle_deg) - dz);

  if (aEff > 0) {
    const t = clamp(aEff / p.angleMaxForward_deg, 0, 1);
    return { throttle: t ** p.gammaForward, reverse: 0 };
  }

  const t = clamp(-aEff / p.angleMaxReverse_deg, 0, 1);
  return { throttle: 0, reverse: t ** p.gammaReverse };
}
