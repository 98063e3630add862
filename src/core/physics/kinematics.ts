/**
 * Longitudinal vehicle model
 *
 * Units are screen pixels: speed in px/s, acceleration in px/s².
 * pxPerM converts to metres for reporting.
 *
 *   accel = aMax * throttle - aRevMax * reverse - drag * (speed / vMax)
 *
 * Drag is proportional to forward-normalised speed and acts whether or
 * not throttle is applied, so the car coasts to a stop.
 */

import type { Actuation, KinematicState, SessionConfig } from '../models/types';
import { clamp } from '../math/filters';

export type KinematicParams = Pick<SessionConfig, 'vMax' | 'vRevMax' | 'aMax' | 'aRevMax' | 'drag' | 'pxPerM'>;

const FAR_LAYER_FACTOR = 0.6;

export function createKinematics(): KinematicState {
  return {
    speed: 0,
    distance: 0,
    absDistance_m: 0,
    movingTime_s: 0,
    scroll: { road: 0, mid: 0, far: 0 },
  };
}

export function computeAcceleration(speed: number, cmd: Actuation, p: KinematicParams): number {
  return p.aMax * cmd.throttle - p.aRevMax * cmd.reverse - p.drag * (speed / p.vMax);
}

/**
 * Advance one tick. With motion disabled, acceleration and speed are
 * zeroed for the tick (hard stop, no coasting) and nothing accumulates.
 */
export function stepKinematics(
  state: KinematicState,
  cmd: Actuation,
  p: KinematicParams,
  dt: number,
  enabled: boolean
): KinematicState {
  if (!enabled) {
    return { ...state, speed: 0 };
  }

  const accel = computeAcceleration(state.speed, cmd, p);
  const speed = clamp(state.speed + accel * dt, -p.vRevMax, p.vMax);
  const ds = speed * dt;

  return {
    speed,
    distance: state.distance + ds,
    absDistance_m: state.absDistance_m + Math.abs(ds) / p.pxPerM,
    movingTime_s: state.movingTime_s + dt,
    scroll: {
      road: state.scroll.road + ds,
      mid: state.scroll.mid + ds,
      far: state.scroll.far + ds * FAR_LAYER_FACTOR,
    },
  };
}

export function kmhFromPxPerSec(pxps: number, pxPerM: number = 70): number {
  return (pxps / pxPerM) * 3.6;
}

export function averageSpeedKmh(state: KinematicState): number {
  if (state.movingTime_s <= 0) return 0;
  return (state.absDistance_m / state.movingTime_s) * 3.6;
}
