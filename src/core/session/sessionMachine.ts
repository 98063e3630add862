/**
 * Session state machine
 *
 *   NOT_STARTED --start--> COUNTDOWN --(countdown <= 0)--> RUNNING --(last phase exits)--> COMPLETE
 *   COMPLETE --restart--> COUNTDOWN
 *
 * A calibration window can open at any time. While it is open the control
 * angle is forced to 0, the classifier is held neutral, the countdown and
 * phase timers are suspended and the vehicle is stopped.
 *
 * Every function here is pure: state in, state out. One tickSession() call
 * is one control-loop frame.
 */

import type {
  PhaseSpec,
  RepMetrics,
  RepRecord,
  SessionConfig,
  SessionReport,
  SessionState,
  TickInput,
} from '../models/types';
import { beginCalibration, createCalibration, feedCalibration } from '../calibration/zeroCalibration';
import { nextDirection } from '../control/directionClassifier';
import { mapActuation, NO_ACTUATION } from '../control/actuation';
import { averageSpeedKmh, createKinematics, stepKinematics } from '../physics/kinematics';
import { buildPhaseSequence, isRepPhase, repDirection, totalReps } from './phases';

export const DEFAULT_SESSION_CONFIG: SessionConfig = {
  deadzone_deg: 2.0,
  angleMaxForward_deg: 30.0,
  angleMaxReverse_deg: 30.0,
  gammaForward: 0.9,
  gammaReverse: 0.9,
  vMax: 980.0,
  vRevMax: 600.0,
  aMax: 1200.0,
  aRevMax: 900.0,
  drag: 180.0,
  pxPerM: 70.0,
  startCountdown_s: 8.0,
  targetFront_deg: 20.0,
  targetBack_deg: -20.0,
  enter_deg: 3.0,
  exit_deg: 2.0,
  repTime_s: 10.0,
  restTime_s: 2.0,
  repsEach: 5,
  settleTol_deg: 2.5,
  settleTime_s: 3.0,
  settleMax_s: 6.0,
  calibrationWindow_s: 4.0,
  lowBattery_v: 3.6,
};

const MIN_RATE_DT = 1e-3;
const SETTLE_EPS_S = 1e-9;

function freshRep(): RepMetrics {
  return { extreme_deg: null, hit: false, elapsed_s: 0, timeToTarget_s: null };
}

/**
 * Power-on state. The zero-calibration window is already open, as the
 * foot is expected to rest while the sensor connects.
 */
export function createSessionState(cfg: SessionConfig): SessionState {
  const phases = buildPhaseSequence(cfg);
  return {
    lifecycle: 'NOT_STARTED',
    countdownLeft_s: 0,
    phases,
    phaseIndex: 0,
    phaseLeft_s: phases[0]?.duration_s ?? 0,
    settleOk_s: 0,
    settleTotal_s: 0,
    repsCompleted: 0,
    elapsed_s: 0,
    rep: freshRep(),
    report: Object.freeze([]),
    calibration: createCalibration(true),
    direction: 'neutral',
    raw_deg: 0,
    angle_deg: 0,
    angleRate_dps: 0,
    actuation: NO_ACTUATION,
    kinematics: createKinematics(),
  };
}

/**
 * Full reset into COUNTDOWN. The calibration zero (and any open window)
 * is kept, since it belongs to the sensor mounting rather than the run.
 */
export function resetSession(state: SessionState, cfg: SessionConfig): SessionState {
  const fresh = createSessionState(cfg);
  return {
    ...fresh,
    lifecycle: 'COUNTDOWN',
    countdownLeft_s: cfg.startCountdown_s,
    calibration: state.calibration,
    raw_deg: state.raw_deg,
  };
}

export function startSession(state: SessionState, cfg: SessionConfig): SessionState {
  if (state.lifecycle !== 'NOT_STARTED') return state;
  return resetSession(state, cfg);
}

export function restartSession(state: SessionState, cfg: SessionConfig): SessionState {
  if (state.lifecycle !== 'COMPLETE') return state;
  return resetSession(state, cfg);
}

export function requestCalibration(state: SessionState): SessionState {
  return {
    ...state,
    calibration: beginCalibration(state.calibration),
    direction: 'neutral',
    angle_deg: 0,
    angleRate_dps: 0,
    actuation: NO_ACTUATION,
  };
}

export function currentPhase(state: SessionState): PhaseSpec | null {
  if (state.lifecycle !== 'RUNNING') return null;
  return state.phases[state.phaseIndex] ?? null;
}

export function isControllable(state: SessionState): boolean {
  return state.lifecycle === 'RUNNING' && !state.calibration.active;
}

export function isMotionEnabled(state: SessionState): boolean {
  const phase = currentPhase(state);
  return isControllable(state) && phase !== null && phase.kind !== 'TRANSITION';
}

function advancePhase(s: SessionState): SessionState {
  const phaseIndex = s.phaseIndex + 1;
  const next = s.phases[phaseIndex];
  const base = { ...s, phaseIndex, settleOk_s: 0, settleTotal_s: 0, rep: freshRep() };

  if (!next) {
    return { ...base, lifecycle: 'COMPLETE', phaseLeft_s: 0 };
  }
  return { ...base, phaseLeft_s: next.duration_s };
}

/**
 * Closes the active repetition. If the foot never crossed zero in the
 * phase's direction the extreme is recorded as 0 rather than the observed
 * value.
 */
function finalizeRep(s: SessionState, kind: 'REP_BACK' | 'REP_FRONT'): SessionState {
  const observed = s.rep.extreme_deg ?? 0;
  const extreme_deg = kind === 'REP_FRONT' ? Math.max(0, observed) : Math.min(0, observed);

  const record: RepRecord = Object.freeze({
    direction: repDirection(kind),
    extreme_deg,
    timeToTarget_s: s.rep.timeToTarget_s,
  });

  return {
    ...s,
    report: Object.freeze([...s.report, record]),
    repsCompleted: s.repsCompleted + 1,
  };
}

function stepRep(s: SessionState, kind: 'REP_BACK' | 'REP_FRONT', angle: number, dt: number, cfg: SessionConfig): SessionState {
  const front = kind === 'REP_FRONT';
  const elapsed_s = s.rep.elapsed_s + dt;
  const prev = s.rep.extreme_deg;
  const extreme_deg = prev === null ? angle : front ? Math.max(prev, angle) : Math.min(prev, angle);

  let { hit, timeToTarget_s } = s.rep;
  if (!hit && (front ? angle >= cfg.targetFront_deg : angle <= cfg.targetBack_deg)) {
    hit = true;
    timeToTarget_s = elapsed_s;
  }

  const next: SessionState = {
    ...s,
    phaseLeft_s: s.phaseLeft_s - dt,
    rep: { extreme_deg, hit, elapsed_s, timeToTarget_s },
  };

  if (next.phaseLeft_s <= 0) {
    return advancePhase(finalizeRep(next, kind));
  }
  return next;
}

function stepPhase(s: SessionState, angle: number, dt: number, cfg: SessionConfig): SessionState {
  const phase = s.phases[s.phaseIndex];
  if (!phase) return { ...s, lifecycle: 'COMPLETE' };
  if (isRepPhase(phase.kind)) return stepRep(s, phase.kind, angle, dt, cfg);

  if (phase.kind === 'TRANSITION') {
    const settleTotal_s = s.settleTotal_s + dt;
    // The foot must stay inside the band continuously; any excursion restarts the clock.
    const settleOk_s = Math.abs(angle) <= cfg.settleTol_deg ? s.settleOk_s + dt : 0;
    const next: SessionState = { ...s, settleTotal_s, settleOk_s, phaseLeft_s: s.phaseLeft_s - dt };

    // Sums of frame dt drift below the exact total, hence the tolerance.
    if (settleOk_s >= cfg.settleTime_s - SETTLE_EPS_S || settleTotal_s >= cfg.settleMax_s - SETTLE_EPS_S) {
      return advancePhase(next);
    }
    return next;
  }

  const next: SessionState = { ...s, phaseLeft_s: s.phaseLeft_s - dt };
  return next.phaseLeft_s <= 0 ? advancePhase(next) : next;
}

function stepLifecycle(s: SessionState, angle: number, dt: number, cfg: SessionConfig): SessionState {
  switch (s.lifecycle) {
    case 'COUNTDOWN': {
      const countdownLeft_s = s.countdownLeft_s - dt;
      if (countdownLeft_s > 0) return { ...s, countdownLeft_s };

      return {
        ...s,
        lifecycle: 'RUNNING',
        countdownLeft_s: 0,
        phaseIndex: 0,
        phaseLeft_s: s.phases[0]?.duration_s ?? 0,
        rep: freshRep(),
      };
    }
    case 'RUNNING':
      return stepPhase(s, angle, dt, cfg);
    default:
      return s;
  }
}

export function tickSession(state: SessionState, input: TickInput, cfg: SessionConfig): SessionState {
  const dt = isFinite(input.dt) && input.dt > 0 ? input.dt : 0;
  const raw_deg = isFinite(input.angle_deg) ? input.angle_deg : state.raw_deg;

  const calibration = state.calibration.active
    ? feedCalibration(state.calibration, raw_deg, dt, cfg.calibrationWindow_s)
    : state.calibration;

  const controllable = state.lifecycle === 'RUNNING' && !calibration.active;
  const angle_deg = controllable ? raw_deg - calibration.zero_deg : 0;
  const angleRate_dps = controllable ? (angle_deg - state.angle_deg) / Math.max(MIN_RATE_DT, dt) : 0;
  const direction = nextDirection(state.direction, angle_deg, cfg, controllable);

  let s: SessionState = { ...state, calibration, raw_deg, angle_deg, angleRate_dps, direction };

  if (state.lifecycle === 'COUNTDOWN' || state.lifecycle === 'RUNNING') {
    s = { ...s, elapsed_s: s.elapsed_s + dt };
  }

  if (!calibration.active) {
    s = stepLifecycle(s, angle_deg, dt, cfg);
  }

  const enabled = isMotionEnabled(s);
  const actuation = mapActuation(angle_deg, cfg);
  const kinematics = stepKinematics(s.kinematics, actuation, cfg, dt, enabled);

  return { ...s, actuation, kinematics };
}

export function buildReport(state: SessionState, cfg: SessionConfig): SessionReport {
  return {
    reps: state.report,
    repsCompleted: state.repsCompleted,
    repsTotal: totalReps(cfg),
    totalTime_s: state.elapsed_s,
    avgSpeed_kmh: averageSpeedKmh(state.kinematics),
  };
}
