import type { PhaseKind, SessionConfig, SessionState } from '../models/types';
import { calibrationProgress } from '../calibration/zeroCalibration';
import { currentPhase } from './sessionMachine';

export type SessionStatus =
  | { kind: 'calibrating'; progress: number }
  | { kind: 'low_battery'; voltage: number }
  | { kind: 'idle' }
  | { kind: 'countdown'; seconds: number }
  | { kind: 'complete' }
  | { kind: 'phase'; phase: PhaseKind };

export type PhaseProgress = {
  label: string;
  left_s: number;
  total_s: number;
};

export function isLowBattery(voltage: number | null, cfg: Pick<SessionConfig, 'lowBattery_v'>): boolean {
  return voltage !== null && voltage < cfg.lowBattery_v;
}

/**
 * Single headline status, highest priority first. A low battery outranks
 * everything except calibration but never pauses the session.
 */
export function deriveStatus(state: SessionState, batteryVoltage: number | null, cfg: SessionConfig): SessionStatus {
  if (state.calibration.active) {
    return { kind: 'calibrating', progress: calibrationProgress(state.calibration, cfg.calibrationWindow_s) };
  }
  if (batteryVoltage !== null && isLowBattery(batteryVoltage, cfg)) {
    return { kind: 'low_battery', voltage: batteryVoltage };
  }
  switch (state.lifecycle) {
    case 'NOT_STARTED':
      return { kind: 'idle' };
    case 'COUNTDOWN':
      return { kind: 'countdown', seconds: Math.ceil(state.countdownLeft_s) };
    case 'COMPLETE':
      return { kind: 'complete' };
    case 'RUNNING': {
      const phase = currentPhase(state);
      return phase ? { kind: 'phase', phase: phase.kind } : { kind: 'complete' };
    }
  }
}

const PHASE_MESSAGES: Record<PhaseKind, string> = {
  REP_BACK: 'TRÁS: lift the foot',
  REP_FRONT: 'FRENTE: push the toes forward',
  TRANSITION: 'TRANSITION: return to zero',
  REST: 'REST: relax',
};

export function statusMessage(status: SessionStatus): string {
  switch (status.kind) {
    case 'calibrating':
      return `CALIBRATING: keep the foot still (${status.progress.toFixed(0)}%)`;
    case 'low_battery':
      return `LOW BATTERY: ${status.voltage.toFixed(2)} V, recharge the sensor`;
    case 'idle':
      return 'PRESS SPACE TO START';
    case 'countdown':
      return `GET READY: starting in ${status.seconds}s`;
    case 'complete':
      return 'SESSION COMPLETE';
    case 'phase':
      return PHASE_MESSAGES[status.phase];
  }
}

/**
 * Progress bar contents for the running phase. A transition counts down
 * the continuous time still needed at zero, not its timeout.
 */
export function phaseProgress(state: SessionState, cfg: SessionConfig): PhaseProgress | null {
  if (state.calibration.active) return null;
  const phase = currentPhase(state);
  if (!phase) return null;

  switch (phase.kind) {
    case 'REP_BACK':
      return { label: 'TRÁS', left_s: Math.max(0, state.phaseLeft_s), total_s: cfg.repTime_s };
    case 'REP_FRONT':
      return { label: 'FRENTE', left_s: Math.max(0, state.phaseLeft_s), total_s: cfg.repTime_s };
    case 'TRANSITION': {
      const total_s = Math.max(cfg.settleTime_s, 0.01);
      return { label: 'TRANSITION (at zero)', left_s: Math.max(0, total_s - state.settleOk_s), total_s };
    }
    case 'REST':
      return { label: 'REST', left_s: Math.max(0, state.phaseLeft_s), total_s: cfg.restTime_s };
  }
}

/**
 * Whether the running repetition's target is met by the current angle,
 * for the goal label next to the vehicle.
 */
export function targetMet(state: SessionState, cfg: SessionConfig): boolean | null {
  const phase = currentPhase(state);
  if (!phase || state.calibration.active) return null;
  if (phase.kind === 'REP_FRONT') return state.angle_deg >= cfg.targetFront_deg;
  if (phase.kind === 'REP_BACK') return state.angle_deg <= cfg.targetBack_deg;
  return null;
}
