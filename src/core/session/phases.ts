import type { PhaseKind, PhaseSpec, RepDirection, SessionConfig } from '../models/types';

/**
 * One block per repetition: back, settle, front, settle.
 * Transitions carry settleMax_s as their nominal length; they usually
 * exit earlier once the foot holds still near zero.
 */
export function buildPhaseSequence(
  cfg: Pick<SessionConfig, 'repsEach' | 'repTime_s' | 'settleMax_s'>
): readonly PhaseSpec[] {
  const seq: PhaseSpec[] = [];
  for (let i = 0; i < cfg.repsEach; i++) {
    seq.push(
      { kind: 'REP_BACK', duration_s: cfg.repTime_s },
      { kind: 'TRANSITION', duration_s: cfg.settleMax_s },
      { kind: 'REP_FRONT', duration_s: cfg.repTime_s },
      { kind: 'TRANSITION', duration_s: cfg.settleMax_s }
    );
  }
  return Object.freeze(seq);
}

export function isRepPhase(kind: PhaseKind): kind is 'REP_BACK' | 'REP_FRONT' {
  return kind === 'REP_BACK' || kind === 'REP_FRONT';
}

export function repDirection(kind: 'REP_BACK' | 'REP_FRONT'): RepDirection {
  return kind === 'REP_FRONT' ? 'FRENTE' : 'TRÁS';
}

export function totalReps(cfg: Pick<SessionConfig, 'repsEach'>): number {
  return cfg.repsEach * 2;
}
