import { describe, it, expect } from 'vitest';
import { createCalibration } from '../core/calibration/zeroCalibration';
import type { SessionConfig, SessionState } from '../core/models/types';
import {
  DEFAULT_SESSION_CONFIG,
  buildReport,
  createSessionState,
  currentPhase,
  isMotionEnabled,
  requestCalibration,
  restartSession,
  startSession,
  tickSession,
} from '../core/session/sessionMachine';

const cfg: SessionConfig = {
  ...DEFAULT_SESSION_CONFIG,
  settleTol_deg: 2.5,
  settleTime_s: 3,
  settleMax_s: 6,
};

function calibrated(config: SessionConfig = cfg): SessionState {
  return { ...createSessionState(config), calibration: createCalibration(false) };
}

function runningAt(phaseIndex: number, config: SessionConfig = cfg): SessionState {
  const base = calibrated(config);
  return {
    ...base,
    lifecycle: 'RUNNING',
    phaseIndex,
    phaseLeft_s: base.phases[phaseIndex].duration_s,
  };
}

function feed(state: SessionState, angles: number[], dt: number, config: SessionConfig = cfg): SessionState {
  return angles.reduce((s, angle_deg) => tickSession(s, { angle_deg, dt }, config), state);
}

describe('Session state machine', () => {
  describe('lifecycle', () => {
    it('should start in NOT_STARTED with a calibration window open', () => {
      const state = createSessionState(cfg);
      expect(state.lifecycle).toBe('NOT_STARTED');
      expect(state.calibration.active).toBe(true);
      expect(state.phases).toHaveLength(20);
    });

    it('should run the countdown before the first phase', () => {
      let state = startSession(calibrated(), cfg);
      expect(state.lifecycle).toBe('COUNTDOWN');
      expect(state.countdownLeft_s).toBe(8);

      state = feed(state, [30, 30, 30, 30, 30, 30, 30], 1);
      expect(state.lifecycle).toBe('COUNTDOWN');
      expect(state.angle_deg).toBe(0);
      expect(state.direction).toBe('neutral');
      expect(state.kinematics.speed).toBe(0);

      state = feed(state, [30], 1);
      expect(state.lifecycle).toBe('RUNNING');
      expect(state.phaseIndex).toBe(0);
      expect(state.phaseLeft_s).toBe(10);
      expect(currentPhase(state)?.kind).toBe('REP_BACK');
    });

    it('should count session time from the countdown', () => {
      const state = feed(startSession(calibrated(), cfg), [0, 0, 0], 0.5);
      expect(state.elapsed_s).toBe(1.5);
    });

    it('should ignore start once started', () => {
      const running = runningAt(0);
      expect(startSession(running, cfg)).toBe(running);
    });

    it('should ignore restart until the session is complete', () => {
      const running = runningAt(2);
      expect(restartSession(running, cfg)).toBe(running);

      const idle = calibrated();
      expect(restartSession(idle, cfg)).toBe(idle);
    });

    it('should fully reset on restart after completion', () => {
      const last = runningAt(19);
      const done = feed({ ...last, settleTotal_s: 5.5 }, [10], 0.5);
      expect(done.lifecycle).toBe('COMPLETE');

      const withReport = { ...done, report: [{ direction: 'FRENTE' as const, extreme_deg: 20, timeToTarget_s: 1 }] };
      const restarted = restartSession(withReport, cfg);

      expect(restarted.lifecycle).toBe('COUNTDOWN');
      expect(restarted.countdownLeft_s).toBe(8);
      expect(restarted.report).toEqual([]);
      expect(restarted.phaseIndex).toBe(0);
      expect(restarted.repsCompleted).toBe(0);
      expect(restarted.elapsed_s).toBe(0);
      expect(restarted.kinematics.distance).toBe(0);
    });
  });

  describe('calibration', () => {
    it('should compute the zero from the boot window and apply it', () => {
      let state = startSession(createSessionState(cfg), cfg);
      state = feed(state, [5, 5, 5, 5], 1);

      expect(state.calibration.active).toBe(false);
      expect(state.calibration.zero_deg).toBe(5);
      // Countdown is suspended while calibrating, except for the closing tick.
      expect(state.countdownLeft_s).toBe(7);

      const running = feed({ ...state, lifecycle: 'RUNNING', phaseLeft_s: 10 }, [15], 0.5);
      expect(running.angle_deg).toBe(10);
    });

    it('should suspend phases and stop the vehicle while recalibrating', () => {
      let state = feed(runningAt(0), [25, 25], 0.5);
      expect(state.kinematics.speed).toBeGreaterThan(0);
      const left = state.phaseLeft_s;

      state = requestCalibration(state);
      state = feed(state, [25], 0.5);

      expect(state.calibration.active).toBe(true);
      expect(state.angle_deg).toBe(0);
      expect(state.direction).toBe('neutral');
      expect(state.phaseLeft_s).toBe(left);
      expect(state.kinematics.speed).toBe(0);
      expect(isMotionEnabled(state)).toBe(false);
    });
  });

  describe('transition phase', () => {
    it('should exit after settling continuously for settleTime', () => {
      let state = feed(runningAt(1), [1, 1, 1, 1, 1], 0.5);
      expect(state.phaseIndex).toBe(1);
      expect(state.settleOk_s).toBe(2.5);

      state = feed(state, [1], 0.5);
      expect(state.phaseIndex).toBe(2);
      expect(state.settleOk_s).toBe(0);
      expect(state.settleTotal_s).toBe(0);
    });

    it('should force exit at settleMax when the foot never settles', () => {
      let state = feed(runningAt(1), Array(11).fill(10), 0.5);
      expect(state.phaseIndex).toBe(1);
      expect(state.settleOk_s).toBe(0);

      state = feed(state, [10], 0.5);
      expect(state.phaseIndex).toBe(2);
    });

    it('should restart the settle clock on any excursion', () => {
      let state = feed(runningAt(1), [0, 0, 0, 0, 4], 0.5);
      expect(state.settleOk_s).toBe(0);
      expect(state.settleTotal_s).toBe(2.5);

      state = feed(state, [0, 0, 0, 0, 0], 0.5);
      expect(state.phaseIndex).toBe(1);

      state = feed(state, [0], 0.5);
      expect(state.phaseIndex).toBe(2);
    });

    it('should keep the vehicle stopped', () => {
      const state = feed(runningAt(1), [25, 25], 0.5);
      expect(state.kinematics.speed).toBe(0);
      expect(state.kinematics.movingTime_s).toBe(0);
    });
  });

  describe('transition timing at 60 Hz', () => {
    const dt = 1 / 60;

    function ticksToLeave(angle_deg: number): number {
      let state = runningAt(1);
      let ticks = 0;
      while (state.phaseIndex === 1 && ticks < 1000) {
        state = tickSession(state, { angle_deg, dt }, cfg);
        ticks++;
      }
      return ticks;
    }

    it('should exit after exactly settleTime of frames at zero', () => {
      expect(ticksToLeave(0)).toBe(180);
    });

    it('should force the exit after exactly settleMax of frames', () => {
      expect(ticksToLeave(10)).toBe(360);
    });
  });

  describe('rest phase', () => {
    function resting(): SessionState {
      return {
        ...calibrated(),
        lifecycle: 'RUNNING',
        phases: [
          { kind: 'REST', duration_s: 2 },
          { kind: 'REP_FRONT', duration_s: 10 },
        ],
        phaseIndex: 0,
        phaseLeft_s: 2,
      };
    }

    it('should hold for its duration with the vehicle free to move', () => {
      const state = feed(resting(), [16], 1);

      expect(state.phaseIndex).toBe(0);
      expect(state.phaseLeft_s).toBe(1);
      expect(isMotionEnabled(state)).toBe(true);
      expect(state.kinematics.speed).toBeGreaterThan(0);
      expect(state.report).toHaveLength(0);
    });

    it('should advance without recording a repetition', () => {
      const state = feed(resting(), [16, 16], 1);

      expect(state.phaseIndex).toBe(1);
      expect(state.phaseLeft_s).toBe(10);
      expect(currentPhase(state)?.kind).toBe('REP_FRONT');
      expect(state.report).toHaveLength(0);
      expect(state.repsCompleted).toBe(0);
    });
  });

  describe('repetition metrics', () => {
    const repCfg: SessionConfig = { ...cfg, repTime_s: 1, targetFront_deg: 20, targetBack_deg: -20 };

    it('should record the front extreme and time to target', () => {
      const state = feed(runningAt(2, repCfg), [5, 12, 20, 18], 0.25, repCfg);

      expect(state.report).toEqual([{ direction: 'FRENTE', extreme_deg: 20, timeToTarget_s: 0.75 }]);
      expect(state.repsCompleted).toBe(1);
      expect(state.phaseIndex).toBe(3);
      expect(Object.isFrozen(state.report[0])).toBe(true);
    });

    it('should record the back minimum', () => {
      const state = feed(runningAt(0, repCfg), [-4, -21, -30, -12], 0.25, repCfg);
      expect(state.report).toEqual([{ direction: 'TRÁS', extreme_deg: -30, timeToTarget_s: 0.5 }]);
    });

    it('should floor the extreme at zero when the foot went the wrong way', () => {
      const state = feed(runningAt(0, repCfg), [3, 4, 5, 3], 0.25, repCfg);
      expect(state.report).toEqual([{ direction: 'TRÁS', extreme_deg: 0, timeToTarget_s: null }]);
    });

    it('should not append a record before the phase ends', () => {
      const state = feed(runningAt(2, repCfg), [25, 25, 25], 0.25, repCfg);
      expect(state.report).toHaveLength(0);
      expect(state.rep.hit).toBe(true);
      expect(state.rep.extreme_deg).toBe(25);
    });

    it('should drive the vehicle during a rep', () => {
      const state = feed(runningAt(2), [16, 16], 0.5);
      expect(state.direction).toBe('forward');
      expect(state.actuation.throttle).toBeCloseTo(Math.pow(14 / 30, 0.9), 10);
      expect(state.kinematics.speed).toBeGreaterThan(0);
    });
  });

  describe('input handling', () => {
    it('should hold the last raw angle on a missing sample', () => {
      let state = feed(runningAt(2), [12], 0.5);
      state = tickSession(state, { angle_deg: NaN, dt: 0.5 }, cfg);
      expect(state.raw_deg).toBe(12);
      expect(state.angle_deg).toBe(12);
    });

    it('should treat a non-finite dt as zero', () => {
      const start = runningAt(0);
      const state = tickSession(start, { angle_deg: 0, dt: NaN }, cfg);
      expect(state.phaseLeft_s).toBe(start.phaseLeft_s);
    });
  });

  describe('end to end', () => {
    function scriptedAngle(state: SessionState): number {
      const phase = currentPhase(state);
      if (state.calibration.active || !phase) return 0;
      if (phase.kind === 'REP_BACK') return -25;
      if (phase.kind === 'REP_FRONT') return 25;
      return 0;
    }

    it('should complete five back/front cycles with ten records', () => {
      let state = startSession(createSessionState(cfg), cfg);

      for (let i = 0; i < 100000 && state.lifecycle !== 'COMPLETE'; i++) {
        state = tickSession(state, { angle_deg: scriptedAngle(state), dt: 0.05 }, cfg);
      }

      expect(state.lifecycle).toBe('COMPLETE');
      expect(state.report).toHaveLength(10);
      expect(state.report.map(r => r.direction)).toEqual([
        'TRÁS', 'FRENTE', 'TRÁS', 'FRENTE', 'TRÁS', 'FRENTE', 'TRÁS', 'FRENTE', 'TRÁS', 'FRENTE',
      ]);
      state.report.forEach((rec) => {
        expect(Math.abs(rec.extreme_deg)).toBe(25);
        expect(rec.timeToTarget_s).toBeCloseTo(0.05, 10);
      });

      const report = buildReport(state, cfg);
      expect(report.repsCompleted).toBe(10);
      expect(report.repsTotal).toBe(10);
      expect(report.avgSpeed_kmh).toBeGreaterThan(0);
      expect(report.totalTime_s).toBeGreaterThan(100);
      expect(isMotionEnabled(state)).toBe(false);

      const after = tickSession(state, { angle_deg: 25, dt: 0.05 }, cfg);
      expect(after.kinematics.speed).toBe(0);
      expect(after.angle_deg).toBe(0);
      expect(after.report).toBe(state.report);
    });
  });
});
