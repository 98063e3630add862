import { createStore } from 'zustand/vanilla';
import type { SessionConfig, SessionReport, SessionState, TickInput } from '../core/models/types';
import {
  buildReport,
  createSessionState,
  requestCalibration,
  restartSession,
  startSession,
  tickSession,
} from '../core/session/sessionMachine';

export interface SessionStoreState {
  config: SessionConfig;
  session: SessionState;

  start: () => void;
  restart: () => void;
  recalibrate: () => void;
  tick: (input: TickInput) => SessionState;
  getReport: () => SessionReport;
}

export function createSessionStore(config: SessionConfig) {
  return createStore<SessionStoreState>()((set, get) => ({
    config,
    session: createSessionState(config),

    start: () => {
      const { session } = get();
      if (session.lifecycle !== 'NOT_STARTED') {
        console.log(`[SessionStore] Start ignored in ${session.lifecycle}`);
        return;
      }
      console.log('[SessionStore] Session started, countdown running');
      set({ session: startSession(session, config) });
    },

    restart: () => {
      const { session } = get();
      if (session.lifecycle !== 'COMPLETE') {
        console.log(`[SessionStore] Restart ignored in ${session.lifecycle}`);
        return;
      }
      console.log('[SessionStore] Session restarted');
      set({ session: restartSession(session, config) });
    },

    recalibrate: () => {
      console.log('[SessionStore] Zero calibration window opened');
      set((state) => ({ session: requestCalibration(state.session) }));
    },

    tick: (input) => {
      const prev = get().session;
      const session = tickSession(prev, input, config);

      if (prev.calibration.active && !session.calibration.active) {
        console.log(`[SessionStore] Zero calibrated at ${session.calibration.zero_deg.toFixed(2)}°`);
      }
      if (session.report.length > prev.report.length) {
        const rec = session.report[session.report.length - 1];
        console.log(
          `[SessionStore] Rep ${session.repsCompleted} ${rec.direction} extreme ${rec.extreme_deg.toFixed(1)}°`,
          rec.timeToTarget_s === null ? '(target not reached)' : `target in ${rec.timeToTarget_s.toFixed(2)}s`
        );
      }
      if (prev.lifecycle !== 'COMPLETE' && session.lifecycle === 'COMPLETE') {
        console.log(`[SessionStore] Session complete: ${session.report.length} reps recorded`);
      }

      set({ session });
      return session;
    },

    getReport: () => buildReport(get().session, config),
  }));
}

export type SessionStore = ReturnType<typeof createSessionStore>;
