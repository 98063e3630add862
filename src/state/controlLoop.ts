import { performance } from 'node:perf_hooks';
import type { SessionState } from '../core/models/types';
import type { SensorStore } from './sensorStore';
import type { SessionStore } from './sessionStore';

type FrameCallback = (session: SessionState, dt: number) => void;

export const DEFAULT_TICK_HZ = 60;

/**
 * Fixed-rate control loop. Each frame reads the latest sensor snapshot once,
 * advances the session by the measured dt and notifies subscribers.
 * Nothing here awaits, so a slow sensor never delays a frame.
 */
export class ControlLoop {
  private interval: NodeJS.Timeout | null = null;
  private lastTime: number | null = null;
  private callbacks = new Set<FrameCallback>();
  private frames = 0;

  constructor(
    private session: SessionStore,
    private sensor: SensorStore,
    private rateHz: number = DEFAULT_TICK_HZ,
    private clock: () => number = () => performance.now()
  ) {}

  start() {
    if (this.interval) {
      console.log('[ControlLoop] Already running');
      return;
    }

    console.log(`[ControlLoop] Starting at ${this.rateHz} Hz`);
    this.lastTime = this.clock();
    this.interval = setInterval(() => {
      this.step();
    }, 1000 / this.rateHz);
  }

  stop() {
    if (!this.interval) return;

    console.log(`[ControlLoop] Stopping after ${this.frames} frames`);
    clearInterval(this.interval);
    this.interval = null;
    this.lastTime = null;
  }

  /** Run a single frame. Exposed so tests can drive the loop by hand. */
  step(): SessionState {
    const now = this.clock();
    const dt = this.lastTime === null ? 0 : (now - this.lastTime) / 1000;
    this.lastTime = now;

    // No sample yet: NaN makes the session hold its last raw angle.
    const angle_deg = this.sensor.getState().angle?.angle_deg ?? NaN;
    const session = this.session.getState().tick({ angle_deg, dt });
    this.frames++;

    this.callbacks.forEach(callback => {
      try {
        callback(session, dt);
      } catch (err) {
        console.error('[ControlLoop] Frame callback error:', err);
      }
    });

    return session;
  }

  onFrame(callback: FrameCallback): () => void {
    this.callbacks.add(callback);
    return () => {
      this.callbacks.delete(callback);
    };
  }

  isRunning(): boolean {
    return this.interval !== null;
  }

  getFrameCount(): number {
    return this.frames;
  }
}
