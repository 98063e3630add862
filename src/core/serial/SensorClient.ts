import { setTimeout as delay } from 'node:timers/promises';
import type { AngleSample, BatterySample, SensorSettings } from '../models/types';
import { LowPassFilter } from '../math/filters';
import { Commands, parseSensorLine } from '../decode/angleLine';

export type ConnectionStatus = 'disconnected' | 'connecting' | 'connected';

export interface SerialLink {
  /** Ends when the port closes, whether by stop() or by the device. */
  lines(): AsyncIterable<string>;
  write(data: Uint8Array): Promise<void>;
  close(): Promise<void>;
}

export interface SerialTransport {
  discover(settings: SensorSettings): Promise<string | null>;
  open(path: string, settings: SensorSettings): Promise<SerialLink>;
}

export interface SensorSink {
  publishAngle: (sample: AngleSample) => void;
  publishBattery: (sample: BatterySample) => void;
  setStatus: (status: ConnectionStatus) => void;
}

export const DEFAULT_SENSOR_SETTINGS: SensorSettings = {
  port: null,
  baudRate: 115200,
  nameHint: 'ESP32_WROOM_IMU',
  filterAlpha: 0.25,
  discoveryRetryMs: 1000,
  reconnectDelayMs: 800,
};

/**
 * Owns the serial link to the ankle sensor.
 *
 * Runs as its own async task:
 *
 *   disconnected -> connecting -> connected -> (read failure / port closed) -> disconnected
 *
 * with a fixed backoff on every return to disconnected. Failures never
 * propagate; the control loop keeps running on the last published angle.
 */
export class SensorClient {
  private link: SerialLink | null = null;
  private filter: LowPassFilter;
  private status: ConnectionStatus = 'disconnected';
  private stopRequested = false;
  private abort: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private reconnectAttempts = 0;

  constructor(
    private transport: SerialTransport,
    private sink: SensorSink,
    private settings: SensorSettings = DEFAULT_SENSOR_SETTINGS,
    private now: () => number = Date.now
  ) {
    this.filter = new LowPassFilter(settings.filterAlpha);
  }

  start(): void {
    if (this.loop) {
      console.log('[SensorClient] Already running');
      return;
    }

    console.log('[SensorClient] Starting sensor task');
    this.stopRequested = false;
    this.abort = new AbortController();
    this.loop = this.run().catch((err) => {
      console.error('[SensorClient] Sensor task crashed:', err);
    });
  }

  async stop(): Promise<void> {
    if (!this.loop) return;

    console.log('[SensorClient] Stopping sensor task');
    this.stopRequested = true;
    this.abort?.abort();
    await this.closeLink();
    await this.loop;
    this.loop = null;
    this.abort = null;
    this.updateStatus('disconnected');
  }

  /** Ask the firmware to zero its own angle reference. */
  async calibrateZero(): Promise<boolean> {
    if (!this.link || this.status !== 'connected') {
      console.warn('[SensorClient] Zero command skipped: not connected');
      return false;
    }
    try {
      await this.link.write(Commands.ZERO);
      return true;
    } catch (err) {
      console.warn('[SensorClient] Zero command failed:', err);
      return false;
    }
  }

  getStatus(): ConnectionStatus {
    return this.status;
  }

  isRunning(): boolean {
    return this.loop !== null;
  }

  getReconnectAttempts(): number {
    return this.reconnectAttempts;
  }

  handleLine(raw: string): void {
    const parsed = parseSensorLine(raw);
    if (!parsed) return;

    const t = this.now();
    if (parsed.kind === 'battery') {
      this.sink.publishBattery({ voltage: parsed.value, t });
      return;
    }
    this.sink.publishAngle({ angle_deg: this.filter.update(parsed.value), t });
  }

  private async run(): Promise<void> {
    while (!this.stopRequested) {
      this.updateStatus('connecting');

      let path: string | null = null;
      try {
        path = await this.transport.discover(this.settings);
      } catch (err) {
        console.warn('[SensorClient] Port discovery failed:', err);
      }

      if (!path) {
        this.updateStatus('disconnected');
        await this.backoff(this.settings.discoveryRetryMs);
        continue;
      }

      try {
        const link = await this.transport.open(path, this.settings);
        this.link = link;
        if (this.stopRequested) {
          await this.closeLink();
          break;
        }

        this.reconnectAttempts = 0;
        this.updateStatus('connected');
        console.log(`[SensorClient] Connected on ${path}`);

        for await (const line of link.lines()) {
          if (this.stopRequested) break;
          this.handleLine(line);
        }

        if (!this.stopRequested) {
          console.warn('[SensorClient] Port closed by device');
        }
      } catch (err) {
        if (!this.stopRequested) {
          console.warn('[SensorClient] Link error:', err);
        }
      }

      await this.closeLink();
      this.updateStatus('disconnected');

      if (!this.stopRequested) {
        this.reconnectAttempts++;
        console.log(`[SensorClient] Reconnect attempt ${this.reconnectAttempts} in ${this.settings.reconnectDelayMs} ms`);
        await this.backoff(this.settings.reconnectDelayMs);
      }
    }
  }

  private async backoff(ms: number): Promise<void> {
    const signal = this.abort?.signal;
    if (this.stopRequested || !signal) return;
    try {
      await delay(ms, undefined, { signal });
    } catch (err) {
      if (!signal.aborted) throw err;
    }
  }

  private async closeLink(): Promise<void> {
    const link = this.link;
    this.link = null;
    if (!link) return;
    try {
      await link.close();
    } catch (err) {
      console.warn('[SensorClient] Error closing port:', err);
    }
  }

  private updateStatus(status: ConnectionStatus): void {
    if (this.status === status) return;
    this.status = status;
    this.sink.setStatus(status);
  }
}
