/**
 * Latest-value channel between the sensor task and the control loop.
 *
 * The sensor side publishes whenever a line arrives; the loop reads one
 * snapshot per tick. setState swaps the whole state object, so a reader
 * never sees an angle from one sample paired with a timestamp from another.
 * Samples that arrive between two ticks are overwritten.
 */

import { createStore } from 'zustand/vanilla';
import type { AngleSample, BatterySample } from '../core/models/types';
import type { ConnectionStatus } from '../core/serial/SensorClient';

export interface SensorState {
  angle: AngleSample | null;
  battery: BatterySample | null;
  status: ConnectionStatus;
  samplesReceived: number;

  publishAngle: (sample: AngleSample) => void;
  publishBattery: (sample: BatterySample) => void;
  setStatus: (status: ConnectionStatus) => void;
  reset: () => void;
}

export function createSensorStore() {
  return createStore<SensorState>()((set) => ({
    angle: null,
    battery: null,
    status: 'disconnected',
    samplesReceived: 0,

    publishAngle: (sample) => set((state) => ({
      angle: sample,
      samplesReceived: state.samplesReceived + 1,
    })),

    publishBattery: (sample) => set({ battery: sample }),

    setStatus: (status) => set({ status }),

    reset: () => set({
      angle: null,
      battery: null,
      status: 'disconnected',
      samplesReceived: 0,
    }),
  }));
}

export type SensorStore = ReturnType<typeof createSensorStore>;
