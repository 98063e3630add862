import type { SessionConfig, SessionReport, SessionState } from '../models/types';
import { classifyMotion, classifyRate } from '../control/directionClassifier';
import { averageSpeedKmh, kmhFromPxPerSec } from '../physics/kinematics';
import { totalReps } from './phases';
import { deriveStatus, phaseProgress, statusMessage, targetMet } from './status';

const DIRECTION_LABELS = { forward: 'forward', reverse: 'back', neutral: 'stopped' } as const;

export function formatClock(seconds: number): string {
  const s = Math.max(0, seconds);
  const mm = Math.floor(s / 60);
  const ss = Math.floor(s % 60);
  return `${String(mm).padStart(2, '0')}:${String(ss).padStart(2, '0')}`;
}

export function formatReport(report: SessionReport): string[] {
  const lines = [
    'Session complete',
    `Total time: ${formatClock(report.totalTime_s)}  |  Avg speed: ${report.avgSpeed_kmh.toFixed(1)} km/h`,
    'Rep  Direction  Extreme (°)  Time to target (s)',
  ];

  report.reps.forEach((rep, i) => {
    const target = rep.timeToTarget_s === null ? '—' : rep.timeToTarget_s.toFixed(2);
    lines.push(
      `${String(i + 1).padStart(3)}  ${rep.direction.padEnd(9)}  ${rep.extreme_deg.toFixed(1).padStart(11)}  ${target.padStart(18)}`
    );
  });

  return lines;
}

/**
 * One-line live summary for the terminal: headline status, phase timer,
 * angle, command and vehicle speed.
 */
export function formatStatusLine(state: SessionState, batteryVoltage: number | null, cfg: SessionConfig): string {
  const parts = [statusMessage(deriveStatus(state, batteryVoltage, cfg))];

  const progress = phaseProgress(state, cfg);
  if (progress) {
    parts.push(`${progress.label} ${progress.left_s.toFixed(1)}s`);
  }
  const met = targetMet(state, cfg);
  if (met) parts.push('target ✓');

  const speed = state.kinematics.speed;
  parts.push(
    `angle ${state.angle_deg >= 0 ? '+' : ''}${state.angle_deg.toFixed(1)}° (${classifyRate(state.angleRate_dps)})`,
    `cmd ${DIRECTION_LABELS[state.direction]}`,
    `${kmhFromPxPerSec(Math.abs(speed), cfg.pxPerM).toFixed(0)} km/h ${DIRECTION_LABELS[classifyMotion(speed)]}`,
    `dist ${(state.kinematics.distance / cfg.pxPerM).toFixed(2)} m`,
    `reps ${state.repsCompleted}/${totalReps(cfg)}`,
    `time ${formatClock(state.elapsed_s)}`,
    `avg ${averageSpeedKmh(state.kinematics).toFixed(1)} km/h`
  );

  return parts.join('  |  ');
}
