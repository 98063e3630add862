export function clamp(x: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, x));
}

/**
 * Exponential low-pass filter for the raw flexion angle.
 *
 * y = alpha * x + (1 - alpha) * y
 *
 * The first sample seeds the state, so there is no start-up transient.
 * At the sensor's ~50 Hz stream:
 * - alpha = 0.25 settles within ~15 samples (~300 ms)
 * - alpha = 0.5 is twice as responsive and noticeably jittery
 */
export class LowPassFilter {
  private value: number | null = null;

  constructor(private readonly alpha: number = 0.25) {
    if (alpha <= 0 || alpha > 1) {
      throw new Error(`filter alpha ${alpha} outside (0, 1]`);
    }
  }

  /** A dropped sample (NaN) returns the held value without disturbing it. */
  update(angle_deg: number): number {
    if (!isFinite(angle_deg)) return this.value ?? 0;

    this.value = this.value === null ? angle_deg : this.alpha * angle_deg + (1 - this.alpha) * this.value;
    return this.value;
  }

  current(): number | null {
    return this.value;
  }

  reset() {
    this.value = null;
  }
}
