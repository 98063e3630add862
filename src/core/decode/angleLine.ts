/**
 * Line protocol spoken by the ankle sensor firmware:
 *
 *   ANG:<float>    flexion angle in degrees
 *   VBAT:<float>   battery voltage
 *   <float>        bare angle (older firmware)
 *
 * Anything else is noise on the link and is dropped.
 */

export type SensorLine =
  | { kind: 'angle'; value: number }
  | { kind: 'battery'; value: number };

const FLOAT_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function parseFloatStrict(text: string): number | null {
  const trimmed = text.trim();
  if (!FLOAT_RE.test(trimmed)) return null;
  const value = Number(trimmed);
  return isFinite(value) ? value : null;
}

export function parseSensorLine(raw: string): SensorLine | null {
  const line = raw.trim();
  if (!line) return null;

  if (line.startsWith('VBAT:')) {
    const value = parseFloatStrict(line.slice(5));
    return value === null ? null : { kind: 'battery', value };
  }

  const body = line.startsWith('ANG:') ? line.slice(4) : line;
  const value = parseFloatStrict(body);
  return value === null ? null : { kind: 'angle', value };
}

export function buildCommand(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

export const Commands = {
  ZERO: buildCommand('z'),
};
