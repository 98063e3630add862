import { readFile } from 'node:fs/promises';
import type { SensorSettings, SessionConfig } from '../models/types';
import { DEFAULT_SESSION_CONFIG } from '../session/sessionMachine';
import { DEFAULT_SENSOR_SETTINGS } from '../serial/SensorClient';

export interface AppConfig {
  session: Readonly<SessionConfig>;
  sensor: Readonly<SensorSettings>;
}

export const DEFAULT_CONFIG: AppConfig = {
  session: DEFAULT_SESSION_CONFIG,
  sensor: DEFAULT_SENSOR_SETTINGS,
};

export const CONFIG_ENV_VAR = 'REHAB_CONFIG';

export class ConfigValidationError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigValidationError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mergeNumbers<T extends object>(defaults: T, stored: unknown, section: string): T {
  if (stored === undefined) return { ...defaults };
  if (!isRecord(stored)) {
    console.warn(`[Config] Ignoring "${section}": expected an object`);
    return { ...defaults };
  }

  const merged: Record<string, unknown> = {};
  for (const [key, fallback] of Object.entries(defaults)) {
    const value = stored[key];
    if (value === undefined) continue;
    if (typeof fallback === 'number') {
      if (typeof value === 'number' && isFinite(value)) {
        merged[key] = value;
      } else {
        console.warn(`[Config] ${section}.${key} is not a finite number, keeping ${fallback}`);
      }
    }
  }
  return Object.assign({ ...defaults }, merged);
}

function mergeSensor(stored: unknown): SensorSettings {
  const merged = mergeNumbers<SensorSettings>(DEFAULT_CONFIG.sensor, stored, 'sensor');
  if (!isRecord(stored)) return merged;

  const port = stored.port;
  if (typeof port === 'string' && port.trim()) merged.port = port.trim();
  const nameHint = stored.nameHint;
  if (typeof nameHint === 'string') merged.nameHint = nameHint;
  return merged;
}

export function validateConfig(config: AppConfig): string[] {
  const { session: s, sensor } = config;
  const problems: string[] = [];

  if (s.exit_deg >= s.enter_deg) problems.push('exit_deg must be below enter_deg');
  if (!Number.isInteger(s.repsEach) || s.repsEach < 1) problems.push('repsEach must be a positive integer');
  if (s.angleMaxForward_deg <= 0 || s.angleMaxReverse_deg <= 0) problems.push('max angles must be positive');
  if (s.gammaForward <= 0 || s.gammaReverse <= 0) problems.push('gammaForward and gammaReverse must be positive');
  if (s.vMax <= 0 || s.vRevMax <= 0) problems.push('vMax and vRevMax must be positive');
  if (s.aMax <= 0 || s.aRevMax <= 0) problems.push('aMax and aRevMax must be positive');
  if (s.pxPerM <= 0) problems.push('pxPerM must be positive');
  if (s.deadzone_deg < 0) problems.push('deadzone_deg must not be negative');
  if (s.repTime_s <= 0 || s.settleMax_s <= 0) problems.push('phase durations must be positive');
  if (s.settleTime_s < 0 || s.settleTol_deg < 0) problems.push('settleTime_s and settleTol_deg must not be negative');
  if (s.calibrationWindow_s <= 0) problems.push('calibrationWindow_s must be positive');
  if (sensor.filterAlpha <= 0 || sensor.filterAlpha > 1) problems.push('filterAlpha must be in (0, 1]');

  return problems;
}

/**
 * Merge a stored document over the defaults, field by field, and freeze
 * the result. Unknown keys are ignored.
 */
export function resolveConfig(stored: unknown): AppConfig {
  const doc: Record<string, unknown> = isRecord(stored) ? stored : {};
  const config: AppConfig = {
    session: Object.freeze(mergeNumbers(DEFAULT_CONFIG.session, doc.session, 'session')),
    sensor: Object.freeze(mergeSensor(doc.sensor)),
  };

  const problems = validateConfig(config);
  if (problems.length > 0) {
    throw new ConfigValidationError(problems);
  }
  return Object.freeze(config);
}

export async function loadConfig(path: string | undefined = process.env[CONFIG_ENV_VAR]): Promise<AppConfig> {
  if (!path) {
    console.log('[Config] No config file given, using defaults');
    return resolveConfig({});
  }

  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    console.log(`[Config] Could not read ${path}, using defaults:`, err);
    return resolveConfig({});
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    console.error(`[Config] ${path} is not valid JSON, using defaults:`, err);
    return resolveConfig({});
  }

  console.log(`[Config] Loaded ${path}`);
  return resolveConfig(parsed);
}
