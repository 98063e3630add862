import type { SensorSettings } from '../models/types';

export type PortCandidate = {
  path: string;
  manufacturer?: string;
  pnpId?: string;
};

/**
 * Choose the serial device to open.
 *
 * An explicit port always wins. Otherwise prefer a port whose description
 * mentions the firmware's advertised name, Bluetooth, or a generic serial
 * adapter, falling back to the first port listed.
 */
export function pickPort(
  ports: PortCandidate[],
  settings: Pick<SensorSettings, 'port' | 'nameHint'>
): string | null {
  if (settings.port) return settings.port;

  const hint = settings.nameHint.toLowerCase();
  for (const p of ports) {
    const desc = `${p.manufacturer ?? ''} ${p.pnpId ?? ''} ${p.path}`.toLowerCase();
    if ((hint && desc.includes(hint)) || desc.includes('bluetooth') || desc.includes('serial')) {
      return p.path;
    }
  }

  return ports[0]?.path ?? null;
}
