/**
 * Network Detection
 *
 * Finds the interface carrying the default route and reads its link speed.
 */

import type { SystemReader } from './reader.js';

export const ROUTE_TABLE_PATH = '/proc/net/route';
export const NET_CLASS_DIR = '/sys/class/net';

/** Link speed assumed when none can be read */
export const DEFAULT_NIC_MBPS = 1000;

export interface NetworkInfo {
  interfaceName: string | null;
  nicMbps: number;
  /** Whether nicMbps was read from the interface rather than assumed */
  measured: boolean;
}

/**
 * Parse /proc/net/route and return the default route's interface.
 */
export function parseDefaultRoute(routeTable: string): string | null {
  const rows = routeTable.split('\n').slice(1);

  for (const row of rows) {
    const [iface, destination] = row.trim().split(/\s+/);
    if (iface && destination === '00000000') {
      return iface;
    }
  }
  return null;
}

/**
 * Find the active interface: the default route's, else the first
 * non-loopback interface by name.
 */
export async function detectInterface(reader: SystemReader): Promise<string | null> {
  const routeTable = await reader.readText(ROUTE_TABLE_PATH);
  const routed = routeTable !== null ? parseDefaultRoute(routeTable) : null;
  if (routed !== null && routed !== 'lo') {
    return routed;
  }

  const interfaces = (await reader.listDir(NET_CLASS_DIR)).filter((name) => name !== 'lo').sort();
  return interfaces[0] ?? null;
}

export async function detectNetwork(reader: SystemReader): Promise<NetworkInfo> {
  const interfaceName = await detectInterface(reader);
  if (interfaceName === null) {
    return { interfaceName, nicMbps: DEFAULT_NIC_MBPS, measured: false };
  }

  const raw = await reader.readText(`${NET_CLASS_DIR}/${interfaceName}/speed`);
  const speed = raw !== null ? Number.parseInt(raw.trim(), 10) : Number.NaN;
  if (Number.isInteger(speed) && speed > 0) {
    return { interfaceName, nicMbps: speed, measured: true };
  }

  return { interfaceName, nicMbps: DEFAULT_NIC_MBPS, measured: false };
}
