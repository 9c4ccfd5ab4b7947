/**
 * CPU Detection
 */

import { DetectionError } from '../core/errors.js';
import type { SystemReader } from './reader.js';

export const CPUINFO_PATH = '/proc/cpuinfo';

export interface CpuInfo {
  cores: number;
  threads: number;
}

/**
 * Count logical CPUs available to this process.
 *
 * Physical cores are not distinguished from hardware threads, so both
 * facts carry the same count. Falls back to counting `processor` entries
 * in /proc/cpuinfo when the runtime reports nothing.
 */
export async function detectCpu(reader: SystemReader): Promise<CpuInfo> {
  let count = reader.cpuCount();

  if (count < 1) {
    const cpuinfo = (await reader.readText(CPUINFO_PATH)) ?? '';
    count = cpuinfo.match(/^processor\s*:/gm)?.length ?? 0;
  }

  if (count < 1) {
    throw new DetectionError('Unable to determine the number of CPUs', CPUINFO_PATH);
  }

  return { cores: count, threads: count };
}
