/**
 * Memory Detection
 *
 * Containers report their cgroup memory limit when one is set; hosts report
 * MemTotal from /proc/meminfo.
 */

import { idiv } from '../rules/bands.js';
import type { SystemReader } from './reader.js';

export const CGROUP_V1_LIMIT_PATH = '/sys/fs/cgroup/memory/memory.limit_in_bytes';
export const CGROUP_V2_LIMIT_PATH = '/sys/fs/cgroup/memory.max';
export const MEMINFO_PATH = '/proc/meminfo';

/** Values cgroups use to mean "no limit" */
const UNLIMITED = new Set(['max', '9223372036854771712']);

const BYTES_PER_GIB = 1024n ** 3n;
const KIB_PER_GIB = 1024 * 1024;

export type MemorySource = 'cgroup' | 'meminfo' | 'fallback';

export interface MemoryInfo {
  ramGB: number;
  source: MemorySource;
}

/**
 * Read the container's memory limit.
 *
 * The v1 file is authoritative when present; v2 is only consulted when v1
 * does not exist.
 *
 * @returns Limit in bytes, or null when unlimited or unavailable
 */
export async function readCgroupLimit(reader: SystemReader): Promise<bigint | null> {
  let raw: string | null = null;

  if (await reader.exists(CGROUP_V1_LIMIT_PATH)) {
    raw = await reader.readText(CGROUP_V1_LIMIT_PATH);
  } else if (await reader.exists(CGROUP_V2_LIMIT_PATH)) {
    raw = await reader.readText(CGROUP_V2_LIMIT_PATH);
  }

  const value = raw?.trim() ?? '';
  if (!/^\d+$/.test(value) || UNLIMITED.has(value)) {
    return null;
  }
  return BigInt(value);
}

/**
 * Convert MemTotal (kB) to whole GiB.
 *
 * Truncates to one decimal first, then rounds half up.
 */
export function memTotalToGiB(memTotalKb: number): number {
  const tenths = idiv(memTotalKb * 10, KIB_PER_GIB);
  return Math.max(1, idiv(tenths + 5, 10));
}

/**
 * Parse the MemTotal line of /proc/meminfo.
 *
 * @returns MemTotal in kB, or null when the line is missing
 */
export function parseMemTotal(meminfo: string): number | null {
  const match = /^MemTotal:\s+(\d+)/m.exec(meminfo);
  return match?.[1] !== undefined ? Number(match[1]) : null;
}

export async function detectMemory(
  reader: SystemReader,
  isContainer: boolean
): Promise<MemoryInfo> {
  if (isContainer) {
    const limit = await readCgroupLimit(reader);
    if (limit !== null) {
      const ramGB = Number(limit / BYTES_PER_GIB);
      return { ramGB: Math.max(1, ramGB), source: 'cgroup' };
    }
  }

  const meminfo = await reader.readText(MEMINFO_PATH);
  const memTotal = meminfo !== null ? parseMemTotal(meminfo) : null;
  if (memTotal === null) {
    return { ramGB: 1, source: 'fallback' };
  }

  return { ramGB: memTotalToGiB(memTotal), source: 'meminfo' };
}
