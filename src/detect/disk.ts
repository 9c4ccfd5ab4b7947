/**
 * Disk Detection
 *
 * Classifies the storage medium behind the root filesystem.
 */

import type { DiskMedium } from '../core/types.js';
import type { SystemReader } from './reader.js';

export const MOUNTS_PATH = '/proc/self/mounts';
export const BLOCK_DIR = '/sys/block';
export const DMI_VENDOR_PATH = '/sys/devices/virtual/dmi/id/sys_vendor';
export const CGROUP_IO_PATHS = ['/sys/fs/cgroup/blkio', '/sys/fs/cgroup/io.max'] as const;

/** Cloud vendors whose container storage is flash-backed */
const SSD_CLOUD_VENDORS = /^(Amazon|Google|Azure|Digital Ocean)/m;

/** Block device names under /dev that map to a whole disk */
const BLOCK_DEVICE = /^\/dev\/(sd[a-z]|nvme\d+n\d+|xvd[a-z]|vd[a-z])/;

/** /sys/block entries that are not physical disks */
const VIRTUAL_BLOCK = /^(loop|ram|zram|sr|fd|dm-|md|nbd)/;

export interface DiskInfo {
  diskMedium: DiskMedium;
  /** Block device the medium was read from, when one was found */
  device: string | null;
  /** Whether a cgroup I/O controller may throttle the container */
  ioLimited: boolean;
}

/**
 * Find the device mounted at `/`.
 *
 * Later mount lines shadow earlier ones.
 */
export function parseRootDevice(mounts: string): string | null {
  let device: string | null = null;

  for (const line of mounts.split('\n')) {
    const [source, target] = line.trim().split(/\s+/);
    if (source && target === '/') {
      device = source;
    }
  }
  return device;
}

/**
 * Map a device path such as `/dev/nvme0n1p2` to its disk, `nvme0n1`.
 */
export function baseBlockDevice(devicePath: string): string | null {
  return BLOCK_DEVICE.exec(devicePath)?.[1] ?? null;
}

async function isRotational(reader: SystemReader, disk: string): Promise<boolean> {
  const flag = await reader.readText(`${BLOCK_DIR}/${disk}/queue/rotational`);
  return flag?.trim() !== '0';
}

async function detectContainerDisk(reader: SystemReader): Promise<DiskInfo> {
  let ioLimited = false;
  for (const path of CGROUP_IO_PATHS) {
    if (await reader.exists(path)) {
      ioLimited = true;
      break;
    }
  }

  const vendor = (await reader.readText(DMI_VENDOR_PATH)) ?? '';
  const diskMedium: DiskMedium = SSD_CLOUD_VENDORS.test(vendor) ? 'SSD' : 'HDD';

  return { diskMedium, device: null, ioLimited };
}

async function detectHostDisk(reader: SystemReader): Promise<DiskInfo> {
  const mounts = (await reader.readText(MOUNTS_PATH)) ?? '';
  const rootDevice = parseRootDevice(mounts);
  const disk = rootDevice !== null ? baseBlockDevice(rootDevice) : null;

  if (disk !== null) {
    if (disk.startsWith('nvme')) {
      return { diskMedium: 'NVMe', device: disk, ioLimited: false };
    }
    const diskMedium: DiskMedium = (await isRotational(reader, disk)) ? 'HDD' : 'SSD';
    return { diskMedium, device: disk, ioLimited: false };
  }

  // Root on LVM, overlay or similar: check the first physical disk instead
  const candidates = (await reader.listDir(BLOCK_DIR))
    .filter((name) => !VIRTUAL_BLOCK.test(name))
    .sort();
  const first = candidates[0];
  if (first === undefined) {
    return { diskMedium: 'HDD', device: null, ioLimited: false };
  }

  const diskMedium: DiskMedium = (await isRotational(reader, first)) ? 'HDD' : 'SSD';
  return { diskMedium, device: first, ioLimited: false };
}

export async function detectDisk(reader: SystemReader, isContainer: boolean): Promise<DiskInfo> {
  return isContainer ? detectContainerDisk(reader) : detectHostDisk(reader);
}
