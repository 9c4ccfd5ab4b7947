/**
 * Container Detection
 */

import type { SystemReader } from './reader.js';

export type ContainerType = 'docker' | 'lxc' | 'podman';

export interface ContainerInfo {
  isContainer: boolean;
  type: ContainerType | null;
}

export const DOCKERENV_PATH = '/.dockerenv';
export const INIT_CGROUP_PATH = '/proc/1/cgroup';
export const CONTAINERENV_PATH = '/run/.containerenv';

/**
 * Decide whether this process runs inside a container, and which kind.
 *
 * Docker markers win over the cgroup path check, which wins over podman's
 * marker file.
 */
export async function detectContainer(reader: SystemReader): Promise<ContainerInfo> {
  const cgroup = (await reader.readText(INIT_CGROUP_PATH)) ?? '';

  if ((await reader.exists(DOCKERENV_PATH)) || cgroup.includes('docker')) {
    return { isContainer: true, type: 'docker' };
  }

  if (/\/(lxc|docker)\//.test(cgroup)) {
    return { isContainer: true, type: cgroup.includes('/lxc/') ? 'lxc' : 'docker' };
  }

  if (await reader.exists(CONTAINERENV_PATH)) {
    return { isContainer: true, type: 'podman' };
  }

  return { isContainer: false, type: null };
}
