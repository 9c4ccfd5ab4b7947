/**
 * Platform Detection
 *
 * Picks the sysctl file the operator should install the artifact to.
 * RHEL-family systems read drop-ins from /etc/sysctl.d; everything else
 * gets the classic /etc/sysctl.conf.
 */

import type { SystemReader } from './reader.js';

export type PlatformFamily = 'rhel' | 'deb';

export interface PlatformInfo {
  family: PlatformFamily;
  installPath: string;
}

export const RHEL_RELEASE_FILES = [
  '/etc/redhat-release',
  '/etc/centos-release',
  '/etc/fedora-release',
] as const;

export const INSTALL_PATHS: Readonly<Record<PlatformFamily, string>> = {
  rhel: '/etc/sysctl.d/99-custom.conf',
  deb: '/etc/sysctl.conf',
};

export async function detectPlatform(reader: SystemReader): Promise<PlatformInfo> {
  for (const releaseFile of RHEL_RELEASE_FILES) {
    if (await reader.exists(releaseFile)) {
      return { family: 'rhel', installPath: INSTALL_PATHS.rhel };
    }
  }
  return { family: 'deb', installPath: INSTALL_PATHS.deb };
}
