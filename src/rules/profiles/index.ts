/**
 * Profile Registry
 *
 * Maps every workload profile to its label, description and rule function.
 * Each rule is evaluated on its own; no profile reads another's output.
 */

import { UnknownProfileError } from '../../core/errors.js';
import { PROFILES, type HardwareFacts, type OverrideMap, type Profile } from '../../core/types.js';
import { cacheRules } from './cache.js';
import { computeRules } from './compute.js';
import { containerRules } from './container.js';
import { databaseRules } from './database.js';
import { developmentRules } from './development.js';
import { fileserverRules } from './fileserver.js';
import { generalRules } from './general.js';
import { networkRules } from './network.js';
import { virtualizationRules } from './virtualization.js';
import { webRules } from './web.js';

/**
 * Rule function producing a profile's override layer
 */
export type ProfileRule = (facts: HardwareFacts) => OverrideMap;

/**
 * Registry entry for a workload profile
 */
export interface ProfileDefinition {
  id: Profile;
  /** Short name used in the artifact header, e.g. "Database Server" */
  label: string;
  /** One-line summary shown in menus */
  description: string;
  rules: ProfileRule;
}

export const PROFILE_REGISTRY: Readonly<Record<Profile, ProfileDefinition>> = {
  general: {
    id: 'general',
    label: 'General Purpose',
    description: 'Balanced tuning for mixed workloads',
    rules: generalRules,
  },
  virtualization: {
    id: 'virtualization',
    label: 'Virtualization Host',
    description: 'For KVM/QEMU/Proxmox/ESXi/etc.',
    rules: virtualizationRules,
  },
  web: {
    id: 'web',
    label: 'Web Server',
    description: 'Optimized for HTTP traffic',
    rules: webRules,
  },
  database: {
    id: 'database',
    label: 'Database Server',
    description: 'Tuned for MySQL/PostgreSQL/etc.',
    rules: databaseRules,
  },
  cache: {
    id: 'cache',
    label: 'Caching Server',
    description: 'For Redis/Memcached/etc.',
    rules: cacheRules,
  },
  compute: {
    id: 'compute',
    label: 'HPC / Compute Node',
    description: 'For computational workloads',
    rules: computeRules,
  },
  fileserver: {
    id: 'fileserver',
    label: 'File Server',
    description: 'For NFS/SMB/file storage',
    rules: fileserverRules,
  },
  network: {
    id: 'network',
    label: 'Network Appliance',
    description: 'For routers/firewalls/gateways',
    rules: networkRules,
  },
  container: {
    id: 'container',
    label: 'Container Host',
    description: 'For Docker/Kubernetes nodes',
    rules: containerRules,
  },
  development: {
    id: 'development',
    label: 'Development Machine',
    description: 'For coding workstations',
    rules: developmentRules,
  },
};

/**
 * Narrow an arbitrary string to a Profile.
 */
export function isProfile(value: string): value is Profile {
  return (PROFILES as readonly string[]).includes(value);
}

/**
 * Parse a profile identifier at the selection boundary.
 *
 * @throws UnknownProfileError when the identifier is not in the fixed set
 */
export function parseProfile(value: string): Profile {
  const normalized = value.trim().toLowerCase();
  if (!isProfile(normalized)) {
    throw new UnknownProfileError(value, PROFILES);
  }
  return normalized;
}

/**
 * Look up a profile's registry entry.
 */
export function getProfile(profile: Profile): ProfileDefinition {
  return PROFILE_REGISTRY[profile];
}

/**
 * All registry entries in menu order.
 */
export function listProfiles(): ProfileDefinition[] {
  return PROFILES.map((id) => PROFILE_REGISTRY[id]);
}

/**
 * Evaluate a profile's override layer.
 */
export function profileRules(profile: Profile, facts: HardwareFacts): OverrideMap {
  return PROFILE_REGISTRY[profile].rules(facts);
}
