/**
 * Core Types for Kerntune
 *
 * Types for hardware facts, workload profiles, and the settings produced
 * by the rule sets and the resolution engine.
 */

// =============================================================================
// Hardware
// =============================================================================

/**
 * Storage medium backing the root filesystem
 */
export type DiskMedium = 'HDD' | 'SSD' | 'NVMe';

/**
 * All disk media, in menu order
 */
export const DISK_MEDIA: readonly DiskMedium[] = ['HDD', 'SSD', 'NVMe'];

/**
 * Immutable snapshot of the hardware the settings are computed for
 */
export interface HardwareFacts {
  /** Physical cores available to the host or container */
  readonly cores: number;
  /** Hardware threads available to the host or container */
  readonly threads: number;
  /** Installed (or cgroup-limited) memory in whole GB, at least 1 */
  readonly ramGB: number;
  /** Link speed of the active interface in Mbps */
  readonly nicMbps: number;
  /** Storage medium of the root disk */
  readonly diskMedium: DiskMedium;
  /** Whether the run happens inside a container */
  readonly isContainer: boolean;
}

// =============================================================================
// Profiles
// =============================================================================

/**
 * Workload profiles, in menu order
 */
export const PROFILES = [
  'general',
  'virtualization',
  'web',
  'database',
  'cache',
  'compute',
  'fileserver',
  'network',
  'container',
  'development',
] as const;

/**
 * Workload archetype selected by the operator
 */
export type Profile = (typeof PROFILES)[number];

// =============================================================================
// Settings
// =============================================================================

/**
 * Dotted sysctl key, e.g. `vm.swappiness`
 */
export type ParameterKey = string;

/**
 * Value of a tunable: integer, symbolic word, or tuple of integers
 */
export type ParameterValue = number | string | readonly number[];

/**
 * Key/value mapping produced by a rule set
 */
export type SettingsMap = ReadonlyMap<ParameterKey, ParameterValue>;

/**
 * Partial mapping layered on top of the baseline
 */
export type OverrideMap = ReadonlyMap<ParameterKey, ParameterValue>;

/**
 * Layer a resolved value came from
 */
export type SettingSource = 'baseline' | 'profile' | 'ipv6';

/**
 * A named layer fed into the merge, lowest precedence first
 */
export interface SettingsLayer {
  source: SettingSource;
  settings: SettingsMap;
}

/**
 * A single entry of the final, sorted settings sequence
 */
export interface ResolvedSetting {
  key: ParameterKey;
  value: ParameterValue;
  /** Layer whose value won */
  source: SettingSource;
}

/**
 * Output of the resolution engine
 */
export interface ResolvedSettings {
  facts: HardwareFacts;
  profile: Profile;
  disableIpv6: boolean;
  /** Entries sorted by key, each key exactly once */
  entries: ResolvedSetting[];
}
