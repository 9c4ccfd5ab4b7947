/**
 * Configuration Types for Kerntune
 *
 * These types represent the YAML configuration structure and the overrides
 * it resolves to.
 */

import type { DiskMedium, Profile } from '../core/types.js';

// =============================================================================
// YAML Input Types
// =============================================================================

/**
 * Root configuration object parsed from a kerntune YAML file
 */
export interface KerntuneConfig {
  /** Workload profile; prompts or `general` apply when absent */
  profile?: Profile;
  /** Disable IPv6 instead of hardening it. Default: false */
  disable_ipv6?: boolean;
  /** Output file. Default: ~/sysctl-suggestion.conf */
  output?: string;
  /** Install path shown in the apply instructions. Default: detected */
  install_path?: string;
  hardware?: HardwareConfig;
}

/**
 * Hardware facts that replace detected values
 */
export interface HardwareConfig {
  cores?: number;
  threads?: number;
  ram_gb?: number;
  nic_mbps?: number;
  disk?: 'hdd' | 'ssd' | 'nvme';
  container?: boolean;
}

// =============================================================================
// Resolved Types
// =============================================================================

/**
 * Hardware facts supplied by a config file, CLI flags or prompts.
 * Unset fields fall through to the layer below.
 */
export interface HardwareOverrides {
  cores?: number;
  threads?: number;
  ramGB?: number;
  nicMbps?: number;
  diskMedium?: DiskMedium;
  isContainer?: boolean;
}

/**
 * One layer of run settings: a config file or the command line
 */
export interface RunOverrides {
  profile?: Profile;
  disableIpv6?: boolean;
  /** Absolute output path */
  outputPath?: string;
  installPath?: string;
  hardware: HardwareOverrides;
}
