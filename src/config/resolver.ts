/**
 * Configuration Resolver
 *
 * Turns a validated configuration file into an override layer, merges
 * override layers, and applies them over detected hardware facts.
 *
 * Precedence, lowest first: detected facts, config file, CLI flags.
 */

import { dirname, resolve } from 'node:path';

import { createHardwareFacts, parseDiskMedium } from '../core/facts.js';
import type { HardwareFacts } from '../core/types.js';
import { expandPath } from '../lib/paths.js';
import type { HardwareOverrides, KerntuneConfig, RunOverrides } from './types.js';

/**
 * Facts that must be known before the engine can run.
 * isContainer is not listed; it defaults to false.
 */
const REQUIRED_FACTS = ['cores', 'threads', 'ramGB', 'nicMbps', 'diskMedium'] as const;

/**
 * Convert a validated configuration file into an override layer.
 *
 * @param config - Validated configuration from YAML
 * @param configPath - Path to the configuration file; relative paths in
 *   the file resolve against its directory
 */
export function configToOverrides(config: KerntuneConfig, configPath: string): RunOverrides {
  const basePath = dirname(resolve(configPath));
  const hardware = config.hardware ?? {};

  return {
    profile: config.profile,
    disableIpv6: config.disable_ipv6,
    outputPath: config.output !== undefined ? expandPath(config.output, basePath) : undefined,
    installPath: config.install_path,
    hardware: {
      cores: hardware.cores,
      threads: hardware.threads,
      ramGB: hardware.ram_gb,
      nicMbps: hardware.nic_mbps,
      diskMedium: hardware.disk !== undefined ? (parseDiskMedium(hardware.disk) ?? undefined) : undefined,
      isContainer: hardware.container,
    },
  };
}

/**
 * Merge two override layers field by field; set fields in `higher` win.
 */
export function mergeOverrides(lower: RunOverrides, higher: RunOverrides): RunOverrides {
  return {
    profile: higher.profile ?? lower.profile,
    disableIpv6: higher.disableIpv6 ?? lower.disableIpv6,
    outputPath: higher.outputPath ?? lower.outputPath,
    installPath: higher.installPath ?? lower.installPath,
    hardware: {
      cores: higher.hardware.cores ?? lower.hardware.cores,
      threads: higher.hardware.threads ?? lower.hardware.threads,
      ramGB: higher.hardware.ramGB ?? lower.hardware.ramGB,
      nicMbps: higher.hardware.nicMbps ?? lower.hardware.nicMbps,
      diskMedium: higher.hardware.diskMedium ?? lower.hardware.diskMedium,
      isContainer: higher.hardware.isContainer ?? lower.hardware.isContainer,
    },
  };
}

/**
 * Whether hardware detection must run to fill in missing facts.
 */
export function needsDetection(hardware: HardwareOverrides): boolean {
  return REQUIRED_FACTS.some((field) => hardware[field] === undefined);
}

/**
 * Apply hardware overrides over detected facts and validate the result.
 *
 * @param detected - Detected facts, or null when detection was skipped
 * @param overrides - Merged overrides from config file and flags
 * @returns Frozen, validated HardwareFacts
 * @throws HardwareFactError when any resulting fact violates its constraint
 */
export function resolveHardware(
  detected: HardwareFacts | null,
  overrides: HardwareOverrides
): HardwareFacts {
  return createHardwareFacts({
    cores: overrides.cores ?? detected?.cores,
    threads: overrides.threads ?? detected?.threads,
    ramGB: overrides.ramGB ?? detected?.ramGB,
    nicMbps: overrides.nicMbps ?? detected?.nicMbps,
    diskMedium: overrides.diskMedium ?? detected?.diskMedium,
    isContainer: overrides.isContainer ?? detected?.isContainer ?? false,
  });
}
