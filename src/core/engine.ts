/**
 * Resolution Engine
 *
 * Merges the baseline, profile and IPv6 layers into one canonical,
 * key-sorted settings sequence. Pure and synchronous.
 */

import { baselineRules } from '../rules/baseline.js';
import { ipv6Rules } from '../rules/ipv6.js';
import { profileRules } from '../rules/profiles/index.js';
import type {
  HardwareFacts,
  ParameterKey,
  Profile,
  ResolvedSetting,
  ResolvedSettings,
  SettingsLayer,
} from './types.js';

/**
 * Options for settings resolution
 */
export interface ResolveOptions {
  /** Disable IPv6 on all scopes instead of hardening it (default: false) */
  disableIpv6?: boolean;
}

/**
 * Byte-order comparison of parameter keys.
 *
 * Keys are ASCII, so UTF-16 code unit order equals byte order.
 */
export function compareKeys(a: ParameterKey, b: ParameterKey): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Merge layers in precedence order and sort the result by key.
 *
 * Layers are applied lowest precedence first; a later layer replaces the
 * whole value of any key an earlier layer set.
 *
 * @param layers - Layers, lowest precedence first
 * @returns One entry per key, sorted by key
 */
export function mergeLayers(layers: readonly SettingsLayer[]): ResolvedSetting[] {
  const merged = new Map<ParameterKey, ResolvedSetting>();

  for (const layer of layers) {
    for (const [key, value] of layer.settings) {
      merged.set(key, { key, value, source: layer.source });
    }
  }

  return [...merged.values()].sort((a, b) => compareKeys(a.key, b.key));
}

/**
 * Build the ordered layer stack for a run: baseline < profile < ipv6.
 */
export function buildLayers(
  facts: HardwareFacts,
  profile: Profile,
  disableIpv6: boolean
): SettingsLayer[] {
  return [
    { source: 'baseline', settings: baselineRules(facts) },
    { source: 'profile', settings: profileRules(profile, facts) },
    { source: 'ipv6', settings: ipv6Rules(disableIpv6) },
  ];
}

/**
 * Resolve the final settings for a hardware snapshot and profile.
 *
 * @param facts - Validated hardware facts
 * @param profile - Selected workload profile
 * @param options - Resolution options
 * @returns Sorted, de-duplicated settings with provenance
 */
export function resolveSettings(
  facts: HardwareFacts,
  profile: Profile,
  options: ResolveOptions = {}
): ResolvedSettings {
  const disableIpv6 = options.disableIpv6 ?? false;
  const entries = mergeLayers(buildLayers(facts, profile, disableIpv6));

  return { facts, profile, disableIpv6, entries };
}

/**
 * Look up a resolved value by key.
 *
 * @returns The entry, or undefined when no layer set the key
 */
export function findSetting(
  resolved: ResolvedSettings,
  key: ParameterKey
): ResolvedSetting | undefined {
  return resolved.entries.find((entry) => entry.key === key);
}
