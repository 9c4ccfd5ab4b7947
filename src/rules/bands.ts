/**
 * Band Helpers
 *
 * Clamp-to-band and tiering primitives shared by every rule set.
 * All arithmetic is integer arithmetic; division truncates toward zero.
 */

import type {
  DiskMedium,
  HardwareFacts,
  ParameterKey,
  ParameterValue,
  SettingsMap,
} from '../core/types.js';

/**
 * A threshold and the value selected when the input reaches it
 */
export type Tier<T> = readonly [threshold: number, value: T];

/**
 * Integer division truncating toward zero.
 */
export function idiv(dividend: number, divisor: number): number {
  return Math.trunc(dividend / divisor);
}

/**
 * Constrain `value` into `[low, high]`.
 *
 * The floor is checked first, so `low` wins if the band is inverted.
 */
export function clamp(value: number, low: number, high: number): number {
  if (value < low) return low;
  if (value > high) return high;
  return value;
}

/**
 * Cap `value` at `cap`.
 */
export function atMost(value: number, cap: number): number {
  return value < cap ? value : cap;
}

/**
 * Raise `value` to at least `floor`.
 */
export function atLeast(value: number, floor: number): number {
  return value < floor ? floor : value;
}

/**
 * Select from threshold tiers.
 *
 * Tiers are scanned in the order given (highest threshold first); the first
 * tier whose threshold is reached wins. Reaching means `>=`, so a value
 * sitting exactly on a boundary falls in the higher tier.
 *
 * @param value - Input quantity, e.g. NIC speed in Mbps
 * @param tiers - Threshold/value pairs, highest threshold first
 * @param fallback - Value when no threshold is reached
 */
export function tier<T>(value: number, tiers: readonly Tier<T>[], fallback: T): T {
  for (const [threshold, selected] of tiers) {
    if (value >= threshold) {
      return selected;
    }
  }
  return fallback;
}

/**
 * Whether the medium is flash storage (SSD or NVMe).
 */
export function isSolidState(medium: DiskMedium): boolean {
  return medium === 'SSD' || medium === 'NVMe';
}

/**
 * Baseline `vm.min_free_kbytes`: 4 MB per GB of RAM.
 *
 * Several profiles scale this value, so it is exposed separately.
 */
export function minFreeKbytes(facts: HardwareFacts): number {
  return facts.ramGB * 4096;
}

/**
 * Build a settings map from an object literal of key/value pairs.
 */
export function settings(entries: Record<ParameterKey, ParameterValue>): SettingsMap {
  return new Map(Object.entries(entries));
}
