/**
 * Settings Renderer
 *
 * Produces the sysctl.conf text: a fixed-format comment header followed by
 * one `key = value` line per resolved setting.
 */

import { getProfile } from '../rules/profiles/index.js';
import { describeHardware } from './facts.js';
import type { ParameterValue, ResolvedSettings } from './types.js';

/**
 * Options for rendering the artifact
 */
export interface RenderOptions {
  /** Where the operator will install the file; appears in the apply hint */
  installPath: string;
  /** Timestamp for the header (default: now) */
  generatedAt?: Date;
}

/**
 * Render a value: integer literal, bare word, or space-joined tuple.
 */
export function formatValue(value: ParameterValue): string {
  if (typeof value === 'number') {
    return String(value);
  }
  if (typeof value === 'string') {
    return value;
  }
  return value.join(' ');
}

/**
 * Format a date as `YYYY-MM-DD HH:MM:SS` in local time.
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Render the comment header.
 */
export function renderHeader(resolved: ResolvedSettings, options: RenderOptions): string[] {
  const generatedAt = options.generatedAt ?? new Date();

  return [
    `# Optimized sysctl.conf for ${getProfile(resolved.profile).label}`,
    `# Hardware: ${describeHardware(resolved.facts)}`,
    `# Generated on: ${formatTimestamp(generatedAt)}`,
    '#',
    `# Apply changes with: sudo sysctl -p ${options.installPath}`,
    '#',
    '# IMPORTANT: Test these settings with your specific workload.',
    '#',
  ];
}

/**
 * Render only the `key = value` lines, in resolved order.
 *
 * Identical inputs always produce identical bodies.
 */
export function renderBody(resolved: ResolvedSettings): string[] {
  return resolved.entries.map((entry) => `${entry.key} = ${formatValue(entry.value)}`);
}

/**
 * Render the complete artifact, newline-terminated.
 */
export function renderSettings(resolved: ResolvedSettings, options: RenderOptions): string {
  const lines = [...renderHeader(resolved, options), ...renderBody(resolved)];
  return `${lines.join('\n')}\n`;
}
