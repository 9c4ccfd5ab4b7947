/**
 * Path Utilities
 *
 * Provides path expansion for configuration values and CLI arguments.
 */

import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';

/**
 * File name of the generated suggestion in the user's home directory
 */
export const DEFAULT_OUTPUT_FILE = 'sysctl-suggestion.conf';

/**
 * Expand a path, resolving ~ to home directory and making relative paths absolute.
 *
 * @param inputPath - Path that may contain ~, $VAR or be relative
 * @param basePath - Base directory for resolving relative paths
 * @returns Absolute path with ~ and variables expanded
 */
export function expandPath(inputPath: string, basePath: string): string {
  let expanded = inputPath;

  // Expand ~ to home directory
  if (expanded === '~' || expanded.startsWith('~/')) {
    expanded = join(homedir(), expanded.slice(1));
  }

  expanded = expanded.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g,
    (_, braced: string | undefined, bare: string | undefined) => {
      return process.env[braced ?? bare ?? ''] ?? '';
    }
  );

  if (!isAbsolute(expanded)) {
    expanded = resolve(basePath, expanded);
  }

  return expanded;
}

/**
 * Get the default output path.
 *
 * @returns ~/sysctl-suggestion.conf
 */
export function getDefaultOutputPath(): string {
  return join(homedir(), DEFAULT_OUTPUT_FILE);
}
