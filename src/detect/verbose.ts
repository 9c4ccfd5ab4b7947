/**
 * Verbose Output Helpers
 *
 * Formats probed system paths for --verbose CLI output.
 * Used by FsSystemReader to print each probe to stderr before it runs.
 */

/**
 * Prefix for verbose probe lines.
 */
const PREFIX = '[probe] ';

/**
 * ANSI SGR 90: bright black (gray) foreground.
 */
const ANSI_GRAY = '\x1b[90m';

/**
 * ANSI SGR 0: reset all attributes.
 */
const ANSI_RESET = '\x1b[0m';

/**
 * Check whether stderr supports ANSI escape codes.
 *
 * Returns true when stderr is a TTY (interactive terminal).
 * Returns false when stderr is piped, redirected, or non-interactive.
 */
export function supportsAnsi(): boolean {
  return Boolean(process.stderr.isTTY);
}

/**
 * Format a probe for verbose output.
 *
 * @param operation - What the probe does, e.g. `read` or `list`
 * @param path - The system path being probed
 * @param ansi - Whether to wrap output in ANSI gray escape codes
 * @returns A single newline-terminated line for `process.stderr.write()`
 */
export function formatProbe(operation: string, path: string, ansi: boolean): string {
  const line = `${PREFIX}${operation} ${path}\n`;

  if (ansi) {
    return `${ANSI_GRAY}${line}${ANSI_RESET}`;
  }

  return line;
}
