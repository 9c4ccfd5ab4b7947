/**
 * System Reader
 *
 * Read-only access to the /proc, /sys and /etc files hardware detection
 * probes. Detection code only talks to the SystemReader interface so it can
 * run against an in-memory file system in tests.
 */

import { access, readdir, readFile } from 'node:fs/promises';
import { availableParallelism } from 'node:os';

import { DetectionError } from '../core/errors.js';
import { formatProbe, supportsAnsi } from './verbose.js';

/**
 * Read-only view of the host's system files
 */
export interface SystemReader {
  /** File content, or null when the file is absent or unreadable */
  readText(path: string): Promise<string | null>;
  /** Whether a file or directory exists */
  exists(path: string): Promise<boolean>;
  /** Directory entries, or an empty list when the directory is absent */
  listDir(path: string): Promise<string[]>;
  /** Logical CPUs available to this process */
  cpuCount(): number;
}

/**
 * Options for constructing an FsSystemReader
 */
export interface FsSystemReaderOptions {
  /** Print each probe to stderr before it runs (default: false) */
  verbose?: boolean;
}

/**
 * Errno codes that mean "this probe is not available here".
 *
 * sysfs answers EINVAL for the speed of a link that is down.
 */
const UNAVAILABLE_CODES = new Set([
  'ENOENT',
  'ENOTDIR',
  'EISDIR',
  'EACCES',
  'EPERM',
  'EINVAL',
  'ENODEV',
]);

function isUnavailable(error: unknown): boolean {
  const err = error as NodeJS.ErrnoException;
  return typeof err.code === 'string' && UNAVAILABLE_CODES.has(err.code);
}

/**
 * SystemReader backed by the real file system.
 */
export class FsSystemReader implements SystemReader {
  private readonly verbose: boolean;

  constructor(options: FsSystemReaderOptions = {}) {
    this.verbose = options.verbose ?? false;
  }

  async readText(path: string): Promise<string | null> {
    this.trace('read', path);
    try {
      return await readFile(path, 'utf-8');
    } catch (error) {
      if (isUnavailable(error)) {
        return null;
      }
      throw new DetectionError(`Failed to read ${path}: ${String(error)}`, path);
    }
  }

  async exists(path: string): Promise<boolean> {
    this.trace('stat', path);
    try {
      await access(path);
      return true;
    } catch (error) {
      if (isUnavailable(error)) {
        return false;
      }
      throw new DetectionError(`Failed to check ${path}: ${String(error)}`, path);
    }
  }

  async listDir(path: string): Promise<string[]> {
    this.trace('list', path);
    try {
      return await readdir(path);
    } catch (error) {
      if (isUnavailable(error)) {
        return [];
      }
      throw new DetectionError(`Failed to list ${path}: ${String(error)}`, path);
    }
  }

  cpuCount(): number {
    return availableParallelism();
  }

  private trace(operation: string, path: string): void {
    if (this.verbose) {
      process.stderr.write(formatProbe(operation, path, supportsAnsi()));
    }
  }
}
