/**
 * Artifact Writer
 *
 * Writes the generated sysctl.conf text to disk.
 * Uses atomic writes so a failed run never leaves a half-written file.
 */

import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';

import { RenderError } from '../core/errors.js';

/**
 * Write content to a file using write-to-temp-then-rename.
 *
 * @param outputPath - Destination path
 * @param content - Full file content
 * @returns Absolute path that was written
 * @throws RenderError wrapping the underlying I/O error
 */
export async function writeSettingsFile(outputPath: string, content: string): Promise<string> {
  const absolutePath = resolve(outputPath);
  const tempPath = `${absolutePath}.tmp`;
  let tempStarted = false;

  try {
    await mkdir(dirname(absolutePath), { recursive: true });
    // A rejected write can still leave a partial temp file behind
    tempStarted = true;
    await writeFile(tempPath, content, { encoding: 'utf-8', mode: 0o644 });
    await rename(tempPath, absolutePath);
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    if (tempStarted) {
      await rm(tempPath, { force: true });
    }
    throw new RenderError(
      `Failed to write ${absolutePath}: ${err.message}`,
      absolutePath,
      err
    );
  }

  return absolutePath;
}
