/**
 * Detect Command Handler
 *
 * Prints the hardware facts and host context detection finds, without
 * generating anything.
 */

import { isKerntuneError, getExitCode } from '../../core/errors.js';
import { detectSystem, FsSystemReader } from '../../detect/index.js';
import { createOutput, OutputFormatter } from '../output.js';

/**
 * Options for the detect command
 */
export interface DetectCommandOptions {
  json?: boolean;
  verbose?: boolean;
}

/**
 * Execute the detect command.
 *
 * @param options - Command options
 */
export async function detectCommand(options: DetectCommandOptions): Promise<void> {
  const output = createOutput('detect', options);

  try {
    const system = await detectSystem(new FsSystemReader({ verbose: options.verbose }));
    output.detectedSystem(system);
    output.flush();
  } catch (error) {
    handleError(output, error);
  }
}

/**
 * Handle errors and exit appropriately.
 */
function handleError(output: OutputFormatter, error: unknown): never {
  if (isKerntuneError(error)) {
    output.error(error.message, error);
  } else if (error instanceof Error) {
    output.error(error.message);
  } else {
    output.error(String(error));
  }

  output.flush();
  process.exit(getExitCode(error));
}
