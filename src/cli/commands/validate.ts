/**
 * Validate Command Handler
 *
 * Validates a YAML configuration file against the schema without
 * probing the host.
 */

import { resolve } from 'node:path';

import { isKerntuneError, getExitCode } from '../../core/errors.js';
import { loadConfig } from '../../config/loader.js';
import { configToOverrides } from '../../config/resolver.js';
import type { RunOverrides } from '../../config/types.js';
import { getDefaultOutputPath } from '../../lib/paths.js';
import { createOutput, OutputFormatter } from '../output.js';

/**
 * Options for the validate command
 */
export interface ValidateCommandOptions {
  json?: boolean;
}

/**
 * Summarize what a valid configuration will do.
 */
export function describeOverrides(overrides: RunOverrides): string[] {
  const { hardware } = overrides;
  const pinned = Object.entries(hardware)
    .filter(([, value]) => value !== undefined)
    .map(([field, value]) => `${field}=${String(value)}`);

  return [
    `Profile: ${overrides.profile ?? 'not set (prompted, or general with --yes)'}`,
    `IPv6: ${overrides.disableIpv6 === true ? 'Disabled' : 'Enabled'}`,
    `Output: ${overrides.outputPath ?? getDefaultOutputPath()}`,
    `Install path: ${overrides.installPath ?? 'detected'}`,
    `Hardware: ${pinned.length > 0 ? pinned.join(', ') : 'detected'}`,
  ];
}

/**
 * Execute the validate command.
 *
 * This command:
 * 1. Loads the YAML configuration file
 * 2. Validates it against the JSON schema
 * 3. Reports validation errors or a summary of the overrides
 *
 * @param file - Path to the configuration file
 * @param options - Command options
 */
export async function validateCommand(
  file: string,
  options: ValidateCommandOptions
): Promise<void> {
  const output = createOutput('validate', options);

  try {
    const configPath = resolve(file);
    output.info(`Validating configuration: ${file}`);

    const config = await loadConfig(configPath);
    const overrides = configToOverrides(config, configPath);

    output.validationSuccess(configPath, describeOverrides(overrides));
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
