/**
 * Generate Command Handler
 *
 * Detects hardware, applies config-file and flag overrides, optionally
 * walks the operator through the interactive prompts, then renders and
 * writes the sysctl file.
 */

import { isKerntuneError, getExitCode, HardwareFactError } from '../../core/errors.js';
import { describeHardware, parseDiskMedium } from '../../core/facts.js';
import { generateArtifact, type GeneratedArtifact } from '../../core/generator.js';
import type { DiskMedium } from '../../core/types.js';
import { loadConfig } from '../../config/loader.js';
import {
  configToOverrides,
  mergeOverrides,
  needsDetection,
  resolveHardware,
} from '../../config/resolver.js';
import type { RunOverrides } from '../../config/types.js';
import { detectSystem, FsSystemReader, type DetectedSystem } from '../../detect/index.js';
import { detectPlatform } from '../../detect/platform.js';
import type { SystemReader } from '../../detect/reader.js';
import { expandPath, getDefaultOutputPath } from '../../lib/paths.js';
import { writeSettingsFile } from '../../lib/writer.js';
import { parseProfile } from '../../rules/profiles/index.js';
import { createOutput, OutputFormatter } from '../output.js';
import {
  askDisableIpv6,
  confirmGeneration,
  createReadlinePrompter,
  reviewHardware,
  selectProfile,
  type Prompter,
} from '../prompts.js';

/**
 * Options for the generate command
 */
export interface GenerateCommandOptions {
  profile?: string;
  disableIpv6?: boolean;
  cores?: string;
  threads?: string;
  ram?: string;
  nic?: string;
  disk?: string;
  container?: boolean;
  config?: string;
  output?: string;
  installPath?: string;
  stdout?: boolean;
  yes?: boolean;
  json?: boolean;
  verbose?: boolean;
}

/**
 * Collaborators the command runs against; tests replace them.
 */
export interface GenerateDependencies {
  reader: SystemReader;
  /** Present only for interactive runs */
  prompter?: Prompter;
  /** Header timestamp (default: now) */
  now?: Date;
}

/**
 * What a generate run produced
 */
export interface GenerateOutcome {
  artifact: GeneratedArtifact;
  installPath: string;
  /** Written path, or null when printed to stdout */
  outputPath: string | null;
}

/**
 * Convert an optional numeric flag; non-numeric text becomes NaN and is
 * rejected by hardware fact validation.
 */
function numericFlag(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

/**
 * Build the override layer for the command-line flags.
 *
 * @throws UnknownProfileError for an unknown --profile
 * @throws HardwareFactError for an unknown --disk
 */
export function flagsToOverrides(options: GenerateCommandOptions): RunOverrides {
  let diskMedium: DiskMedium | undefined;
  if (options.disk !== undefined) {
    const parsed = parseDiskMedium(options.disk);
    if (parsed === null) {
      throw new HardwareFactError([
        { field: 'diskMedium', constraint: 'must be one of HDD, SSD, NVMe' },
      ]);
    }
    diskMedium = parsed;
  }

  return {
    profile: options.profile !== undefined ? parseProfile(options.profile) : undefined,
    disableIpv6: options.disableIpv6,
    outputPath:
      options.output !== undefined ? expandPath(options.output, process.cwd()) : undefined,
    installPath: options.installPath,
    hardware: {
      cores: numericFlag(options.cores),
      threads: numericFlag(options.threads),
      ramGB: numericFlag(options.ram),
      nicMbps: numericFlag(options.nic),
      diskMedium,
      isContainer: options.container,
    },
  };
}

/**
 * Run one generation: resolve inputs, ask what is still open, render,
 * and write or print the artifact.
 */
export async function runGenerate(
  options: GenerateCommandOptions,
  deps: GenerateDependencies,
  output: OutputFormatter
): Promise<GenerateOutcome> {
  const { reader, prompter } = deps;

  // Step 1: Layer config file and flags (flags win)
  let overrides = flagsToOverrides(options);
  if (options.config !== undefined) {
    const config = await loadConfig(options.config);
    overrides = mergeOverrides(configToOverrides(config, options.config), overrides);
  }

  // Step 2: Detect whatever the overrides leave open
  let detected: DetectedSystem | null = null;
  if (needsDetection(overrides.hardware)) {
    detected = await detectSystem(reader);
    output.notes(detected.notes);
  }
  const installPath =
    overrides.installPath ?? detected?.installPath ?? (await detectPlatform(reader)).installPath;

  let facts = resolveHardware(detected?.facts ?? null, overrides.hardware);

  // Step 3: Interactive questions
  if (prompter !== undefined) {
    facts = await reviewHardware(prompter, facts);
  }
  const profile =
    overrides.profile ?? (prompter !== undefined ? await selectProfile(prompter) : 'general');
  const disableIpv6 =
    overrides.disableIpv6 ?? (prompter !== undefined ? await askDisableIpv6(prompter) : false);
  const outputPath = options.stdout ? null : (overrides.outputPath ?? getDefaultOutputPath());

  if (prompter !== undefined) {
    const containerType = detected?.containerType ?? null;
    await confirmGeneration(prompter, [
      `Use Case: ${profile}`,
      `Hardware: ${describeHardware(facts)}`,
      ...(facts.isContainer ? [`Environment: ${containerType ?? 'unknown'} container`] : []),
      `IPv6: ${disableIpv6 ? 'Disabled' : 'Enabled'}`,
      `Output file: ${outputPath ?? 'stdout'}`,
    ]);
  }

  // Step 4: Render and deliver
  const artifact = generateArtifact({
    facts,
    profile,
    disableIpv6,
    installPath,
    generatedAt: deps.now,
  });

  const writtenPath = outputPath !== null ? await writeSettingsFile(outputPath, artifact.content) : null;

  return { artifact, installPath, outputPath: writtenPath };
}

/**
 * Execute the generate command.
 *
 * Prompts only when attached to a terminal and neither --yes, --json nor
 * --stdout was given.
 *
 * @param options - Command options
 */
export async function generateCommand(options: GenerateCommandOptions): Promise<void> {
  const output = createOutput('generate', options);
  const interactive =
    !options.yes && !options.json && !options.stdout && Boolean(process.stdin.isTTY);
  const prompter = interactive ? createReadlinePrompter() : undefined;

  try {
    const outcome = await runGenerate(
      options,
      { reader: new FsSystemReader({ verbose: options.verbose }), prompter },
      output
    );
    prompter?.close();

    const { artifact, installPath, outputPath } = outcome;

    if (outputPath === null && !output.isJson()) {
      process.stdout.write(artifact.content);
      return;
    }

    output.generated(artifact, outputPath, installPath);
    if (outputPath !== null) {
      output.instructions(outputPath, installPath, artifact.resolved.facts.isContainer);
    }
    output.flush();
  } catch (error) {
    prompter?.close();
    handleError(output, error);
  }
}

/**
 * Handle errors and exit appropriately.
 */
function handleError(output: OutputFormatter, error: unknown): never {
  if (isKerntuneError(error)) {
    if (error.code === 'ABORTED') {
      output.info(error.message);
    } else {
      output.error(error.message, error);
    }
  } else if (error instanceof Error) {
    output.error(error.message);
  } else {
    output.error(String(error));
  }

  output.flush();
  process.exit(getExitCode(error));
}
