/**
 * CLI Output Layer
 *
 * Provides consistent output formatting for CLI commands in both
 * human-readable and JSON modes.
 */

import { ConfigError, type ErrorCode, type KerntuneError } from '../core/errors.js';
import { describeHardware } from '../core/facts.js';
import type { GeneratedArtifact } from '../core/generator.js';
import type { HardwareFacts, ParameterValue, SettingSource } from '../core/types.js';
import type { DetectedSystem } from '../detect/index.js';
import type { ProfileDefinition } from '../rules/profiles/index.js';

// =============================================================================
// Output Types
// =============================================================================

/**
 * Standard output format for --json mode
 */
export interface CommandResult {
  success: boolean;
  command: string;
  hardware?: HardwareFacts;
  system?: SystemInfo;
  profiles?: ProfileInfo[];
  profile?: string;
  disableIpv6?: boolean;
  output?: string | null;
  installPath?: string;
  digest?: string;
  settings?: SettingInfo[];
  /** Artifact text, when printed instead of written */
  content?: string;
  config?: string;
  notes?: string[];
  error?: ErrorOutput;
}

/**
 * Detection context for the detect command
 */
export interface SystemInfo {
  containerType: string | null;
  platform: string;
  installPath: string;
  interfaceName: string | null;
  diskDevice: string | null;
  memorySource: string;
}

/**
 * Profile information for the profiles command
 */
export interface ProfileInfo {
  id: string;
  label: string;
  description: string;
}

/**
 * One resolved setting with its provenance
 */
export interface SettingInfo {
  key: string;
  value: ParameterValue;
  source: SettingSource;
}

/**
 * Error output format for JSON mode
 */
export interface ErrorOutput {
  code: ErrorCode | string;
  message: string;
  suggestion?: string;
  details?: Record<string, unknown>;
}

/**
 * Shown after generation when running inside a container
 */
export const CONTAINER_NOTES: readonly string[] = [
  'Some settings may require host privileges and might be ignored',
  "For LXC containers, you may need to adjust permissions (e.g., 'lxc.cap.drop=' in your container config)",
  'Consider applying security-critical settings on the host system instead',
];

/**
 * Steps the operator follows to install a generated file.
 */
export function installSteps(outputPath: string, installPath: string): string[] {
  return [
    `Review the configuration: less ${outputPath}`,
    `Copy it to system location: sudo cp ${outputPath} ${installPath}`,
    `Apply the settings: sudo sysctl -p ${installPath}`,
  ];
}

// =============================================================================
// OutputFormatter Class
// =============================================================================

/**
 * Output mode for the formatter
 */
export type OutputMode = 'human' | 'json';

/**
 * CLI-specific output formatter.
 *
 * Provides high-level methods for formatting command output in both
 * human-readable and JSON modes. In JSON mode, output is collected
 * and emitted as a single JSON object at flush.
 */
export class OutputFormatter {
  private mode: OutputMode;
  private result: CommandResult;
  private indentLevel: number = 0;

  constructor(command: string, options: { json?: boolean } = {}) {
    this.mode = options.json ? 'json' : 'human';
    this.result = {
      success: true,
      command,
    };
  }

  /**
   * Check if in JSON mode.
   */
  isJson(): boolean {
    return this.mode === 'json';
  }

  // ===========================================================================
  // Indentation
  // ===========================================================================

  indent(): void {
    this.indentLevel++;
  }

  dedent(): void {
    if (this.indentLevel > 0) {
      this.indentLevel--;
    }
  }

  private getIndent(): string {
    return '  '.repeat(this.indentLevel);
  }

  // ===========================================================================
  // Basic Output Methods
  // ===========================================================================

  /**
   * Print a success message.
   */
  success(message: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}✓ ${message}`);
    }
  }

  /**
   * Print an error message.
   *
   * Validation errors carried by a ConfigError are listed below it.
   */
  error(message: string, error?: KerntuneError): void {
    this.result.success = false;

    const validationErrors = error instanceof ConfigError ? (error.validationErrors ?? []) : [];

    if (this.mode === 'human') {
      console.error(`${this.getIndent()}✗ ${message}`);
      for (const err of validationErrors) {
        console.error(`${this.getIndent()}  - ${err.path}: ${err.message}`);
      }
      if (error?.suggestion) {
        console.error(`${this.getIndent()}  Fix: ${error.suggestion}`);
      }
    }

    this.result.error = {
      code: error?.code ?? 'UNKNOWN',
      message,
      suggestion: error?.suggestion,
      details: validationErrors.length > 0 ? { errors: validationErrors } : undefined,
    };
  }

  /**
   * Print an info message.
   */
  info(message: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}${message}`);
    }
  }

  /**
   * Print a warning message.
   */
  warning(message: string): void {
    if (this.mode === 'human') {
      console.warn(`${this.getIndent()}⚠ ${message}`);
    }
  }

  /**
   * Print a blank line.
   */
  newline(): void {
    if (this.mode === 'human') {
      console.log();
    }
  }

  // ===========================================================================
  // Table Output
  // ===========================================================================

  /**
   * Print a table of data.
   *
   * @param headers - Column headers
   * @param rows - Row data
   */
  table(headers: string[], rows: string[][]): void {
    if (this.mode === 'human') {
      const widths = headers.map((h, i) => {
        const maxRowWidth = Math.max(0, ...rows.map((r) => (r[i] ?? '').length));
        return Math.max(h.length, maxRowWidth);
      });

      const headerLine = headers.map((h, i) => h.padEnd(widths[i] ?? 0)).join('  ');
      console.log(`${this.getIndent()}${headerLine.trimEnd()}`);

      for (const row of rows) {
        const rowLine = row.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join('  ');
        console.log(`${this.getIndent()}${rowLine.trimEnd()}`);
      }
    }
  }

  // ===========================================================================
  // Detect Output
  // ===========================================================================

  /**
   * Print detected hardware and host context.
   */
  detectedSystem(system: DetectedSystem): void {
    const { facts } = system;

    if (this.mode === 'human') {
      this.info('System Hardware Detection:');
      this.indent();
      this.info(`CPU: ${facts.cores} cores / ${facts.threads} threads`);
      this.info(`RAM: ${facts.ramGB} GB${system.memorySource === 'cgroup' ? ' (container limit)' : ''}`);
      this.info(`Network: ${facts.nicMbps} Mbps${system.interfaceName ? ` (${system.interfaceName})` : ''}`);
      this.info(`Disk: ${facts.diskMedium}${system.diskDevice ? ` (${system.diskDevice})` : ''}`);
      this.info(`Environment: ${system.containerType ? `${system.containerType} container` : 'host'}`);
      this.info(`Platform: ${system.platform} (install path ${system.installPath})`);
      this.dedent();
      if (system.notes.length > 0) {
        this.newline();
        this.notes(system.notes);
      }
    }

    this.result.hardware = facts;
    this.result.system = {
      containerType: system.containerType,
      platform: system.platform,
      installPath: system.installPath,
      interfaceName: system.interfaceName,
      diskDevice: system.diskDevice,
      memorySource: system.memorySource,
    };
    this.result.notes = system.notes;
  }

  /**
   * Print detection caveats as warnings.
   *
   * Warnings go to stderr, so stdout stays clean for --stdout.
   */
  notes(notes: readonly string[]): void {
    if (this.mode === 'human') {
      for (const note of notes) {
        this.warning(note);
      }
    }
  }

  // ===========================================================================
  // Profiles Output
  // ===========================================================================

  /**
   * Print the profile catalogue.
   */
  profilesTable(profiles: readonly ProfileDefinition[]): void {
    const infos: ProfileInfo[] = profiles.map((p) => ({
      id: p.id,
      label: p.label,
      description: p.description,
    }));

    if (this.mode === 'human') {
      this.table(
        ['PROFILE', 'NAME', 'DESCRIPTION'],
        infos.map((p) => [p.id, p.label, p.description])
      );
    }

    this.result.profiles = infos;
  }

  // ===========================================================================
  // Generate Output
  // ===========================================================================

  /**
   * Print the generation summary.
   *
   * @param artifact - The rendered artifact
   * @param outputPath - Where it was written, or null when printed to stdout
   * @param installPath - Target path for the apply instructions
   */
  generated(artifact: GeneratedArtifact, outputPath: string | null, installPath: string): void {
    const { resolved } = artifact;

    if (this.mode === 'human') {
      this.newline();
      this.success('Optimization complete!');
      this.indent();
      this.info(`Profile: ${resolved.profile}`);
      this.info(`Hardware: ${describeHardware(resolved.facts)}`);
      this.info(`IPv6: ${resolved.disableIpv6 ? 'Disabled' : 'Enabled'}`);
      this.info(`Settings: ${resolved.entries.length} (digest ${artifact.digest})`);
      if (outputPath !== null) {
        this.info(`Configuration saved to: ${outputPath}`);
      }
      this.dedent();
    }

    this.result.hardware = resolved.facts;
    this.result.profile = resolved.profile;
    this.result.disableIpv6 = resolved.disableIpv6;
    this.result.output = outputPath;
    this.result.installPath = installPath;
    this.result.digest = artifact.digest;
    this.result.settings = resolved.entries.map((entry) => ({
      key: entry.key,
      value: entry.value,
      source: entry.source,
    }));
    if (outputPath === null) {
      this.result.content = artifact.content;
    }
  }

  /**
   * Print how to install and apply the file.
   */
  instructions(outputPath: string, installPath: string, isContainer: boolean): void {
    if (this.mode !== 'human') {
      return;
    }

    this.newline();
    this.info('To apply these settings:');
    this.indent();
    installSteps(outputPath, installPath).forEach((step, i) => {
      this.info(`${i + 1}. ${step}`);
    });
    this.dedent();

    if (isContainer) {
      this.newline();
      this.warning('Container Environment Notes:');
      this.indent();
      for (const note of CONTAINER_NOTES) {
        this.info(`- ${note}`);
      }
      this.dedent();
    }

    this.newline();
    this.warning('Always test these settings in a staging environment before applying to production.');
  }

  // ===========================================================================
  // Validate Output
  // ===========================================================================

  /**
   * Print validation success.
   */
  validationSuccess(configPath: string, summary: string[]): void {
    if (this.mode === 'human') {
      this.success('Configuration valid');
      this.indent();
      for (const line of summary) {
        this.info(line);
      }
      this.dedent();
    }

    this.result.config = configPath;
  }

  // ===========================================================================
  // JSON Output
  // ===========================================================================

  /**
   * Get the command result object.
   */
  getResult(): CommandResult {
    return this.result;
  }

  /**
   * Flush output.
   *
   * In JSON mode, prints the collected JSON.
   * In human mode, does nothing (output was printed inline).
   */
  flush(): void {
    if (this.mode === 'json') {
      console.log(JSON.stringify(this.result, null, 2));
    }
  }
}

/**
 * Create an OutputFormatter from CLI options.
 */
export function createOutput(
  command: string,
  options: { json?: boolean }
): OutputFormatter {
  return new OutputFormatter(command, options);
}
