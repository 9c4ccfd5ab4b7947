/**
 * Error Types for Kerntune
 *
 * Custom error classes with error codes for structured error handling.
 */

/**
 * Error codes for all kerntune errors
 */
export type ErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_INVALID_YAML'
  | 'CONFIG_VALIDATION_FAILED'
  | 'INVALID_HARDWARE_FACT'
  | 'UNKNOWN_PROFILE'
  | 'DETECTION_FAILED'
  | 'RENDER_FAILED'
  | 'ABORTED';

/**
 * Mapping of error codes to exit codes
 */
export const EXIT_CODES: Record<ErrorCode, number> = {
  CONFIG_NOT_FOUND: 1,
  CONFIG_INVALID_YAML: 1,
  CONFIG_VALIDATION_FAILED: 1,
  INVALID_HARDWARE_FACT: 1,
  UNKNOWN_PROFILE: 1,
  DETECTION_FAILED: 2,
  RENDER_FAILED: 2,
  ABORTED: 0,
};

/**
 * Base error class for all kerntune errors.
 *
 * Provides structured error information with codes and suggestions.
 */
export class KerntuneError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'KerntuneError';
    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, KerntuneError.prototype);
  }

  /**
   * Get the exit code for this error.
   */
  get exitCode(): number {
    return EXIT_CODES[this.code];
  }

  /**
   * Format the error for display.
   */
  format(): string {
    let output = `Error: ${this.message}`;
    if (this.suggestion) {
      output += `\n\nFix: ${this.suggestion}`;
    }
    return output;
  }
}

/**
 * Error for configuration-file issues.
 */
export class ConfigError extends KerntuneError {
  constructor(
    message: string,
    code: 'CONFIG_NOT_FOUND' | 'CONFIG_INVALID_YAML' | 'CONFIG_VALIDATION_FAILED',
    suggestion?: string,
    public readonly path?: string,
    public readonly validationErrors?: Array<{
      path: string;
      message: string;
    }>
  ) {
    super(message, code, suggestion);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  override format(): string {
    let output = super.format();
    if (this.validationErrors && this.validationErrors.length > 0) {
      output += '\n\nValidation errors:';
      for (const error of this.validationErrors) {
        output += `\n  - ${error.path}: ${error.message}`;
      }
    }
    return output;
  }
}

/**
 * A single violated hardware constraint
 */
export interface FactViolation {
  /** Field name, e.g. `cores` */
  field: string;
  /** Constraint that failed, e.g. `must be >= 1` */
  constraint: string;
}

/**
 * Error for hardware facts that violate their constraints.
 *
 * Raised before the engine runs; no output file is written.
 */
export class HardwareFactError extends KerntuneError {
  constructor(public readonly violations: FactViolation[]) {
    super(
      `Invalid hardware facts: ${violations
        .map((v) => `${v.field} ${v.constraint}`)
        .join('; ')}`,
      'INVALID_HARDWARE_FACT',
      'Use whole numbers: up to 65536 cores, threads and GB of RAM, up to 1000000 Mb/s NIC speed. Disk is one of hdd, ssd, nvme.'
    );
    this.name = 'HardwareFactError';
    Object.setPrototypeOf(this, HardwareFactError.prototype);
  }
}

/**
 * Error for a profile selection outside the fixed profile set.
 */
export class UnknownProfileError extends KerntuneError {
  constructor(
    public readonly profile: string,
    knownProfiles: readonly string[]
  ) {
    super(
      `Unknown profile: ${profile}`,
      'UNKNOWN_PROFILE',
      `Choose one of: ${knownProfiles.join(', ')}`
    );
    this.name = 'UnknownProfileError';
    Object.setPrototypeOf(this, UnknownProfileError.prototype);
  }
}

/**
 * Error for hardware detection failures.
 */
export class DetectionError extends KerntuneError {
  constructor(
    message: string,
    public readonly probePath?: string
  ) {
    super(
      message,
      'DETECTION_FAILED',
      'Pass the hardware facts explicitly with --cores, --threads, --ram, --nic and --disk.'
    );
    this.name = 'DetectionError';
    Object.setPrototypeOf(this, DetectionError.prototype);
  }
}

/**
 * Error for a failed write of the generated artifact.
 *
 * The underlying I/O error is preserved as `cause`.
 */
export class RenderError extends KerntuneError {
  constructor(
    message: string,
    public readonly outputPath: string,
    public override readonly cause?: Error
  ) {
    super(message, 'RENDER_FAILED', 'Check that the output directory exists and is writable.');
    this.name = 'RenderError';
    Object.setPrototypeOf(this, RenderError.prototype);
  }
}

/**
 * Raised when the operator declines the confirmation prompt.
 */
export class AbortedError extends KerntuneError {
  constructor() {
    super('Aborted by user.', 'ABORTED');
    this.name = 'AbortedError';
    Object.setPrototypeOf(this, AbortedError.prototype);
  }
}

/**
 * Check if an error is a KerntuneError.
 */
export function isKerntuneError(error: unknown): error is KerntuneError {
  return error instanceof KerntuneError;
}

/**
 * Get the exit code for any error.
 */
export function getExitCode(error: unknown): number {
  if (isKerntuneError(error)) {
    return error.exitCode;
  }
  // Default to system error for unknown errors
  return 2;
}
