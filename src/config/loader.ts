/**
 * Configuration Loader
 *
 * Loads YAML configuration files from the filesystem and checks them
 * against the configuration schema.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import yaml from 'js-yaml';

import { ConfigError } from '../core/errors.js';
import type { KerntuneConfig } from './types.js';
import { validateConfig } from './validator.js';

/**
 * Why a configuration file could not be loaded
 */
export type ConfigLoadFailure = 'not-found' | 'unreadable' | 'syntax';

/**
 * Error thrown when configuration loading fails
 */
export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly reason: ConfigLoadFailure,
    public override readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConfigLoadError';
  }

  /**
   * Convert to the coded error reported by the CLI.
   */
  toConfigError(): ConfigError {
    if (this.reason === 'syntax') {
      return new ConfigError(
        this.message,
        'CONFIG_INVALID_YAML',
        'Fix the YAML syntax at the reported line.',
        this.filePath
      );
    }
    return new ConfigError(
      this.message,
      'CONFIG_NOT_FOUND',
      'Ensure the configuration file exists and is readable.',
      this.filePath
    );
  }
}

/**
 * Load and parse a YAML configuration file.
 *
 * @param filePath - Path to the YAML configuration file
 * @returns Parsed YAML content as unknown (requires validation)
 * @throws ConfigLoadError if the file cannot be read or parsed
 */
export async function loadYamlFile(filePath: string): Promise<unknown> {
  let content: string;

  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') {
      throw new ConfigLoadError(
        `Configuration file not found: ${filePath}`,
        filePath,
        'not-found',
        err
      );
    }
    if (err.code === 'EACCES') {
      throw new ConfigLoadError(
        `Permission denied reading configuration file: ${filePath}`,
        filePath,
        'unreadable',
        err
      );
    }
    throw new ConfigLoadError(
      `Failed to read configuration file: ${filePath}`,
      filePath,
      'unreadable',
      err
    );
  }

  try {
    return yaml.load(content);
  } catch (error) {
    const err = error as yaml.YAMLException;
    throw new ConfigLoadError(
      `Invalid YAML syntax in ${filePath}: ${err.message}`,
      filePath,
      'syntax',
      err
    );
  }
}

/**
 * Load, parse and validate a configuration file.
 *
 * @param filePath - Path to the YAML configuration file
 * @returns The validated configuration
 * @throws ConfigError with code CONFIG_NOT_FOUND, CONFIG_INVALID_YAML or
 *   CONFIG_VALIDATION_FAILED
 */
export async function loadConfig(filePath: string): Promise<KerntuneConfig> {
  const configPath = resolve(filePath);

  let raw: unknown;
  try {
    raw = await loadYamlFile(configPath);
  } catch (error) {
    if (error instanceof ConfigLoadError) {
      throw error.toConfigError();
    }
    throw error;
  }

  const result = validateConfig(raw);
  if (!result.valid) {
    throw new ConfigError(
      `Configuration validation failed: ${configPath}`,
      'CONFIG_VALIDATION_FAILED',
      'Correct the fields listed below.',
      configPath,
      result.errors.map(({ path, message }) => ({ path, message }))
    );
  }

  return result.config;
}
