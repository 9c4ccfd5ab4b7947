/**
 * Configuration Validator
 *
 * Validates configuration data against the JSON Schema using Ajv.
 */

import Ajv, { type ErrorObject } from 'ajv';
import type { KerntuneConfig } from './types.js';
import configSchema from './schema.json' with { type: 'json' };

/**
 * Validation error details
 */
export interface ValidationError {
  /** JSON path to the invalid field */
  path: string;
  /** Human-readable error message */
  message: string;
  /** Additional error parameters from Ajv */
  params: Record<string, unknown>;
}

/**
 * Validation result - either success with config or failure with errors
 */
export type ValidationResult =
  | { valid: true; config: KerntuneConfig }
  | { valid: false; errors: ValidationError[] };

const ajv = new Ajv.default({
  allErrors: true,
  verbose: true,
});

// Compile the schema once
const validate = ajv.compile<KerntuneConfig>(configSchema);

/**
 * Describe one Ajv error; enum failures list the allowed values.
 */
function describeError(error: ErrorObject): string {
  const allowed: unknown = error.params['allowedValues'];
  if (error.keyword === 'enum' && Array.isArray(allowed)) {
    return `must be one of ${allowed.join(', ')}`;
  }
  if (error.keyword === 'additionalProperties') {
    return `unknown property "${String(error.params['additionalProperty'])}"`;
  }
  return error.message ?? 'Unknown validation error';
}

/**
 * Validate configuration data against the JSON Schema.
 *
 * An empty YAML document is treated as an empty configuration.
 *
 * @param data - Parsed YAML/JSON data to validate
 * @returns Validation result with either the typed config or detailed errors
 */
export function validateConfig(data: unknown): ValidationResult {
  const candidate = data ?? {};

  if (!validate(candidate)) {
    const errors: ValidationError[] = (validate.errors ?? []).map(
      (error: ErrorObject) => ({
        path: error.instancePath || '/',
        message: describeError(error),
        params: error.params,
      })
    );

    return { valid: false, errors };
  }

  return { valid: true, config: candidate };
}
