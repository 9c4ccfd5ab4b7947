/**
 * Hardware Facts
 *
 * Validates candidate hardware facts and freezes them into the immutable
 * snapshot every rule set reads.
 */

import Ajv, { type ErrorObject } from 'ajv';

import { HardwareFactError, type FactViolation } from './errors.js';
import { DISK_MEDIA, type DiskMedium, type HardwareFacts } from './types.js';

/**
 * Upper bounds for numeric facts.
 *
 * The largest derived value, `kernel.shmmax` at 90% of RAM in bytes, stays
 * below 2^53 at these limits, so every setting renders as an exact integer.
 */
export const FACT_LIMITS = {
  cores: 65536,
  threads: 65536,
  ramGB: 65536,
  nicMbps: 1000000,
} as const;

const hardwareFactsSchema = {
  type: 'object',
  properties: {
    cores: { type: 'integer', minimum: 1, maximum: FACT_LIMITS.cores },
    threads: { type: 'integer', minimum: 1, maximum: FACT_LIMITS.threads },
    ramGB: { type: 'integer', minimum: 1, maximum: FACT_LIMITS.ramGB },
    nicMbps: { type: 'integer', minimum: 1, maximum: FACT_LIMITS.nicMbps },
    diskMedium: { type: 'string', enum: [...DISK_MEDIA] },
    isContainer: { type: 'boolean' },
  },
  required: ['cores', 'threads', 'ramGB', 'nicMbps', 'diskMedium', 'isContainer'],
  additionalProperties: false,
} as const;

const ajv = new Ajv.default({ allErrors: true });
const validate = ajv.compile<HardwareFacts>(hardwareFactsSchema);

/**
 * Convert an Ajv error into the field/constraint pair reported to the user.
 */
function toViolation(error: ErrorObject): FactViolation {
  const missing = error.params['missingProperty'];
  const field =
    error.instancePath.length > 0
      ? error.instancePath.slice(1)
      : typeof missing === 'string'
        ? missing
        : '/';

  if (error.keyword === 'required') {
    return { field, constraint: 'is required' };
  }
  if (error.keyword === 'enum') {
    return { field, constraint: `must be one of ${DISK_MEDIA.join(', ')}` };
  }
  return { field, constraint: error.message ?? 'is invalid' };
}

/**
 * Validate candidate facts and return a frozen snapshot.
 *
 * @param candidate - Facts from detection, a config file, flags or prompts
 * @returns Frozen HardwareFacts
 * @throws HardwareFactError listing every violated constraint
 */
export function createHardwareFacts(candidate: unknown): HardwareFacts {
  if (!validate(candidate)) {
    throw new HardwareFactError((validate.errors ?? []).map(toViolation));
  }

  return Object.freeze({
    cores: candidate.cores,
    threads: candidate.threads,
    ramGB: candidate.ramGB,
    nicMbps: candidate.nicMbps,
    diskMedium: candidate.diskMedium,
    isContainer: candidate.isContainer,
  });
}

/**
 * Parse a disk medium name case-insensitively (`hdd`, `ssd`, `nvme`).
 *
 * @returns The medium, or null when the name is not recognized
 */
export function parseDiskMedium(input: string): DiskMedium | null {
  const normalized = input.trim().toLowerCase();
  return DISK_MEDIA.find((medium) => medium.toLowerCase() === normalized) ?? null;
}

/**
 * One-line hardware summary used in headers and confirmations.
 */
export function describeHardware(facts: HardwareFacts): string {
  return `${facts.cores} cores / ${facts.threads} threads, ${facts.ramGB}GB RAM, ${facts.nicMbps}Mb/s NIC, ${facts.diskMedium}`;
}
