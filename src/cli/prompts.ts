/**
 * Interactive Prompts
 *
 * Question flows for the interactive generate command. Every flow re-asks
 * until it receives a valid answer; declining the final confirmation
 * raises AbortedError.
 */

import * as readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';

import { AbortedError } from '../core/errors.js';
import { createHardwareFacts, describeHardware, FACT_LIMITS } from '../core/facts.js';
import { DISK_MEDIA, type DiskMedium, type HardwareFacts, type Profile } from '../core/types.js';
import { listProfiles } from '../rules/profiles/index.js';

/**
 * Line-oriented terminal I/O used by the flows
 */
export interface Prompter {
  /** Ask a question and return the raw answer */
  ask(question: string): Promise<string>;
  /** Print a line */
  say(message: string): void;
  /** Release the terminal */
  close(): void;
}

/**
 * A numbered menu entry
 */
export interface Choice<T> {
  label: string;
  value: T;
}

const INVALID_SELECTION = 'Invalid selection. Please try again.';
const INVALID_NUMBER = 'Invalid input. Please enter a positive number.';
const INVALID_CONFIRMATION = 'Invalid choice. Please enter Y or n.';

const DISK_LABELS: Readonly<Record<DiskMedium, string>> = {
  HDD: 'HDD (Hard Disk Drive)',
  SSD: 'SSD (Solid State Drive)',
  NVMe: 'NVMe SSD',
};

/**
 * Prompter over the process's stdin and stdout.
 */
export function createReadlinePrompter(): Prompter {
  const rl = readline.createInterface({ input, output });

  return {
    ask: (question) => rl.question(question),
    say: (message) => {
      console.log(message);
    },
    close: () => {
      rl.close();
    },
  };
}

/**
 * Parse a strictly positive decimal integer.
 *
 * @returns The number, or null for anything else
 */
export function parsePositiveInteger(answer: string): number | null {
  const trimmed = answer.trim();
  if (!/^\d+$/.test(trimmed)) {
    return null;
  }
  const value = Number(trimmed);
  return Number.isSafeInteger(value) && value > 0 ? value : null;
}

/**
 * Ask until the answer is a positive integer no larger than `max`.
 */
export async function askPositiveInteger(
  prompter: Prompter,
  question: string,
  max: number = Number.MAX_SAFE_INTEGER
): Promise<number> {
  for (;;) {
    const value = parsePositiveInteger(await prompter.ask(question));
    if (value !== null && value <= max) {
      return value;
    }
    prompter.say(value !== null ? `Please enter a number no larger than ${max}.` : INVALID_NUMBER);
  }
}

/**
 * Present a numbered menu and ask until a listed number is entered.
 *
 * @param defaultValue - Returned for an empty answer; without it an empty
 *   answer is invalid
 */
export async function choose<T>(
  prompter: Prompter,
  choices: readonly Choice<T>[],
  defaultValue?: T
): Promise<T> {
  choices.forEach((choice, i) => {
    prompter.say(`${String(i + 1).padStart(2)}) ${choice.label}`);
  });

  for (;;) {
    const answer = (await prompter.ask(`Enter selection [1-${choices.length}]: `)).trim();
    if (answer === '' && defaultValue !== undefined) {
      return defaultValue;
    }
    const index = parsePositiveInteger(answer);
    const choice = index !== null ? choices[index - 1] : undefined;
    if (choice !== undefined) {
      return choice.value;
    }
    prompter.say(INVALID_SELECTION);
  }
}

/**
 * Show detected hardware and let the operator keep it or type their own.
 *
 * The container flag is always kept from detection.
 */
export async function reviewHardware(
  prompter: Prompter,
  detected: HardwareFacts
): Promise<HardwareFacts> {
  prompter.say(`Detected hardware: ${describeHardware(detected)}`);
  prompter.say('Do you want to use these detected values or manually input your own?');

  const manual = await choose(
    prompter,
    [
      { label: 'Use detected values (default)', value: false },
      { label: 'Manually input values', value: true },
    ],
    false
  );
  if (!manual) {
    return detected;
  }

  const cores = await askPositiveInteger(
    prompter,
    'Enter number of CPU cores: ',
    FACT_LIMITS.cores
  );
  const threads = await askPositiveInteger(
    prompter,
    'Enter number of CPU threads: ',
    FACT_LIMITS.threads
  );
  const ramGB = await askPositiveInteger(prompter, 'Enter RAM amount in GB: ', FACT_LIMITS.ramGB);
  const nicMbps = await askPositiveInteger(
    prompter,
    'Enter network speed in Mbps (e.g., 1000 for 1Gbps): ',
    FACT_LIMITS.nicMbps
  );
  prompter.say('Select disk type:');
  const diskMedium = await choose(
    prompter,
    DISK_MEDIA.map((medium) => ({ label: DISK_LABELS[medium], value: medium }))
  );

  const facts = createHardwareFacts({
    cores,
    threads,
    ramGB,
    nicMbps,
    diskMedium,
    isContainer: detected.isContainer,
  });
  prompter.say(`Hardware parameters updated: ${describeHardware(facts)}`);
  return facts;
}

/**
 * Ask for the workload profile.
 */
export async function selectProfile(prompter: Prompter): Promise<Profile> {
  prompter.say("Select your server's primary use case:");

  const profile = await choose(
    prompter,
    listProfiles().map((p) => ({ label: `${p.id.padEnd(16)} ${p.description}`, value: p.id }))
  );
  prompter.say(`Selected: ${profile}`);
  return profile;
}

/**
 * Ask whether to disable IPv6. Keeping it enabled is the default.
 */
export async function askDisableIpv6(prompter: Prompter): Promise<boolean> {
  prompter.say('Do you want to disable IPv6 on this system?');

  const disable = await choose(
    prompter,
    [
      { label: 'No, keep IPv6 enabled (default)', value: false },
      { label: 'Yes, disable IPv6 completely', value: true },
    ],
    false
  );
  prompter.say(`IPv6 will be ${disable ? 'disabled' : 'enabled'} in the generated configuration.`);
  return disable;
}

/**
 * Print the run summary and ask for a final go-ahead.
 *
 * @throws AbortedError when the operator answers no
 */
export async function confirmGeneration(prompter: Prompter, summary: readonly string[]): Promise<void> {
  prompter.say('Configuration Summary:');
  for (const line of summary) {
    prompter.say(`  - ${line}`);
  }

  for (;;) {
    const answer = (await prompter.ask('Generate sysctl.conf with these settings? [Y/n]: ')).trim();
    if (answer === '' || answer === 'y' || answer === 'Y') {
      return;
    }
    if (answer === 'n' || answer === 'N') {
      throw new AbortedError();
    }
    prompter.say(INVALID_CONFIRMATION);
  }
}
