#!/usr/bin/env node
import { program } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

import { generateCommand } from './commands/generate.js';
import { detectCommand } from './commands/detect.js';
import { profilesCommand } from './commands/profiles.js';
import { validateCommand } from './commands/validate.js';

// Get version from package.json
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packagePath = join(__dirname, '..', '..', 'package.json');
const packageJson = JSON.parse(readFileSync(packagePath, 'utf-8')) as { version: string };

program
  .name('kerntune')
  .description('Hardware-aware sysctl.conf generator for Linux hosts and containers')
  .version(packageJson.version)
  .option('--verbose', 'Print each probed system file before reading it');

/**
 * Verbose option description shared across all commands that probe the host.
 */
const VERBOSE_DESC = 'Print each probed system file before reading it';

/**
 * Merge the global --verbose flag into command-level options.
 * Supports both positions:
 *   kerntune --verbose detect    (parent parses --verbose)
 *   kerntune detect --verbose    (subcommand parses --verbose)
 */
function withGlobalOpts<T extends { verbose?: boolean }>(opts: T): T & { verbose: boolean } {
  const globalOpts = program.opts<{ verbose?: boolean }>();
  return { ...opts, verbose: opts.verbose === true || globalOpts.verbose === true };
}

program
  .command('generate')
  .description('Generate an optimized sysctl.conf for this host')
  .option('-p, --profile <profile>', 'Workload profile (see `kerntune profiles`)')
  .option('--disable-ipv6', 'Disable IPv6 instead of hardening it')
  .option('--cores <n>', 'CPU cores')
  .option('--threads <n>', 'CPU threads')
  .option('--ram <gb>', 'RAM in GB')
  .option('--nic <mbps>', 'Network link speed in Mb/s')
  .option('--disk <type>', 'Disk type: hdd, ssd or nvme')
  .option('--container', 'Treat the host as a container')
  .option('--no-container', 'Treat the host as bare metal or a VM')
  .option('-c, --config <file>', 'YAML configuration file')
  .option('-o, --output <file>', 'Output file (default: ~/sysctl-suggestion.conf)')
  .option('--install-path <path>', 'Where the file will be installed')
  .option('--stdout', 'Print the file instead of writing it')
  .option('-y, --yes', 'Do not prompt; the profile defaults to general')
  .option('--json', 'Output as JSON')
  .option('--verbose', VERBOSE_DESC)
  .action((opts) => generateCommand(withGlobalOpts(opts)));

program
  .command('detect')
  .description('Show detected hardware facts')
  .option('--json', 'Output as JSON')
  .option('--verbose', VERBOSE_DESC)
  .action((opts) => detectCommand(withGlobalOpts(opts)));

program
  .command('profiles')
  .description('List workload profiles')
  .option('--json', 'Output as JSON')
  .action(profilesCommand);

program
  .command('validate <file>')
  .description('Validate YAML configuration against schema')
  .option('--json', 'Output as JSON')
  .action(validateCommand);

await program.parseAsync();
