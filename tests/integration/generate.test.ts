/**
 * Integration tests for the `generate` command
 *
 * Runs the whole pipeline against in-memory hosts and a temp output dir.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { access, mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { runGenerate, type GenerateCommandOptions } from '../../src/cli/commands/generate.js';
import { OutputFormatter } from '../../src/cli/output.js';
import { findSetting } from '../../src/core/engine.js';
import { AbortedError, HardwareFactError, UnknownProfileError } from '../../src/core/errors.js';
import { computeContentHash } from '../../src/lib/hash.js';
import { debianHost, dockerHost } from '../helpers/hosts.js';
import { MemorySystemReader } from '../helpers/memory-reader.js';
import { ScriptedPrompter } from '../helpers/prompter.js';

const VALID_CONFIGS = join(dirname(fileURLToPath(import.meta.url)), '../fixtures/valid-configs');

const FIXED_TIME = new Date(2026, 0, 2, 3, 4, 5);

function jsonOutput(): OutputFormatter {
  return new OutputFormatter('generate', { json: true });
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

describe('generate command', () => {
  let workDir: string;
  let outputFile: string;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'kerntune-generate-'));
    outputFile = join(workDir, 'sysctl.conf');
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  function run(
    options: GenerateCommandOptions,
    reader: MemorySystemReader = debianHost(),
    prompter?: ScriptedPrompter
  ) {
    return runGenerate(
      { output: outputFile, ...options },
      { reader, prompter, now: FIXED_TIME },
      jsonOutput()
    );
  }

  describe('non-interactive defaults', () => {
    it('should detect hardware and write a general profile', async () => {
      const outcome = await run({ yes: true });

      assert.deepStrictEqual({ ...outcome.artifact.resolved.facts }, {
        cores: 4,
        threads: 4,
        ramGB: 8,
        nicMbps: 1000,
        diskMedium: 'HDD',
        isContainer: false,
      });
      assert.strictEqual(outcome.artifact.resolved.profile, 'general');
      assert.strictEqual(outcome.artifact.resolved.disableIpv6, false);
      assert.strictEqual(outcome.installPath, '/etc/sysctl.conf');
      assert.strictEqual(outcome.outputPath, outputFile);
    });

    it('should write the header followed by sorted settings', async () => {
      await run({ yes: true });

      const lines = (await readFile(outputFile, 'utf-8')).split('\n');

      assert.deepStrictEqual(lines.slice(0, 8), [
        '# Optimized sysctl.conf for General Purpose',
        '# Hardware: 4 cores / 4 threads, 8GB RAM, 1000Mb/s NIC, HDD',
        '# Generated on: 2026-01-02 03:04:05',
        '#',
        '# Apply changes with: sudo sysctl -p /etc/sysctl.conf',
        '#',
        '# IMPORTANT: Test these settings with your specific workload.',
        '#',
      ]);
      assert.strictEqual(lines.at(-1), '');

      const body = lines.slice(8, -1);
      const keys = body.map((line) => line.split(' = ')[0] ?? '');
      assert.deepStrictEqual(keys, [...keys].sort());
      assert.strictEqual(new Set(keys).size, keys.length);
      assert.ok(body.includes('vm.swappiness = 20'));
      assert.ok(body.includes('net.core.somaxconn = 4096'));
      assert.ok(body.includes('net.ipv6.conf.all.disable_ipv6 = 0'));
    });

    it('should write nothing when printing to stdout', async () => {
      const outcome = await run({ yes: true, stdout: true });

      assert.strictEqual(outcome.outputPath, null);
      assert.strictEqual(await fileExists(outputFile), false);
      assert.ok(outcome.artifact.content.startsWith('# Optimized sysctl.conf for General Purpose\n'));
    });
  });

  describe('determinism', () => {
    it('should produce the same digest regardless of generation time', async () => {
      const first = await run({ yes: true, stdout: true });
      const second = await runGenerate(
        { yes: true, stdout: true },
        { reader: debianHost(), now: new Date(2027, 5, 6, 7, 8, 9) },
        jsonOutput()
      );

      assert.strictEqual(first.artifact.digest, second.artifact.digest);
      assert.notStrictEqual(first.artifact.content, second.artifact.content);
    });

    it('should digest only the settings lines', async () => {
      const outcome = await run({ yes: true, stdout: true });
      const body = outcome.artifact.content.split('\n').slice(8, -1).join('\n');

      assert.strictEqual(outcome.artifact.digest, computeContentHash(body));
    });
  });

  describe('IPv6 toggle', () => {
    it('should disable IPv6 on every scope', async () => {
      const outcome = await run({ yes: true, disableIpv6: true });
      const { resolved } = outcome.artifact;

      for (const scope of ['all', 'default', 'lo']) {
        const setting = findSetting(resolved, `net.ipv6.conf.${scope}.disable_ipv6`);
        assert.strictEqual(setting?.value, 1);
        assert.strictEqual(setting?.source, 'ipv6');
      }
      assert.strictEqual(findSetting(resolved, 'net.ipv6.conf.all.accept_ra'), undefined);
    });

    it('should harden IPv6 when it stays enabled', async () => {
      const outcome = await run({ yes: true });
      const { resolved } = outcome.artifact;

      assert.strictEqual(findSetting(resolved, 'net.ipv6.conf.all.accept_ra')?.value, 0);
      assert.strictEqual(findSetting(resolved, 'net.ipv6.neigh.default.gc_thresh3')?.value, 8192);
    });
  });

  describe('override precedence', () => {
    it('should let flags win over the config file', async () => {
      const outcome = await run({
        yes: true,
        config: join(VALID_CONFIGS, 'full.yaml'),
        profile: 'web',
        ram: '16',
      });

      assert.strictEqual(outcome.artifact.resolved.profile, 'web');
      assert.strictEqual(outcome.artifact.resolved.disableIpv6, true);
      assert.deepStrictEqual({ ...outcome.artifact.resolved.facts }, {
        cores: 8,
        threads: 16,
        ramGB: 16,
        nicMbps: 10000,
        diskMedium: 'NVMe',
        isContainer: false,
      });
      assert.strictEqual(outcome.installPath, '/etc/sysctl.d/99-custom.conf');
    });

    it('should skip detection when every fact is pinned', async () => {
      const reader = debianHost();

      await run(
        {
          yes: true,
          config: join(VALID_CONFIGS, 'full.yaml'),
        },
        reader
      );

      assert.deepStrictEqual(reader.probes, []);
    });

    it('should fill unpinned facts from detection', async () => {
      const outcome = await run({
        yes: true,
        config: join(VALID_CONFIGS, 'hardware-only.yaml'),
        cores: '2',
      });

      assert.deepStrictEqual({ ...outcome.artifact.resolved.facts }, {
        cores: 2,
        threads: 4,
        ramGB: 32,
        nicMbps: 1000,
        diskMedium: 'SSD',
        isContainer: false,
      });
    });
  });

  describe('invalid input', () => {
    it('should reject a non-positive core count', async () => {
      await assert.rejects(() => run({ yes: true, cores: '0' }), HardwareFactError);
      assert.strictEqual(await fileExists(outputFile), false);
    });

    it('should reject non-numeric RAM', async () => {
      await assert.rejects(
        () => run({ yes: true, ram: 'lots' }),
        (error: unknown) => {
          assert.ok(error instanceof HardwareFactError);
          assert.strictEqual(error.violations[0]?.field, 'ramGB');
          return true;
        }
      );
    });

    it('should reject oversized hardware flags before rendering', async () => {
      await assert.rejects(
        () => run({ yes: true, profile: 'web', threads: '100000000000000000000', ram: '20000000000' }),
        (error: unknown) => {
          assert.ok(error instanceof HardwareFactError);
          assert.strictEqual(error.code, 'INVALID_HARDWARE_FACT');
          assert.deepStrictEqual(error.violations, [
            { field: 'threads', constraint: 'must be <= 65536' },
            { field: 'ramGB', constraint: 'must be <= 65536' },
          ]);
          return true;
        }
      );
      assert.strictEqual(await fileExists(outputFile), false);
    });

    it('should reject an unknown disk type', async () => {
      await assert.rejects(() => run({ yes: true, disk: 'floppy' }), HardwareFactError);
    });

    it('should reject an unknown profile', async () => {
      await assert.rejects(() => run({ yes: true, profile: 'gaming' }), UnknownProfileError);
    });
  });

  describe('interactive flow', () => {
    it('should ask for profile and IPv6, then confirm', async () => {
      const prompter = new ScriptedPrompter(['', '4', '2', 'y']);

      const outcome = await run({}, debianHost(), prompter);

      assert.strictEqual(outcome.artifact.resolved.profile, 'database');
      assert.strictEqual(outcome.artifact.resolved.disableIpv6, true);
      assert.strictEqual(prompter.remaining, 0);
      assert.ok(prompter.lines.includes('  - Use Case: database'));
      assert.ok(prompter.lines.includes(`  - Output file: ${outputFile}`));
    });

    it('should not ask for values given as flags', async () => {
      const prompter = new ScriptedPrompter(['', '']);

      const outcome = await run({ profile: 'cache', disableIpv6: false }, debianHost(), prompter);

      assert.strictEqual(outcome.artifact.resolved.profile, 'cache');
      assert.strictEqual(prompter.questions.length, 2);
      assert.strictEqual(
        prompter.questions[1],
        'Generate sysctl.conf with these settings? [Y/n]: '
      );
    });

    it('should write nothing when the operator declines', async () => {
      const prompter = new ScriptedPrompter(['', '1', '', 'n']);

      await assert.rejects(() => run({}, debianHost(), prompter), AbortedError);
      assert.strictEqual(await fileExists(outputFile), false);
    });
  });

  describe('container hosts', () => {
    it('should use the container memory limit and cloud disk', async () => {
      const outcome = await run({ yes: true, profile: 'container' }, dockerHost());

      assert.deepStrictEqual({ ...outcome.artifact.resolved.facts }, {
        cores: 2,
        threads: 2,
        ramGB: 4,
        nicMbps: 1000,
        diskMedium: 'SSD',
        isContainer: true,
      });
      assert.strictEqual(outcome.artifact.resolved.profile, 'container');
    });
  });
});
