/**
 * Unit tests for Configuration Resolver
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { resolve } from 'node:path';
import {
  configToOverrides,
  mergeOverrides,
  needsDetection,
  resolveHardware,
} from '../../../src/config/resolver.js';
import type { RunOverrides } from '../../../src/config/types.js';
import { HardwareFactError } from '../../../src/core/errors.js';
import { makeFacts } from '../../helpers/facts.js';

describe('configToOverrides', () => {
  it('should map every config field to its override', () => {
    const overrides = configToOverrides(
      {
        profile: 'database',
        disable_ipv6: true,
        output: 'out/sysctl-db.conf',
        install_path: '/etc/sysctl.d/99-custom.conf',
        hardware: {
          cores: 8,
          threads: 16,
          ram_gb: 64,
          nic_mbps: 10000,
          disk: 'nvme',
          container: false,
        },
      },
      '/srv/kerntune/full.yaml'
    );

    assert.deepStrictEqual(overrides, {
      profile: 'database',
      disableIpv6: true,
      outputPath: resolve('/srv/kerntune', 'out/sysctl-db.conf'),
      installPath: '/etc/sysctl.d/99-custom.conf',
      hardware: {
        cores: 8,
        threads: 16,
        ramGB: 64,
        nicMbps: 10000,
        diskMedium: 'NVMe',
        isContainer: false,
      },
    });
  });

  it('should leave absent fields undefined', () => {
    const overrides = configToOverrides({ hardware: { disk: 'ssd' } }, '/srv/kerntune/c.yaml');

    assert.strictEqual(overrides.profile, undefined);
    assert.strictEqual(overrides.outputPath, undefined);
    assert.strictEqual(overrides.hardware.diskMedium, 'SSD');
    assert.strictEqual(overrides.hardware.cores, undefined);
  });

  it('should keep absolute output paths unchanged', () => {
    const overrides = configToOverrides({ output: '/tmp/sysctl.conf' }, '/srv/kerntune/c.yaml');

    assert.strictEqual(overrides.outputPath, '/tmp/sysctl.conf');
  });
});

describe('mergeOverrides', () => {
  const lower: RunOverrides = {
    profile: 'web',
    disableIpv6: true,
    outputPath: '/tmp/a.conf',
    hardware: { cores: 2, ramGB: 4, diskMedium: 'HDD' },
  };

  it('should let set fields in the higher layer win', () => {
    const merged = mergeOverrides(lower, {
      profile: 'cache',
      hardware: { ramGB: 32 },
    });

    assert.strictEqual(merged.profile, 'cache');
    assert.strictEqual(merged.hardware.ramGB, 32);
  });

  it('should fall through to the lower layer for unset fields', () => {
    const merged = mergeOverrides(lower, { hardware: {} });

    assert.deepStrictEqual(merged, {
      profile: 'web',
      disableIpv6: true,
      outputPath: '/tmp/a.conf',
      installPath: undefined,
      hardware: {
        cores: 2,
        threads: undefined,
        ramGB: 4,
        nicMbps: undefined,
        diskMedium: 'HDD',
        isContainer: undefined,
      },
    });
  });

  it('should keep an explicit false from the higher layer', () => {
    const merged = mergeOverrides(lower, { disableIpv6: false, hardware: {} });

    assert.strictEqual(merged.disableIpv6, false);
  });
});

describe('needsDetection', () => {
  it('should be true when any required fact is missing', () => {
    assert.strictEqual(
      needsDetection({ cores: 4, threads: 8, ramGB: 16, nicMbps: 1000 }),
      true
    );
  });

  it('should be false when all required facts are set', () => {
    assert.strictEqual(
      needsDetection({ cores: 4, threads: 8, ramGB: 16, nicMbps: 1000, diskMedium: 'SSD' }),
      false
    );
  });
});

describe('resolveHardware', () => {
  it('should apply overrides over detected facts', () => {
    const detected = makeFacts({ ramGB: 8, isContainer: true });
    const facts = resolveHardware(detected, { ramGB: 128, diskMedium: 'NVMe' });

    assert.strictEqual(facts.ramGB, 128);
    assert.strictEqual(facts.diskMedium, 'NVMe');
    assert.strictEqual(facts.cores, detected.cores);
    assert.strictEqual(facts.isContainer, true);
  });

  it('should default isContainer to false without detection', () => {
    const facts = resolveHardware(null, {
      cores: 2,
      threads: 4,
      ramGB: 8,
      nicMbps: 1000,
      diskMedium: 'SSD',
    });

    assert.strictEqual(facts.isContainer, false);
  });

  it('should report each missing fact when detection was skipped', () => {
    assert.throws(
      () => resolveHardware(null, { cores: 4 }),
      (error: unknown) => {
        assert.ok(error instanceof HardwareFactError);
        assert.deepStrictEqual(
          error.violations.map((v) => v.field),
          ['threads', 'ramGB', 'nicMbps', 'diskMedium']
        );
        return true;
      }
    );
  });

  it('should reject an override that violates a constraint', () => {
    assert.throws(
      () => resolveHardware(makeFacts(), { cores: 0 }),
      HardwareFactError
    );
  });
});
