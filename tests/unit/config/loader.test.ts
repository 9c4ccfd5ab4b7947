/**
 * Unit tests for Configuration Loader
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigLoadError, loadConfig, loadYamlFile } from '../../../src/config/loader.js';
import { ConfigError } from '../../../src/core/errors.js';

const FIXTURES_DIR = join(dirname(fileURLToPath(import.meta.url)), '../../fixtures');
const VALID_CONFIGS = join(FIXTURES_DIR, 'valid-configs');
const INVALID_CONFIGS = join(FIXTURES_DIR, 'invalid-configs');

describe('loadYamlFile', () => {
  it('should parse YAML into plain data', async () => {
    const data = await loadYamlFile(join(VALID_CONFIGS, 'hardware-only.yaml'));

    assert.deepStrictEqual(data, { hardware: { ram_gb: 32, disk: 'ssd' } });
  });

  it('should throw ConfigLoadError with reason not-found for a missing file', async () => {
    const filePath = join(VALID_CONFIGS, 'does-not-exist.yaml');

    await assert.rejects(
      () => loadYamlFile(filePath),
      (error: unknown) => {
        assert.ok(error instanceof ConfigLoadError);
        assert.strictEqual(error.reason, 'not-found');
        assert.strictEqual(error.filePath, filePath);
        assert.strictEqual(error.message, `Configuration file not found: ${filePath}`);
        return true;
      }
    );
  });

  it('should throw ConfigLoadError with reason syntax for malformed YAML', async () => {
    await assert.rejects(
      () => loadYamlFile(join(INVALID_CONFIGS, 'syntax-error.yaml')),
      (error: unknown) => {
        assert.ok(error instanceof ConfigLoadError);
        assert.strictEqual(error.reason, 'syntax');
        assert.ok(error.message.startsWith('Invalid YAML syntax in '));
        return true;
      }
    );
  });

  it('should report a directory as unreadable', async () => {
    await assert.rejects(
      () => loadYamlFile(VALID_CONFIGS),
      (error: unknown) => {
        assert.ok(error instanceof ConfigLoadError);
        assert.strictEqual(error.reason, 'unreadable');
        return true;
      }
    );
  });
});

describe('ConfigLoadError.toConfigError', () => {
  it('should map syntax failures to CONFIG_INVALID_YAML', () => {
    const error = new ConfigLoadError('bad yaml', '/etc/kerntune.yaml', 'syntax');
    const converted = error.toConfigError();

    assert.strictEqual(converted.code, 'CONFIG_INVALID_YAML');
    assert.strictEqual(converted.path, '/etc/kerntune.yaml');
    assert.strictEqual(converted.message, 'bad yaml');
  });

  it('should map read failures to CONFIG_NOT_FOUND', () => {
    const error = new ConfigLoadError('denied', '/etc/kerntune.yaml', 'unreadable');

    assert.strictEqual(error.toConfigError().code, 'CONFIG_NOT_FOUND');
  });
});

describe('loadConfig', () => {
  it('should return the validated configuration', async () => {
    const config = await loadConfig(join(VALID_CONFIGS, 'minimal.yaml'));

    assert.deepStrictEqual(config, { profile: 'general' });
  });

  it('should throw CONFIG_NOT_FOUND for a missing file', async () => {
    await assert.rejects(
      () => loadConfig(join(VALID_CONFIGS, 'missing.yaml')),
      (error: unknown) => {
        assert.ok(error instanceof ConfigError);
        assert.strictEqual(error.code, 'CONFIG_NOT_FOUND');
        assert.strictEqual(error.exitCode, 1);
        return true;
      }
    );
  });

  it('should throw CONFIG_INVALID_YAML for malformed YAML', async () => {
    await assert.rejects(
      () => loadConfig(join(INVALID_CONFIGS, 'syntax-error.yaml')),
      (error: unknown) => {
        assert.ok(error instanceof ConfigError);
        assert.strictEqual(error.code, 'CONFIG_INVALID_YAML');
        return true;
      }
    );
  });

  it('should throw CONFIG_VALIDATION_FAILED carrying each field error', async () => {
    const configPath = join(INVALID_CONFIGS, 'bad-hardware.yaml');

    await assert.rejects(
      () => loadConfig(configPath),
      (error: unknown) => {
        assert.ok(error instanceof ConfigError);
        assert.strictEqual(error.code, 'CONFIG_VALIDATION_FAILED');
        assert.strictEqual(error.message, `Configuration validation failed: ${configPath}`);
        assert.deepStrictEqual(error.validationErrors, [
          { path: '/hardware/cores', message: 'must be >= 1' },
          { path: '/hardware/disk', message: 'must be one of hdd, ssd, nvme' },
        ]);
        return true;
      }
    );
  });
});
