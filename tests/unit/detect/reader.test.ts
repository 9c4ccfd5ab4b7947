/**
 * Unit tests for the file-system backed SystemReader
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { FsSystemReader } from '../../../src/detect/reader.js';

describe('FsSystemReader', () => {
  let root: string;
  const reader = new FsSystemReader();

  before(async () => {
    root = join(tmpdir(), `kerntune-reader-test-${randomUUID()}`);
    await mkdir(join(root, 'block', 'sda'), { recursive: true });
    await writeFile(join(root, 'meminfo'), 'MemTotal: 1024 kB\n');
  });

  after(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should read existing files', async () => {
    assert.strictEqual(await reader.readText(join(root, 'meminfo')), 'MemTotal: 1024 kB\n');
  });

  it('should return null for missing files', async () => {
    assert.strictEqual(await reader.readText(join(root, 'missing')), null);
  });

  it('should return null when reading a directory', async () => {
    assert.strictEqual(await reader.readText(join(root, 'block')), null);
  });

  it('should check existence', async () => {
    assert.strictEqual(await reader.exists(join(root, 'meminfo')), true);
    assert.strictEqual(await reader.exists(join(root, 'block')), true);
    assert.strictEqual(await reader.exists(join(root, 'missing')), false);
  });

  it('should list directories', async () => {
    assert.deepStrictEqual(await reader.listDir(join(root, 'block')), ['sda']);
    assert.deepStrictEqual(await reader.listDir(join(root, 'missing')), []);
  });

  it('should report at least one CPU', () => {
    assert.ok(reader.cpuCount() >= 1);
  });
});
