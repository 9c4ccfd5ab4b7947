/**
 * Unit tests for memory detection
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  CGROUP_V1_LIMIT_PATH,
  CGROUP_V2_LIMIT_PATH,
  detectMemory,
  MEMINFO_PATH,
  memTotalToGiB,
  parseMemTotal,
} from '../../../src/detect/memory.js';
import { MemorySystemReader } from '../../helpers/memory-reader.js';

const MEMINFO_16G = 'MemTotal:       16303428 kB\nMemFree:         1203344 kB\n';

describe('parseMemTotal', () => {
  it('should read the MemTotal line', () => {
    assert.strictEqual(parseMemTotal(MEMINFO_16G), 16303428);
  });

  it('should return null when the line is missing', () => {
    assert.strictEqual(parseMemTotal('MemFree: 1 kB\n'), null);
  });
});

describe('memTotalToGiB', () => {
  it('should round to the nearest GiB', () => {
    assert.strictEqual(memTotalToGiB(16303428), 16);
    assert.strictEqual(memTotalToGiB(8024164), 8);
  });

  it('should round half up', () => {
    assert.strictEqual(memTotalToGiB(1572864), 2);
  });

  it('should never report less than 1 GiB', () => {
    assert.strictEqual(memTotalToGiB(1000), 1);
  });
});

describe('detectMemory', () => {
  it('should use MemTotal on a host', async () => {
    const reader = new MemorySystemReader({
      files: { [MEMINFO_PATH]: MEMINFO_16G, [CGROUP_V2_LIMIT_PATH]: '2147483648\n' },
    });
    assert.deepStrictEqual(await detectMemory(reader, false), { ramGB: 16, source: 'meminfo' });
  });

  it('should use the cgroup v1 limit in a container', async () => {
    const reader = new MemorySystemReader({
      files: { [MEMINFO_PATH]: MEMINFO_16G, [CGROUP_V1_LIMIT_PATH]: '4294967296\n' },
    });
    assert.deepStrictEqual(await detectMemory(reader, true), { ramGB: 4, source: 'cgroup' });
  });

  it('should use the cgroup v2 limit in a container', async () => {
    const reader = new MemorySystemReader({
      files: { [MEMINFO_PATH]: MEMINFO_16G, [CGROUP_V2_LIMIT_PATH]: '6442450944\n' },
    });
    assert.deepStrictEqual(await detectMemory(reader, true), { ramGB: 6, source: 'cgroup' });
  });

  it('should truncate small limits up to 1 GiB', async () => {
    const reader = new MemorySystemReader({
      files: { [CGROUP_V2_LIMIT_PATH]: '536870912\n' },
    });
    assert.deepStrictEqual(await detectMemory(reader, true), { ramGB: 1, source: 'cgroup' });
  });

  it('should ignore unlimited markers', async () => {
    const v2 = new MemorySystemReader({
      files: { [MEMINFO_PATH]: MEMINFO_16G, [CGROUP_V2_LIMIT_PATH]: 'max\n' },
    });
    const v1 = new MemorySystemReader({
      files: { [MEMINFO_PATH]: MEMINFO_16G, [CGROUP_V1_LIMIT_PATH]: '9223372036854771712\n' },
    });

    assert.deepStrictEqual(await detectMemory(v2, true), { ramGB: 16, source: 'meminfo' });
    assert.deepStrictEqual(await detectMemory(v1, true), { ramGB: 16, source: 'meminfo' });
  });

  it('should not consult v2 when a v1 file exists', async () => {
    const reader = new MemorySystemReader({
      files: {
        [MEMINFO_PATH]: MEMINFO_16G,
        [CGROUP_V1_LIMIT_PATH]: '9223372036854771712\n',
        [CGROUP_V2_LIMIT_PATH]: '2147483648\n',
      },
    });
    assert.deepStrictEqual(await detectMemory(reader, true), { ramGB: 16, source: 'meminfo' });
  });

  it('should assume 1 GiB when MemTotal is unavailable', async () => {
    const reader = new MemorySystemReader();
    assert.deepStrictEqual(await detectMemory(reader, false), { ramGB: 1, source: 'fallback' });
  });
});
