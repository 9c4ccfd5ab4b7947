/**
 * Database server profile (MySQL, PostgreSQL and similar).
 */

import type { HardwareFacts, OverrideMap } from '../../core/types.js';
import { atLeast, atMost, clamp, idiv, isSolidState, minFreeKbytes, settings } from '../bands.js';

const BYTES_PER_GB = 1024 * 1024 * 1024;
const PAGE_SIZE = 4096;

/**
 * Shared-memory segment ceiling: 90% of RAM, 80% from 64 GB upward.
 */
export function databaseShmmax(ramGB: number): number {
  const percent = ramGB >= 64 ? 80 : 90;
  return idiv(ramGB * BYTES_PER_GB * percent, 100);
}

export function databaseRules(facts: HardwareFacts): OverrideMap {
  const { cores, threads, ramGB, nicMbps, diskMedium } = facts;
  const fast = nicMbps >= 10000;
  const flash = isSolidState(diskMedium);
  const bigMemory = ramGB >= 32;
  const tcpMem = fast ? [8192, 262144, 67108864] : [4096, 131072, 33554432];

  // shmall is expressed in pages of the shmmax computed above
  const shmmax = databaseShmmax(ramGB);
  const shmall = idiv(shmmax, PAGE_SIZE);

  const writeback = flash
    ? {
        'vm.dirty_ratio': bigMemory ? 20 : 40,
        'vm.dirty_background_ratio': bigMemory ? 5 : 10,
        'vm.dirty_expire_centisecs': 500,
        'vm.dirty_writeback_centisecs': 100,
      }
    : {
        'vm.dirty_ratio': bigMemory ? 10 : 20,
        'vm.dirty_background_ratio': bigMemory ? 3 : 5,
        'vm.dirty_expire_centisecs': 1000,
        'vm.dirty_writeback_centisecs': 500,
      };

  return settings({
    'net.core.rmem_max': fast ? 67108864 : 33554432,
    'net.core.wmem_max': fast ? 67108864 : 33554432,
    'net.core.rmem_default': 4194304,
    'net.core.wmem_default': 4194304,
    'net.core.optmem_max': 8388608,
    'net.ipv4.tcp_rmem': tcpMem,
    'net.ipv4.tcp_wmem': tcpMem,
    'net.ipv4.udp_mem': [8388608, 16777216, 33554432],
    'net.ipv4.tcp_mem': [1048576, 4194304, 33554432],

    'kernel.shmmax': shmmax,
    'kernel.shmall': shmall,
    'kernel.shmmni': atLeast(ramGB * 32, 4096),

    'vm.swappiness': flash ? 1 : 5,
    ...writeback,
    'vm.zone_reclaim_mode': 0,
    'vm.min_free_kbytes': atLeast(minFreeKbytes(facts) * 2, ramGB * 2048),
    'vm.vfs_cache_pressure': flash ? 50 : 125,
    'vm.page-cluster': flash ? 0 : 3,

    'net.core.somaxconn': clamp(threads * 256, 4096, 65535),
    'net.ipv4.tcp_max_syn_backlog': atMost(threads * 2048, 131072),
    'net.ipv4.tcp_keepalive_time': 90,
    'net.ipv4.tcp_keepalive_intvl': 10,
    'net.ipv4.tcp_keepalive_probes': 9,
    'net.ipv4.tcp_max_tw_buckets': 2000000,
    'net.ipv4.tcp_tw_reuse': 0,

    'fs.aio-max-nr': atMost(ramGB * 65536, 4194304),
    'fs.file-max': atMost(ramGB * 2097152, 104857600),

    'kernel.sched_migration_cost_ns': cores >= 16 ? 5000000 : 1000000,
    'kernel.sched_min_granularity_ns': 10000,
    'kernel.sched_wakeup_granularity_ns': 15000,
    'kernel.sched_autogroup_enabled': 0,
  });
}
