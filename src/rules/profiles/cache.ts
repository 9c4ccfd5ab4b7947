/**
 * Caching server profile (Redis, Memcached and similar).
 */

import type { HardwareFacts, OverrideMap } from '../../core/types.js';
import { atLeast, atMost, clamp, idiv, minFreeKbytes, settings } from '../bands.js';

export function cacheRules(facts: HardwareFacts): OverrideMap {
  const { cores, threads, ramGB, nicMbps } = facts;
  const fast = nicMbps >= 10000;
  const hugeMemory = ramGB >= 64;
  const smallCpu = cores <= 4;

  return settings({
    // Small requests in, larger responses out
    'net.core.rmem_max': fast ? 33554432 : 16777216,
    'net.core.wmem_max': fast ? 67108864 : 33554432,
    'net.core.rmem_default': 1048576,
    'net.core.wmem_default': 4194304,
    'net.core.optmem_max': 4194304,
    'net.ipv4.tcp_rmem': fast ? [4096, 65536, 33554432] : [4096, 32768, 16777216],
    'net.ipv4.tcp_wmem': fast ? [4096, 131072, 67108864] : [4096, 65536, 33554432],
    'net.ipv4.udp_mem': [8388608, 16777216, 33554432],
    'net.ipv4.tcp_mem': [1048576, 4194304, 33554432],

    'vm.swappiness': 0,
    'vm.overcommit_memory': 1,
    'vm.overcommit_ratio': atMost(50 + idiv(ramGB, 4), 95),
    'vm.min_free_kbytes': atLeast(idiv(minFreeKbytes(facts) * 3, 2), ramGB * 1024),
    'vm.vfs_cache_pressure': atLeast(50 - idiv(ramGB, 8), 5),
    'vm.dirty_ratio': hugeMemory ? 3 : 5,
    'vm.dirty_background_ratio': hugeMemory ? 1 : 2,
    'vm.zone_reclaim_mode': 0,

    'net.core.somaxconn': clamp(threads * 2048, 65535, 524288),
    'net.ipv4.tcp_max_syn_backlog': clamp(threads * 4096, 65536, 262144),
    'net.ipv4.tcp_max_tw_buckets': 6000000,
    'net.ipv4.tcp_tw_reuse': 1,
    'net.ipv4.tcp_fin_timeout': fast ? 5 : 10,
    'net.core.netdev_max_backlog': fast ? 250000 : 100000,

    'kernel.sched_min_granularity_ns': smallCpu ? 5000 : 10000,
    'kernel.sched_wakeup_granularity_ns': smallCpu ? 10000 : 15000,
    'kernel.numa_balancing': 0,
    'kernel.sched_migration_cost_ns': cores <= 8 ? 5000 : atLeast(cores * 10000, 100000),
    'kernel.sched_autogroup_enabled': 0,

    'fs.file-max': atMost(ramGB * 2097152, 104857600),
    'fs.aio-max-nr': atMost(ramGB * 8192, 1048576),
  });
}
