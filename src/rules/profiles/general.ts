/**
 * General-purpose profile: balanced tuning for mixed workloads.
 */

import type { HardwareFacts, OverrideMap } from '../../core/types.js';
import { atLeast, atMost, clamp, isSolidState, minFreeKbytes, settings } from '../bands.js';

export function generalRules(facts: HardwareFacts): OverrideMap {
  const { cores, threads, ramGB, nicMbps, diskMedium } = facts;
  const fast = nicMbps >= 10000;
  const bigMemory = ramGB >= 32;
  const tcpMem = fast ? [4096, 131072, 33554432] : [4096, 65536, 16777216];

  return settings({
    'net.core.rmem_max': fast ? 33554432 : 16777216,
    'net.core.wmem_max': fast ? 33554432 : 16777216,
    'net.core.rmem_default': 2097152,
    'net.core.wmem_default': 2097152,
    'net.core.optmem_max': 4194304,
    'net.ipv4.tcp_rmem': tcpMem,
    'net.ipv4.tcp_wmem': tcpMem,
    'net.ipv4.udp_mem': [4194304, 8388608, 16777216],
    'net.ipv4.tcp_mem': [786432, 1048576, 16777216],

    'net.core.somaxconn': clamp(threads * 256, 4096, 65535),
    'net.ipv4.tcp_max_syn_backlog': clamp(threads * 512, 8192, 65536),
    'net.core.netdev_max_backlog': fast ? 250000 : 30000,

    'vm.swappiness': isSolidState(diskMedium) ? 10 : 20,
    'vm.vfs_cache_pressure': 50,
    'vm.dirty_ratio': bigMemory ? 10 : 20,
    'vm.dirty_background_ratio': bigMemory ? 3 : 5,
    'vm.min_free_kbytes': atLeast(minFreeKbytes(facts), ramGB * 1024),

    'kernel.pid_max': atMost(ramGB * 16384, 4194304),
    'fs.file-max': atMost(ramGB * 262144, 26214400),

    'kernel.sched_migration_cost_ns': cores <= 4 ? 100000 : 500000,
    'kernel.sched_min_granularity_ns': 10000,
    'kernel.sched_wakeup_granularity_ns': 15000,
  });
}
