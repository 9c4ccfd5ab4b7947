/**
 * HPC / compute node profile: long-running CPU-bound jobs.
 */

import type { HardwareFacts, OverrideMap } from '../../core/types.js';
import { atLeast, atMost, clamp, idiv, isSolidState, minFreeKbytes, settings } from '../bands.js';

/**
 * Transparent huge page modes for compute nodes.
 *
 * `enabled` switches to `always` from 16 GB, `defrag` from 32 GB;
 * below those sizes both stay on `madvise`.
 */
export function computeHugepageModes(ramGB: number): { enabled: string; defrag: string } {
  return {
    enabled: ramGB >= 16 ? 'always' : 'madvise',
    defrag: ramGB >= 32 ? 'always' : 'madvise',
  };
}

export function computeRules(facts: HardwareFacts): OverrideMap {
  const { cores, threads, ramGB, nicMbps, diskMedium } = facts;
  const fast = nicMbps >= 10000;
  const smallCpu = cores <= 4;
  const tcpMem = fast ? [4096, 131072, 33554432] : [4096, 65536, 16777216];
  const processLimit = clamp(ramGB * 32768, 4194304, 4194304 * 4);
  const hugepages = computeHugepageModes(ramGB);

  return settings({
    'net.core.rmem_max': fast ? 33554432 : 16777216,
    'net.core.wmem_max': fast ? 33554432 : 16777216,
    'net.core.rmem_default': 2097152,
    'net.core.wmem_default': 2097152,
    'net.core.optmem_max': 4194304,
    'net.ipv4.tcp_rmem': tcpMem,
    'net.ipv4.tcp_wmem': tcpMem,
    'net.ipv4.udp_mem': [4194304, 8388608, 16777216],
    'net.ipv4.tcp_mem': [1048576, 4194304, 16777216],

    'kernel.sched_min_granularity_ns': smallCpu ? 3000 : 5000,
    'kernel.sched_wakeup_granularity_ns': smallCpu ? 5000 : 10000,
    'kernel.sched_latency_ns': clamp(cores * 1000, 10000, 60000),
    'kernel.sched_migration_cost_ns': atLeast(cores * 5000, 50000),
    'kernel.sched_autogroup_enabled': 0,
    'kernel.numa_balancing': cores >= 32 ? 1 : 0,
    'kernel.sched_rt_runtime_us': 990000,

    'vm.swappiness': isSolidState(diskMedium) ? 1 : 5,
    'vm.overcommit_ratio': atMost(50 + idiv(ramGB, 16), 95),
    'vm.min_free_kbytes': atLeast(idiv(minFreeKbytes(facts) * 6, 5), ramGB * 512),
    'vm.zone_reclaim_mode': ramGB >= 64 && cores >= 16 ? 1 : 0,
    'vm.transparent_hugepage.enabled': hugepages.enabled,
    'vm.transparent_hugepage.defrag': hugepages.defrag,

    'kernel.pid_max': processLimit,
    'kernel.threads-max': processLimit,

    'net.core.busy_poll': fast ? 50 : 25,
    'net.core.busy_read': fast ? 50 : 25,
    'net.core.netdev_budget': clamp(cores * 20, 300, 1000),
    'net.core.somaxconn': clamp(threads * 128, 1024, 65535),

    'fs.file-max': atMost(ramGB * 1048576, 52428800),
    'fs.aio-max-nr': atMost(ramGB * 4096, 1048576),
  });
}
