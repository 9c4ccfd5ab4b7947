/**
 * Development workstation profile: interactive desktop responsiveness.
 */

import type { HardwareFacts, OverrideMap } from '../../core/types.js';
import { atLeast, atMost, clamp, isSolidState, minFreeKbytes, settings } from '../bands.js';

export function developmentRules(facts: HardwareFacts): OverrideMap {
  const { cores, ramGB, nicMbps, diskMedium } = facts;
  const flash = isSolidState(diskMedium);
  const gigabit = nicMbps >= 1000;

  return settings({
    'net.core.rmem_max': 8388608,
    'net.core.wmem_max': 8388608,
    'net.core.rmem_default': 1048576,
    'net.core.wmem_default': 1048576,
    'net.core.optmem_max': 2097152,
    'net.ipv4.tcp_rmem': [4096, 65536, 8388608],
    'net.ipv4.tcp_wmem': [4096, 65536, 8388608],
    'net.ipv4.udp_mem': [4194304, 4194304, 8388608],
    'net.ipv4.tcp_mem': [786432, 1048576, 4194304],

    'vm.swappiness': flash ? 10 : 20,
    'vm.vfs_cache_pressure': flash ? 50 : 70,
    'vm.dirty_ratio': flash ? 10 : 20,
    'vm.dirty_background_ratio': flash ? 3 : 5,
    'vm.dirty_expire_centisecs': flash ? 1500 : 3000,
    'vm.dirty_writeback_centisecs': flash ? 250 : 500,
    'vm.min_free_kbytes': atLeast(minFreeKbytes(facts), ramGB * 512),

    // Favour interactive tasks
    'kernel.sched_autogroup_enabled': 1,
    'kernel.sched_child_runs_first': 1,
    'kernel.sched_min_granularity_ns': clamp(cores * 150000, 1000000, 10000000),
    'kernel.sched_wakeup_granularity_ns': clamp(cores * 200000, 2000000, 15000000),
    'kernel.sched_latency_ns': clamp(cores * 1000000, 6000000, 30000000),
    'kernel.sched_migration_cost_ns': clamp(cores * 30000, 100000, 2000000),

    'net.core.somaxconn': gigabit ? 4096 : 1024,
    'net.ipv4.tcp_fastopen': 3,
    'net.ipv4.tcp_keepalive_time': 600,
    'net.ipv4.tcp_max_syn_backlog': gigabit ? 2048 : 512,

    // IDE file watchers
    'fs.inotify.max_user_watches': atMost(ramGB * 65536, 8388608),
    'fs.file-max': atMost(ramGB * 32768, 4194304),
  });
}
