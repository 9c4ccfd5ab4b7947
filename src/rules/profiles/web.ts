/**
 * Web server profile: many short-lived HTTP connections.
 */

import type { HardwareFacts, OverrideMap } from '../../core/types.js';
import { atLeast, atMost, clamp, idiv, isSolidState, minFreeKbytes, settings } from '../bands.js';

export function webRules(facts: HardwareFacts): OverrideMap {
  const { cores, threads, ramGB, nicMbps, diskMedium } = facts;
  const fast = nicMbps >= 10000;
  const bigMemory = ramGB >= 32;
  const manyCores = cores >= 16;
  const tcpMem = fast ? [4096, 131072, 33554432] : [4096, 65536, 16777216];

  // Flash storage tolerates more dirty pages and faster flushing
  const writeback = isSolidState(diskMedium)
    ? {
        'vm.swappiness': 10,
        'vm.dirty_ratio': bigMemory ? 5 : 10,
        'vm.dirty_background_ratio': bigMemory ? 2 : 5,
        'vm.dirty_expire_centisecs': 300,
        'vm.dirty_writeback_centisecs': 100,
      }
    : {
        'vm.swappiness': 30,
        'vm.dirty_ratio': bigMemory ? 3 : 5,
        'vm.dirty_background_ratio': bigMemory ? 1 : 2,
        'vm.dirty_expire_centisecs': 500,
        'vm.dirty_writeback_centisecs': 250,
      };

  return settings({
    'net.core.rmem_max': fast ? 33554432 : 16777216,
    'net.core.wmem_max': fast ? 33554432 : 16777216,
    'net.core.rmem_default': 1048576,
    'net.core.wmem_default': 1048576,
    'net.core.optmem_max': 4194304,
    'net.ipv4.tcp_rmem': tcpMem,
    'net.ipv4.tcp_wmem': tcpMem,
    'net.ipv4.udp_mem': [4194304, 8388608, 16777216],
    'net.ipv4.tcp_mem': [786432, 1048576, 26777216],

    ...writeback,
    'vm.vfs_cache_pressure': 70,
    'vm.min_free_kbytes': atLeast(idiv(minFreeKbytes(facts) * 3, 2), ramGB * 1024),

    'net.core.somaxconn': clamp(threads * 1024, 4096, 262144),
    'net.core.netdev_max_backlog': fast ? 250000 : 65536,
    'net.ipv4.tcp_max_syn_backlog': atLeast(threads * 1024, 8192),
    'net.ipv4.tcp_fin_timeout': fast ? 10 : 15,
    'net.ipv4.tcp_keepalive_time': 600,
    'net.ipv4.tcp_max_tw_buckets': atMost(ramGB * 50000, 6000000),
    'net.ipv4.tcp_tw_reuse': 1,
    'net.ipv4.tcp_fastopen': 3,
    'net.ipv4.tcp_slow_start_after_idle': 0,

    'fs.file-max': atMost(ramGB * 1048576, 104857600),
    'fs.inotify.max_user_watches': atMost(ramGB * 131072, 8388608),

    'kernel.sched_min_granularity_ns': manyCores ? 15000000 : 10000000,
    'kernel.sched_wakeup_granularity_ns': manyCores ? 20000000 : 15000000,
    'kernel.pid_max': clamp(ramGB * 8192, 1048576, 4194304),
  });
}
