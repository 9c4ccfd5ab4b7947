/**
 * File server profile (NFS, SMB and other bulk storage).
 */

import type { HardwareFacts, OverrideMap } from '../../core/types.js';
import { atLeast, atMost, clamp, idiv, isSolidState, minFreeKbytes, settings, tier } from '../bands.js';

export function fileserverRules(facts: HardwareFacts): OverrideMap {
  const { threads, ramGB, nicMbps, diskMedium } = facts;
  const bigMemory = ramGB >= 32;
  const bufferMax = tier(
    nicMbps,
    [
      [40000, 134217728],
      [10000, 67108864],
    ],
    33554432
  );
  const tcpMem = nicMbps >= 25000 ? [8192, 262144, 134217728] : [4096, 131072, 67108864];
  const slotEntries = clamp(ramGB * 8, 128, 2048);

  const pageCache = isSolidState(diskMedium)
    ? {
        'vm.dirty_ratio': bigMemory ? 15 : 30,
        'vm.dirty_background_ratio': bigMemory ? 3 : 5,
        'vm.vfs_cache_pressure': 50,
        'vm.swappiness': 10,
        'vm.dirty_expire_centisecs': 1500,
        'vm.dirty_writeback_centisecs': 250,
      }
    : {
        'vm.dirty_ratio': bigMemory ? 10 : 20,
        'vm.dirty_background_ratio': bigMemory ? 2 : 3,
        'vm.vfs_cache_pressure': 10,
        'vm.swappiness': 20,
        'vm.dirty_expire_centisecs': 3000,
        'vm.dirty_writeback_centisecs': 500,
      };

  return settings({
    'net.core.rmem_max': bufferMax,
    'net.core.wmem_max': bufferMax,
    'net.core.rmem_default': 8388608,
    'net.core.wmem_default': 8388608,
    'net.core.optmem_max': 16777216,
    'net.ipv4.tcp_rmem': tcpMem,
    'net.ipv4.tcp_wmem': tcpMem,
    'net.ipv4.udp_mem': [16777216, 33554432, 67108864],
    'net.ipv4.tcp_mem': [16777216, 33554432, 67108864],

    'net.ipv4.tcp_window_scaling': 1,
    'net.ipv4.tcp_timestamps': 1,
    'net.ipv4.tcp_sack': 1,
    'net.ipv4.tcp_slow_start_after_idle': 0,
    'net.ipv4.tcp_fin_timeout': 20,
    'net.core.netdev_max_backlog': nicMbps >= 10000 ? 250000 : 100000,
    'net.core.somaxconn': clamp(threads * 512, 2048, 65535),

    'sunrpc.tcp_slot_table_entries': slotEntries,
    'sunrpc.udp_slot_table_entries': slotEntries,
    'fs.nfsd.max_connections': clamp(ramGB * 64, 256, 65536),

    'fs.file-max': atMost(ramGB * 4194304, 1073741824),
    'fs.inotify.max_user_watches': atMost(ramGB * 131072, 8388608),
    'fs.inotify.max_user_instances': atMost(ramGB * 256, 65536),
    'fs.aio-max-nr': atMost(ramGB * 32768, 4194304),

    ...pageCache,
    'vm.min_free_kbytes': atLeast(idiv(minFreeKbytes(facts) * 3, 2), ramGB * 1024),
  });
}
