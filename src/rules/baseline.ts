/**
 * Baseline Rule Set
 *
 * Profile-independent parameters: network buffer sizing, scheduler defaults,
 * filesystem limits and memory-management defaults. Every profile and the
 * IPv6 layer are applied on top of this map.
 */

import type { HardwareFacts, SettingsMap } from '../core/types.js';
import { isSolidState, minFreeKbytes, settings, tier } from './bands.js';

/**
 * Socket buffer ceilings selected by NIC speed
 */
export interface BufferPreset {
  rmemMax: number;
  wmemMax: number;
  /** min / default / max for tcp_rmem and tcp_wmem */
  tcpMem: readonly [number, number, number];
}

const PRESET_10G: BufferPreset = {
  rmemMax: 67108864,
  wmemMax: 67108864,
  tcpMem: [4096, 262144, 33554432],
};

const PRESET_1G: BufferPreset = {
  rmemMax: 16777216,
  wmemMax: 16777216,
  tcpMem: [4096, 262144, 16777216],
};

const PRESET_SLOW: BufferPreset = {
  rmemMax: 4194304,
  wmemMax: 4194304,
  tcpMem: [4096, 131072, 4194304],
};

/**
 * Select the baseline buffer preset for a link speed.
 */
export function selectBufferPreset(nicMbps: number): BufferPreset {
  return tier(
    nicMbps,
    [
      [10000, PRESET_10G],
      [1000, PRESET_1G],
    ],
    PRESET_SLOW
  );
}

/**
 * Compute the baseline settings map.
 *
 * @param facts - Hardware snapshot
 * @returns Map covering every baseline key
 */
export function baselineRules(facts: HardwareFacts): SettingsMap {
  const { threads, ramGB, nicMbps, diskMedium } = facts;
  const buffers = selectBufferPreset(nicMbps);
  const largeMemory = ramGB >= 16;

  return settings({
    // Network buffers
    'net.core.rmem_max': buffers.rmemMax,
    'net.core.wmem_max': buffers.wmemMax,
    'net.core.rmem_default': 2097152,
    'net.core.wmem_default': 2097152,
    'net.core.optmem_max': 4194304,
    'net.ipv4.tcp_rmem': buffers.tcpMem,
    'net.ipv4.tcp_wmem': buffers.tcpMem,
    'net.ipv4.udp_mem': [4194304, 8388608, 16777216],
    'net.ipv4.tcp_mem': [786432, 1048576, 26777216],
    'net.ipv4.udp_rmem_min': 16384,
    'net.ipv4.udp_wmem_min': 16384,

    // Queues and connection handling
    'net.core.netdev_max_backlog': nicMbps >= 10000 ? 250000 : 30000,
    'net.core.somaxconn': threads * 1024,
    'net.ipv4.tcp_max_syn_backlog': 16384,
    'net.core.busy_poll': 50,
    'net.core.busy_read': 50,
    'net.ipv4.tcp_fastopen': 3,
    'net.ipv4.tcp_notsent_lowat': 16384,
    'net.core.netdev_budget_usecs': 4000,
    'net.core.dev_weight': 64,
    'net.ipv4.tcp_max_tw_buckets': 2000000,
    'net.ipv4.ip_local_port_range': [1024, 65535],
    'net.ipv4.tcp_congestion_control': 'bbr',
    'net.core.default_qdisc': 'fq',

    // TCP behaviour
    'net.ipv4.tcp_window_scaling': 1,
    'net.ipv4.tcp_timestamps': 1,
    'net.ipv4.tcp_sack': 1,
    'net.ipv4.tcp_dsack': 1,
    'net.ipv4.tcp_slow_start_after_idle': 0,
    'net.ipv4.tcp_fin_timeout': 10,
    'net.ipv4.tcp_keepalive_time': 300,
    'net.ipv4.tcp_keepalive_intvl': 10,
    'net.ipv4.tcp_keepalive_probes': 6,
    'net.ipv4.tcp_moderate_rcvbuf': 1,
    'net.ipv4.tcp_frto': 2,
    'net.ipv4.tcp_mtu_probing': 1,
    'net.ipv4.conf.all.rp_filter': 1,
    'net.ipv4.conf.default.rp_filter': 1,
    'net.ipv4.conf.all.accept_redirects': 0,
    'net.ipv4.conf.default.accept_redirects': 0,
    'net.netfilter.nf_conntrack_max': 1048576,

    // Scheduler
    'kernel.sched_min_granularity_ns': 10000,
    'kernel.sched_wakeup_granularity_ns': 15000,
    'kernel.sched_latency_ns': 60000,
    'kernel.sched_rt_runtime_us': 980000,
    'kernel.sched_migration_cost_ns': 50000,
    'kernel.sched_autogroup_enabled': 0,
    'kernel.sched_cfs_bandwidth_slice_us': 3000,

    // Memory
    'vm.swappiness': isSolidState(diskMedium) ? 5 : 10,
    'vm.dirty_ratio': largeMemory ? 5 : 10,
    'vm.dirty_background_ratio': largeMemory ? 2 : 5,
    'vm.dirty_expire_centisecs': 1000,
    'vm.dirty_writeback_centisecs': 100,
    'vm.zone_reclaim_mode': 0,
    'vm.min_free_kbytes': minFreeKbytes(facts),
    'vm.vfs_cache_pressure': 50,
    'vm.overcommit_memory': 0,
    'vm.overcommit_ratio': 50,
    'vm.max_map_count': 1048576,
    'vm.page-cluster': 0,
    'vm.oom_kill_allocating_task': 1,

    // Filesystem and process limits
    'fs.file-max': 26214400,
    'fs.nr_open': 26214400,
    'fs.aio-max-nr': 1048576,
    'fs.inotify.max_user_instances': 8192,
    'fs.inotify.max_user_watches': 1048576,
    'kernel.pid_max': 4194304,
  });
}
