/**
 * Virtualization host profile (KVM, QEMU, Proxmox and similar).
 */

import type { HardwareFacts, OverrideMap } from '../../core/types.js';
import { atLeast, atMost, clamp, idiv, isSolidState, minFreeKbytes, settings, tier } from '../bands.js';

/**
 * Huge pages reserved for guests, shared across cores, never below 2.
 */
export function virtualizationHugepages(facts: HardwareFacts): number {
  const { cores, ramGB } = facts;
  const perGB = ramGB >= 128 ? 200 : 156;
  const raw = idiv(ramGB * perGB, cores + 1);
  return atLeast(raw, 2);
}

export function virtualizationRules(facts: HardwareFacts): OverrideMap {
  const { cores, threads, ramGB, nicMbps, diskMedium } = facts;
  const bufferMax = tier(
    nicMbps,
    [
      [25000, 134217728],
      [10000, 67108864],
    ],
    33554432
  );
  const tcpMem = nicMbps >= 25000 ? [8192, 262144, 134217728] : [4096, 131072, 67108864];
  const slotEntries = clamp(idiv(ramGB, 4), 64, 256);

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

    // Guest traffic
    'net.ipv4.ip_forward': 1,
    'net.ipv6.conf.all.forwarding': 1,
    'net.bridge.bridge-nf-call-iptables': 0,
    'net.bridge.bridge-nf-call-ip6tables': 0,
    'net.bridge.bridge-nf-call-arptables': 0,
    'net.core.netdev_max_backlog': nicMbps >= 10000 ? 250000 : 100000,
    'net.core.somaxconn': atMost(threads * 1024, 65535),
    'net.ipv4.tcp_max_syn_backlog': clamp(threads * 1024, 16384, 262144),
    'net.ipv4.tcp_tw_reuse': 1,
    'net.ipv4.tcp_fin_timeout': 15,

    // Guest memory
    'vm.nr_hugepages': virtualizationHugepages(facts),
    'vm.hugetlb_shm_group': 0,
    'vm.transparent_hugepage.enabled': 'madvise',
    'vm.transparent_hugepage.defrag': ramGB >= 64 ? 'madvise' : 'never',
    'vm.swappiness': isSolidState(diskMedium) ? 5 : 10,
    'vm.dirty_ratio': tier(ramGB, [[64, 10], [16, 20]], 30),
    'vm.dirty_background_ratio': tier(ramGB, [[64, 3], [16, 5]], 10),
    'vm.overcommit_memory': 1,
    'vm.overcommit_ratio': atMost(50 + idiv(ramGB, 8), 95),
    'vm.zone_reclaim_mode': 0,
    'vm.min_free_kbytes': atLeast(minFreeKbytes(facts), ramGB * 2048),
    'vm.vfs_cache_pressure': ramGB >= 64 ? 50 : 75,

    'kernel.sched_migration_cost_ns': cores <= 4 ? 1000000 : 5000000,
    'kernel.sched_autogroup_enabled': 0,
    'kernel.pid_max': atMost(ramGB * 16384, 4194304 * 2),

    'net.netfilter.nf_conntrack_max': atMost(ramGB * 16384, 4194304),
    'net.netfilter.nf_conntrack_tcp_timeout_established': 86400,

    // NFS-backed guest images
    'sunrpc.tcp_slot_table_entries': slotEntries,
    'sunrpc.udp_slot_table_entries': slotEntries,

    'kernel.tsc_reliable': 1,
    'kernel.randomize_va_space': 0,

    'fs.file-max': atMost(ramGB * 2097152, 1073741824),
    'fs.inotify.max_user_watches': atMost(ramGB * 65536, 8388608),
    'fs.inotify.max_user_instances': atMost(ramGB * 32, 8192),
  });
}
