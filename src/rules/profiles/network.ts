/**
 * Network appliance profile (routers, firewalls, gateways).
 */

import type { HardwareFacts, OverrideMap } from '../../core/types.js';
import { atLeast, atMost, clamp, minFreeKbytes, settings, tier } from '../bands.js';

/**
 * NAPI polling budget in microseconds: 4000 on links up to 1 Gbps,
 * 8000 above, always kept within [2000, 16000].
 */
export function networkBudgetUsecs(nicMbps: number): number {
  const base = nicMbps <= 1000 ? 4000 : 8000;
  return clamp(base, 2000, 16000);
}

export function networkRules(facts: HardwareFacts): OverrideMap {
  const { cores, threads, ramGB, nicMbps } = facts;
  const bufferMax = tier(
    nicMbps,
    [
      [40000, 268435456],
      [10000, 134217728],
    ],
    67108864
  );
  const tcpMem = tier(
    nicMbps,
    [
      [40000, [16384, 1048576, 268435456]],
      [10000, [8192, 524288, 134217728]],
    ],
    [4096, 262144, 67108864]
  );
  const pressureMem =
    nicMbps >= 25000 ? [33554432, 67108864, 134217728] : [16777216, 33554432, 67108864];
  const fileLimit = atMost(ramGB * 1048576, 104857600);

  return settings({
    'net.core.rmem_max': bufferMax,
    'net.core.wmem_max': bufferMax,
    'net.core.rmem_default': 16777216,
    'net.core.wmem_default': 16777216,
    'net.core.optmem_max': nicMbps >= 25000 ? 67108864 : 33554432,
    'net.ipv4.tcp_rmem': tcpMem,
    'net.ipv4.tcp_wmem': tcpMem,
    'net.ipv4.udp_mem': pressureMem,
    'net.ipv4.tcp_mem': pressureMem,

    // Routing and forwarding
    'net.ipv4.ip_forward': 1,
    'net.ipv6.conf.all.forwarding': 1,
    'net.ipv4.conf.all.route_localnet': 1,
    'net.ipv4.conf.all.rp_filter': 2,
    'net.ipv4.conf.default.rp_filter': 2,

    'net.netfilter.nf_conntrack_max': atMost(ramGB * 65536, 8388608),
    'net.netfilter.nf_conntrack_tcp_timeout_established': 432000,
    'net.netfilter.nf_conntrack_tcp_timeout_time_wait': 30,

    'net.core.netdev_max_backlog': nicMbps >= 40000 ? 1000000 : 250000,
    'net.core.netdev_budget': clamp(cores * 25, 300, 1000),
    'net.core.netdev_budget_usecs': networkBudgetUsecs(nicMbps),
    'net.core.dev_weight': 600,

    'net.core.somaxconn': clamp(threads * 2048, 65535, 1048576),
    'net.ipv4.tcp_max_syn_backlog': clamp(threads * 2048, 65536, 1048576),
    'net.ipv4.tcp_adv_win_scale': nicMbps >= 10000 ? 1 : 2,
    'net.ipv4.tcp_no_metrics_save': 1,
    'net.ipv4.tcp_slow_start_after_idle': 0,
    'net.ipv4.tcp_max_tw_buckets': clamp(ramGB * 20000, 2000000, 6000000),

    'vm.min_free_kbytes': atLeast(minFreeKbytes(facts) * 2, ramGB * 2048),
    'vm.swappiness': 10,
    'vm.dirty_ratio': 5,
    'vm.dirty_background_ratio': 2,

    'fs.file-max': fileLimit,
    'fs.nr_open': fileLimit,
  });
}
