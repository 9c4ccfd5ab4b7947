/**
 * Container host profile (Docker, Kubernetes nodes).
 */

import type { HardwareFacts, OverrideMap } from '../../core/types.js';
import { atLeast, atMost, clamp, idiv, isSolidState, minFreeKbytes, settings } from '../bands.js';

export function containerRules(facts: HardwareFacts): OverrideMap {
  const { threads, ramGB, nicMbps, diskMedium } = facts;
  const fast = nicMbps >= 10000;
  const flash = isSolidState(diskMedium);
  const tcpMem = fast ? [4096, 262144, 67108864] : [4096, 131072, 33554432];
  const namespaces = clamp(ramGB * 256, 5000, 30000);
  const processLimit = clamp(ramGB * 32768, 4194304, 4194304 * 4);
  const backlog = clamp(threads * 1024, 8192, 262144);

  return settings({
    'net.core.rmem_max': fast ? 67108864 : 33554432,
    'net.core.wmem_max': fast ? 67108864 : 33554432,
    'net.core.rmem_default': 4194304,
    'net.core.wmem_default': 4194304,
    'net.core.optmem_max': 8388608,
    'net.ipv4.tcp_rmem': tcpMem,
    'net.ipv4.tcp_wmem': tcpMem,
    'net.ipv4.udp_mem': [8388608, 16777216, 33554432],
    'net.ipv4.tcp_mem': [4194304, 8388608, 33554432],

    'vm.overcommit_memory': 1,
    'vm.overcommit_ratio': atMost(50 + idiv(ramGB, 4), 95),
    'kernel.panic_on_oom': 0,
    'vm.swappiness': flash ? 0 : 5,
    'vm.vfs_cache_pressure': flash ? 50 : 75,
    'vm.min_free_kbytes': atLeast(idiv(minFreeKbytes(facts) * 3, 2), ramGB * 1024),
    'vm.dirty_ratio': 10,
    'vm.dirty_background_ratio': 5,
    'vm.dirty_expire_centisecs': 500,
    'vm.dirty_writeback_centisecs': 100,

    // Keyring quotas and namespace limits
    'kernel.keys.root_maxkeys': clamp(ramGB * 4096, 10000, 2000000),
    'kernel.keys.root_maxbytes': clamp(ramGB * 100000, 1000000, 50000000),
    'kernel.keys.maxkeys': clamp(ramGB * 16, 1000, 4000),
    'kernel.keys.maxbytes': clamp(ramGB * 16000, 1000000, 4000000),
    'user.max_user_namespaces': namespaces,
    'user.max_ipc_namespaces': namespaces,
    'user.max_pid_namespaces': namespaces,
    'user.max_net_namespaces': namespaces,
    'user.max_mnt_namespaces': namespaces,
    'user.max_uts_namespaces': namespaces,

    'kernel.pid_max': processLimit,
    'kernel.threads-max': processLimit,

    'net.ipv4.ip_forward': 1,
    'net.ipv6.conf.all.forwarding': 1,
    'net.bridge.bridge-nf-call-ip6tables': 1,
    'net.bridge.bridge-nf-call-iptables': 1,
    'net.ipv4.conf.default.rp_filter': 0,
    'net.ipv4.conf.all.rp_filter': 0,
    'net.core.somaxconn': backlog,
    'net.ipv4.tcp_max_syn_backlog': backlog,

    'fs.file-max': atMost(ramGB * 4194304, 1073741824),
    'fs.inotify.max_user_instances': atMost(ramGB * 512, 65536),
    'fs.inotify.max_user_watches': atMost(ramGB * 131072, 16777216),
    'fs.aio-max-nr': atMost(ramGB * 8192, 1048576),
  });
}
