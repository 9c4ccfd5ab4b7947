/**
 * IPv6 Rule Set
 *
 * Either disables IPv6 on every scope or applies neighbour-table and
 * router-advertisement hardening. The two branches never mix.
 */

import type { OverrideMap } from '../core/types.js';
import { settings } from './bands.js';

export function ipv6Rules(disableIpv6: boolean): OverrideMap {
  if (disableIpv6) {
    return settings({
      'net.ipv6.conf.all.disable_ipv6': 1,
      'net.ipv6.conf.default.disable_ipv6': 1,
      'net.ipv6.conf.lo.disable_ipv6': 1,
    });
  }

  return settings({
    'net.ipv6.conf.all.accept_redirects': 0,
    'net.ipv6.conf.default.accept_redirects': 0,
    'net.ipv6.conf.all.accept_ra': 0,
    'net.ipv6.conf.default.accept_ra': 0,
    'net.ipv6.neigh.default.gc_thresh1': 1024,
    'net.ipv6.neigh.default.gc_thresh2': 4096,
    'net.ipv6.neigh.default.gc_thresh3': 8192,
    'net.ipv6.conf.all.disable_ipv6': 0,
    'net.ipv6.conf.default.disable_ipv6': 0,
    'net.ipv6.conf.lo.disable_ipv6': 0,
  });
}
