/**
 * Address helpers
 * Strict parsing and private-use classification of endpoint addresses
 */

import { isIP } from 'net';
import ipaddr from 'ipaddr.js';
import { InvalidAddressError } from '@flowgauge/shared';
import type { IpAddress } from './types.js';

// loopback, link-local, RFC 1918 and RFC 4193 unique-local
const PRIVATE_RANGES: ReadonlySet<string> = new Set(['private', 'loopback', 'linkLocal', 'uniqueLocal']);

/**
 * Parse a textual IPv4/IPv6 address. IPv4-mapped IPv6 addresses come back in IPv4 form.
 * Shorthand forms ipaddr.js would accept (`10.1`, hex octets) and zone-scoped IPv6 text
 * (`fe80::1%eth0`) are rejected.
 */
export function parseAddress(raw: string): IpAddress {
  if (raw.includes('%') || isIP(raw) === 0) {
    throw new InvalidAddressError(raw);
  }
  try {
    return ipaddr.process(raw);
  } catch {
    throw new InvalidAddressError(raw);
  }
}

/**
 * Canonical key for set membership
 */
export function addressKey(ip: IpAddress): string {
  return ip.toNormalizedString();
}

export function isPrivateAddress(ip: IpAddress): boolean {
  return PRIVATE_RANGES.has(ip.range());
}
