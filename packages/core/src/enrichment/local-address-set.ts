/**
 * Local Address Set
 * Addresses owned by this host, fixed for the lifetime of the pipeline
 */

import { addressKey, parseAddress } from './address.js';
import type { IpAddress } from './types.js';

export class LocalAddressSet {
  private readonly keys: ReadonlySet<string>;

  constructor(addresses: Iterable<IpAddress>) {
    const keys = new Set<string>();
    for (const address of addresses) {
      keys.add(addressKey(address));
    }
    this.keys = keys;
  }

  /**
   * Build from textual addresses; throws InvalidAddressError on the first bad entry
   */
  static fromStrings(addresses: Iterable<string>): LocalAddressSet {
    const parsed: IpAddress[] = [];
    for (const address of addresses) {
      parsed.push(parseAddress(address));
    }
    return new LocalAddressSet(parsed);
  }

  has(ip: IpAddress): boolean {
    return this.keys.has(addressKey(ip));
  }

  get size(): number {
    return this.keys.size;
  }
}
