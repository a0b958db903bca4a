/**
 * Local Addresses
 * The host's own addresses, read once at startup
 */

import { networkInterfaces, type NetworkInterfaceInfo } from 'os';
import { ConfigurationError, InvalidAddressError, createChildLogger } from '@flowgauge/shared';
import { LocalAddressSet } from '@flowgauge/core';

const logger = createChildLogger({ component: 'LocalAddresses' });

export type InterfaceSource = () => NodeJS.Dict<NetworkInterfaceInfo[]>;

/**
 * Use `override` when configured, otherwise every address bound to a local interface
 */
export function currentLocalAddresses(
  override?: readonly string[],
  interfaces: InterfaceSource = networkInterfaces
): LocalAddressSet {
  if (override) {
    try {
      const set = LocalAddressSet.fromStrings(override);
      logger.info({ count: set.size, source: 'LOCAL_ADDRESSES' }, 'Local addresses configured');
      return set;
    } catch (error) {
      if (error instanceof InvalidAddressError) {
        throw new ConfigurationError(`LOCAL_ADDRESSES contains an invalid address: '${error.address}'`);
      }
      throw error;
    }
  }

  const addresses: string[] = [];
  for (const [name, infos] of Object.entries(interfaces())) {
    for (const info of infos ?? []) {
      addresses.push(info.address);
    }
    logger.debug({ interface: name, count: infos?.length ?? 0 }, 'Interface addresses read');
  }

  const set = LocalAddressSet.fromStrings(addresses);
  logger.info({ count: set.size, source: 'interfaces' }, 'Local addresses discovered');
  return set;
}
