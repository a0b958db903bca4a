/**
 * Peer Resolver
 * Resolves an endpoint address into geolocation and network-ownership attributes
 */

import { createChildLogger } from '@flowgauge/shared';
import type { AsnLookup, AsnRecord, CityLookup, CityRecord, LookupServices } from '@flowgauge/shared';
import { parseAddress } from './address.js';
import type { Peer } from './types.js';

export class PeerResolver {
  private readonly city: CityLookup;
  private readonly asn: AsnLookup;
  private logger = createChildLogger({ component: 'PeerResolver' });

  constructor(lookups: LookupServices) {
    this.city = lookups.city;
    this.asn = lookups.asn;
  }

  /**
   * Resolve one address. Throws InvalidAddressError when `raw` is not an IP address;
   * a lookup without a record leaves its fields empty. Lookups use the parsed form,
   * so an IPv4-mapped address is looked up as IPv4.
   */
  resolve(raw: string): Peer {
    const ip = parseAddress(raw);
    const key = ip.toString();
    const cityRecord = this.lookupCity(key);
    const asnRecord = this.lookupAsn(key);

    return {
      ip,
      country: cityRecord?.country ?? '',
      countryIso: cityRecord?.countryIso ?? '',
      city: cityRecord?.city ?? '',
      latitude: cityRecord?.latitude ?? 0,
      longitude: cityRecord?.longitude ?? 0,
      asn: asnRecord ? String(asnRecord.number) : '',
      asnOrg: asnRecord?.organization ?? '',
    };
  }

  private lookupCity(ip: string): CityRecord | null {
    try {
      return this.city.lookupCity(ip);
    } catch (error) {
      this.logger.warn({ ip, err: error }, 'City lookup failed, treating as no record');
      return null;
    }
  }

  private lookupAsn(ip: string): AsnRecord | null {
    try {
      return this.asn.lookupAsn(ip);
    } catch (error) {
      this.logger.warn({ ip, err: error }, 'ASN lookup failed, treating as no record');
      return null;
    }
  }
}
