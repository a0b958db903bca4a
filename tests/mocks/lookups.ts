/**
 * In-memory lookup services for pipeline tests
 */
import type { AsnRecord, CityRecord, LookupServices } from '@flowgauge/shared';

export interface StaticLookupData {
  cities?: Record<string, CityRecord>;
  asns?: Record<string, AsnRecord>;
}

/**
 * Addresses missing from the tables are lookup misses
 */
export function createStaticLookups(data: StaticLookupData = {}): LookupServices {
  const cities = new Map(Object.entries(data.cities ?? {}));
  const asns = new Map(Object.entries(data.asns ?? {}));

  return {
    city: { lookupCity: (ip) => cities.get(ip) ?? null },
    asn: { lookupAsn: (ip) => asns.get(ip) ?? null },
  };
}

export const GOOGLE_DNS_CITY: CityRecord = {
  country: 'United States',
  countryIso: 'US',
  city: 'Mountain View',
  latitude: 37.386,
  longitude: -122.0838,
};

export const GOOGLE_DNS_ASN: AsnRecord = {
  number: 15169,
  organization: 'GOOGLE',
};

export const EXAMPLE_NET_CITY: CityRecord = {
  country: 'Germany',
  countryIso: 'DE',
  city: 'Berlin',
  latitude: 52.52,
  longitude: 13.405,
};

export const EXAMPLE_NET_ASN: AsnRecord = {
  number: 64500,
  organization: 'Example Transit GmbH',
};
