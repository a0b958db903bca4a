/**
 * Lookup service contracts
 * Read-only enrichment sources queried once per flow endpoint
 */

export interface CityRecord {
  country: string;
  countryIso: string;
  city: string;
  latitude: number;
  longitude: number;
}

export interface AsnRecord {
  number: number;
  organization: string;
}

/**
 * Geolocation by address. `null` means the database has no entry.
 */
export interface CityLookup {
  lookupCity(ip: string): CityRecord | null;
}

/**
 * Autonomous system by address. `null` means the database has no entry.
 */
export interface AsnLookup {
  lookupAsn(ip: string): AsnRecord | null;
}

export interface LookupServices {
  city: CityLookup;
  asn: AsnLookup;
}
