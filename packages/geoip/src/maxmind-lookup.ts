/**
 * MaxMind Lookups
 * GeoLite2/GeoIP2 City and ASN databases behind the lookup service contracts
 */

import { open } from 'maxmind';
import type { AsnResponse, CityResponse } from 'maxmind';
import { ConfigurationError, createChildLogger } from '@flowgauge/shared';
import type { AsnLookup, AsnRecord, CityLookup, CityRecord, LookupServices } from '@flowgauge/shared';
import type { GeoIpDatabasePaths, RecordReader } from './types.js';

const logger = createChildLogger({ component: 'GeoIp' });

export class MaxMindCityLookup implements CityLookup {
  constructor(private readonly reader: RecordReader<CityResponse>) {}

  lookupCity(ip: string): CityRecord | null {
    const record = this.reader.get(ip);
    if (!record) {
      return null;
    }

    return {
      country: record.country?.names.en ?? '',
      countryIso: record.country?.iso_code ?? '',
      city: record.city?.names.en ?? '',
      latitude: record.location?.latitude ?? 0,
      longitude: record.location?.longitude ?? 0,
    };
  }
}

export class MaxMindAsnLookup implements AsnLookup {
  constructor(private readonly reader: RecordReader<AsnResponse>) {}

  lookupAsn(ip: string): AsnRecord | null {
    const record = this.reader.get(ip);
    if (!record) {
      return null;
    }

    return {
      number: record.autonomous_system_number,
      organization: record.autonomous_system_organization ?? '',
    };
  }
}

async function openDatabase<T extends CityResponse | AsnResponse>(
  path: string,
  kind: 'city' | 'asn'
): Promise<RecordReader<T>> {
  try {
    const reader = await open<T>(path);
    logger.info({ path, kind }, 'GeoIP database opened');
    return reader;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot open ${kind} database '${path}': ${reason}`, { path, kind });
  }
}

/**
 * Open both databases; either failing is a ConfigurationError
 */
export async function openLookups(paths: GeoIpDatabasePaths): Promise<LookupServices> {
  const [cityReader, asnReader] = await Promise.all([
    openDatabase<CityResponse>(paths.cityDatabase, 'city'),
    openDatabase<AsnResponse>(paths.asnDatabase, 'asn'),
  ]);

  return {
    city: new MaxMindCityLookup(cityReader),
    asn: new MaxMindAsnLookup(asnReader),
  };
}
