/**
 * GeoIP Types
 */

/**
 * The part of a maxmind Reader the lookups depend on
 */
export interface RecordReader<T> {
  get(ip: string): T | null;
}

export interface GeoIpDatabasePaths {
  cityDatabase: string;
  asnDatabase: string;
}
