/**
 * @flowgauge/geoip
 * MaxMind database backed lookup services
 */

export * from './types.js';
export { MaxMindCityLookup, MaxMindAsnLookup, openLookups } from './maxmind-lookup.js';
