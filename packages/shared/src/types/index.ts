/**
 * Shared types for flowgauge
 */

export type { CityRecord, AsnRecord, CityLookup, AsnLookup, LookupServices } from './lookup.js';
