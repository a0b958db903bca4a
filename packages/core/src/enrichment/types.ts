/**
 * Enrichment Layer Types
 * Flow records, resolved peers and classification tags
 */

import type ipaddr from 'ipaddr.js';

export type IpAddress = ReturnType<typeof ipaddr.parse>;

// ===========================================
// Wire Types
// ===========================================

/**
 * One decoded collector line, before any address parsing
 */
export interface RawFlowRecord {
  readonly ipSrc: string;
  readonly ipDst: string;
  readonly packets: number;
  readonly bytes: number;
  readonly proto?: string;
}

// ===========================================
// Enriched Types
// ===========================================

export interface Peer {
  readonly ip: IpAddress;
  readonly country: string;
  readonly countryIso: string;
  readonly city: string;
  readonly latitude: number;
  readonly longitude: number;
  readonly asn: string;
  readonly asnOrg: string;
}

export type FlowDirection = 'in' | 'out' | 'unknown';
export type FlowPrivacy = 'private' | 'public';

export interface FlowEndpoints {
  readonly ipSrc: IpAddress;
  readonly ipDst: IpAddress;
}

export interface Classification {
  direction: FlowDirection;
  privacy: FlowPrivacy;
}

export interface Flow extends FlowEndpoints {
  readonly packets: number;
  readonly bytes: number;
  readonly proto: string;
  readonly direction: FlowDirection;
  readonly privacy: FlowPrivacy;
  readonly source: Peer;
  readonly destination: Peer;
}
