/**
 * Metric Aggregator
 * Attributes each attributable flow's traffic to its remote peer
 */

import type { Flow, Peer } from '../enrichment/types.js';
import type { FlowCounters } from './flow-counters.js';
import type { FlowLabels, ObserveOutcome } from './types.js';

export class MetricAggregator {
  constructor(private readonly counters: FlowCounters) {}

  /**
   * Flows with direction "unknown" are not counted
   */
  observe(flow: Flow): ObserveOutcome {
    if (flow.direction === 'unknown') {
      return 'skipped';
    }

    const remote = remotePeer(flow);
    const labels: FlowLabels = {
      direction: flow.direction,
      private: flow.privacy,
      country: remote.country,
      asn: remote.asn,
      asn_org: remote.asnOrg,
    };

    this.counters.add(labels, flow.bytes, flow.packets);
    return 'counted';
  }
}

// Inbound traffic comes from the source; outbound goes to the destination
export function remotePeer(flow: Flow): Peer {
  return flow.direction === 'in' ? flow.source : flow.destination;
}
