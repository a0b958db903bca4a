/**
 * Flow Pipeline
 * Wires resolver, enricher, counters, aggregator and pump around one set of lookups
 */

import type { Registry } from 'prom-client';
import type { LookupServices } from '@flowgauge/shared';
import { PeerResolver } from './enrichment/peer-resolver.js';
import { FlowEnricher } from './enrichment/flow-enricher.js';
import type { LocalAddressSet } from './enrichment/local-address-set.js';
import { FlowCounters } from './aggregation/flow-counters.js';
import { MetricAggregator } from './aggregation/metric-aggregator.js';
import { LinePump } from './ingestion/line-pump.js';
import type { DiagnosticSink } from './ingestion/types.js';

export interface FlowPipelineOptions {
  lookups: LookupServices;
  localAddresses: LocalAddressSet;
  diagnosticSink: DiagnosticSink;
  registry?: Registry;
  countPackets?: boolean;
  verbose?: boolean;
}

export interface FlowPipeline {
  counters: FlowCounters;
  enricher: FlowEnricher;
  aggregator: MetricAggregator;
  pump: LinePump;
}

export function createFlowPipeline(options: FlowPipelineOptions): FlowPipeline {
  const counters = new FlowCounters({
    registry: options.registry,
    countPackets: options.countPackets ?? false,
  });
  const enricher = new FlowEnricher(new PeerResolver(options.lookups), options.localAddresses);
  const aggregator = new MetricAggregator(counters);
  const pump = new LinePump(enricher, aggregator, options.diagnosticSink, {
    verbose: options.verbose ?? false,
  });

  return { counters, enricher, aggregator, pump };
}
