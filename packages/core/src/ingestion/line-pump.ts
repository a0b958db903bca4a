/**
 * Line Pump
 * Drives collector output through enrichment and aggregation, one line at a time
 */

import { createChildLogger, isFlowGaugeError, wrapError } from '@flowgauge/shared';
import { isFlowCandidate } from '../enrichment/flow-parser.js';
import type { FlowEnricher } from '../enrichment/flow-enricher.js';
import type { Flow, Peer } from '../enrichment/types.js';
import type { MetricAggregator } from '../aggregation/metric-aggregator.js';
import type { DiagnosticSink, LineOutcome, LinePumpConfig, PumpStats } from './types.js';

const DEFAULT_CONFIG: LinePumpConfig = {
  verbose: false,
};

export class LinePump {
  private config: LinePumpConfig;
  private stats: PumpStats = emptyStats();
  private logger = createChildLogger({ component: 'LinePump' });

  constructor(
    private readonly enricher: FlowEnricher,
    private readonly aggregator: MetricAggregator,
    private readonly diagnosticSink: DiagnosticSink,
    config: Partial<LinePumpConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Consume the stream in order until it ends. Rejects only if reading the stream fails.
   */
  async run(lines: AsyncIterable<string>): Promise<PumpStats> {
    this.logger.info('Line pump started');

    for await (const line of lines) {
      this.handleLine(line);
    }

    this.logger.info({ ...this.stats }, 'Line stream closed');
    return this.getStats();
  }

  /**
   * Process a single line synchronously; never throws for bad input
   */
  handleLine(line: string): LineOutcome {
    this.stats.lines++;

    if (!isFlowCandidate(line)) {
      this.diagnosticSink(line);
      this.stats.passthrough++;
      return 'passthrough';
    }

    let flow: Flow;
    try {
      flow = this.enricher.enrich(line);
    } catch (error) {
      this.reportRejected(line, error);
      this.stats.rejected++;
      return 'rejected';
    }

    this.stats.flows++;
    if (this.config.verbose) {
      this.logger.info({ flow: describeFlow(flow) }, 'Flow enriched');
    }

    const outcome = this.aggregator.observe(flow);
    this.stats[outcome]++;
    return outcome;
  }

  getStats(): PumpStats {
    return { ...this.stats };
  }

  private reportRejected(line: string, error: unknown): void {
    const context = { line: line.substring(0, 200) };

    if (isFlowGaugeError(error) && (error.code === 'MALFORMED_RECORD' || error.code === 'INVALID_ADDRESS')) {
      this.logger.warn({ ...context, code: error.code, reason: error.message }, 'Flow record rejected');
      return;
    }

    const wrapped = wrapError(error, { category: 'INPUT' });
    this.logger.error({ ...context, err: wrapped }, 'Unexpected error while processing flow record');
  }
}

function emptyStats(): PumpStats {
  return { lines: 0, flows: 0, counted: 0, skipped: 0, passthrough: 0, rejected: 0 };
}

function describePeer(peer: Peer) {
  return {
    ip: peer.ip.toString(),
    country: peer.country,
    countryIso: peer.countryIso,
    city: peer.city,
    latitude: peer.latitude,
    longitude: peer.longitude,
    asn: peer.asn,
    asnOrg: peer.asnOrg,
  };
}

function describeFlow(flow: Flow) {
  return {
    packets: flow.packets,
    bytes: flow.bytes,
    proto: flow.proto,
    direction: flow.direction,
    privacy: flow.privacy,
    source: describePeer(flow.source),
    destination: describePeer(flow.destination),
  };
}
