/**
 * Flow Counters
 * Process-lifetime byte (and optionally packet) counters keyed by remote-peer labels
 */

import { Counter, Registry } from 'prom-client';
import { FLOW_LABEL_NAMES } from './types.js';
import type { CounterSample, FlowCountersSnapshot, FlowLabelName, FlowLabels } from './types.js';

export interface FlowCountersOptions {
  registry?: Registry;
  countPackets?: boolean;
}

export class FlowCounters {
  readonly registry: Registry;
  private readonly bytes: Counter<FlowLabelName>;
  private readonly packets: Counter<FlowLabelName> | null;

  constructor(options: FlowCountersOptions = {}) {
    this.registry = options.registry ?? new Registry();

    this.bytes = new Counter({
      name: 'flow_bytes_total',
      help: 'Flow bytes attributed to the remote peer.',
      labelNames: FLOW_LABEL_NAMES,
      registers: [this.registry],
    });

    this.packets = options.countPackets
      ? new Counter({
          name: 'flow_packets_total',
          help: 'Flow packets attributed to the remote peer.',
          labelNames: FLOW_LABEL_NAMES,
          registers: [this.registry],
        })
      : null;
  }

  get countsPackets(): boolean {
    return this.packets !== null;
  }

  add(labels: FlowLabels, bytes: number, packets: number): void {
    this.bytes.inc(labels, bytes);
    this.packets?.inc(labels, packets);
  }

  async snapshot(): Promise<FlowCountersSnapshot> {
    return {
      bytes: await readSamples(this.bytes),
      packets: this.packets ? await readSamples(this.packets) : [],
    };
  }

  async bytesFor(labels: FlowLabels): Promise<number> {
    const samples = await readSamples(this.bytes);
    return samples.find((sample) => sameLabels(sample.labels, labels))?.value ?? 0;
  }
}

async function readSamples(counter: Counter<FlowLabelName>): Promise<CounterSample[]> {
  const metric = await counter.get();
  return metric.values.map((entry) => ({
    labels: {
      direction: String(entry.labels.direction ?? ''),
      private: String(entry.labels.private ?? ''),
      country: String(entry.labels.country ?? ''),
      asn: String(entry.labels.asn ?? ''),
      asn_org: String(entry.labels.asn_org ?? ''),
    },
    value: entry.value,
  }));
}

function sameLabels(a: FlowLabels, b: FlowLabels): boolean {
  return FLOW_LABEL_NAMES.every((name) => a[name] === b[name]);
}
