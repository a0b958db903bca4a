/**
 * Aggregation Layer Types
 */

export const FLOW_LABEL_NAMES = ['direction', 'private', 'country', 'asn', 'asn_org'] as const;

export type FlowLabelName = (typeof FLOW_LABEL_NAMES)[number];

export type FlowLabels = Record<FlowLabelName, string>;

export interface CounterSample {
  labels: FlowLabels;
  value: number;
}

export interface FlowCountersSnapshot {
  bytes: CounterSample[];
  packets: CounterSample[];
}

export type ObserveOutcome = 'counted' | 'skipped';
