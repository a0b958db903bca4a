/**
 * Aggregation Layer
 * Counter state and flow-to-counter attribution
 */

export * from './types.js';
export { FlowCounters } from './flow-counters.js';
export type { FlowCountersOptions } from './flow-counters.js';
export { MetricAggregator, remotePeer } from './metric-aggregator.js';
