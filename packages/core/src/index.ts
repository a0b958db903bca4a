/**
 * @flowgauge/core
 * Flow enrichment and aggregation pipeline
 */

// Enrichment - parsing, peer resolution, direction classification
export * from './enrichment/index.js';

// Aggregation - counter state and attribution
export * from './aggregation/index.js';

// Ingestion - line pump
export * from './ingestion/index.js';

// Pipeline assembly
export { createFlowPipeline } from './pipeline.js';
export type { FlowPipeline, FlowPipelineOptions } from './pipeline.js';
