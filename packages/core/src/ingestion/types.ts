/**
 * Ingestion Layer Types
 */

/**
 * Receives every line that is not a flow record, unchanged
 */
export type DiagnosticSink = (line: string) => void;

export type LineOutcome = 'counted' | 'skipped' | 'passthrough' | 'rejected';

export interface PumpStats {
  lines: number;
  flows: number;        // enriched successfully
  counted: number;
  skipped: number;      // direction "unknown"
  passthrough: number;
  rejected: number;     // malformed record or invalid address
}

export interface LinePumpConfig {
  verbose: boolean;     // log every enriched flow
}
