/**
 * Ingestion Layer
 * Line-by-line consumption of collector output
 */

export * from './types.js';
export { LinePump } from './line-pump.js';
