/**
 * Enrichment Layer
 * Parsing, peer resolution and direction classification of collector flow records
 */

export * from './types.js';
export { parseAddress, isPrivateAddress, addressKey } from './address.js';
export { LocalAddressSet } from './local-address-set.js';
export { PeerResolver } from './peer-resolver.js';
export { FlowParser, isFlowCandidate } from './flow-parser.js';
export { classify } from './direction-classifier.js';
export { FlowEnricher } from './flow-enricher.js';
