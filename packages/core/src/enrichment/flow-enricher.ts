/**
 * Flow Enricher
 * Turns one raw collector line into an annotated Flow
 */

import { FlowParser } from './flow-parser.js';
import { classify } from './direction-classifier.js';
import type { PeerResolver } from './peer-resolver.js';
import type { LocalAddressSet } from './local-address-set.js';
import type { Flow } from './types.js';

export class FlowEnricher {
  private readonly parser: FlowParser;

  constructor(
    private readonly resolver: PeerResolver,
    private readonly localAddresses: LocalAddressSet,
    parser?: FlowParser
  ) {
    this.parser = parser ?? new FlowParser();
  }

  /**
   * Throws MalformedRecordError or InvalidAddressError; either endpoint failing drops the flow
   */
  enrich(line: string): Flow {
    const record = this.parser.parse(line);
    const source = this.resolver.resolve(record.ipSrc);
    const destination = this.resolver.resolve(record.ipDst);
    const { direction, privacy } = classify(
      { ipSrc: source.ip, ipDst: destination.ip },
      this.localAddresses
    );

    return {
      ipSrc: source.ip,
      ipDst: destination.ip,
      packets: record.packets,
      bytes: record.bytes,
      proto: record.proto ?? '',
      direction,
      privacy,
      source,
      destination,
    };
  }
}
