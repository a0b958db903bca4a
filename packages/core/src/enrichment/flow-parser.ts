/**
 * Flow Parser
 * Decodes one pmacct JSON line into a raw flow record
 */

import { z } from 'zod';
import { MalformedRecordError } from '@flowgauge/shared';
import type { RawFlowRecord } from './types.js';

// {"event_type": "purge", "ip_src": "10.0.1.1", "ip_dst": "10.0.2.1", "packets": 2, "bytes": 143}
// Unknown keys (event_type and any later collector fields) are stripped.
const flowRecordSchema = z.object({
  ip_src: z.string(),
  ip_dst: z.string(),
  packets: z.number().int().nonnegative(),
  bytes: z.number().int().nonnegative(),
  proto: z.string().optional(),
});

/**
 * Only lines whose first non-whitespace character is `{` are flow records
 */
export function isFlowCandidate(line: string): boolean {
  return line.trimStart().startsWith('{');
}

export class FlowParser {
  parse(line: string): RawFlowRecord {
    let decoded: unknown;
    try {
      decoded = JSON.parse(line);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new MalformedRecordError(`Flow record is not valid JSON: ${reason}`);
    }

    const result = flowRecordSchema.safeParse(decoded);
    if (!result.success) {
      const issues = result.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
      );
      throw new MalformedRecordError(`Flow record failed validation: ${issues.join('; ')}`, issues);
    }

    const record = result.data;
    return {
      ipSrc: record.ip_src,
      ipDst: record.ip_dst,
      packets: record.packets,
      bytes: record.bytes,
      proto: record.proto,
    };
  }
}
