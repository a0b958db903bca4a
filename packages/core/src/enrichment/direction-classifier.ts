/**
 * Direction Classifier
 * Tags a flow as inbound, outbound or unattributable, and as private or public
 */

import { isPrivateAddress } from './address.js';
import type { LocalAddressSet } from './local-address-set.js';
import type { Classification, FlowDirection, FlowEndpoints } from './types.js';

export function classify(endpoints: FlowEndpoints, localAddresses: LocalAddressSet): Classification {
  // Destination first: a local-to-local flow is always "in"
  let direction: FlowDirection = 'unknown';
  if (localAddresses.has(endpoints.ipDst)) {
    direction = 'in';
  } else if (localAddresses.has(endpoints.ipSrc)) {
    direction = 'out';
  }

  const isPrivate = isPrivateAddress(endpoints.ipSrc) && isPrivateAddress(endpoints.ipDst);

  return {
    direction,
    privacy: isPrivate ? 'private' : 'public',
  };
}
