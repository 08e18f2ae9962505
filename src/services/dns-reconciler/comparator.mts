import { minimatch } from 'minimatch';

import type { NetworkInterfaceSnapshot } from './types.mts';

// `*` matches any run of characters and `?` a single one, as in `10.0.1.*`.
export function matchesPrefix(ipAddress: string, pattern: string) {
  return minimatch(ipAddress, pattern, {
    nocomment: true,
    nonegate: true,
    noext: true,
  });
}

export function isInScope(snapshot: NetworkInterfaceSnapshot, pattern: string) {
  return snapshot.ipAddresses.some((ip) => matchesPrefix(ip, pattern));
}

/**
 * True when the two lists are not set-equal. Order and repeated entries are
 * ignored; one missing or extra address is enough.
 */
export function requiresChange(
  currentDNS: readonly string[],
  desiredDNS: readonly string[],
) {
  const current = new Set(currentDNS);
  const desired = new Set(desiredDNS);

  for (const address of current) {
    if (!desired.has(address)) {
      return true;
    }
  }
  for (const address of desired) {
    if (!current.has(address)) {
      return true;
    }
  }
  return false;
}
