// RFC 8785 canonical JSON: sorted keys, no insignificant whitespace

import canonicalizeLib from 'canonicalize';

/**
 * @example
 * ```typescript
 * canonicalize({ operation: 'elevate', account: 'DAG1' });
 * // '{"account":"DAG1","operation":"elevate"}'
 * ```
 */
export function canonicalize<T>(data: T): string {
  const result = canonicalizeLib(data);
  if (result === undefined) {
    throw new Error('Failed to canonicalize data: data cannot be serialized to JSON');
  }
  return result;
}
