/**
 * Longest values the network tables accept, counted in characters the
 * way PostgreSQL measures `varchar(n)`.
 */
export const STORAGE_LIMITS = {
  networkName: 255,
  networkVersion: 64,
  networkContact: 255,
  nodeLabel: 512,
  citationDb: 64,
  citationReference: 255,
} as const;

export function exceedsLimit(value: string, limit: number): boolean {
  return Array.from(value).length > limit;
}

/** True when any string or key inside `value` holds U+0000. */
export function containsNul(value: unknown): boolean {
  if (typeof value === 'string') {
    return value.includes('\u0000');
  }
  if (Array.isArray(value)) {
    return value.some(containsNul);
  }
  if (typeof value === 'object' && value !== null) {
    return Object.entries(value).some(
      ([key, entry]) => key.includes('\u0000') || containsNul(entry),
    );
  }
  return false;
}
