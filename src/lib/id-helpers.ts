import { ulid } from 'ulid';

/**
 * Generate a lexicographically sortable identifier (ULID).
 *
 * Lifecycle events, shutdown runs and process handles are tagged with these
 * so log lines from one run can be correlated and replayed in order.
 */
export function generateID(seedTime?: number): string {
  return ulid(seedTime);
}

const ULID_REGEX = /^[0-9A-HJKMNP-TV-Z]{26}$/;

export function isValidID(value: unknown): value is string {
  return typeof value === 'string' && ULID_REGEX.test(value);
}
