/**
 * Runtime type guards shared by the logger, the event emitter and the
 * callback helpers.
 */

export function isPromise(value: unknown): value is Promise<unknown> {
  if (value === null || value === undefined) {
    return false;
  }

  if (typeof value !== 'object' && typeof value !== 'function') {
    return false;
  }

  return 'then' in value && typeof value.then === 'function';
}

export function isFunction(
  value: unknown,
): value is (...args: unknown[]) => unknown {
  return typeof value === 'function';
}

/**
 * `true` for numbers that are not NaN
 *
 * @example
 * ```typescript
 * isNumber(42);    // true
 * isNumber(NaN);   // false
 * isNumber('42');  // false
 * ```
 */
export function isNumber(value: unknown): value is number {
  return typeof value === 'number' && !isNaN(value);
}

/**
 * `true` for any non-null object, arrays and class instances included
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object';
}
