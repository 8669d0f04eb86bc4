import datamask from 'datamask';
import type { RedactFunction } from '../types';
import { isRecord } from '../../type-guards';

export const REDACTED_PLACEHOLDER = '***REDACTED***';

/**
 * Default redaction: strings are masked with asterisks by datamask (at most
 * 60), everything else becomes a fixed placeholder.
 */
export const defaultRedactFunction: RedactFunction = (
  _keyName: string,
  value: unknown,
): unknown => {
  if (typeof value === 'string') {
    return datamask.string(value, '*', 60);
  }

  return REDACTED_PLACEHOLDER;
};

function getNestedValue(obj: Record<string, unknown>, path: string): unknown {
  let current: unknown = obj;

  for (const part of path.split('.')) {
    if (!isRecord(current) || !(part in current)) {
      return undefined;
    }

    current = current[part];
  }

  return current;
}

function setNestedValue(
  obj: Record<string, unknown>,
  path: string,
  value: unknown,
): void {
  const parts = path.split('.');
  const lastPart = parts.pop();
  let current: unknown = obj;

  for (const part of parts) {
    if (!isRecord(current)) {
      return;
    }

    current = current[part];
  }

  if (lastPart !== undefined && isRecord(current) && lastPart in current) {
    current[lastPart] = value;
  }
}

/**
 * Apply redaction to params based on redacted keys.
 * Supports top-level keys and nested paths in dot notation ('rcon.password').
 *
 * @returns A new object; `params` itself is never mutated
 */
export function applyRedaction(
  params: Record<string, unknown>,
  redactedKeys?: string[],
  redactFunction?: RedactFunction,
): Record<string, unknown> {
  if (!redactedKeys || redactedKeys.length === 0) {
    return params;
  }

  const redactFn = redactFunction ?? defaultRedactFunction;
  const redactedParams = structuredClone(params);

  for (const key of redactedKeys) {
    const value = getNestedValue(redactedParams, key);

    if (value !== undefined) {
      setNestedValue(redactedParams, key, redactFn(key, value));
    }
  }

  return redactedParams;
}
