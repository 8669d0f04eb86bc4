import { describe, test, expect } from 'vitest';
import {
  applyRedaction,
  defaultRedactFunction,
  REDACTED_PLACEHOLDER,
} from './redaction';

describe('applyRedaction', () => {
  test('returns params unchanged without keys', () => {
    const params = { a: 1 };
    expect(applyRedaction(params)).toBe(params);
  });

  test('masks top-level and nested keys without mutating the input', () => {
    const params = {
      password: 'test-secret',
      rcon: { password: 'abc', port: 27001 },
    };

    const result = applyRedaction(params, ['password', 'rcon.password']);

    expect(result).toEqual({
      password: defaultRedactFunction('password', 'test-secret'),
      rcon: { password: defaultRedactFunction('rcon.password', 'abc'), port: 27001 },
    });
    expect(result.password).not.toBe('test-secret');
    expect(params.password).toBe('test-secret');
    expect(params.rcon.password).toBe('abc');
  });

  test('ignores keys that are absent', () => {
    expect(applyRedaction({ a: 1 }, ['b', 'a.c'])).toEqual({ a: 1 });
  });

  test('uses a custom redact function', () => {
    expect(
      applyRedaction({ token: 'test-secret' }, ['token'], () => '[hidden]'),
    ).toEqual({ token: '[hidden]' });
  });
});

describe('defaultRedactFunction', () => {
  test('masks strings with asterisks', () => {
    const masked = defaultRedactFunction('rconPassword', 'test-secret');

    expect(typeof masked).toBe('string');
    expect(masked).not.toBe('test-secret');
    expect(masked).toContain('*');
  });

  test('keeps masks of long values within 60 characters', () => {
    const masked = String(defaultRedactFunction('token', 'x'.repeat(100)));

    expect(masked.length).toBeLessThanOrEqual(60);
    expect(masked).not.toContain('x');
  });

  test('replaces non-strings with the placeholder', () => {
    expect(defaultRedactFunction('k', 1234)).toBe(REDACTED_PLACEHOLDER);
  });
});
