import { isRecord } from '../../type-guards';

const PLACEHOLDER_PATTERN = /(?:\\)?{{(\s*[\w.]+?)(?:\\)?\s*}}/g;

function lookup(locals: Record<string, unknown>, key: string): unknown {
  let current: unknown = locals;

  for (const part of key.split('.')) {
    if (!isRecord(current) || !(part in current)) {
      return undefined;
    }

    current = current[part];
  }

  return current;
}

/**
 * Replace `{{key}}` / `{{nested.key}}` placeholders with values from `locals`.
 *
 * Missing or null values render as `fallback`. A placeholder written as
 * `\{{key}}` is kept literally (without the backslash).
 */
export function renderTemplate(
  template: string,
  locals: Record<string, unknown>,
  fallback: string = '(null)',
): string {
  if (!template.includes('{{')) {
    return template;
  }

  return template.replace(PLACEHOLDER_PATTERN, (match: string, key: string) => {
    if (match.startsWith('\\')) {
      return match.slice(1);
    }

    const value = lookup(locals, key.trim());

    if (value === undefined || value === null) {
      return fallback;
    }

    if (typeof value === 'object') {
      try {
        return JSON.stringify(value);
      } catch {
        return fallback;
      }
    }

    return String(value);
  });
}
