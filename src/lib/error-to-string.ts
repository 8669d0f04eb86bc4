import { EOL, INDENT } from './constants';
import { isRecord } from './type-guards';

function stringifyValue(value: unknown): string {
  if (value === null || value === undefined) {
    return String(value);
  }

  switch (typeof value) {
    case 'string':
      return value;
    case 'number':
    case 'boolean':
    case 'bigint':
      return String(value);
    case 'function':
      return '[Function]';
    case 'symbol':
      return value.toString();
    case 'object':
      if (value instanceof Error) {
        return `${value.name}: ${value.message}`;
      }

      try {
        return JSON.stringify(value);
      } catch {
        return '[Unserializable]';
      }
    default:
      return '[Unknown]';
  }
}

/**
 * Render an error (or anything thrown) as a readable multi-line block.
 *
 * Known error fields come first (message, name, code, errno, then the
 * errPrefix/errType/errCode convention used by this package's error classes),
 * followed by `additionalInfo` entries and the stack. Keys listed in
 * `sensitiveFieldNames` are masked.
 */
export function errorToString(error: unknown): string {
  if (!isRecord(error)) {
    return stringifyValue(error);
  }

  const err = error;
  const lines: string[] = [];

  const addRow = (label: string, value: unknown): void => {
    if (value !== undefined && value !== null && value !== '') {
      lines.push(`${label}: ${stringifyValue(value)}`);
    }
  };

  addRow('Message', err['message']);
  addRow('Name', err['name']);
  addRow('Code', err['code']);
  addRow('Errno', err['errno']);
  addRow('Prefix', err['errPrefix']);
  addRow('errType', err['errType']);
  addRow('errCode', err['errCode']);

  const additionalInfo = err['additionalInfo'];

  if (additionalInfo && typeof additionalInfo === 'object') {
    const sensitiveFieldNames: unknown = err['sensitiveFieldNames'];
    const sensitive: unknown[] = Array.isArray(sensitiveFieldNames)
      ? sensitiveFieldNames
      : [];

    for (const [key, value] of Object.entries(additionalInfo)) {
      addRow(
        `AdditionalInfo.${key}`,
        sensitive.includes(key) ? '***' : value,
      );
    }
  }

  if (lines.length === 0) {
    lines.push(stringifyValue(error));
  }

  if (typeof err['stack'] === 'string') {
    lines.push('Stack:');
    for (const stackLine of err['stack'].split(EOL)) {
      lines.push(INDENT + stackLine.trim());
    }
  }

  return lines.join(EOL);
}
