import { OutputStream } from '../types/cli';

export interface WriteJsonOptions {
  /** Drop keys whose value is null, an empty string or an empty list. */
  omitNull?: boolean;
}

function isEmptyValue(value: unknown): boolean {
  return value === null || value === undefined || value === '' || (Array.isArray(value) && value.length === 0);
}

export function omitNullValues(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(omitNullValues);
  }
  if (typeof value === 'object' && value !== null) {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      if (!isEmptyValue(entry)) {
        result[key] = omitNullValues(entry);
      }
    }
    return result;
  }
  return value;
}

export function writeJSON(out: OutputStream, value: unknown, options: WriteJsonOptions = {}): void {
  const payload = options.omitNull ? omitNullValues(value) : value;
  out.write(JSON.stringify(payload, null, 2) + '\n');
}
