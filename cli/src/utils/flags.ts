/**
 * Flag value parsing shared by the resource commands.
 */

import { InvalidArgumentError } from 'commander';
import { ValidationError } from './error-handler';
import { OptionValues } from '../types/cli';

/** commander argument parser for --limit / --offset style flags. */
export function parseNonNegativeInteger(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return parsed;
}

/** "true"/"false" (any case) to a boolean. */
export function parseBooleanFlag(value: string, flag: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true') return true;
  if (normalized === 'false') return false;
  throw new ValidationError(`${flag} must be true or false`);
}

export function parseIntegerFlag(value: string, flag: string): number {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new ValidationError(`${flag} must be an integer`);
  }
  return Number(trimmed);
}

export function parseNumberFlag(value: string, flag: string): number {
  const parsed = Number(value.trim());
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new ValidationError(`${flag} must be a number`);
  }
  return parsed;
}

/** Split "a, b,,c" into ["a", "b", "c"]. */
export function splitCommaList(raw: string): string[] {
  return raw
    .split(',')
    .map(part => part.trim())
    .filter(part => part !== '');
}

/** kebab-case flag name to the camelCase key commander stores it under. */
export function flagKey(flag: string): string {
  return flag.replace(/-([a-z0-9])/g, (_, letter: string) => letter.toUpperCase());
}

// ===== Reading parsed option values =====

export function optionString(options: OptionValues, key: string): string | undefined {
  const value = options[key];
  return typeof value === 'string' ? value : undefined;
}

export function optionBoolean(options: OptionValues, key: string): boolean | undefined {
  const value = options[key];
  return typeof value === 'boolean' ? value : undefined;
}

export function optionNumber(options: OptionValues, key: string): number | undefined {
  const value = options[key];
  return typeof value === 'number' ? value : undefined;
}
