/**
 * Value formatting for table cells and detail lines.
 */

import { JsonValue } from '../jsonapi/document';
import { toClassName } from '../jsonapi/resource-types';

export function firstNonEmpty(...values: string[]): string {
  for (const value of values) {
    const trimmed = value.trim();
    if (trimmed !== '') {
      return trimmed;
    }
  }
  return '';
}

/** "name (id)", or whichever of the two is present. */
export function formatRelated(name: string, id: string): string {
  if (name !== '' && id !== '') {
    return `${name} (${id})`;
  }
  return name !== '' ? name : id;
}

/** Label for a polymorphic reference with no resolved name: "brokers/12". */
export function formatPolymorphic(type: string, id: string): string {
  if (type !== '' && id !== '') {
    return `${type}/${id}`;
  }
  return type !== '' ? type : id;
}

export function formatBool(value: boolean): string {
  return value ? 'yes' : 'no';
}

export function formatDateTime(value: string): string {
  return value.trim();
}

/** Date part of an ISO timestamp: "2024-05-01T10:00:00Z" -> "2024-05-01". */
export function formatDate(value: string): string {
  const trimmed = value.trim();
  const match = /^(\d{4}-\d{2}-\d{2})(?:[T ]|$)/.exec(trimmed);
  return match ? match[1] : trimmed;
}

export function formatAnyValue(value: JsonValue | undefined): string {
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value === 'string') {
    return value.trim();
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return JSON.stringify(value);
}

export function formatList(values: readonly string[]): string {
  return values.join(', ');
}

/** "material-suppliers" -> "MaterialSupplier", used in the organization column. */
export function formatTypeLabel(type: string): string {
  return toClassName(type);
}
