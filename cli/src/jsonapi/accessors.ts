/**
 * Total accessors over JSON:API attributes and relationships.
 *
 * Sparse fieldsets mean any attribute may be missing from a response, so none of
 * these throw: an absent or mistyped value yields the zero value of the
 * requested type.
 */

import { Attributes, JsonValue, Relationships, Resource, ResourceIdentifier } from './document';

export type IncludedIndex = ReadonlyMap<string, Resource>;

export function stringAttr(attrs: Attributes | undefined, key: string): string {
  const value = attrs?.[key];
  return typeof value === 'string' ? value : '';
}

export function boolAttr(attrs: Attributes | undefined, key: string): boolean {
  const value = attrs?.[key];
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string') {
    return value.trim().toLowerCase() === 'true';
  }
  return false;
}

export function floatAttr(attrs: Attributes | undefined, key: string): number {
  const value = attrs?.[key];
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

export function intAttr(attrs: Attributes | undefined, key: string): number {
  return Math.trunc(floatAttr(attrs, key));
}

/** Like intAttr, but keeps "not set" distinguishable from zero. */
export function intAttrOrNull(attrs: Attributes | undefined, key: string): number | null {
  const value = attrs?.[key];
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value === 'number' || (typeof value === 'string' && value.trim() !== '')) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? Math.trunc(parsed) : null;
  }
  return null;
}

export function stringSliceAttr(attrs: Attributes | undefined, key: string): string[] {
  const value = attrs?.[key];
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string');
  }
  if (typeof value === 'string' && value !== '') {
    return [value];
  }
  return [];
}

export function anyAttr(attrs: Attributes | undefined, key: string): JsonValue | undefined {
  return attrs?.[key];
}

/** Numbers and numeric strings rendered as text, e.g. decimal columns serialized as strings. */
export function numberAttrAsString(attrs: Attributes | undefined, key: string): string {
  const value = attrs?.[key];
  if (typeof value === 'number') {
    return String(value);
  }
  if (typeof value === 'string') {
    return value.trim();
  }
  return '';
}

// ===== Relationships =====

export function relationshipRef(relationships: Relationships | undefined, name: string): ResourceIdentifier | undefined {
  const data = relationships?.[name]?.data;
  if (!data || Array.isArray(data)) {
    return undefined;
  }
  return data;
}

export function relationshipID(relationships: Relationships | undefined, name: string): string {
  return relationshipRef(relationships, name)?.id ?? '';
}

export function relationshipType(relationships: Relationships | undefined, name: string): string {
  return relationshipRef(relationships, name)?.type ?? '';
}

export function relationshipRefs(relationships: Relationships | undefined, name: string): ResourceIdentifier[] {
  const data = relationships?.[name]?.data;
  if (!data) {
    return [];
  }
  return Array.isArray(data) ? data : [data];
}

/** Ids of a to-many relationship, in document order. */
export function relationshipIDList(relationships: Relationships | undefined, name: string): string[] {
  return relationshipRefs(relationships, name)
    .map(ref => ref.id)
    .filter(id => id !== '');
}

// ===== Included side table =====

export function resourceKey(type: string, id: string): string {
  return `${type}|${id}`;
}

export function indexIncluded(included: readonly Resource[]): IncludedIndex {
  const index = new Map<string, Resource>();
  for (const resource of included) {
    index.set(resourceKey(resource.type, resource.id), resource);
  }
  return index;
}

export function resolveIncluded(index: IncludedIndex, ref: ResourceIdentifier | undefined): Resource | undefined {
  if (!ref) {
    return undefined;
  }
  return index.get(resourceKey(ref.type, ref.id));
}

/**
 * Resolve a to-one relationship and read one attribute of the related resource.
 * The id is returned even when the related resource was not included.
 */
export function resolveRelated(
  resource: Resource,
  index: IncludedIndex,
  name: string,
  ...attributeKeys: string[]
): { id: string; type: string; name: string } {
  const ref = relationshipRef(resource.relationships, name);
  if (!ref) {
    return { id: '', type: '', name: '' };
  }
  const related = resolveIncluded(index, ref);
  let label = '';
  for (const key of attributeKeys) {
    label = stringAttr(related?.attributes, key).trim();
    if (label !== '') {
      break;
    }
  }
  return { id: ref.id, type: ref.type, name: label };
}
