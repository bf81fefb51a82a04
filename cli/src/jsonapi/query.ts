/**
 * Query strings and request bodies in JSON:API form.
 */

import { JsonValue, ResourceIdentifier } from './document';

export interface ListQueryOptions {
  include?: readonly string[];
  fields?: Readonly<Record<string, readonly string[]>>;
  sort?: string;
  limit?: number;
  offset?: number;
  filters?: Readonly<Record<string, string | undefined>>;
}

export function setFilterIfPresent(query: URLSearchParams, name: string, value: string | undefined): void {
  const trimmed = value?.trim();
  if (trimmed) {
    query.set(`filter[${name}]`, trimmed);
  }
}

/**
 * Build the query for a show or list request. Page parameters are only sent
 * when positive so the server default applies otherwise.
 */
export function buildListQuery(options: ListQueryOptions): URLSearchParams {
  const query = new URLSearchParams();

  if (options.include && options.include.length > 0) {
    query.set('include', options.include.join(','));
  }
  for (const [type, fields] of Object.entries(options.fields ?? {})) {
    if (fields.length > 0) {
      query.set(`fields[${type}]`, fields.join(','));
    }
  }
  if (options.sort && options.sort.trim() !== '') {
    query.set('sort', options.sort.trim());
  }
  if (options.limit !== undefined && options.limit > 0) {
    query.set('page[limit]', String(options.limit));
  }
  if (options.offset !== undefined && options.offset > 0) {
    query.set('page[offset]', String(options.offset));
  }
  for (const [name, value] of Object.entries(options.filters ?? {})) {
    setFilterIfPresent(query, name, value);
  }

  return query;
}

// ===== Request bodies =====

export type RelationshipLinkage = ResourceIdentifier | ResourceIdentifier[] | null;

export interface ResourceObjectInput {
  type: string;
  id?: string;
  attributes: Record<string, JsonValue>;
  relationships: Record<string, RelationshipLinkage>;
}

export interface ResourceBody {
  data: {
    type: string;
    id?: string;
    attributes: Record<string, JsonValue>;
    relationships?: Record<string, { data: RelationshipLinkage }>;
  };
}

export function buildResourceBody(input: ResourceObjectInput): ResourceBody {
  const body: ResourceBody = {
    data: {
      type: input.type,
      attributes: input.attributes
    }
  };
  if (input.id !== undefined) {
    body.data = { type: input.type, id: input.id, attributes: input.attributes };
  }
  const names = Object.keys(input.relationships);
  if (names.length > 0) {
    const relationships: Record<string, { data: RelationshipLinkage }> = {};
    for (const name of names) {
      relationships[name] = { data: input.relationships[name] };
    }
    body.data.relationships = relationships;
  }
  return body;
}
