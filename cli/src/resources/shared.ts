/**
 * Pieces shared by several resource families.
 */

import { IncludedIndex, resolveRelated } from '../jsonapi/accessors';
import { Resource } from '../jsonapi/document';
import { FilterFlag } from '../commands/resource-commands';

/** Sparse fieldsets for every organization type a polymorphic relationship can point at. */
export const ORGANIZATION_FIELDS: Readonly<Record<string, readonly string[]>> = {
  brokers: ['company-name'],
  customers: ['company-name'],
  truckers: ['company-name'],
  'material-suppliers': ['name'],
  developers: ['name']
};

/** Brokers, customers and truckers carry `company-name`; the other organization types carry `name`. */
export function resolveOrganization(
  resource: Resource,
  included: IncludedIndex,
  relationship = 'organization'
): { id: string; type: string; name: string } {
  return resolveRelated(resource, included, relationship, 'company-name', 'name');
}

export function booleanFilter(flag: string, description: string, filter?: string): FilterFlag {
  return { flag, description: `${description} (true/false)`, filter, kind: 'boolean' };
}
