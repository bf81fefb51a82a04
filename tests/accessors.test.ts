import { describe, it, expect } from 'vitest';
import {
  anyAttr,
  boolAttr,
  floatAttr,
  indexIncluded,
  intAttr,
  intAttrOrNull,
  numberAttrAsString,
  relationshipID,
  relationshipIDList,
  relationshipRef,
  relationshipType,
  resolveIncluded,
  resolveRelated,
  stringAttr,
  stringSliceAttr
} from '../cli/src/jsonapi/accessors';
import { Resource } from '../cli/src/jsonapi/document';

const attrs = {
  name: 'Ada',
  admin: true,
  admin_text: 'TRUE',
  count: 3.7,
  count_text: '12',
  bad_number: 'abc',
  tags: ['a', 1, 'b'],
  single: 'only',
  empty: null
};

describe('attribute accessors', () => {
  it('return zero values for missing keys and missing attribute maps', () => {
    expect(stringAttr(attrs, 'missing')).toBe('');
    expect(boolAttr(attrs, 'missing')).toBe(false);
    expect(floatAttr(attrs, 'missing')).toBe(0);
    expect(intAttr(attrs, 'missing')).toBe(0);
    expect(stringSliceAttr(attrs, 'missing')).toEqual([]);
    expect(anyAttr(attrs, 'missing')).toBeUndefined();
    expect(stringAttr(undefined, 'name')).toBe('');
    expect(boolAttr(undefined, 'admin')).toBe(false);
  });

  it('return zero values for mistyped values', () => {
    expect(stringAttr(attrs, 'count')).toBe('');
    expect(boolAttr(attrs, 'count')).toBe(false);
    expect(floatAttr(attrs, 'bad_number')).toBe(0);
    expect(stringAttr(attrs, 'empty')).toBe('');
  });

  it('read well-typed values', () => {
    expect(stringAttr(attrs, 'name')).toBe('Ada');
    expect(boolAttr(attrs, 'admin')).toBe(true);
    expect(boolAttr(attrs, 'admin_text')).toBe(true);
    expect(floatAttr(attrs, 'count')).toBe(3.7);
    expect(floatAttr(attrs, 'count_text')).toBe(12);
    expect(intAttr(attrs, 'count')).toBe(3);
    expect(stringSliceAttr(attrs, 'tags')).toEqual(['a', 'b']);
    expect(stringSliceAttr(attrs, 'single')).toEqual(['only']);
    expect(anyAttr(attrs, 'tags')).toEqual(['a', 1, 'b']);
  });

  it('intAttrOrNull keeps "not set" apart from zero', () => {
    expect(intAttrOrNull({ n: 0 }, 'n')).toBe(0);
    expect(intAttrOrNull({ n: '4' }, 'n')).toBe(4);
    expect(intAttrOrNull({ n: null }, 'n')).toBeNull();
    expect(intAttrOrNull({}, 'n')).toBeNull();
    expect(intAttrOrNull({ n: 'x' }, 'n')).toBeNull();
  });

  it('numberAttrAsString renders numbers and numeric strings', () => {
    expect(numberAttrAsString({ n: 2500 }, 'n')).toBe('2500');
    expect(numberAttrAsString({ n: ' 12.50 ' }, 'n')).toBe('12.50');
    expect(numberAttrAsString({}, 'n')).toBe('');
  });
});

describe('relationship accessors', () => {
  const relationships = {
    owner: { data: { type: 'users', id: '7' } },
    parent: { data: null },
    children: {
      data: [
        { type: 'objectives', id: '3' },
        { type: 'objectives', id: '1' },
        { type: 'objectives', id: '2' }
      ]
    },
    links_only: {}
  };

  it('reads to-one references', () => {
    expect(relationshipRef(relationships, 'owner')).toEqual({ type: 'users', id: '7' });
    expect(relationshipID(relationships, 'owner')).toBe('7');
    expect(relationshipType(relationships, 'owner')).toBe('users');
  });

  it('returns blanks for null, missing or to-many data', () => {
    expect(relationshipRef(relationships, 'parent')).toBeUndefined();
    expect(relationshipID(relationships, 'parent')).toBe('');
    expect(relationshipID(relationships, 'missing')).toBe('');
    expect(relationshipID(relationships, 'links_only')).toBe('');
    expect(relationshipID(relationships, 'children')).toBe('');
    expect(relationshipID(undefined, 'owner')).toBe('');
  });

  it('keeps document order for to-many ids', () => {
    expect(relationshipIDList(relationships, 'children')).toEqual(['3', '1', '2']);
    expect(relationshipIDList(relationships, 'owner')).toEqual(['7']);
    expect(relationshipIDList(relationships, 'parent')).toEqual([]);
  });
});

describe('included resolution', () => {
  const user: Resource = { type: 'users', id: '7', attributes: { name: ' Ada ' }, relationships: {} };
  const broker: Resource = { type: 'brokers', id: '7', attributes: { 'company-name': 'Acme' }, relationships: {} };
  const index = indexIncluded([user, broker]);

  const resource: Resource = {
    type: 'memberships',
    id: '1',
    attributes: {},
    relationships: {
      user: { data: { type: 'users', id: '7' } },
      organization: { data: { type: 'brokers', id: '7' } },
      project: { data: { type: 'projects', id: '9' } }
    }
  };

  it('keys included resources by type and id', () => {
    expect(resolveIncluded(index, { type: 'users', id: '7' })).toBe(user);
    expect(resolveIncluded(index, { type: 'brokers', id: '7' })).toBe(broker);
    expect(resolveIncluded(index, { type: 'customers', id: '7' })).toBeUndefined();
    expect(resolveIncluded(index, undefined)).toBeUndefined();
  });

  it('resolves a related name and trims it', () => {
    expect(resolveRelated(resource, index, 'user', 'name')).toEqual({ id: '7', type: 'users', name: 'Ada' });
  });

  it('tries attribute keys in order', () => {
    expect(resolveRelated(resource, index, 'organization', 'name', 'company-name')).toEqual({
      id: '7',
      type: 'brokers',
      name: 'Acme'
    });
  });

  it('keeps the id when the related resource was not included', () => {
    expect(resolveRelated(resource, index, 'project', 'name')).toEqual({ id: '9', type: 'projects', name: '' });
    expect(resolveRelated(resource, index, 'missing', 'name')).toEqual({ id: '', type: '', name: '' });
  });
});
