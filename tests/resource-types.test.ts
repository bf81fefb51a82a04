import { describe, it, expect } from 'vitest';
import {
  formatTypedFilter,
  parseTypedRef,
  toClassName,
  toJsonApiType,
  toSingularKebab
} from '../cli/src/jsonapi/resource-types';
import { ValidationError } from '../cli/src/utils/error-handler';

describe('resource type aliases', () => {
  it.each([
    ['customer', 'Customer'],
    ['customers', 'Customer'],
    ['Customer', 'Customer'],
    ['material_suppliers', 'MaterialSupplier'],
    ['material-supplier', 'MaterialSupplier'],
    ['MaterialSupplier', 'MaterialSupplier'],
    ['developers', 'Developer'],
    ['business-unit-memberships', 'BusinessUnitMembership'],
    ['activities', 'Activity'],
    ['addresses', 'Address'],
    ['people', 'Person'],
    ['Brokers', 'Broker'],
    ['MaterialSuppliers', 'MaterialSupplier'],
    ['Businesses', 'Business'],
    ['', '']
  ])('toClassName(%j) is %j', (input, expected) => {
    expect(toClassName(input)).toBe(expected);
  });

  it.each([
    ['Customer', 'customers'],
    ['customer', 'customers'],
    ['material_supplier', 'material-suppliers'],
    ['MaterialSupplier', 'material-suppliers'],
    ['Broker', 'brokers'],
    ['Activity', 'activities'],
    ['Address', 'addresses'],
    ['equipment', 'equipment'],
    ['Brokers', 'brokers'],
    ['MaterialSuppliers', 'material-suppliers']
  ])('toJsonApiType(%j) is %j', (input, expected) => {
    expect(toJsonApiType(input)).toBe(expected);
  });

  it('gives the singular kebab form used by membership endpoints', () => {
    expect(toSingularKebab('MaterialSupplier')).toBe('material-supplier');
    expect(toSingularKebab('brokers')).toBe('broker');
  });
});

describe('parseTypedRef', () => {
  it('splits Type|ID and normalizes the type', () => {
    expect(parseTypedRef('customers| 12 ', '--organization')).toEqual({
      className: 'Customer',
      type: 'customers',
      id: '12'
    });
  });

  it('accepts capitalized plural type names', () => {
    expect(parseTypedRef('Brokers|4', '--organization')).toEqual({ className: 'Broker', type: 'brokers', id: '4' });
    expect(formatTypedFilter('Customers|5', '--organization')).toBe('Customer|5');
  });

  it.each(['12', 'Customer|', '|12', 'a|b|c'])('rejects %j', value => {
    expect(() => parseTypedRef(value, '--organization')).toThrow(ValidationError);
    expect(() => parseTypedRef(value, '--organization')).toThrow(
      '--organization must be in Type|ID format (e.g. Customer|123)'
    );
  });
});

describe('formatTypedFilter', () => {
  it('normalizes every reference in a comma list', () => {
    expect(formatTypedFilter('brokers|1, material_supplier|2,', '--organization')).toBe('Broker|1,MaterialSupplier|2');
  });
});
