import { defineResource } from '../commands/resource-commands';
import { ValidationError } from '../utils/error-handler';
import {
  MEMBERSHIP_DETAIL_LAYOUT,
  MEMBERSHIP_FILTERS,
  MEMBERSHIP_LIST_INCLUDE,
  MEMBERSHIP_SHOW_FIELDS,
  MEMBERSHIP_SHOW_INCLUDE,
  MembershipDetails,
  MembershipRow,
  buildMembershipDetails,
  buildMembershipRow
} from './memberships';

export const customerMemberships = defineResource<MembershipRow, MembershipDetails>({
  name: 'customer-memberships',
  type: 'customer-memberships',
  singular: 'customer membership',
  category: 'organizations',
  description: 'User memberships in customers',

  list: {
    include: MEMBERSHIP_LIST_INCLUDE,
    fields: {
      users: ['name', 'email-address', 'mobile-number'],
      customers: ['company-name'],
      brokers: ['company-name']
    },
    filters: [
      {
        flag: 'customer',
        description: 'Filter by customer ID (comma-separated for multiple)',
        filter: 'organization',
        classPrefix: 'Customer'
      },
      {
        flag: 'organization',
        description: 'Filter by organization (Type|ID, e.g. Customer|123)',
        kind: 'typed'
      },
      ...MEMBERSHIP_FILTERS
    ],
    validate: values => {
      if (values.has('customer') && values.has('organization')) {
        throw new ValidationError('--customer and --organization cannot be used together');
      }
    },
    buildRow: buildMembershipRow,
    columns: [
      { header: 'ID', value: row => row.id },
      { header: 'USER', value: row => row.user_name, maxWidth: 20 },
      { header: 'CUSTOMER', value: row => row.organization_name, maxWidth: 25 },
      { header: 'KIND', value: row => row.kind }
    ]
  },

  show: {
    include: MEMBERSHIP_SHOW_INCLUDE,
    fields: MEMBERSHIP_SHOW_FIELDS,
    buildDetails: buildMembershipDetails,
    layout: MEMBERSHIP_DETAIL_LAYOUT
  }
});
