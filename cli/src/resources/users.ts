import { boolAttr, stringAttr } from '../jsonapi/accessors';
import { Resource } from '../jsonapi/document';
import { AttributeFlag, defineResource } from '../commands/resource-commands';
import { formatBool, formatDateTime } from '../output/format';
import { booleanFilter } from './shared';

export interface UserRow {
  id: string;
  name: string;
  email: string;
  mobile: string;
  is_admin: boolean;
}

export interface UserDetails extends UserRow {
  slack_id: string;
  is_driver: boolean;
  created_at: string;
  updated_at: string;
}

export function buildUserRow(resource: Resource): UserRow {
  const attrs = resource.attributes;
  return {
    id: resource.id,
    name: stringAttr(attrs, 'name').trim(),
    email: stringAttr(attrs, 'email-address'),
    mobile: stringAttr(attrs, 'mobile-number'),
    is_admin: boolAttr(attrs, 'is-admin')
  };
}

export function buildUserDetails(resource: Resource): UserDetails {
  const attrs = resource.attributes;
  return {
    ...buildUserRow(resource),
    slack_id: stringAttr(attrs, 'slack-id'),
    is_driver: boolAttr(attrs, 'is-driver'),
    created_at: formatDateTime(stringAttr(attrs, 'created-at')),
    updated_at: formatDateTime(stringAttr(attrs, 'updated-at'))
  };
}

function flag(name: string, description: string, attribute?: string): AttributeFlag {
  return { flag: name, description: `${description} (true/false)`, kind: 'boolean', attribute };
}

const USER_ATTRIBUTES: readonly AttributeFlag[] = [
  { flag: 'name', description: 'User name' },
  { flag: 'email', description: 'Email address', attribute: 'email-address' },
  { flag: 'mobile', description: 'Mobile phone number', attribute: 'mobile-number' },
  { flag: 'default-contact-method', description: 'Default contact method (email, sms, push)' },
  flag('is-suspended-from-driving', 'Suspend from driving'),
  { flag: 'dark-mode', description: 'Dark mode preference' },
  flag('is-available-for-question', 'Available for question assignment', 'is-available-for-question-assignment'),
  { flag: 'slack-id', description: 'Slack user ID (admin only)' },
  flag('is-admin', 'Admin status'),
  flag('is-potential-trucker-referrer', 'Potential trucker referrer'),
  flag('opt-out-of-check-in-request-notifications', 'Opt out of check-in notifications'),
  flag('opt-out-of-shift-starting-notifications', 'Opt out of shift starting notifications'),
  flag('opt-out-of-pre-approval-notifications', 'Opt out of pre-approval notifications'),
  flag('is-contact-method-required', 'Contact method required'),
  flag('notify-when-gps-not-available', 'Notify when GPS not available'),
  flag('opt-out-of-time-card-approver-notifications', 'Opt out of time card approver notifications'),
  { flag: 'notification-preferences-explicit', description: 'Explicit notification preferences' },
  { flag: 'explicit-time-zone-id', description: 'Explicit time zone ID' },
  flag('is-generating-notification-posts-explicit', 'Generating notification posts'),
  { flag: 'reference-data', description: 'Reference data (JSON)', kind: 'json' },
  flag('is-read-only-mode-enabled', 'Read-only mode enabled'),
  flag('is-notifiable', 'Notifiable'),
  flag('is-sales', 'Sales role, admin only'),
  flag('is-customer-success', 'Customer success role, admin only')
];

export const users = defineResource<UserRow, UserDetails>({
  name: 'users',
  type: 'users',
  singular: 'user',
  category: 'organizations',
  description: 'People with accounts',

  list: {
    fields: { users: ['name', 'email-address', 'mobile-number', 'is-admin'] },
    filters: [
      { flag: 'name', description: 'Filter by name (partial match)', filter: 'q' },
      booleanFilter('is-admin', 'Filter by admin status', 'is_admin'),
      { flag: 'email-address', description: 'Filter by email address' },
      { flag: 'email-address-like', description: 'Filter by email address (partial match)' },
      { flag: 'mobile-number', description: 'Filter by mobile number' },
      { flag: 'slack-id', description: 'Filter by Slack ID' },
      booleanFilter('is-driver', 'Filter by driver status'),
      {
        flag: 'having-customer-membership-with',
        description: 'Filter by customer membership (customer ID, comma-separated for multiple)',
        kind: 'list'
      },
      {
        flag: 'having-trucker-membership-with',
        description: 'Filter by trucker membership (trucker ID, comma-separated for multiple)',
        kind: 'list'
      }
    ],
    buildRow: buildUserRow,
    columns: [
      { header: 'ID', value: row => row.id },
      { header: 'NAME', value: row => row.name, maxWidth: 30 },
      { header: 'EMAIL', value: row => row.email, maxWidth: 35 },
      { header: 'MOBILE', value: row => row.mobile },
      { header: 'ADMIN', value: row => (row.is_admin ? 'yes' : '') }
    ]
  },

  show: {
    buildDetails: buildUserDetails,
    layout: {
      fields: [
        { label: 'ID', value: d => d.id, always: true },
        { label: 'Name', value: d => d.name },
        { label: 'Email', value: d => d.email },
        { label: 'Mobile', value: d => d.mobile },
        { label: 'Slack ID', value: d => d.slack_id },
        { label: 'Admin', value: d => formatBool(d.is_admin) },
        { label: 'Driver', value: d => formatBool(d.is_driver) },
        { label: 'Created At', value: d => d.created_at },
        { label: 'Updated At', value: d => d.updated_at }
      ]
    }
  },

  create: {
    attributes: USER_ATTRIBUTES.map(spec =>
      spec.flag === 'name' || spec.flag === 'email' ? { ...spec, required: true } : spec
    )
  },

  update: {
    attributes: USER_ATTRIBUTES
  },

  label: d => d.name,
  writeOutput: 'summary'
});
