/**
 * Memberships link a user to an organization (broker, customer, trucker,
 * material supplier or developer). The server stores each organization kind
 * under its own type (`broker-memberships`, `customer-memberships`, ...), so
 * creates pick the endpoint from `--organization` and updates look the
 * concrete type up first.
 */

import {
  IncludedIndex,
  boolAttr,
  intAttrOrNull,
  relationshipRef,
  resolveIncluded,
  resolveRelated,
  stringAttr
} from '../jsonapi/accessors';
import { Resource } from '../jsonapi/document';
import { parseTypedRef, toSingularKebab } from '../jsonapi/resource-types';
import {
  AttributeFlag,
  FilterFlag,
  FlagValues,
  RelationshipFlag,
  WriteTarget,
  defineResource
} from '../commands/resource-commands';
import { CLI_CONFIG } from '../config/defaults';
import { TableColumn } from '../output/table';
import { DetailLayout } from '../output/detail';
import { formatBool, formatDateTime, formatRelated, formatTypeLabel } from '../output/format';
import { ValidationError } from '../utils/error-handler';
import { ORGANIZATION_FIELDS, booleanFilter, resolveOrganization } from './shared';

export interface MembershipRow {
  id: string;
  user_id: string;
  user_name: string;
  user_email: string;
  user_mobile: string;
  organization_type: string;
  organization_id: string;
  organization_name: string;
  broker_id: string;
  broker_name: string;
  kind: string;
  is_admin: boolean;
  title: string;
  external_employee_id: string;
  color_hex: string;
}

export interface MembershipDetails extends MembershipRow {
  type: string;
  project_office_id: string;
  project_office_name: string;
  explicit_sort_order: number | null;
  start_at: string;
  end_at: string;
  drives_shift_type: string;
  trailer_coassignments_reset_on: string;
  can_see_rates_as_driver: boolean;
  can_see_rates_as_manager: boolean;
  can_validate_profit_improvements: boolean;
  is_rate_editor: boolean;
  is_time_card_auditor: boolean;
  is_equipment_rental_team_member: boolean;
  is_geofence_violation_team_member: boolean;
  is_unapproved_time_card_subscriber: boolean;
  is_default_job_production_plan_subscriber: boolean;
  enable_recap_notifications: boolean;
  enable_inventory_capacity_notifications: boolean;
}

export function buildMembershipRow(resource: Resource, included: IncludedIndex): MembershipRow {
  const attrs = resource.attributes;
  const user = resolveRelated(resource, included, 'user', 'name');
  const userResource = resolveIncluded(included, relationshipRef(resource.relationships, 'user'));
  const organization = resolveOrganization(resource, included);
  const broker = resolveRelated(resource, included, 'broker', 'company-name');

  return {
    id: resource.id,
    user_id: user.id,
    user_name: user.name,
    user_email: stringAttr(userResource?.attributes, 'email-address'),
    user_mobile: stringAttr(userResource?.attributes, 'mobile-number'),
    organization_type: organization.type,
    organization_id: organization.id,
    organization_name: organization.name,
    broker_id: broker.id,
    broker_name: broker.name,
    kind: stringAttr(attrs, 'kind'),
    is_admin: boolAttr(attrs, 'is-admin'),
    title: stringAttr(attrs, 'title'),
    external_employee_id: stringAttr(attrs, 'external-employee-id'),
    color_hex: stringAttr(attrs, 'color-hex')
  };
}

export function buildMembershipDetails(resource: Resource, included: IncludedIndex): MembershipDetails {
  const attrs = resource.attributes;
  const projectOffice = resolveRelated(resource, included, 'project-office', 'name');

  return {
    ...buildMembershipRow(resource, included),
    type: resource.type,
    project_office_id: projectOffice.id,
    project_office_name: projectOffice.name,
    explicit_sort_order: intAttrOrNull(attrs, 'explicit-sort-order'),
    start_at: formatDateTime(stringAttr(attrs, 'start-at')),
    end_at: formatDateTime(stringAttr(attrs, 'end-at')),
    drives_shift_type: stringAttr(attrs, 'drives-shift-type'),
    trailer_coassignments_reset_on: stringAttr(attrs, 'trailer-coassignments-reset-on'),
    can_see_rates_as_driver: boolAttr(attrs, 'can-see-rates-as-driver'),
    can_see_rates_as_manager: boolAttr(attrs, 'can-see-rates-as-manager'),
    can_validate_profit_improvements: boolAttr(attrs, 'can-validate-profit-improvements'),
    is_rate_editor: boolAttr(attrs, 'is-rate-editor'),
    is_time_card_auditor: boolAttr(attrs, 'is-time-card-auditor'),
    is_equipment_rental_team_member: boolAttr(attrs, 'is-equipment-rental-team-member'),
    is_geofence_violation_team_member: boolAttr(attrs, 'is-geofence-violation-team-member'),
    is_unapproved_time_card_subscriber: boolAttr(attrs, 'is-unapproved-time-card-subscriber'),
    is_default_job_production_plan_subscriber: boolAttr(attrs, 'is-default-job-production-plan-subscriber'),
    enable_recap_notifications: boolAttr(attrs, 'enable-recap-notifications'),
    enable_inventory_capacity_notifications: boolAttr(attrs, 'enable-inventory-capacity-notifications')
  };
}

// Filter names use snake_case on the memberships endpoints
export const MEMBERSHIP_FILTERS: readonly FilterFlag[] = [
  { flag: 'user', description: 'Filter by user ID' },
  { flag: 'broker', description: 'Filter by broker ID' },
  { flag: 'project-office', description: 'Filter by project office ID', filter: 'project_office' },
  { flag: 'kind', description: 'Filter by kind (manager/operations)' },
  { flag: 'q', description: 'Search by user name' },
  { flag: 'drives-shift-type', description: 'Filter by drives shift type', filter: 'drives_shift_type' },
  { flag: 'external-employee-id', description: 'Filter by external employee ID', filter: 'external_employee_id' },
  booleanFilter('is-rate-editor', 'Filter by rate editor permission', 'is_rate_editor'),
  booleanFilter('is-time-card-auditor', 'Filter by time card auditor permission', 'is_time_card_auditor'),
  booleanFilter(
    'is-equipment-rental-team-member',
    'Filter by equipment rental team membership',
    'is_equipment_rental_team_member'
  ),
  booleanFilter(
    'is-geofence-violation-team-member',
    'Filter by geofence violation team membership',
    'is_geofence_violation_team_member'
  ),
  booleanFilter(
    'is-unapproved-time-card-subscriber',
    'Filter by unapproved time card subscription',
    'is_unapproved_time_card_subscriber'
  ),
  booleanFilter(
    'is-default-job-production-plan-subscriber',
    'Filter by default job production plan subscription',
    'is_default_job_production_plan_subscriber'
  )
];

export const MEMBERSHIP_LIST_INCLUDE = ['user', 'organization', 'broker'];

const MEMBERSHIP_LIST_FIELDS: Readonly<Record<string, readonly string[]>> = {
  users: ['name', 'email-address', 'mobile-number'],
  ...ORGANIZATION_FIELDS
};

function permissionFlag(flag: string, description: string): AttributeFlag {
  return { flag, description: `${description} (true/false)`, kind: 'boolean' };
}

const MEMBERSHIP_ATTRIBUTES: readonly AttributeFlag[] = [
  { flag: 'kind', description: 'Membership kind (manager/operations)' },
  { flag: 'is-admin', description: 'Organization admin (true/false)', kind: 'boolean' },
  { flag: 'title', description: 'Job title' },
  { flag: 'color-hex', description: 'Display color (hex)' },
  { flag: 'external-employee-id', description: 'External employee ID' },
  { flag: 'explicit-sort-order', description: 'Sort order', kind: 'integer' },
  { flag: 'start-at', description: 'Start time (ISO 8601)' },
  { flag: 'end-at', description: 'End time (ISO 8601)' },
  { flag: 'drives-shift-type', description: 'Drives shift type' },
  permissionFlag('can-see-rates-as-driver', 'Can see rates as driver'),
  permissionFlag('can-see-rates-as-manager', 'Can see rates as manager'),
  permissionFlag('can-validate-profit-improvements', 'Can validate profit improvements'),
  permissionFlag('is-rate-editor', 'Rate editor'),
  permissionFlag('is-time-card-auditor', 'Time card auditor'),
  permissionFlag('is-equipment-rental-team-member', 'Equipment rental team member'),
  permissionFlag('is-geofence-violation-team-member', 'Geofence violation team member'),
  permissionFlag('is-unapproved-time-card-subscriber', 'Unapproved time card subscriber'),
  permissionFlag('is-default-job-production-plan-subscriber', 'Default job production plan subscriber'),
  permissionFlag('enable-recap-notifications', 'Recap notifications'),
  permissionFlag('enable-inventory-capacity-notifications', 'Inventory capacity notifications')
];

const PROJECT_OFFICE: RelationshipFlag = {
  flag: 'project-office',
  description: 'Project office ID',
  type: 'project-offices'
};

/** "Broker|12" -> broker-memberships. */
export function membershipTarget(values: FlagValues): WriteTarget {
  const ref = parseTypedRef(values.get('organization') ?? '', '--organization');
  const type = `${toSingularKebab(ref.className)}-memberships`;
  return { type, path: `${CLI_CONFIG.API_PREFIX}/${type}` };
}

export const MEMBERSHIP_DETAIL_LAYOUT: DetailLayout<MembershipDetails> = {
  fields: [
    { label: 'ID', value: d => d.id, always: true },
    { label: 'Type', value: d => d.type },
    { label: 'Kind', value: d => d.kind },
    { label: 'Title', value: d => d.title },
    { label: 'Admin', value: d => formatBool(d.is_admin) },
    { label: 'External Employee ID', value: d => d.external_employee_id },
    { label: 'Color', value: d => d.color_hex },
    { label: 'Sort Order', value: d => (d.explicit_sort_order === null ? '' : String(d.explicit_sort_order)) }
  ],
  sections: [
    {
      title: 'User',
      fields: [
        { label: 'User', value: d => formatRelated(d.user_name, d.user_id) },
        { label: 'Email', value: d => d.user_email },
        { label: 'Mobile', value: d => d.user_mobile }
      ]
    },
    {
      title: 'Organization',
      fields: [
        { label: 'Type', value: d => (d.organization_type === '' ? '' : formatTypeLabel(d.organization_type)) },
        { label: 'Organization', value: d => formatRelated(d.organization_name, d.organization_id) },
        { label: 'Broker', value: d => formatRelated(d.broker_name, d.broker_id) },
        { label: 'Project Office', value: d => formatRelated(d.project_office_name, d.project_office_id) }
      ]
    },
    {
      title: 'Dates',
      fields: [
        { label: 'Start At', value: d => d.start_at },
        { label: 'End At', value: d => d.end_at },
        { label: 'Drives Shift Type', value: d => d.drives_shift_type },
        { label: 'Trailer Coassignments Reset On', value: d => d.trailer_coassignments_reset_on }
      ]
    },
    {
      title: 'Permissions',
      fields: [
        { label: 'Can See Rates As Driver', value: d => formatBool(d.can_see_rates_as_driver) },
        { label: 'Can See Rates As Manager', value: d => formatBool(d.can_see_rates_as_manager) },
        { label: 'Can Validate Profit Improvements', value: d => formatBool(d.can_validate_profit_improvements) },
        { label: 'Rate Editor', value: d => formatBool(d.is_rate_editor) },
        { label: 'Time Card Auditor', value: d => formatBool(d.is_time_card_auditor) },
        { label: 'Equipment Rental Team', value: d => formatBool(d.is_equipment_rental_team_member) },
        { label: 'Geofence Violation Team', value: d => formatBool(d.is_geofence_violation_team_member) }
      ]
    },
    {
      title: 'Notifications',
      fields: [
        { label: 'Unapproved Time Cards', value: d => formatBool(d.is_unapproved_time_card_subscriber) },
        {
          label: 'Default Job Production Plans',
          value: d => formatBool(d.is_default_job_production_plan_subscriber)
        },
        { label: 'Recaps', value: d => formatBool(d.enable_recap_notifications) },
        { label: 'Inventory Capacity', value: d => formatBool(d.enable_inventory_capacity_notifications) }
      ]
    }
  ]
};

export const MEMBERSHIP_SHOW_INCLUDE = ['user', 'organization', 'broker', 'project-office'];

export const MEMBERSHIP_SHOW_FIELDS: Readonly<Record<string, readonly string[]>> = {
  ...MEMBERSHIP_LIST_FIELDS,
  'project-offices': ['name']
};

const columns: readonly TableColumn<MembershipRow>[] = [
  { header: 'ID', value: row => row.id },
  { header: 'USER', value: row => row.user_name, maxWidth: 20 },
  { header: 'TYPE', value: row => formatTypeLabel(row.organization_type) },
  { header: 'NAME', value: row => row.organization_name, maxWidth: 25 },
  { header: 'KIND', value: row => row.kind }
];

export const memberships = defineResource<MembershipRow, MembershipDetails>({
  name: 'memberships',
  type: 'memberships',
  singular: 'membership',
  category: 'organizations',
  description: 'User memberships in organizations',

  list: {
    include: MEMBERSHIP_LIST_INCLUDE,
    fields: MEMBERSHIP_LIST_FIELDS,
    filters: [
      ...MEMBERSHIP_FILTERS.slice(0, 2),
      {
        flag: 'organization',
        description: 'Filter by organization (Type|ID, e.g. Broker|123)',
        kind: 'typed'
      },
      ...MEMBERSHIP_FILTERS.slice(2)
    ],
    buildRow: buildMembershipRow,
    columns
  },

  show: {
    include: MEMBERSHIP_SHOW_INCLUDE,
    fields: MEMBERSHIP_SHOW_FIELDS,
    buildDetails: buildMembershipDetails,
    layout: MEMBERSHIP_DETAIL_LAYOUT
  },

  create: {
    attributes: MEMBERSHIP_ATTRIBUTES,
    relationships: [
      { flag: 'user', description: 'User ID', type: 'users', required: true },
      {
        flag: 'organization',
        description: 'Organization (Type|ID, e.g. Broker|123)',
        required: true
      },
      PROJECT_OFFICE
    ],
    validate: values => {
      const ref = parseTypedRef(values.get('organization') ?? '', '--organization');
      if (ref.className === 'Organization') {
        throw new ValidationError('--organization must name a concrete type (e.g. Broker|123)');
      }
    },
    target: membershipTarget
  },

  update: {
    attributes: MEMBERSHIP_ATTRIBUTES,
    relationships: [PROJECT_OFFICE],
    resolveType: true
  },

  delete: true
});
