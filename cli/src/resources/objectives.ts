import {
  IncludedIndex,
  anyAttr,
  boolAttr,
  relationshipIDList,
  resolveRelated,
  stringAttr
} from '../jsonapi/accessors';
import { JsonValue, Resource } from '../jsonapi/document';
import { parseTypedRef } from '../jsonapi/resource-types';
import { AttributeFlag, FlagValues, RelationshipFlag, defineResource } from '../commands/resource-commands';
import { firstNonEmpty, formatAnyValue, formatDate, formatList, formatPolymorphic, formatRelated } from '../output/format';
import { parseBooleanFlag } from '../utils/flags';
import { ValidationError } from '../utils/error-handler';
import { ORGANIZATION_FIELDS, booleanFilter, resolveOrganization } from './shared';

export interface ObjectiveRow {
  id: string;
  name: string;
  status: string;
  commitment: string;
  start_on: string;
  end_on: string;
  is_template: boolean;
  template_scope: string;
  slug: string;
  owner_id: string;
  owner_name: string;
  organization_id: string;
  organization_type: string;
  organization_name: string;
  project_id: string;
  project_name: string;
  sales_responsible_person_id: string;
  sales_responsible_person_name: string;
}

export interface ObjectiveDetails extends ObjectiveRow {
  description: string;
  name_summary: string;
  name_summary_explicit: string;
  name_summary_implicit: string;
  is_generating_objective_stakeholder_classifications: boolean;
  is_abandoned: boolean;
  completion_percentage_calculated: JsonValue;
  parent_id: string;
  parent_type: string;
  parent_name: string;
  key_result_ids: string[];
  child_objective_ids: string[];
  objective_stakeholder_classification_ids: string[];
  latest_objective_status_post_id: string;
  latest_objective_status_post_summary: string;
}

export function buildObjectiveRow(resource: Resource, included: IncludedIndex): ObjectiveRow {
  const attrs = resource.attributes;
  const owner = resolveRelated(resource, included, 'owner', 'name');
  const organization = resolveOrganization(resource, included);
  const project = resolveRelated(resource, included, 'project', 'name');
  const salesPerson = resolveRelated(resource, included, 'sales-responsible-person', 'name');

  return {
    id: resource.id,
    name: stringAttr(attrs, 'name').trim(),
    status: stringAttr(attrs, 'status'),
    commitment: stringAttr(attrs, 'commitment'),
    start_on: formatDate(stringAttr(attrs, 'start-on')),
    end_on: formatDate(stringAttr(attrs, 'end-on')),
    is_template: boolAttr(attrs, 'is-template'),
    template_scope: stringAttr(attrs, 'template-scope'),
    slug: stringAttr(attrs, 'slug'),
    owner_id: owner.id,
    owner_name: owner.name,
    organization_id: organization.id,
    organization_type: organization.type,
    organization_name: organization.name,
    project_id: project.id,
    project_name: project.name,
    sales_responsible_person_id: salesPerson.id,
    sales_responsible_person_name: salesPerson.name
  };
}

export function buildObjectiveDetails(resource: Resource, included: IncludedIndex): ObjectiveDetails {
  const attrs = resource.attributes;
  // Parents are objectives (name) or key results (title)
  const parent = resolveRelated(resource, included, 'parent', 'name', 'title');
  const post = resolveRelated(resource, included, 'latest-objective-status-post', 'short-text-content');

  return {
    ...buildObjectiveRow(resource, included),
    description: stringAttr(attrs, 'description').trim(),
    name_summary: stringAttr(attrs, 'name-summary'),
    name_summary_explicit: stringAttr(attrs, 'name-summary-explicit'),
    name_summary_implicit: stringAttr(attrs, 'name-summary-implicit'),
    is_generating_objective_stakeholder_classifications: boolAttr(
      attrs,
      'is-generating-objective-stakeholder-classifications'
    ),
    is_abandoned: boolAttr(attrs, 'is-abandoned'),
    completion_percentage_calculated: anyAttr(attrs, 'completion-percentage-calculated') ?? null,
    parent_id: parent.id,
    parent_type: parent.type,
    parent_name: parent.name,
    key_result_ids: relationshipIDList(resource.relationships, 'key-results'),
    child_objective_ids: relationshipIDList(resource.relationships, 'children'),
    objective_stakeholder_classification_ids: relationshipIDList(
      resource.relationships,
      'objective-stakeholder-classifications'
    ),
    latest_objective_status_post_id: post.id,
    latest_objective_status_post_summary: post.name
  };
}

function organizationLabel(name: string, type: string, id: string): string {
  return name !== '' ? name : formatPolymorphic(type, id);
}

/**
 * Template objectives carry a scope and no organization, owner or sales
 * person; every other objective needs an organization.
 */
export function validateObjectiveTemplate(values: FlagValues, mode: 'create' | 'update'): void {
  const rawTemplate = values.get('is-template');
  const isTemplate = rawTemplate !== undefined && rawTemplate !== '' && parseBooleanFlag(rawTemplate, '--is-template');
  const has = (flag: string): boolean => (values.get(flag) ?? '').trim() !== '';

  if (isTemplate) {
    if (mode === 'create' && !has('template-scope')) {
      throw new ValidationError('--template-scope is required when --is-template true');
    }
    for (const flag of ['organization', 'owner', 'sales-responsible-person']) {
      if (has(flag)) {
        throw new ValidationError(`--${flag} cannot be used when --is-template true`);
      }
    }
    return;
  }

  if (has('template-scope') && (mode === 'create' || rawTemplate !== undefined)) {
    throw new ValidationError('--template-scope requires --is-template true');
  }
  if (mode === 'create') {
    if (!has('organization')) {
      throw new ValidationError('--organization is required for non-template objectives (or set --is-template true)');
    }
    parseTypedRef(values.get('organization') ?? '', '--organization');
  }
}

const OBJECTIVE_ATTRIBUTES: readonly AttributeFlag[] = [
  { flag: 'name', description: 'Objective name' },
  { flag: 'description', description: 'Description' },
  { flag: 'start-on', description: 'Start date (YYYY-MM-DD)' },
  { flag: 'end-on', description: 'End date (YYYY-MM-DD)' },
  { flag: 'commitment', description: 'Commitment (committed/aspirational)' },
  { flag: 'name-summary-explicit', description: 'Explicit name summary' },
  { flag: 'is-template', description: 'Template objective (true/false)', kind: 'boolean' },
  { flag: 'template-scope', description: 'Template scope' },
  {
    flag: 'is-generating-objective-stakeholder-classifications',
    description: 'Generate stakeholder classifications (true/false)',
    kind: 'boolean'
  }
];

const OBJECTIVE_RELATIONSHIPS: readonly RelationshipFlag[] = [
  { flag: 'owner', description: 'Owner user ID', type: 'users' },
  { flag: 'organization', description: 'Organization (Type|ID, e.g. Broker|123)' },
  { flag: 'parent', description: 'Parent (Type|ID, e.g. Objective|123)' },
  { flag: 'project', description: 'Project ID', type: 'projects' },
  { flag: 'sales-responsible-person', description: 'Sales responsible person user ID', type: 'users' }
];

export const objectives = defineResource<ObjectiveRow, ObjectiveDetails>({
  name: 'objectives',
  type: 'objectives',
  singular: 'objective',
  category: 'projects',
  description: 'Objectives and their progress',

  list: {
    include: ['owner', 'organization', 'project', 'sales-responsible-person'],
    fields: {
      objectives: [
        'name',
        'status',
        'start-on',
        'end-on',
        'commitment',
        'is-template',
        'template-scope',
        'slug',
        'owner',
        'organization',
        'project',
        'sales-responsible-person'
      ],
      users: ['name'],
      projects: ['name'],
      ...ORGANIZATION_FIELDS
    },
    filters: [
      { flag: 'name', description: 'Filter by name' },
      { flag: 'owner', description: 'Filter by owner user ID (comma-separated for multiple)', kind: 'list' },
      { flag: 'organization', description: 'Filter by organization (Type|ID, e.g. Broker|123)', kind: 'typed' },
      { flag: 'status', description: 'Filter by status' },
      { flag: 'start-on', description: 'Filter by start date (YYYY-MM-DD)' },
      { flag: 'start-on-min', description: 'Filter by minimum start date (YYYY-MM-DD)' },
      { flag: 'start-on-max', description: 'Filter by maximum start date (YYYY-MM-DD)' },
      { flag: 'end-on', description: 'Filter by end date (YYYY-MM-DD)' },
      { flag: 'end-on-min', description: 'Filter by minimum end date (YYYY-MM-DD)' },
      { flag: 'end-on-max', description: 'Filter by maximum end date (YYYY-MM-DD)' },
      { flag: 'commitment', description: 'Filter by commitment' },
      { flag: 'project', description: 'Filter by project ID (comma-separated for multiple)', kind: 'list' },
      booleanFilter('is-template', 'Filter by template status'),
      { flag: 'template-scope', description: 'Filter by template scope' },
      { flag: 'slug', description: 'Filter by slug' },
      {
        flag: 'sales-responsible-person',
        description: 'Filter by sales responsible person user ID (comma-separated for multiple)',
        kind: 'list'
      },
      booleanFilter('has-sales-responsible-person', 'Filter by presence of a sales responsible person')
    ],
    buildRow: buildObjectiveRow,
    columns: [
      { header: 'ID', value: row => row.id },
      { header: 'STATUS', value: row => row.status },
      { header: 'NAME', value: row => row.name, maxWidth: 40 },
      { header: 'COMMITMENT', value: row => row.commitment },
      { header: 'START', value: row => row.start_on },
      { header: 'END', value: row => row.end_on },
      { header: 'OWNER', value: row => firstNonEmpty(row.owner_name, row.owner_id), maxWidth: 25 },
      {
        header: 'ORG',
        value: row => organizationLabel(row.organization_name, row.organization_type, row.organization_id),
        maxWidth: 30
      },
      { header: 'TEMPLATE', value: row => (row.is_template ? 'yes' : '') }
    ]
  },

  show: {
    include: ['owner', 'organization', 'parent', 'project', 'sales-responsible-person', 'latest-objective-status-post'],
    fields: {
      users: ['name'],
      projects: ['name'],
      posts: ['short-text-content'],
      ...ORGANIZATION_FIELDS
    },
    buildDetails: buildObjectiveDetails,
    layout: {
      fields: [
        { label: 'ID', value: d => d.id, always: true },
        { label: 'Name', value: d => d.name },
        { label: 'Status', value: d => d.status },
        { label: 'Commitment', value: d => d.commitment },
        { label: 'Start On', value: d => d.start_on },
        { label: 'End On', value: d => d.end_on },
        { label: 'Description', value: d => d.description },
        { label: 'Name Summary', value: d => d.name_summary },
        { label: 'Name Summary Explicit', value: d => d.name_summary_explicit },
        { label: 'Name Summary Implicit', value: d => d.name_summary_implicit },
        { label: 'Slug', value: d => d.slug },
        { label: 'Is Template', value: d => String(d.is_template) },
        { label: 'Template Scope', value: d => d.template_scope },
        {
          label: 'Is Generating Stakeholder Classifications',
          value: d => String(d.is_generating_objective_stakeholder_classifications)
        },
        { label: 'Is Abandoned', value: d => String(d.is_abandoned) },
        { label: 'Completion (Calculated)', value: d => formatAnyValue(d.completion_percentage_calculated) }
      ],
      sections: [
        {
          title: 'Relationships',
          fields: [
            { label: 'Owner', value: d => formatRelated(d.owner_name, d.owner_id) },
            {
              label: 'Organization',
              value: d =>
                formatRelated(d.organization_name, formatPolymorphic(d.organization_type, d.organization_id))
            },
            {
              label: 'Parent',
              value: d => formatRelated(d.parent_name, formatPolymorphic(d.parent_type, d.parent_id))
            },
            { label: 'Project', value: d => formatRelated(d.project_name, d.project_id) },
            {
              label: 'Sales Responsible Person',
              value: d => formatRelated(d.sales_responsible_person_name, d.sales_responsible_person_id)
            },
            {
              label: 'Latest Status Post',
              value: d => formatRelated(d.latest_objective_status_post_summary, d.latest_objective_status_post_id)
            },
            { label: 'Key Results', value: d => formatList(d.key_result_ids) },
            { label: 'Child Objectives', value: d => formatList(d.child_objective_ids) },
            {
              label: 'Objective Stakeholder Classifications',
              value: d => formatList(d.objective_stakeholder_classification_ids)
            }
          ]
        }
      ]
    }
  },

  create: {
    attributes: OBJECTIVE_ATTRIBUTES.map(flag => (flag.flag === 'name' ? { ...flag, required: true } : flag)),
    relationships: OBJECTIVE_RELATIONSHIPS,
    validate: values => validateObjectiveTemplate(values, 'create')
  },

  update: {
    attributes: [
      ...OBJECTIVE_ATTRIBUTES,
      { flag: 'is-abandoned', description: 'Abandoned (true/false)', kind: 'boolean' }
    ],
    relationships: OBJECTIVE_RELATIONSHIPS,
    validate: values => validateObjectiveTemplate(values, 'update')
  },

  delete: true,
  label: d => d.name,
  writeOutput: 'summary'
});
