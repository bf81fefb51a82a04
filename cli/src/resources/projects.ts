import { IncludedIndex, boolAttr, resolveRelated, stringAttr } from '../jsonapi/accessors';
import { Resource } from '../jsonapi/document';
import { AttributeFlag, RelationshipFlag, defineResource } from '../commands/resource-commands';
import { formatBool, formatDate, formatDateTime, formatRelated } from '../output/format';
import { booleanFilter } from './shared';

export interface ProjectRow {
  id: string;
  name: string;
  status: string;
  created_at: string;
}

export interface ProjectDetails extends ProjectRow {
  number: string;
  due_on: string;
  start_on: string;
  is_opportunity: boolean;
  is_managed: boolean;
  is_transport_only: boolean;
  developer_id: string;
  developer_name: string;
  project_manager_id: string;
  project_manager_name: string;
  estimator_id: string;
  estimator_name: string;
  project_office_id: string;
  project_office_name: string;
}

export function buildProjectRow(resource: Resource): ProjectRow {
  const attrs = resource.attributes;
  return {
    id: resource.id,
    name: stringAttr(attrs, 'name').trim(),
    status: stringAttr(attrs, 'status'),
    created_at: formatDate(stringAttr(attrs, 'created-at'))
  };
}

export function buildProjectDetails(resource: Resource, included: IncludedIndex): ProjectDetails {
  const attrs = resource.attributes;
  const developer = resolveRelated(resource, included, 'developer', 'name');
  const manager = resolveRelated(resource, included, 'project-manager', 'name');
  const estimator = resolveRelated(resource, included, 'estimator', 'name');
  const office = resolveRelated(resource, included, 'project-office', 'name');

  return {
    ...buildProjectRow(resource),
    created_at: formatDateTime(stringAttr(attrs, 'created-at')),
    number: stringAttr(attrs, 'number'),
    due_on: formatDate(stringAttr(attrs, 'due-on')),
    start_on: formatDate(stringAttr(attrs, 'start-on')),
    is_opportunity: boolAttr(attrs, 'is-opportunity'),
    is_managed: boolAttr(attrs, 'is-managed'),
    is_transport_only: boolAttr(attrs, 'is-transport-only'),
    developer_id: developer.id,
    developer_name: developer.name,
    project_manager_id: manager.id,
    project_manager_name: manager.name,
    estimator_id: estimator.id,
    estimator_name: estimator.name,
    project_office_id: office.id,
    project_office_name: office.name
  };
}

function flag(name: string, description: string): AttributeFlag {
  return { flag: name, description: `${description} (true/false)`, kind: 'boolean' };
}

const PROJECT_ATTRIBUTES: readonly AttributeFlag[] = [
  { flag: 'name', description: 'Project name' },
  { flag: 'number', description: 'Project number' },
  { flag: 'due-on', description: 'Due date (ISO 8601)' },
  { flag: 'start-on', description: 'Start date (ISO 8601)' },
  flag('is-opportunity', 'Mark as opportunity'),
  flag('is-inactive', 'Mark as inactive'),
  flag('is-managed', 'Mark as managed'),
  flag('is-prevailing-wage-explicit', 'Prevailing wage'),
  flag('is-certification-required-explicit', 'Certification required'),
  flag('is-time-card-payroll-certification-required-explicit', 'Time card payroll certification required'),
  flag('is-one-way-job-explicit', 'One-way job'),
  flag('is-transport-only', 'Transport only'),
  flag('enforce-number-uniqueness', 'Enforce number uniqueness')
];

const PROJECT_RELATIONSHIPS: readonly RelationshipFlag[] = [
  { flag: 'project-manager', description: 'Project manager user ID', type: 'users' },
  { flag: 'estimator', description: 'Estimator user ID', type: 'users' },
  { flag: 'project-office', description: 'Project office ID', type: 'project-offices' }
];

export const projects = defineResource<ProjectRow, ProjectDetails>({
  name: 'projects',
  type: 'projects',
  singular: 'project',
  category: 'projects',
  description: 'Construction projects',

  list: {
    fields: { projects: ['name', 'status', 'created-at'] },
    filters: [
      { flag: 'name', description: 'Filter by project name (partial match)' },
      { flag: 'status', description: 'Filter by project status' },
      { flag: 'created-at-min', description: 'Filter by minimum created date (YYYY-MM-DD)', filter: 'created_at_min' },
      { flag: 'created-at-max', description: 'Filter by maximum created date (YYYY-MM-DD)', filter: 'created_at_max' },
      { flag: 'broker', description: 'Filter by broker ID (comma-separated for multiple)', kind: 'list' },
      { flag: 'customer', description: 'Filter by customer ID (comma-separated for multiple)', kind: 'list' },
      {
        flag: 'project-manager',
        description: 'Filter by project manager user ID (comma-separated for multiple)',
        kind: 'list'
      },
      { flag: 'estimator', description: 'Filter by estimator user ID (comma-separated for multiple)', kind: 'list' },
      { flag: 'developer', description: 'Filter by developer ID (comma-separated for multiple)', kind: 'list' },
      {
        flag: 'project-office',
        description: 'Filter by project office ID (comma-separated for multiple)',
        kind: 'list'
      },
      { flag: 'q', description: 'Full-text search' },
      { flag: 'number', description: 'Filter by project number' },
      booleanFilter('is-active', 'Filter by active status'),
      booleanFilter('is-managed', 'Filter by managed status'),
      { flag: 'due-on-min', description: 'Filter by minimum due date (YYYY-MM-DD)' },
      { flag: 'due-on-max', description: 'Filter by maximum due date (YYYY-MM-DD)' }
    ],
    buildRow: buildProjectRow,
    columns: [
      { header: 'ID', value: row => row.id },
      { header: 'NAME', value: row => row.name, maxWidth: 40 },
      { header: 'STATUS', value: row => row.status },
      { header: 'CREATED', value: row => row.created_at }
    ]
  },

  show: {
    include: ['developer', 'project-manager', 'estimator', 'project-office'],
    fields: { developers: ['name'], users: ['name'], 'project-offices': ['name'] },
    buildDetails: buildProjectDetails,
    layout: {
      fields: [
        { label: 'ID', value: d => d.id, always: true },
        { label: 'Name', value: d => d.name },
        { label: 'Number', value: d => d.number },
        { label: 'Status', value: d => d.status },
        { label: 'Start On', value: d => d.start_on },
        { label: 'Due On', value: d => d.due_on },
        { label: 'Opportunity', value: d => formatBool(d.is_opportunity) },
        { label: 'Managed', value: d => formatBool(d.is_managed) },
        { label: 'Transport Only', value: d => formatBool(d.is_transport_only) },
        { label: 'Created At', value: d => d.created_at }
      ],
      sections: [
        {
          title: 'Relationships',
          fields: [
            { label: 'Developer', value: d => formatRelated(d.developer_name, d.developer_id) },
            { label: 'Project Manager', value: d => formatRelated(d.project_manager_name, d.project_manager_id) },
            { label: 'Estimator', value: d => formatRelated(d.estimator_name, d.estimator_id) },
            { label: 'Project Office', value: d => formatRelated(d.project_office_name, d.project_office_id) }
          ]
        }
      ]
    }
  },

  create: {
    attributes: PROJECT_ATTRIBUTES.map(spec => (spec.flag === 'name' ? { ...spec, required: true } : spec)),
    relationships: [
      { flag: 'developer', description: 'Developer ID', type: 'developers', required: true },
      ...PROJECT_RELATIONSHIPS
    ]
  },

  update: {
    attributes: PROJECT_ATTRIBUTES,
    relationships: PROJECT_RELATIONSHIPS
  },

  label: d => d.name,
  writeOutput: 'summary'
});
