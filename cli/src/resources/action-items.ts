import {
  IncludedIndex,
  relationshipIDList,
  relationshipRef,
  resolveIncluded,
  resolveRelated,
  stringAttr
} from '../jsonapi/accessors';
import { Resource } from '../jsonapi/document';
import { defineResource } from '../commands/resource-commands';
import { firstNonEmpty, formatDate, formatList, formatPolymorphic, formatRelated } from '../output/format';
import { ORGANIZATION_FIELDS, booleanFilter, resolveOrganization } from './shared';

export interface ActionItemRow {
  id: string;
  status: string;
  kind: string;
  title: string;
  created_by_id: string;
  created_by_name: string;
  responsible_person_id: string;
  responsible_person_name: string;
  responsible_org_id: string;
  responsible_org_type: string;
  responsible_org_name: string;
  project_id: string;
  project_name: string;
  tracker_id: string;
  priority: string;
}

export interface ActionItemDetails extends ActionItemRow {
  description: string;
  due_on: string;
  completed_on: string;
  created_at: string;
  updated_at: string;
  meeting_id: string;
  meeting_name: string;
  root_cause_id: string;
  root_cause_name: string;
  parent_action_item_id: string;
  parent_action_item_title: string;
  child_action_item_ids: string[];
}

export function buildActionItemRow(resource: Resource, included: IncludedIndex): ActionItemRow {
  const attrs = resource.attributes;
  const createdBy = resolveRelated(resource, included, 'created-by', 'name');
  const person = resolveRelated(resource, included, 'responsible-person', 'name');
  const organization = resolveOrganization(resource, included, 'responsible-organization');
  const project = resolveRelated(resource, included, 'project', 'name');
  const trackerRef = relationshipRef(resource.relationships, 'tracker');
  const tracker = resolveIncluded(included, trackerRef);

  return {
    id: resource.id,
    status: stringAttr(attrs, 'status'),
    kind: stringAttr(attrs, 'kind'),
    title: stringAttr(attrs, 'title').trim(),
    created_by_id: createdBy.id,
    created_by_name: createdBy.name,
    responsible_person_id: person.id,
    responsible_person_name: person.name,
    responsible_org_id: organization.id,
    responsible_org_type: organization.type,
    responsible_org_name: organization.name,
    project_id: project.id,
    project_name: project.name,
    tracker_id: trackerRef?.id ?? '',
    priority: stringAttr(tracker?.attributes, 'priority')
  };
}

export function buildActionItemDetails(resource: Resource, included: IncludedIndex): ActionItemDetails {
  const attrs = resource.attributes;
  const meeting = resolveRelated(resource, included, 'meeting', 'name');
  const rootCause = resolveRelated(resource, included, 'root-cause', 'name');
  const parent = resolveRelated(resource, included, 'parent-action-item', 'title');

  return {
    ...buildActionItemRow(resource, included),
    description: stringAttr(attrs, 'description').trim(),
    due_on: formatDate(stringAttr(attrs, 'due-on')),
    completed_on: formatDate(stringAttr(attrs, 'completed-on')),
    created_at: formatDate(stringAttr(attrs, 'created-at')),
    updated_at: formatDate(stringAttr(attrs, 'updated-at')),
    meeting_id: meeting.id,
    meeting_name: meeting.name,
    root_cause_id: rootCause.id,
    root_cause_name: rootCause.name,
    parent_action_item_id: parent.id,
    parent_action_item_title: parent.name,
    child_action_item_ids: relationshipIDList(resource.relationships, 'child-action-items')
  };
}

function responsibleLabel(row: ActionItemRow): string {
  return firstNonEmpty(
    row.responsible_person_name,
    row.responsible_org_name,
    row.responsible_person_id,
    formatPolymorphic(row.responsible_org_type, row.responsible_org_id)
  );
}

export const actionItems = defineResource<ActionItemRow, ActionItemDetails>({
  name: 'action-items',
  type: 'action-items',
  singular: 'action item',
  category: 'projects',
  description: 'Action items and follow-ups',

  list: {
    include: ['created-by', 'responsible-person', 'responsible-organization', 'project', 'tracker'],
    fields: {
      users: ['name'],
      projects: ['name'],
      'action-item-trackers': ['priority'],
      ...ORGANIZATION_FIELDS
    },
    filters: [
      { flag: 'status', description: 'Filter by status (comma-separated for multiple)', kind: 'list' },
      { flag: 'kind', description: 'Filter by kind (comma-separated for multiple)', kind: 'list' },
      { flag: 'project', description: 'Filter by project ID' },
      { flag: 'tracker', description: 'Filter by tracker ID' },
      { flag: 'broker', description: 'Filter by broker ID' },
      { flag: 'q', description: 'Full-text search' },
      { flag: 'due-on', description: 'Filter by due date (YYYY-MM-DD)' },
      { flag: 'due-on-min', description: 'Filter by minimum due date (YYYY-MM-DD)' },
      { flag: 'due-on-max', description: 'Filter by maximum due date (YYYY-MM-DD)' },
      { flag: 'completed-on', description: 'Filter by completion date (YYYY-MM-DD)' },
      booleanFilter('is-completed', 'Filter by completion'),
      { flag: 'responsible-person', description: 'Filter by responsible person user ID' },
      {
        flag: 'responsible-organization',
        description: 'Filter by responsible organization (Type|ID, e.g. Broker|123)',
        kind: 'typed'
      },
      { flag: 'created-by', description: 'Filter by creator user ID' },
      { flag: 'priority', description: 'Filter by tracker priority' },
      booleanFilter('is-deleted', 'Filter by deletion'),
      { flag: 'source', description: 'Filter by source (Type|ID, e.g. Meeting|123)', kind: 'typed' }
    ],
    buildRow: buildActionItemRow,
    columns: [
      { header: 'ID', value: row => row.id },
      { header: 'STATUS', value: row => row.status },
      { header: 'KIND', value: row => row.kind },
      { header: 'TITLE', value: row => row.title, maxWidth: 40 },
      { header: 'RESPONSIBLE', value: responsibleLabel, maxWidth: 25 },
      { header: 'PROJECT', value: row => firstNonEmpty(row.project_name, row.project_id), maxWidth: 25 }
    ]
  },

  show: {
    include: [
      'created-by',
      'responsible-organization',
      'responsible-person',
      'project',
      'tracker',
      'meeting',
      'root-cause',
      'parent-action-item'
    ],
    fields: {
      users: ['name'],
      projects: ['name'],
      'action-item-trackers': ['priority'],
      ...ORGANIZATION_FIELDS
    },
    buildDetails: buildActionItemDetails,
    layout: {
      fields: [
        { label: 'ID', value: d => d.id, always: true },
        { label: 'Title', value: d => d.title },
        { label: 'Status', value: d => d.status },
        { label: 'Kind', value: d => d.kind },
        { label: 'Priority', value: d => d.priority },
        { label: 'Due On', value: d => d.due_on },
        { label: 'Completed On', value: d => d.completed_on },
        { label: 'Created At', value: d => d.created_at },
        { label: 'Updated At', value: d => d.updated_at },
        { label: 'Description', value: d => d.description }
      ],
      sections: [
        {
          title: 'Relationships',
          fields: [
            { label: 'Created By', value: d => formatRelated(d.created_by_name, d.created_by_id) },
            {
              label: 'Responsible Person',
              value: d => formatRelated(d.responsible_person_name, d.responsible_person_id)
            },
            {
              label: 'Responsible Organization',
              value: d =>
                formatRelated(d.responsible_org_name, formatPolymorphic(d.responsible_org_type, d.responsible_org_id))
            },
            { label: 'Project', value: d => formatRelated(d.project_name, d.project_id) },
            { label: 'Tracker', value: d => d.tracker_id },
            { label: 'Meeting', value: d => formatRelated(d.meeting_name, d.meeting_id) },
            { label: 'Root Cause', value: d => formatRelated(d.root_cause_name, d.root_cause_id) },
            {
              label: 'Parent Action Item',
              value: d => formatRelated(d.parent_action_item_title, d.parent_action_item_id)
            },
            { label: 'Child Action Items', value: d => formatList(d.child_action_item_ids) }
          ]
        }
      ]
    }
  }
});
