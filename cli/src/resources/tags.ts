import { IncludedIndex, resolveRelated, stringAttr } from '../jsonapi/accessors';
import { Resource } from '../jsonapi/document';
import { defineResource } from '../commands/resource-commands';
import { formatDateTime, formatRelated } from '../output/format';

export interface TagRow {
  id: string;
  name: string;
  description: string;
  tag_category_id: string;
  tag_category_name: string;
}

export interface TagDetails extends TagRow {
  created_at: string;
  updated_at: string;
}

export function buildTagRow(resource: Resource, included: IncludedIndex): TagRow {
  const category = resolveRelated(resource, included, 'tag-category', 'name');
  return {
    id: resource.id,
    name: stringAttr(resource.attributes, 'name'),
    description: stringAttr(resource.attributes, 'description'),
    tag_category_id: category.id,
    tag_category_name: category.name
  };
}

export function buildTagDetails(resource: Resource, included: IncludedIndex): TagDetails {
  return {
    ...buildTagRow(resource, included),
    created_at: formatDateTime(stringAttr(resource.attributes, 'created-at')),
    updated_at: formatDateTime(stringAttr(resource.attributes, 'updated-at'))
  };
}

const tagAttributes = [
  { flag: 'name', description: 'Tag name' },
  { flag: 'description', description: 'Description' }
];

export const tags = defineResource<TagRow, TagDetails>({
  name: 'tags',
  type: 'tags',
  singular: 'tag',
  category: 'reference',
  description: 'Tags used to label records',

  list: {
    include: ['tag-category'],
    fields: { 'tag-categories': ['name'] },
    filters: [
      { flag: 'name', description: 'Filter by name' },
      { flag: 'tag-category', description: 'Filter by tag category ID (comma-separated for multiple)', kind: 'list' },
      { flag: 'q', description: 'Full-text search' }
    ],
    buildRow: buildTagRow,
    columns: [
      { header: 'ID', value: row => row.id },
      { header: 'NAME', value: row => row.name, maxWidth: 30 },
      { header: 'CATEGORY', value: row => row.tag_category_name, maxWidth: 25 },
      { header: 'DESCRIPTION', value: row => row.description, maxWidth: 50 }
    ]
  },

  show: {
    include: ['tag-category'],
    fields: { 'tag-categories': ['name'] },
    buildDetails: buildTagDetails,
    layout: {
      fields: [
        { label: 'ID', value: d => d.id, always: true },
        { label: 'Name', value: d => d.name },
        { label: 'Description', value: d => d.description },
        { label: 'Category', value: d => formatRelated(d.tag_category_name, d.tag_category_id) },
        { label: 'Created At', value: d => d.created_at },
        { label: 'Updated At', value: d => d.updated_at }
      ]
    }
  },

  create: {
    attributes: tagAttributes.map(flag => (flag.flag === 'name' ? { ...flag, required: true } : flag)),
    relationships: [{ flag: 'tag-category', description: 'Tag category ID', type: 'tag-categories' }]
  },
  update: {
    attributes: tagAttributes,
    relationships: [{ flag: 'tag-category', description: 'Tag category ID', type: 'tag-categories' }]
  },
  delete: true,
  label: d => d.name,
  writeOutput: 'summary'
});
