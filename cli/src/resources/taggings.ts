import { IncludedIndex, resolveRelated, stringAttr } from '../jsonapi/accessors';
import { Resource } from '../jsonapi/document';
import { defineResource } from '../commands/resource-commands';
import { firstNonEmpty, formatDateTime, formatPolymorphic, formatRelated } from '../output/format';

export interface TaggingRow {
  id: string;
  tag_id: string;
  tag_name: string;
  taggable_type: string;
  taggable_id: string;
  created_at: string;
}

export interface TaggingDetails extends TaggingRow {
  taggable_name: string;
  updated_at: string;
}

export function buildTaggingRow(resource: Resource, included: IncludedIndex): TaggingRow {
  const tag = resolveRelated(resource, included, 'tag', 'name');
  const taggable = resolveRelated(resource, included, 'taggable');
  return {
    id: resource.id,
    tag_id: tag.id,
    tag_name: tag.name,
    taggable_type: taggable.type,
    taggable_id: taggable.id,
    created_at: formatDateTime(stringAttr(resource.attributes, 'created-at'))
  };
}

export function buildTaggingDetails(resource: Resource, included: IncludedIndex): TaggingDetails {
  const taggable = resolveRelated(resource, included, 'taggable', 'name', 'company-name', 'title');
  return {
    ...buildTaggingRow(resource, included),
    taggable_name: taggable.name,
    updated_at: formatDateTime(stringAttr(resource.attributes, 'updated-at'))
  };
}

export const taggings = defineResource<TaggingRow, TaggingDetails>({
  name: 'taggings',
  type: 'taggings',
  singular: 'tagging',
  category: 'content',
  description: 'Tags applied to records',

  list: {
    include: ['tag'],
    fields: { tags: ['name'] },
    filters: [
      { flag: 'tag', description: 'Filter by tag ID (comma-separated for multiple)', kind: 'list' },
      { flag: 'taggable', description: 'Filter by tagged record (Type|ID, e.g. Project|123)', kind: 'typed' },
      { flag: 'taggable-type', description: 'Filter by tagged record type', filter: 'taggable_type' }
    ],
    buildRow: buildTaggingRow,
    columns: [
      { header: 'ID', value: row => row.id },
      { header: 'TAG', value: row => firstNonEmpty(row.tag_name, row.tag_id), maxWidth: 30 },
      { header: 'TAGGABLE', value: row => formatPolymorphic(row.taggable_type, row.taggable_id), maxWidth: 40 },
      { header: 'CREATED', value: row => row.created_at }
    ]
  },

  show: {
    include: ['tag', 'taggable'],
    buildDetails: buildTaggingDetails,
    layout: {
      fields: [
        { label: 'ID', value: d => d.id, always: true },
        { label: 'Tag', value: d => formatRelated(d.tag_name, d.tag_id) },
        {
          label: 'Taggable',
          value: d => formatRelated(d.taggable_name, formatPolymorphic(d.taggable_type, d.taggable_id))
        },
        { label: 'Created At', value: d => d.created_at },
        { label: 'Updated At', value: d => d.updated_at }
      ]
    }
  },

  create: {
    relationships: [
      { flag: 'tag', description: 'Tag ID', type: 'tags', required: true },
      { flag: 'taggable', description: 'Record to tag (Type|ID, e.g. Project|123)', required: true }
    ]
  },
  delete: true,
  label: d => d.tag_name,
  writeOutput: 'summary'
});
