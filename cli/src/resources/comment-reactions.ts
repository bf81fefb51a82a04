import { IncludedIndex, boolAttr, relationshipRef, resolveIncluded, stringAttr } from '../jsonapi/accessors';
import { Resource } from '../jsonapi/document';
import { defineResource } from '../commands/resource-commands';
import { truncateString } from '../output/table';
import { firstNonEmpty, formatBool, formatDateTime, formatRelated } from '../output/format';
import { booleanFilter } from './shared';

export interface CommentReactionRow {
  id: string;
  comment_id: string;
  comment_body: string;
  comment_is_admin_only: boolean;
  reaction_classification_id: string;
  reaction_label: string;
  reaction_utf8: string;
  reaction_external_reference: string;
  created_by_id: string;
  created_by_name: string;
  created_by_email: string;
  created_at: string;
  updated_at: string;
}

export function buildCommentReactionRow(resource: Resource, included: IncludedIndex): CommentReactionRow {
  const commentRef = relationshipRef(resource.relationships, 'comment');
  const comment = resolveIncluded(included, commentRef);
  const reactionRef = relationshipRef(resource.relationships, 'reaction-classification');
  const reaction = resolveIncluded(included, reactionRef);
  const creatorRef = relationshipRef(resource.relationships, 'created-by');
  const creator = resolveIncluded(included, creatorRef);

  return {
    id: resource.id,
    comment_id: commentRef?.id ?? '',
    comment_body: stringAttr(comment?.attributes, 'body').trim(),
    comment_is_admin_only: boolAttr(comment?.attributes, 'is-admin-only'),
    reaction_classification_id: reactionRef?.id ?? '',
    reaction_label: stringAttr(reaction?.attributes, 'label'),
    reaction_utf8: stringAttr(reaction?.attributes, 'utf8'),
    reaction_external_reference: stringAttr(reaction?.attributes, 'external-reference'),
    created_by_id: creatorRef?.id ?? '',
    created_by_name: stringAttr(creator?.attributes, 'name').trim(),
    created_by_email: stringAttr(creator?.attributes, 'email-address'),
    created_at: formatDateTime(stringAttr(resource.attributes, 'created-at')),
    updated_at: formatDateTime(stringAttr(resource.attributes, 'updated-at'))
  };
}

function reactionLabel(row: CommentReactionRow): string {
  return [row.reaction_utf8, row.reaction_label].filter(part => part !== '').join(' ') || row.reaction_classification_id;
}

const INCLUDE = ['comment', 'created-by', 'reaction-classification'];

const FIELDS: Readonly<Record<string, readonly string[]>> = {
  'comment-reactions': ['comment', 'created-by', 'reaction-classification', 'created-at', 'updated-at'],
  comments: ['body', 'is-admin-only'],
  users: ['name', 'email-address'],
  'reaction-classifications': ['label', 'utf8', 'external-reference']
};

export const commentReactions = defineResource<CommentReactionRow, CommentReactionRow>({
  name: 'comment-reactions',
  type: 'comment-reactions',
  singular: 'comment reaction',
  category: 'content',
  description: 'Reactions left on comments',

  list: {
    include: INCLUDE,
    fields: FIELDS,
    filters: [
      { flag: 'created-at-min', description: 'Filter by minimum created time (ISO 8601)' },
      { flag: 'created-at-max', description: 'Filter by maximum created time (ISO 8601)' },
      booleanFilter('is-created-at', 'Filter by presence of created time'),
      { flag: 'updated-at-min', description: 'Filter by minimum updated time (ISO 8601)' },
      { flag: 'updated-at-max', description: 'Filter by maximum updated time (ISO 8601)' },
      booleanFilter('is-updated-at', 'Filter by presence of updated time'),
      { flag: 'not-id', description: 'Exclude IDs (comma-separated)', kind: 'list' }
    ],
    buildRow: buildCommentReactionRow,
    columns: [
      { header: 'ID', value: row => row.id },
      { header: 'COMMENT', value: row => firstNonEmpty(truncateString(row.comment_body, 40), row.comment_id) },
      { header: 'REACTION', value: reactionLabel, maxWidth: 24 },
      {
        header: 'CREATED BY',
        value: row => firstNonEmpty(row.created_by_name, row.created_by_email, row.created_by_id),
        maxWidth: 24
      },
      { header: 'CREATED', value: row => row.created_at }
    ]
  },

  show: {
    include: INCLUDE,
    fields: FIELDS,
    buildDetails: buildCommentReactionRow,
    layout: {
      fields: [
        { label: 'ID', value: d => d.id, always: true },
        { label: 'Created At', value: d => d.created_at },
        { label: 'Updated At', value: d => d.updated_at }
      ],
      sections: [
        {
          title: 'Comment',
          fields: [
            { label: 'ID', value: d => d.comment_id },
            { label: 'Body', value: d => d.comment_body },
            { label: 'Admin Only', value: d => (d.comment_id === '' ? '' : formatBool(d.comment_is_admin_only)) }
          ]
        },
        {
          title: 'Reaction',
          fields: [
            { label: 'Classification', value: d => formatRelated(d.reaction_label, d.reaction_classification_id) },
            { label: 'Emoji', value: d => d.reaction_utf8 },
            { label: 'External Reference', value: d => d.reaction_external_reference }
          ]
        },
        {
          title: 'Created By',
          fields: [
            { label: 'User', value: d => formatRelated(d.created_by_name, d.created_by_id) },
            { label: 'Email', value: d => d.created_by_email }
          ]
        }
      ]
    }
  },

  create: {
    relationships: [
      { flag: 'comment', description: 'Comment ID', type: 'comments', required: true },
      {
        flag: 'reaction-classification',
        description: 'Reaction classification ID',
        type: 'reaction-classifications',
        required: true
      }
    ]
  },
  delete: true,
  label: d => d.reaction_label,
  writeOutput: 'summary'
});
