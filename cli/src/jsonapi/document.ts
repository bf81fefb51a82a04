/**
 * JSON:API document model and decoder.
 *
 * The decoder checks only the envelope: `data` must be present, resources must
 * carry a `type`, and relationship linkage must be null, an identifier or a
 * list of identifiers. Attribute values are kept as untyped JSON so that any
 * resource type the server adds decodes without changes here.
 */

import { z } from 'zod';
import { DecodeError, ValidationError, errorMessage, parseJsonWithContext } from '../utils/error-handler';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type Attributes = Record<string, JsonValue>;

export interface ResourceIdentifier {
  type: string;
  id: string;
}

export interface Relationship {
  data?: ResourceIdentifier | ResourceIdentifier[] | null;
}

export type Relationships = Record<string, Relationship>;

export interface Resource {
  type: string;
  id: string;
  attributes: Attributes;
  relationships: Relationships;
}

export interface Document<TData extends Resource | Resource[] | null = Resource | Resource[] | null> {
  data: TData;
  included: Resource[];
  meta?: Attributes;
}

export type SingleDocument = Document<Resource>;
export type CollectionDocument = Document<Resource[]>;

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

// Some endpoints serialize ids as numbers
const idSchema = z.union([z.string(), z.number()]).transform(String);

const identifierSchema = z.object({
  type: z.string(),
  id: idSchema
});

const relationshipSchema = z.object({
  data: z.union([identifierSchema, z.array(identifierSchema), z.null()]).optional()
});

const resourceSchema = z.object({
  type: z.string(),
  id: idSchema.optional().transform(id => id ?? ''),
  attributes: z.record(jsonValueSchema).nullish().transform(attrs => attrs ?? {}),
  relationships: z.record(relationshipSchema).nullish().transform(rels => rels ?? {})
});

const documentSchema = z.object({
  data: z.union([resourceSchema, z.array(resourceSchema), z.null()]),
  included: z.array(resourceSchema).nullish().transform(included => included ?? []),
  meta: z.record(jsonValueSchema).optional()
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/** JSON given on the command line, such as `--reference-data '{"a":1}'`. */
export function parseJsonFlag(raw: string, flag: string): JsonValue {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`${flag} must be valid JSON: ${errorMessage(error)}`);
  }
  const result = jsonValueSchema.safeParse(parsed);
  if (!result.success) {
    throw new ValidationError(`${flag} must be valid JSON: ${formatIssues(result.error)}`);
  }
  return result.data;
}

function bodyToString(body: string | Uint8Array): string {
  return typeof body === 'string' ? body : Buffer.from(body).toString('utf8');
}

/**
 * Decode a response body into a Document. Throws DecodeError when the body is
 * not JSON or has no `data` member.
 */
export function decodeDocument(body: string | Uint8Array): Document {
  const parsed = parseJsonWithContext(bodyToString(body), 'response is not valid JSON');
  const result = documentSchema.safeParse(parsed);
  if (!result.success) {
    throw new DecodeError(`invalid JSON:API document: ${formatIssues(result.error)}`);
  }
  const { data, included, meta } = result.data;
  const document: Document = { data, included };
  if (meta !== undefined) {
    document.meta = meta;
  }
  return document;
}

/** Decode a document whose primary data is a single resource. */
export function decodeSingle(body: string | Uint8Array): SingleDocument {
  const { data, included, meta } = decodeDocument(body);
  if (data === null || Array.isArray(data)) {
    throw new DecodeError('invalid JSON:API document: expected a single resource in data');
  }
  return { data, included, meta };
}

/** Decode a document whose primary data is a list of resources. */
export function decodeCollection(body: string | Uint8Array): CollectionDocument {
  const { data, included, meta } = decodeDocument(body);
  if (!Array.isArray(data)) {
    throw new DecodeError('invalid JSON:API document: expected a list of resources in data');
  }
  return { data, included, meta };
}
