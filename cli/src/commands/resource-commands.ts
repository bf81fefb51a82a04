/**
 * Resource command builder.
 *
 * A resource family is described once as a ResourceDefinition (endpoint,
 * filters, writable flags, flatteners and output layout) and turned into
 * `xbe view <name> list|show` and `xbe do <name> create|update|delete`
 * subcommands here. Every command makes exactly one request, apart from
 * updates of resources whose concrete type must be looked up first.
 */

import { Command } from 'commander';
import { CommandContext } from './context';
import { CLI_CONFIG } from '../config/defaults';
import { JsonValue, Resource, decodeCollection, decodeSingle, parseJsonFlag } from '../jsonapi/document';
import { IncludedIndex, indexIncluded } from '../jsonapi/accessors';
import { RelationshipLinkage, buildListQuery, buildResourceBody } from '../jsonapi/query';
import { formatTypedFilter, parseTypedRef } from '../jsonapi/resource-types';
import { DetailLayout, writeDetails } from '../output/detail';
import { formatAnyValue } from '../output/format';
import { writeJSON } from '../output/json';
import { TableColumn, writeTable } from '../output/table';
import { ConnectionFlags, DeleteFlags, ListFlags, OptionValues, ReadFlags } from '../types/cli';
import {
  flagKey,
  optionBoolean,
  optionNumber,
  optionString,
  parseBooleanFlag,
  parseIntegerFlag,
  parseNonNegativeInteger,
  parseNumberFlag,
  splitCommaList
} from '../utils/flags';
import { ValidationError } from '../utils/error-handler';

// ===== Definition types =====

export type ResourceCategory = 'organizations' | 'content' | 'projects' | 'reference';

/** Help sections for `xbe view --help` and `xbe do --help`, in display order. */
export const RESOURCE_CATEGORIES: readonly { category: ResourceCategory; title: string }[] = [
  { category: 'organizations', title: 'Organizations' },
  { category: 'content', title: 'Content & Publishing' },
  { category: 'projects', title: 'Projects & Jobs' },
  { category: 'reference', title: 'Reference Data' }
];

/**
 * How a filter flag value becomes a `filter[...]` query value.
 *   string   trimmed as given
 *   boolean  must be true or false
 *   list     comma-separated, blanks dropped
 *   typed    comma-separated Type|ID references with normalized class names
 */
export type FilterKind = 'string' | 'boolean' | 'list' | 'typed';

export interface FilterFlag {
  flag: string;
  description: string;
  /** Name inside filter[...]; defaults to the flag name. */
  filter?: string;
  kind?: FilterKind;
  /** Ids of this class, sent as "<Class>|<id>". */
  classPrefix?: string;
}

export type AttributeKind = 'string' | 'boolean' | 'integer' | 'number' | 'json';

export interface AttributeFlag {
  flag: string;
  description: string;
  /** Attribute name in the request body; defaults to the flag name. */
  attribute?: string;
  kind?: AttributeKind;
  required?: boolean;
}

export interface RelationshipFlag {
  flag: string;
  description: string;
  /** Relationship name in the request body; defaults to the flag name. */
  relationship?: string;
  /** Target JSON:API type. Without it the flag takes a Type|ID reference. */
  type?: string;
  required?: boolean;
}

/** Flags the user passed, keyed by flag name. */
export type FlagValues = ReadonlyMap<string, string>;

export interface WriteTarget {
  type: string;
  path: string;
}

export interface WriteDefinition {
  attributes?: readonly AttributeFlag[];
  relationships?: readonly RelationshipFlag[];
  /** Cross-flag rules, run before any request is made. */
  validate?: (values: FlagValues) => void;
}

export interface CreateDefinition extends WriteDefinition {
  /** Endpoint and type chosen from the flags, for families with subtypes. */
  target?: (values: FlagValues) => WriteTarget;
}

export interface UpdateDefinition extends WriteDefinition {
  /** Fetch the resource first and write to its concrete type. */
  resolveType?: boolean;
}

export interface ListDefinition<TRow> {
  include?: readonly string[];
  fields?: Readonly<Record<string, readonly string[]>>;
  filters?: readonly FilterFlag[];
  validate?: (values: FlagValues) => void;
  buildRow: (resource: Resource, included: IncludedIndex) => TRow;
  columns: readonly TableColumn<TRow>[];
}

export interface ShowDefinition<TDetail> {
  include?: readonly string[];
  fields?: Readonly<Record<string, readonly string[]>>;
  buildDetails: (resource: Resource, included: IncludedIndex) => TDetail;
  layout: DetailLayout<TDetail>;
}

export interface ResourceDefinition<TRow, TDetail> {
  /** Command name, also used in messages ("No customer memberships found."). */
  name: string;
  /** JSON:API type and endpoint segment. */
  type: string;
  singular: string;
  category: ResourceCategory;
  description: string;
  list: ListDefinition<TRow>;
  show: ShowDefinition<TDetail>;
  create?: CreateDefinition;
  update?: UpdateDefinition;
  delete?: boolean;
  /** Friendly name shown after create and update. */
  label?: (detail: TDetail) => string;
  /** After create/update print the full detail block, or one summary line. */
  writeOutput?: 'details' | 'summary';
}

export interface ResourceCommands {
  name: string;
  category: ResourceCategory;
  description: string;
  hasWriteCommands: boolean;
  registerView(parent: Command, context: CommandContext): void;
  registerDo(parent: Command, context: CommandContext): void;
}

// ===== Common flags =====

function addConnectionOptions(command: Command): Command {
  return command
    .option('--json', 'Output JSON')
    .option('--base-url <url>', 'API base URL')
    .option('--token <token>', 'API token (optional)');
}

function addReadOptions(command: Command): Command {
  return addConnectionOptions(command)
    .option('--no-auth', 'Disable auth token lookup')
    .option('--omit-null', 'Omit null values in JSON output');
}

function addListOptions(command: Command): Command {
  return addReadOptions(command)
    .option('--limit <n>', 'Page size (defaults to server default)', parseNonNegativeInteger)
    .option('--offset <n>', 'Page offset', parseNonNegativeInteger)
    .option('--sort <fields>', 'Sort by field (prefix with - for descending)')
    .option('--fields <list>', 'Sparse fieldset: only show id and these attributes');
}

function connectionFlags(options: OptionValues): ConnectionFlags {
  return {
    baseUrl: optionString(options, 'baseUrl'),
    token: optionString(options, 'token'),
    json: optionBoolean(options, 'json')
  };
}

function readFlags(options: OptionValues): ReadFlags {
  return {
    ...connectionFlags(options),
    auth: optionBoolean(options, 'auth') ?? true,
    omitNull: optionBoolean(options, 'omitNull')
  };
}

function listFlags(options: OptionValues): ListFlags {
  return {
    ...readFlags(options),
    limit: optionNumber(options, 'limit'),
    offset: optionNumber(options, 'offset'),
    sort: optionString(options, 'sort'),
    fields: optionString(options, 'fields')
  };
}

function deleteFlags(options: OptionValues): DeleteFlags {
  return { ...connectionFlags(options), confirm: optionBoolean(options, 'confirm') };
}

function collectFlagValues(options: OptionValues, flags: readonly string[]): Map<string, string> {
  const values = new Map<string, string>();
  for (const flag of flags) {
    const value = optionString(options, flagKey(flag));
    if (value !== undefined) {
      values.set(flag, value);
    }
  }
  return values;
}

function requireId(id: string, singular: string): string {
  const trimmed = id.trim();
  if (trimmed === '') {
    throw new ValidationError(`${singular} id is required`);
  }
  return trimmed;
}

function wantsJson(context: CommandContext, flags: ConnectionFlags): boolean {
  return Boolean(flags.json) || context.config.defaults.output === 'json';
}

function resourcePath(type: string, id?: string): string {
  return id === undefined ? `${CLI_CONFIG.API_PREFIX}/${type}` : `${CLI_CONFIG.API_PREFIX}/${type}/${encodeURIComponent(id)}`;
}

// ===== Filters and request bodies =====

export function buildFilters(filters: readonly FilterFlag[], values: FlagValues): Record<string, string> {
  const result: Record<string, string> = {};
  for (const filter of filters) {
    const raw = values.get(filter.flag);
    if (raw === undefined || raw.trim() === '') {
      continue;
    }
    const name = filter.filter ?? filter.flag;
    const label = `--${filter.flag}`;
    const classPrefix = filter.classPrefix;
    if (classPrefix !== undefined) {
      result[name] = splitCommaList(raw)
        .map(id => `${classPrefix}|${id}`)
        .join(',');
      continue;
    }
    switch (filter.kind ?? 'string') {
      case 'boolean':
        result[name] = String(parseBooleanFlag(raw, label));
        break;
      case 'list':
        result[name] = splitCommaList(raw).join(',');
        break;
      case 'typed':
        result[name] = formatTypedFilter(raw, label);
        break;
      default:
        result[name] = raw.trim();
    }
  }
  return result;
}

function convertAttribute(spec: AttributeFlag, raw: string): JsonValue {
  const label = `--${spec.flag}`;
  switch (spec.kind ?? 'string') {
    case 'boolean':
      return parseBooleanFlag(raw, label);
    case 'integer':
      return parseIntegerFlag(raw, label);
    case 'number':
      return parseNumberFlag(raw, label);
    case 'json':
      return parseJsonFlag(raw, label);
    default:
      return raw;
  }
}

function convertRelationship(spec: RelationshipFlag, raw: string): RelationshipLinkage {
  if (spec.type !== undefined) {
    return { type: spec.type, id: raw.trim() };
  }
  const ref = parseTypedRef(raw, `--${spec.flag}`);
  return { type: ref.type, id: ref.id };
}

function writeFlagNames(definition: WriteDefinition): string[] {
  return [
    ...(definition.attributes ?? []).map(spec => spec.flag),
    ...(definition.relationships ?? []).map(spec => spec.flag)
  ];
}

function checkRequired(definition: WriteDefinition, values: FlagValues): void {
  const specs = [...(definition.attributes ?? []), ...(definition.relationships ?? [])];
  for (const spec of specs) {
    if (spec.required && (values.get(spec.flag) ?? '').trim() === '') {
      throw new ValidationError(`--${spec.flag} is required`);
    }
  }
}

/**
 * Attributes and relationships for a request body.
 *
 * For create, blank flags are left out. For update every flag the user passed
 * is sent, and a blank relationship flag clears the relationship.
 */
export function buildWritePayload(
  definition: WriteDefinition,
  values: FlagValues,
  mode: 'create' | 'update'
): { attributes: Record<string, JsonValue>; relationships: Record<string, RelationshipLinkage> } {
  const attributes: Record<string, JsonValue> = {};
  const relationships: Record<string, RelationshipLinkage> = {};

  for (const spec of definition.attributes ?? []) {
    const raw = values.get(spec.flag);
    if (raw === undefined || (mode === 'create' && raw === '')) {
      continue;
    }
    attributes[spec.attribute ?? spec.flag] = convertAttribute(spec, raw);
  }

  for (const spec of definition.relationships ?? []) {
    const raw = values.get(spec.flag);
    if (raw === undefined) {
      continue;
    }
    const name = spec.relationship ?? spec.flag;
    if (raw.trim() === '') {
      if (mode === 'update') {
        relationships[name] = null;
      }
      continue;
    }
    relationships[name] = convertRelationship(spec, raw);
  }

  return { attributes, relationships };
}

// ===== Sparse fieldsets =====

export interface SparseRow {
  [field: string]: JsonValue;
}

/** One row per resource with the id and each requested attribute (or relationship id). */
export function buildSparseRows(resources: readonly Resource[], fields: readonly string[]): SparseRow[] {
  return resources.map(resource => {
    const row: SparseRow = { id: resource.id };
    for (const field of fields) {
      const attribute = resource.attributes[field];
      if (attribute !== undefined) {
        row[field] = attribute;
        continue;
      }
      const linkage = resource.relationships[field]?.data;
      if (Array.isArray(linkage)) {
        row[field] = linkage.map(ref => ref.id);
      } else {
        row[field] = linkage ? linkage.id : null;
      }
    }
    return row;
  });
}

function writeSparseTable(context: CommandContext, rows: readonly SparseRow[], fields: readonly string[]): void {
  const columns: TableColumn<SparseRow>[] = [
    { header: 'ID', value: row => formatAnyValue(row.id) },
    ...fields.map(field => ({
      header: field.toUpperCase(),
      value: (row: SparseRow) => formatAnyValue(row[field]),
      maxWidth: 40
    }))
  ];
  writeTable(context.stdout, columns, rows);
}

// ===== Commands =====

export function defineResource<TRow, TDetail>(definition: ResourceDefinition<TRow, TDetail>): ResourceCommands {
  const plural = definition.name.replace(/-/g, ' ');

  async function runList(context: CommandContext, options: OptionValues): Promise<void> {
    const flags = listFlags(options);
    const token = context.readToken(flags);

    const filterSpecs = definition.list.filters ?? [];
    const values = collectFlagValues(
      options,
      filterSpecs.map(filter => filter.flag)
    );
    definition.list.validate?.(values);
    const filters = buildFilters(filterSpecs, values);

    const sparseFields = flags.fields ? splitCommaList(flags.fields) : [];
    const query =
      sparseFields.length > 0
        ? buildListQuery({
            fields: { [definition.type]: sparseFields },
            sort: flags.sort,
            limit: flags.limit,
            offset: flags.offset,
            filters
          })
        : buildListQuery({
            include: definition.list.include,
            fields: definition.list.fields,
            sort: flags.sort,
            limit: flags.limit,
            offset: flags.offset,
            filters
          });

    const client = context.createClient(flags, token);
    const response = await client.get(resourcePath(definition.type), query);
    const document = decodeCollection(response.body);

    if (sparseFields.length > 0) {
      const rows = buildSparseRows(document.data, sparseFields);
      if (wantsJson(context, flags)) {
        writeJSON(context.stdout, rows, { omitNull: flags.omitNull });
      } else if (rows.length === 0) {
        context.stdout.write(`No ${plural} found.\n`);
      } else {
        writeSparseTable(context, rows, sparseFields);
      }
      return;
    }

    const included = indexIncluded(document.included);
    const rows = document.data.map(resource => definition.list.buildRow(resource, included));
    if (wantsJson(context, flags)) {
      writeJSON(context.stdout, rows, { omitNull: flags.omitNull });
      return;
    }
    if (rows.length === 0) {
      context.stdout.write(`No ${plural} found.\n`);
      return;
    }
    writeTable(context.stdout, definition.list.columns, rows);
  }

  async function runShow(context: CommandContext, rawId: string, options: OptionValues): Promise<void> {
    const flags = readFlags(options);
    const token = context.readToken(flags);
    const id = requireId(rawId, definition.singular);

    const query = buildListQuery({ include: definition.show.include, fields: definition.show.fields });
    const client = context.createClient(flags, token);
    const response = await client.get(resourcePath(definition.type, id), query);
    const document = decodeSingle(response.body);
    const details = definition.show.buildDetails(document.data, indexIncluded(document.included));

    if (wantsJson(context, flags)) {
      writeJSON(context.stdout, details, { omitNull: flags.omitNull });
      return;
    }
    writeDetails(context.stdout, definition.show.layout, details);
  }

  function writeResult(context: CommandContext, flags: ConnectionFlags, verb: string, body: string): void {
    const document = decodeSingle(body);
    const details = definition.show.buildDetails(document.data, indexIncluded(document.included));
    if (wantsJson(context, flags)) {
      writeJSON(context.stdout, details);
      return;
    }
    const headline = `${verb} ${definition.singular} ${document.data.id}`;
    if ((definition.writeOutput ?? 'details') === 'summary') {
      const label = definition.label?.(details) ?? '';
      context.stdout.write(label !== '' ? `${headline} (${label})\n` : `${headline}\n`);
      return;
    }
    context.stdout.write(`${headline}\n\n`);
    writeDetails(context.stdout, definition.show.layout, details);
  }

  async function runCreate(context: CommandContext, spec: CreateDefinition, options: OptionValues): Promise<void> {
    const flags = connectionFlags(options);
    const token = context.writeToken(flags);

    const values = collectFlagValues(options, writeFlagNames(spec));
    checkRequired(spec, values);
    spec.validate?.(values);
    const { attributes, relationships } = buildWritePayload(spec, values, 'create');

    const target = spec.target?.(values) ?? { type: definition.type, path: resourcePath(definition.type) };
    const body = buildResourceBody({ type: target.type, attributes, relationships });

    const client = context.createClient(flags, token);
    const response = await client.post(target.path, body);
    writeResult(context, flags, 'Created', response.body);
  }

  async function runUpdate(
    context: CommandContext,
    spec: UpdateDefinition,
    rawId: string,
    options: OptionValues
  ): Promise<void> {
    const flags = connectionFlags(options);
    const token = context.writeToken(flags);
    const id = requireId(rawId, definition.singular);

    const values = collectFlagValues(options, writeFlagNames(spec));
    if (values.size === 0) {
      throw new ValidationError('at least one field to update is required');
    }
    spec.validate?.(values);
    const { attributes, relationships } = buildWritePayload(spec, values, 'update');

    const client = context.createClient(flags, token);
    let type = definition.type;
    if (spec.resolveType) {
      const existing = await client.get(resourcePath(definition.type, id));
      type = decodeSingle(existing.body).data.type;
      context.logger.debug(`Resolved ${definition.singular} ${id} to type ${type}`);
    }

    const body = buildResourceBody({ type, id, attributes, relationships });
    const response = await client.patch(resourcePath(type, id), body);
    writeResult(context, flags, 'Updated', response.body);
  }

  async function runDelete(context: CommandContext, rawId: string, options: OptionValues): Promise<void> {
    const flags = deleteFlags(options);
    const token = context.writeToken(flags);
    const id = requireId(rawId, definition.singular);
    if (!flags.confirm) {
      throw new ValidationError(`--confirm is required to delete ${definition.singular} ${id}`);
    }

    const client = context.createClient(flags, token);
    await client.delete(resourcePath(definition.type, id));

    if (wantsJson(context, flags)) {
      writeJSON(context.stdout, { id, deleted: true });
      return;
    }
    context.stdout.write(`Deleted ${definition.singular} ${id}\n`);
  }

  function addFilterOptions(command: Command): void {
    for (const filter of definition.list.filters ?? []) {
      command.option(`--${filter.flag} <value>`, filter.description);
    }
  }

  function addWriteOptions(command: Command, spec: WriteDefinition, mode: 'create' | 'update'): void {
    const specs = [...(spec.attributes ?? []), ...(spec.relationships ?? [])];
    for (const flag of specs) {
      const suffix = mode === 'create' && flag.required ? ' (required)' : '';
      command.option(`--${flag.flag} <value>`, `${flag.description}${suffix}`);
    }
  }

  return {
    name: definition.name,
    category: definition.category,
    description: definition.description,
    hasWriteCommands: Boolean(definition.create || definition.update || definition.delete),

    registerView(parent: Command, context: CommandContext): void {
      const group = parent.command(definition.name).description(`Browse ${plural}`);

      const list = addListOptions(group.command('list').description(`List ${plural}`));
      addFilterOptions(list);
      list.action(async (options: OptionValues) => runList(context, options));

      addReadOptions(group.command('show').description(`Show ${definition.singular} details`))
        .argument('<id>', `${definition.singular} id`)
        .action(async (id: string, options: OptionValues) => runShow(context, id, options));
    },

    registerDo(parent: Command, context: CommandContext): void {
      const { create, update } = definition;
      if (!create && !update && !definition.delete) {
        return;
      }
      const group = parent.command(definition.name).description(`Create, update or delete ${plural}`);

      if (create) {
        const command = addConnectionOptions(group.command('create').description(`Create a ${definition.singular}`));
        addWriteOptions(command, create, 'create');
        command.action(async (options: OptionValues) => runCreate(context, create, options));
      }

      if (update) {
        const command = addConnectionOptions(
          group.command('update').description(`Update a ${definition.singular}`).argument('<id>', `${definition.singular} id`)
        );
        addWriteOptions(command, update, 'update');
        command.action(async (id: string, options: OptionValues) => runUpdate(context, update, id, options));
      }

      if (definition.delete) {
        addConnectionOptions(group.command('delete').description(`Delete a ${definition.singular}`))
          .argument('<id>', `${definition.singular} id`)
          .option('--confirm', 'Confirm deletion')
          .action(async (id: string, options: OptionValues) => runDelete(context, id, options));
      }
    }
  };
}
