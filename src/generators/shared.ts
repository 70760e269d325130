/**
 * Model helpers shared by the artifact generators: lookups, TypeScript and
 * zod types for fields, and the endpoint plan every surface agrees on.
 *
 * @module generators/shared
 */

import type { EntityField, EntityModel, EntityRelation, ResolvedModel } from '../contracts/types.js';
import { compareStrings } from '../utils/collections.js';
import { camelCase, kebabCase, pascalCase, singularWords, splitWords } from '../pipeline/naming.js';
import { e, param, t } from './code-model.js';
import type { DocumentValue, Expr, ImportSpec, TypeRef } from './code-model.js';

// =============================================================================
// LOOKUPS
// =============================================================================

export function findEntity(model: ResolvedModel, name: string): EntityModel {
  const entity = model.entities.find((candidate) => candidate.name === name);
  if (!entity) throw new Error(`Internal error: unknown entity ${name}`);
  return entity;
}

export function findField(entity: EntityModel, name: string): EntityField {
  const field = entity.fields.find((candidate) => candidate.name === name);
  if (!field) throw new Error(`Internal error: unknown field ${entity.name}.${name}`);
  return field;
}

export function keyFields(entity: EntityModel): EntityField[] {
  return entity.primaryKey.map((name) => findField(entity, name));
}

/** Forward to-one and many-to-many relations, the ones responses carry */
export function responseRelations(entity: EntityModel): EntityRelation[] {
  return entity.relations.filter((rel) => rel.kind === 'many-to-many' || rel.direction === 'forward');
}

export function manyToManyRelations(entity: EntityModel): EntityRelation[] {
  return entity.relations.filter((rel) => rel.kind === 'many-to-many');
}

// =============================================================================
// IDENTIFIERS
// =============================================================================

/** camelCase variable for an entity: OrderLine → orderLine */
export function entityVar(entity: { name: string }): string {
  return camelCase(splitWords(entity.name));
}

export function keyTypeName(entityName: string): string {
  return `${entityName}Key`;
}

export function metaName(entity: EntityModel): string {
  return `${entityVar(entity)}Meta`;
}

export function createSchemaName(entity: EntityModel): string {
  return `${entityVar(entity)}CreateSchema`;
}

export function updateSchemaName(entity: EntityModel): string {
  return `${entityVar(entity)}UpdateSchema`;
}

export function responseMapperName(entity: EntityModel): string {
  return `to${entity.name}Response`;
}

export function upperFirst(name: string): string {
  return name.charAt(0).toUpperCase() + name.slice(1);
}

// =============================================================================
// TYPES
// =============================================================================

/** TypeScript type of a field value, without nullability */
export function baseFieldType(field: EntityField): TypeRef {
  const element = field.spec.array ? field.spec.tsType.replace(/\[\]$/, '') : field.spec.tsType;
  return field.spec.array ? t.array(t.named(element)) : t.named(element);
}

export function fieldType(field: EntityField): TypeRef {
  const base = baseFieldType(field);
  return field.nullable ? t.nullable(base) : base;
}

/** Key type: the field type for a single-field key, an object for a composite one */
export function keyType(entity: EntityModel): TypeRef {
  const fields = keyFields(entity);
  if (fields.length === 1) return baseFieldType(fields[0]);
  return t.object(fields.map((field) => ({ name: field.name, type: baseFieldType(field) })));
}

const ZOD_BASE: Record<EntityField['spec']['kind'], (field: EntityField) => Expr> = {
  integer: () => e.chain(e.ref('z'), ['number'], ['int']),
  bigint: () => e.chain(e.ref('z'), ['number'], ['int']),
  decimal: () => e.chain(e.ref('z'), ['string'], ['regex', e.regex('^-?\\d+(\\.\\d+)?$')]),
  float: () => e.chain(e.ref('z'), ['number']),
  string: (field) =>
    field.spec.length !== null
      ? e.chain(e.ref('z'), ['string'], ['max', e.lit(field.spec.length)])
      : e.chain(e.ref('z'), ['string']),
  text: () => e.chain(e.ref('z'), ['string']),
  boolean: () => e.chain(e.ref('z'), ['boolean']),
  date: () => e.chain(e.ref('z'), ['string'], ['date']),
  datetime: () => e.chain(e.ref('z'), ['string'], ['datetime', e.props([['offset', e.lit(true)]])]),
  time: () => e.chain(e.ref('z'), ['string'], ['time']),
  interval: () => e.chain(e.ref('z'), ['string']),
  uuid: () => e.chain(e.ref('z'), ['string'], ['uuid']),
  json: () => e.chain(e.ref('z'), ['unknown']),
  binary: () => e.chain(e.ref('z'), ['string'], ['base64']),
  inet: () => e.chain(e.ref('z'), ['string'], ['ip']),
  opaque: () => e.chain(e.ref('z'), ['string']),
};

/** zod schema for one field value, without nullability or optionality */
export function zodBase(field: EntityField): Expr {
  const element = ZOD_BASE[field.spec.kind](field);
  return field.spec.array ? e.call(e.path('z.array'), element) : element;
}

/** zod schema for a writable field in a create payload */
export function zodField(field: EntityField): Expr {
  let schema = zodBase(field);
  const optional = field.nullable || field.spec.default.kind !== 'none';
  // z.unknown() accepts a missing key
  if (!optional && field.spec.kind === 'json' && !field.spec.array) {
    schema = e.chain(schema, ['refine', e.arrow([param('value')], e.binary(e.ref('value'), '!==', e.ref('undefined'))), e.lit('Required')]);
  }
  if (field.nullable) schema = e.chain(schema, ['nullable']);
  if (optional) schema = e.chain(schema, ['optional']);
  return schema;
}

/** Fields a client may send; database-assigned ones are excluded */
export function writableFields(entity: EntityModel): EntityField[] {
  return entity.fields.filter((field) => !field.readOnly);
}

// =============================================================================
// ENDPOINTS
// =============================================================================

export type HttpMethod = 'get' | 'post' | 'patch' | 'delete';

export type EndpointOperation =
  | 'list'
  | 'create'
  | 'retrieve'
  | 'update'
  | 'remove'
  | 'lookup'
  | 'list-members'
  | 'add-member'
  | 'remove-member';

export interface PathParam {
  name: string;
  field: EntityField;
}

export interface Endpoint {
  method: HttpMethod;
  /** Route pattern with `:param` placeholders */
  path: string;
  operation: EndpointOperation;
  /** Property name on the entity's handler object */
  handler: string;
  summary: string;
  /** Path parameters identifying this entity */
  keyParams: PathParam[];
  /** Unique field for lookups */
  lookupField?: EntityField;
  relation?: EntityRelation;
  /** Path or body parameters identifying the member for member endpoints */
  memberParams?: PathParam[];
}

/** Parameter names identifying a member of a many-to-many relation */
export function memberParams(entity: EntityModel, relation: EntityRelation, model: ResolvedModel): PathParam[] {
  const target = findEntity(model, relation.targetEntity);
  const prefix = camelCase(singularWords(splitWords(target.name)));
  const taken = new Set(entity.primaryKey);
  return keyFields(target).map((field) => {
    const name = `${prefix}${pascalCase(splitWords(field.name))}`;
    return { name: taken.has(name) ? `target${upperFirst(name)}` : name, field };
  });
}

export function detailPath(entity: EntityModel): string {
  return [entity.routePath, ...entity.primaryKey.map((name) => `:${name}`)].join('/');
}

/**
 * The endpoints of one entity, in registration order. Lookup routes come
 * before detail routes so a fixed `by-*` segment is never read as a key.
 */
export function endpointsFor(entity: EntityModel, model: ResolvedModel): Endpoint[] {
  const keyParams = keyFields(entity).map((field) => ({ name: field.name, field }));
  const detail = detailPath(entity);
  const endpoints: Endpoint[] = [
    { method: 'get', path: entity.routePath, operation: 'list', handler: 'list', summary: `List ${entity.name} records`, keyParams: [] },
    { method: 'post', path: entity.routePath, operation: 'create', handler: 'create', summary: `Create a ${entity.name}`, keyParams: [] },
  ];

  for (const name of entity.uniqueLookups) {
    const field = findField(entity, name);
    endpoints.push({
      method: 'get',
      path: `${entity.routePath}/by-${kebabCase(splitWords(name))}/:value`,
      operation: 'lookup',
      handler: `retrieveBy${upperFirst(name)}`,
      summary: `Retrieve a ${entity.name} by ${name}`,
      keyParams: [],
      lookupField: field,
    });
  }

  endpoints.push(
    { method: 'get', path: detail, operation: 'retrieve', handler: 'retrieve', summary: `Retrieve a ${entity.name}`, keyParams },
    { method: 'patch', path: detail, operation: 'update', handler: 'update', summary: `Update a ${entity.name}`, keyParams },
    { method: 'delete', path: detail, operation: 'remove', handler: 'remove', summary: `Delete a ${entity.name}`, keyParams }
  );

  for (const relation of manyToManyRelations(entity)) {
    const segment = kebabCase(splitWords(relation.accessor));
    const members = memberParams(entity, relation, model);
    const accessor = upperFirst(relation.accessor);
    const collection = `${detail}/${segment}`;
    endpoints.push(
      {
        method: 'get',
        path: collection,
        operation: 'list-members',
        handler: `list${accessor}`,
        summary: `List the ${relation.targetEntity} records linked to a ${entity.name} through ${relation.accessor}`,
        keyParams,
        relation,
        memberParams: members,
      },
      {
        method: 'post',
        path: collection,
        operation: 'add-member',
        handler: `addTo${accessor}`,
        summary: `Link a ${relation.targetEntity} to a ${entity.name} through ${relation.accessor}`,
        keyParams,
        relation,
        memberParams: members,
      },
      {
        method: 'delete',
        path: [collection, ...members.map((p) => `:${p.name}`)].join('/'),
        operation: 'remove-member',
        handler: `removeFrom${accessor}`,
        summary: `Unlink a ${relation.targetEntity} from a ${entity.name} through ${relation.accessor}`,
        keyParams,
        relation,
        memberParams: members,
      }
    );
  }

  return endpoints;
}

// =============================================================================
// IMPORTS
// =============================================================================

function namedTypes(type: TypeRef, into: Set<string>): void {
  switch (type.kind) {
    case 'named':
      into.add(type.name);
      for (const arg of type.args ?? []) namedTypes(arg, into);
      return;
    case 'array':
      namedTypes(type.element, into);
      return;
    case 'tuple':
      for (const element of type.elements) namedTypes(element, into);
      return;
    case 'union':
      for (const member of type.members) namedTypes(member, into);
      return;
    case 'object':
      for (const member of type.members) namedTypes(member.type, into);
      return;
    case 'keyof':
      namedTypes(type.target, into);
      return;
    case 'intersection':
      for (const member of type.members) namedTypes(member, into);
      return;
    case 'indexed':
      namedTypes(type.object, into);
      return;
    case 'function':
      for (const p of type.params) if (p.type) namedTypes(p.type, into);
      namedTypes(type.returns, into);
      return;
    case 'string-literal':
    case 'typeof':
      return;
  }
}

/**
 * Type-only imports of the entity and key types the given types mention,
 * one import per entity module, in entity name order.
 */
export function entityTypeImports(from: string, types: readonly TypeRef[], model: ResolvedModel, exclude: readonly string[] = []): ImportSpec[] {
  const used = new Set<string>();
  for (const type of types) namedTypes(type, used);
  const imports: ImportSpec[] = [];
  const entities = [...model.entities].sort((a, b) => compareStrings(a.name, b.name));
  for (const entity of entities) {
    const names = [entity.name, keyTypeName(entity.name)].filter((name) => used.has(name) && !exclude.includes(name));
    if (names.length > 0) imports.push({ from: importPath(from, paths.entity(entity)), names, typeOnly: true });
  }
  return imports;
}

// =============================================================================
// MODULE PATHS
// =============================================================================

export const paths = {
  entity: (entity: { fileName: string }): string => `src/entities/${entity.fileName}.ts`,
  entityMeta: 'src/entities/meta.ts',
  entityBarrel: 'src/entities/index.ts',
  transformer: (entity: { fileName: string }): string => `src/transformers/${entity.fileName}.ts`,
  handler: (entity: { fileName: string }): string => `src/handlers/${entity.fileName}.ts`,
  repository: 'src/handlers/repository.ts',
  routes: 'src/routes.ts',
  admin: 'src/admin.ts',
  openapi: 'openapi.yaml',
  test: (entity: { fileName: string }): string => `tests/${entity.fileName}.test.ts`,
};

/** Relative import specifier from one output path to another, with a .js ending */
export function importPath(from: string, to: string): string {
  const fromParts = from.split('/').slice(0, -1);
  const toParts = to.replace(/\.ts$/, '.js').split('/');
  let shared = 0;
  while (shared < fromParts.length && shared < toParts.length - 1 && fromParts[shared] === toParts[shared]) {
    shared++;
  }
  const up = fromParts.length - shared;
  const rest = toParts.slice(shared).join('/');
  return up === 0 ? `./${rest}` : `${'../'.repeat(up)}${rest}`;
}

// =============================================================================
// API SCHEMAS
// =============================================================================

/** OpenAPI schema of a field value, without nullability */
export function apiBaseSchema(field: EntityField): { [key: string]: DocumentValue } {
  const { spec } = field;
  const element: { [key: string]: DocumentValue } = { type: spec.apiType };
  if (spec.apiFormat) element.format = spec.apiFormat;
  if (spec.length !== null && spec.apiType === 'string') element.maxLength = spec.length;
  if (spec.precision !== null) element['x-precision'] = spec.precision;
  if (spec.scale !== null) element['x-scale'] = spec.scale;
  return spec.array ? { type: 'array', items: element } : element;
}

/** OpenAPI schema of the key identifying one entity */
export function apiKeySchema(entity: EntityModel): { [key: string]: DocumentValue } {
  const fields = keyFields(entity);
  if (fields.length === 1) return apiBaseSchema(fields[0]);
  const properties: { [key: string]: DocumentValue } = {};
  for (const field of fields) properties[field.name] = apiBaseSchema(field);
  return { type: 'object', required: fields.map((field) => field.name), properties };
}
