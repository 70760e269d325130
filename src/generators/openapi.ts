/**
 * API Description Emitter
 *
 * Builds one OpenAPI 3.0.3 document from the resolved model. Every field
 * carries its type, format, nullability and length/precision/scale; every
 * relationship is listed under `x-relationships`.
 *
 * @module generators/openapi
 */

import type { EntityModel, EntityRelation, ResolvedModel } from '../contracts/types.js';
import type { DocumentValue, OutputUnit } from './code-model.js';
import { relationStyleStrategy } from './relation-styles.js';
import type { RelationStyleStrategy } from './relation-styles.js';
import { apiBaseSchema, endpointsFor, entityVar, paths, responseRelations, upperFirst, writableFields } from './shared.js';
import type { Endpoint, PathParam } from './shared.js';
import type { ArtifactGenerator, GeneratorContext } from './types.js';

type Json = { [key: string]: DocumentValue };

export const OPENAPI_VERSION = '3.0.3';

const ref = (name: string): Json => ({ $ref: `#/components/schemas/${name}` });
const jsonContent = (schema: Json): Json => ({ 'application/json': { schema } });

/** `/posts/:id/tags` → `/posts/{id}/tags` */
export function toOpenApiPath(path: string): string {
  return path.replace(/:([A-Za-z_$][A-Za-z0-9_$]*)/g, '{$1}');
}

// =============================================================================
// SCHEMAS
// =============================================================================

function relationshipExtension(relation: EntityRelation, model: ResolvedModel): Json {
  const info = model.relationships.find((rel) => rel.id === relation.relationshipId);
  const extension: Json = {
    name: relation.accessor,
    kind: relation.kind,
    direction: relation.direction,
    cardinality: relation.cardinality,
    target: relation.targetEntity,
    targetTable: relation.targetTable,
    owningColumns: info ? [...info.owningColumns] : [],
    nullable: relation.nullable,
    deferred: relation.deferred,
  };
  if (relation.junction) {
    extension.junction = {
      table: relation.junction.table,
      localColumns: [...relation.junction.localColumns],
      remoteColumns: [...relation.junction.remoteColumns],
    };
  }
  return extension;
}

function entitySchema(entity: EntityModel, model: ResolvedModel, strategy: RelationStyleStrategy): Json {
  const properties: Json = {};
  for (const field of entity.fields) {
    const schema: Json = { ...apiBaseSchema(field), description: `Column ${field.column} (${field.spec.nativeType})` };
    if (field.nullable) schema.nullable = true;
    if (field.readOnly) schema.readOnly = true;
    if (field.spec.default.kind === 'constant') schema.default = field.spec.default.value;
    if (field.spec.default.kind === 'server') schema['x-server-default'] = true;
    properties[field.name] = schema;
  }
  const relations = responseRelations(entity);
  for (const relation of relations) {
    properties[relation.accessor] = strategy.apiSchema(relation, model);
  }
  return {
    type: 'object',
    required: [...entity.fields.map((field) => field.name), ...relations.map((relation) => relation.accessor)],
    properties,
    'x-table': entity.table,
    'x-primary-key': [...entity.primaryKey],
    'x-relationships': entity.relations.map((relation) => relationshipExtension(relation, model)),
  };
}

function writeSchema(entity: EntityModel, partial: boolean): Json {
  const properties: Json = {};
  const required: string[] = [];
  for (const field of writableFields(entity)) {
    const schema: Json = field.nullable ? { ...apiBaseSchema(field), nullable: true } : apiBaseSchema(field);
    if (!partial && field.spec.default.kind === 'constant') schema.default = field.spec.default.value;
    properties[field.name] = schema;
    if (!field.nullable && field.spec.default.kind === 'none') required.push(field.name);
  }
  const schema: Json = { type: 'object', properties };
  if (!partial && required.length > 0) schema.required = required;
  return schema;
}

function pageSchema(entity: EntityModel): Json {
  return {
    type: 'object',
    required: ['items', 'total', 'page', 'pageSize'],
    properties: {
      items: { type: 'array', items: ref(entity.name) },
      total: { type: 'integer' },
      page: { type: 'integer' },
      pageSize: { type: 'integer' },
    },
  };
}

const ERROR_SCHEMAS: Json = {
  Error: {
    type: 'object',
    required: ['error', 'message'],
    properties: { error: { type: 'string' }, message: { type: 'string' } },
  },
  ValidationError: {
    type: 'object',
    required: ['error', 'issues'],
    properties: {
      error: { type: 'string' },
      issues: {
        type: 'array',
        items: {
          type: 'object',
          required: ['path', 'message'],
          properties: { path: { type: 'string' }, message: { type: 'string' } },
        },
      },
    },
  },
};

// =============================================================================
// OPERATIONS
// =============================================================================

function pathParameter(p: PathParam): Json {
  return { name: p.name, in: 'path', required: true, schema: apiBaseSchema(p.field) };
}

const PAGINATION_PARAMETERS: DocumentValue[] = [
  { name: 'page', in: 'query', required: false, schema: { type: 'integer', minimum: 1, default: 1 } },
  { name: 'page_size', in: 'query', required: false, schema: { type: 'integer', minimum: 1, maximum: 500, default: 50 } },
];

const NOT_FOUND: Json = { description: 'Not found', content: jsonContent(ref('Error')) };
const INVALID: Json = { description: 'Invalid request body', content: jsonContent(ref('ValidationError')) };

function operation(entity: EntityModel, endpoint: Endpoint): Json {
  const op: Json = {
    operationId: `${entityVar(entity)}${upperFirst(endpoint.handler)}`,
    tags: [entity.name],
    summary: endpoint.summary,
  };
  const parameters: DocumentValue[] = endpoint.keyParams.map(pathParameter);
  const ok = (schema: Json): Json => ({ description: 'OK', content: jsonContent(schema) });

  switch (endpoint.operation) {
    case 'list':
      parameters.push(...PAGINATION_PARAMETERS);
      op.responses = { '200': ok(ref(`${entity.name}Page`)) };
      break;
    case 'create':
      op.requestBody = { required: true, content: jsonContent(ref(`${entity.name}Create`)) };
      op.responses = { '201': { description: 'Created', content: jsonContent(ref(entity.name)) }, '400': INVALID };
      break;
    case 'retrieve':
      op.responses = { '200': ok(ref(entity.name)), '404': NOT_FOUND };
      break;
    case 'update':
      op.requestBody = { required: true, content: jsonContent(ref(`${entity.name}Update`)) };
      op.responses = { '200': ok(ref(entity.name)), '400': INVALID, '404': NOT_FOUND };
      break;
    case 'remove':
      op.responses = { '204': { description: 'Deleted' }, '404': NOT_FOUND };
      break;
    case 'lookup':
      if (endpoint.lookupField) {
        parameters.push({ name: 'value', in: 'path', required: true, schema: apiBaseSchema(endpoint.lookupField) });
      }
      op.responses = { '200': ok(ref(entity.name)), '404': NOT_FOUND };
      break;
    case 'list-members':
      op.responses = {
        '200': ok({ type: 'array', items: ref(endpoint.relation?.targetEntity ?? entity.name) }),
        '404': NOT_FOUND,
      };
      break;
    case 'add-member': {
      const members = endpoint.memberParams ?? [];
      const properties: Json = {};
      for (const p of members) properties[p.name] = apiBaseSchema(p.field);
      op.requestBody = {
        required: true,
        content: jsonContent({ type: 'object', required: members.map((p) => p.name), properties }),
      };
      op.responses = { '204': { description: 'Linked' }, '400': INVALID, '404': NOT_FOUND };
      break;
    }
    case 'remove-member':
      parameters.push(...(endpoint.memberParams ?? []).map(pathParameter));
      op.responses = { '204': { description: 'Unlinked' }, '404': NOT_FOUND };
      break;
  }

  if (parameters.length > 0) op.parameters = parameters;
  return op;
}

// =============================================================================
// DOCUMENT
// =============================================================================

export function buildOpenApiDocument(context: GeneratorContext): Json {
  const { model, api } = context;
  const strategy = relationStyleStrategy(context.relationStyle);

  const info: Json = { title: api.title, version: api.version };
  if (api.description) info.description = api.description;

  const pathItems: Json = {};
  const schemas: Json = {};
  for (const entity of model.entities) {
    for (const endpoint of endpointsFor(entity, model)) {
      const key = toOpenApiPath(endpoint.path);
      const item = pathItems[key];
      const operations: Json = item !== null && typeof item === 'object' && !Array.isArray(item) ? item : {};
      operations[endpoint.method] = operation(entity, endpoint);
      pathItems[key] = operations;
    }
    schemas[entity.name] = entitySchema(entity, model, strategy);
    schemas[`${entity.name}Create`] = writeSchema(entity, false);
    schemas[`${entity.name}Update`] = writeSchema(entity, true);
    schemas[`${entity.name}Page`] = pageSchema(entity);
  }

  return {
    openapi: OPENAPI_VERSION,
    info,
    servers: [{ url: api.serverUrl ?? `/${context.appName}` }],
    tags: model.entities.map((entity) => ({ name: entity.name, description: `Table ${entity.table}` })),
    paths: pathItems,
    components: { schemas: { ...schemas, ...ERROR_SCHEMAS } },
    'x-relation-style': context.relationStyle,
  };
}

export const openApiGenerator: ArtifactGenerator = {
  kind: 'openapi',
  generate(context: GeneratorContext): OutputUnit[] {
    return [{ kind: 'document', path: paths.openapi, format: 'yaml', content: buildOpenApiDocument(context) }];
  },
};
