/**
 * Handler generator
 *
 * A shared repository contract with request helpers, and per entity a key
 * parser plus a handler factory covering CRUD, unique lookups and
 * many-to-many membership.
 *
 * @module generators/handlers
 */

import type { EntityField, EntityModel } from '../contracts/types.js';
import { compareStrings } from '../utils/collections.js';
import { e, param, prop, s, t } from './code-model.js';
import type { Declaration, Expr, ModuleUnit, OutputUnit, Param, PropertySignature, Stmt, TypeRef } from './code-model.js';
import {
  createInputName,
  relatedTypeName,
  responseTypeName,
  updateInputName,
} from './transformers.js';
import {
  createSchemaName,
  endpointsFor,
  entityTypeImports,
  findEntity,
  importPath,
  keyFields,
  keyTypeName,
  manyToManyRelations,
  paths,
  responseMapperName,
  updateSchemaName,
  zodBase,
} from './shared.js';
import type { Endpoint, PathParam } from './shared.js';
import { GENERATED_HEADER } from './types.js';
import type { ArtifactGenerator, GeneratorContext } from './types.js';

const str = t.named('string');
const num = t.named('number');
const promise = (type: TypeRef): TypeRef => t.named('Promise', type);

// =============================================================================
// SHARED CONTRACT
// =============================================================================

function parserFunction(name: string, returns: TypeRef, body: Stmt[]): Declaration {
  return {
    kind: 'function',
    name,
    exported: true,
    params: [param('value', t.union(str, t.named('undefined')))],
    returns: t.nullable(returns),
    body,
  };
}

function method(params: Param[], returns: TypeRef): TypeRef {
  return t.fn(params, returns);
}

function repositoryContract(): ModuleUnit {
  const entity = t.named('TEntity');
  const key = t.named('TKey');
  const memberKey = t.named('TMemberKey');
  const value = e.ref('value');
  const isUndefined = e.binary(value, '===', e.ref('undefined'));
  const respond = (status: number, body: Expr): Stmt =>
    s.expr(e.call(e.member(e.call(e.member(e.ref('res'), 'status'), e.lit(status)), 'json'), body));

  return {
    kind: 'module',
    path: paths.repository,
    header: GENERATED_HEADER,
    imports: [
      { from: 'express', names: ['Request', 'Response'], typeOnly: true },
      { from: 'zod', names: ['ZodError'], typeOnly: true },
    ],
    declarations: [
      { kind: 'interface', name: 'ListQuery', exported: true, members: [prop('page', num), prop('pageSize', num)] },
      {
        kind: 'interface',
        name: 'Page',
        exported: true,
        typeParams: ['T'],
        members: [prop('items', t.array(t.named('T'))), prop('total', num), prop('page', num), prop('pageSize', num)],
      },
      {
        kind: 'interface',
        name: 'Repository',
        exported: true,
        doc: 'Persistence port for one entity. Implementations own the database access.',
        typeParams: ['TEntity', 'TKey', 'TCreate', 'TUpdate', 'TRelated'],
        members: [
          prop('list', method([param('query', t.named('ListQuery'))], promise(t.named('Page', entity)))),
          prop('get', method([param('key', key)], promise(t.nullable(entity)))),
          prop('findBy', method([param('field', t.and(t.keyOf(entity), str)), param('value', str)], promise(t.nullable(entity))), {
            doc: 'Find by a unique field; the value arrives as path text',
          }),
          prop('create', method([param('input', t.named('TCreate'))], promise(entity))),
          prop('update', method([param('key', key), param('input', t.named('TUpdate'))], promise(t.nullable(entity)))),
          prop('remove', method([param('key', key)], promise(t.named('boolean')))),
          prop('related', method([param('entity', entity)], promise(t.named('TRelated'))), {
            doc: 'Related data the response mapper needs',
          }),
        ],
      },
      {
        kind: 'interface',
        name: 'MemberRepository',
        exported: true,
        doc: 'Membership port for one side of a many-to-many relation',
        typeParams: ['TKey', 'TMemberKey', 'TMember'],
        members: [
          prop('list', method([param('key', key)], promise(t.array(t.named('TMember'))))),
          prop('add', method([param('key', key), param('memberKey', memberKey)], promise(t.named('void')))),
          prop('remove', method([param('key', key), param('memberKey', memberKey)], promise(t.named('boolean')))),
        ],
      },
      { kind: 'const', name: 'DEFAULT_PAGE_SIZE', exported: true, value: e.lit(50) },
      { kind: 'const', name: 'MAX_PAGE_SIZE', exported: true, value: e.lit(500) },
      {
        kind: 'function',
        name: 'positiveInteger',
        exported: false,
        params: [param('raw', t.named('unknown')), param('fallback', num)],
        returns: num,
        body: [
          s.const('parsed', e.cond(
            e.binary({ kind: 'unary', op: 'typeof', value: e.ref('raw') }, '===', e.lit('string')),
            e.call('Number', e.ref('raw')),
            e.path('Number.NaN')
          )),
          s.return(e.cond(
            e.binary(e.call('Number.isInteger', e.ref('parsed')), '&&', e.binary(e.ref('parsed'), '>', e.lit(0))),
            e.ref('parsed'),
            e.ref('fallback')
          )),
        ],
      },
      {
        kind: 'function',
        name: 'parseListQuery',
        exported: true,
        doc: 'Pagination from the `page` and `page_size` query parameters',
        params: [param('query', t.indexed(t.named('Request'), 'query'))],
        returns: t.named('ListQuery'),
        body: [
          s.return(e.props([
            ['page', e.call('positiveInteger', e.index(e.ref('query'), e.lit('page')), e.lit(1))],
            ['pageSize', e.call('Math.min',
              e.call('positiveInteger', e.index(e.ref('query'), e.lit('page_size')), e.ref('DEFAULT_PAGE_SIZE')),
              e.ref('MAX_PAGE_SIZE'))],
          ])),
        ],
      },
      parserFunction('parseIntegerParam', num, [
        s.if(e.binary(isUndefined, '||', e.not(e.call(e.member(e.regex('^-?\\d+$'), 'test'), value))), [s.return(e.lit(null))]),
        s.const('parsed', e.call('Number', value)),
        s.return(e.cond(e.call('Number.isSafeInteger', e.ref('parsed')), e.ref('parsed'), e.lit(null))),
      ]),
      parserFunction('parseNumberParam', num, [
        s.if(e.binary(isUndefined, '||', e.binary(e.chain(value, ['trim']), '===', e.lit(''))), [s.return(e.lit(null))]),
        s.const('parsed', e.call('Number', value)),
        s.return(e.cond(e.call('Number.isFinite', e.ref('parsed')), e.ref('parsed'), e.lit(null))),
      ]),
      parserFunction('parseBooleanParam', t.named('boolean'), [
        s.if(e.binary(value, '===', e.lit('true')), [s.return(e.lit(true))]),
        s.if(e.binary(value, '===', e.lit('false')), [s.return(e.lit(false))]),
        s.return(e.lit(null)),
      ]),
      parserFunction('parseStringParam', str, [
        s.return(e.cond(e.binary(isUndefined, '||', e.binary(value, '===', e.lit(''))), e.lit(null), value)),
      ]),
      {
        kind: 'function',
        name: 'sendNotFound',
        exported: true,
        params: [param('res', t.named('Response')), param('entity', str)],
        returns: t.named('void'),
        body: [respond(404, e.props([['error', e.lit('not_found')], ['message', e.template(e.ref('entity'), ' not found')]]))],
      },
      {
        kind: 'function',
        name: 'sendValidationError',
        exported: true,
        params: [param('res', t.named('Response')), param('error', t.named('ZodError'))],
        returns: t.named('void'),
        body: [
          respond(400, e.props([
            ['error', e.lit('validation_failed')],
            ['issues', e.call(e.path('error.issues.map'), e.arrow([param('issue')], e.props([
              ['path', e.call(e.path('issue.path.join'), e.lit('.'))],
              ['message', e.path('issue.message')],
            ])))],
          ])),
        ],
      },
    ],
  };
}

// =============================================================================
// ENTITY HANDLERS
// =============================================================================

/** Request helper parsing a path value into the field's type */
function paramParser(field: EntityField): string {
  switch (field.spec.kind) {
    case 'integer':
    case 'bigint':
      return 'parseIntegerParam';
    case 'float':
      return 'parseNumberParam';
    case 'boolean':
      return 'parseBooleanParam';
    default:
      return 'parseStringParam';
  }
}

export function keyParserName(entity: EntityModel): string {
  return `parse${entity.name}Key`;
}

export function handlerFactoryName(entity: EntityModel): string {
  return `create${entity.name}Handlers`;
}

export function handlersTypeName(entity: EntityModel): string {
  return `${entity.name}Handlers`;
}

function repositoriesTypeName(entity: EntityModel): string {
  return `${entity.name}Repositories`;
}

/** `${name}Value` locals keep parsed parts clear of the handler's own names */
function partLocal(p: PathParam): string {
  return `${p.name}Value`;
}

/** Parse path params into locals and build the key expression; null-guarded by the caller */
function parseParts(params: readonly PathParam[], source: Expr, keyNames: readonly string[]): { statements: Stmt[]; test: Expr; key: Expr } {
  const statements = params.map((p) =>
    s.const(partLocal(p), e.call(paramParser(p.field), e.index(source, e.lit(p.name))))
  );
  const test = params
    .map((p) => e.binary(e.ref(partLocal(p)), '===', e.lit(null)))
    .reduce((left, right) => e.binary(left, '||', right));
  const key = params.length === 1
    ? e.ref(partLocal(params[0]))
    : e.props(params.map((p, i): [string, Expr] => [keyNames[i], e.ref(partLocal(p))]));
  return { statements, test, key };
}

function keyParser(entity: EntityModel): Declaration {
  const fields = keyFields(entity);
  const params = fields.map((field) => ({ name: field.name, field }));
  const { statements, test, key } = parseParts(params, e.ref('params'), entity.primaryKey);
  return {
    kind: 'function',
    name: keyParserName(entity),
    exported: true,
    doc: `Key of a ${entity.name} from route parameters, or null when malformed`,
    params: [param('params', t.named('Record', str, t.union(str, t.named('undefined'))))],
    returns: t.nullable(t.named(keyTypeName(entity.name))),
    body: [...statements, s.if(test, [s.return(e.lit(null))]), s.return(key)],
  };
}

class HandlerBodies {
  constructor(
    private readonly entity: EntityModel,
    private readonly context: GeneratorContext
  ) {}

  private notFound(test: Expr, entityName = this.entity.name): Stmt {
    return s.if(test, [s.expr(e.call('sendNotFound', e.ref('res'), e.lit(entityName))), s.return()]);
  }

  private keyGuard(): Stmt[] {
    return [
      s.const('key', e.call(keyParserName(this.entity), e.path('req.params'))),
      this.notFound(e.binary(e.ref('key'), '===', e.lit(null))),
    ];
  }

  private parseBody(schema: Expr): Stmt[] {
    return [
      s.const('body', e.call(e.member(schema, 'safeParse'), e.path('req.body'))),
      s.if(e.not(e.path('body.success')), [s.expr(e.call('sendValidationError', e.ref('res'), e.path('body.error'))), s.return()]),
    ];
  }

  private records(method: string, ...args: Expr[]): Expr {
    return e.await(e.call(e.path(`repositories.records.${method}`), ...args));
  }

  private members(accessor: string, method: string, ...args: Expr[]): Expr {
    return e.await(e.call(e.member(e.member(e.path('repositories.members'), accessor), method), ...args));
  }

  private json(value: Expr, status?: number): Stmt {
    const res = status === undefined ? e.ref('res') : e.call(e.member(e.ref('res'), 'status'), e.lit(status));
    return s.expr(e.call(e.member(res, 'json'), value));
  }

  private noContent(): Stmt {
    return s.expr(e.call(e.member(e.call(e.member(e.ref('res'), 'status'), e.lit(204)), 'end')));
  }

  private respond(entity: Expr): Expr {
    return e.await(e.call('respond', entity));
  }

  body(endpoint: Endpoint): Stmt[] {
    const entityIsNull = e.binary(e.ref('entity'), '===', e.lit(null));
    switch (endpoint.operation) {
      case 'list':
        return [
          s.const('page', this.records('list', e.call('parseListQuery', e.path('req.query')))),
          s.const('items', e.await(e.call('Promise.all', e.call(e.path('page.items.map'), e.ref('respond'))))),
          this.json(e.object([{ kind: 'spread', value: e.ref('page') }, { kind: 'shorthand', name: 'items' }])),
        ];
      case 'create':
        return [
          ...this.parseBody(e.ref(createSchemaName(this.entity))),
          s.const('entity', this.records('create', e.path('body.data'))),
          this.json(this.respond(e.ref('entity')), 201),
        ];
      case 'retrieve':
        return [
          ...this.keyGuard(),
          s.const('entity', this.records('get', e.ref('key'))),
          this.notFound(entityIsNull),
          this.json(this.respond(e.ref('entity'))),
        ];
      case 'update':
        return [
          ...this.keyGuard(),
          ...this.parseBody(e.ref(updateSchemaName(this.entity))),
          s.const('entity', this.records('update', e.ref('key'), e.path('body.data'))),
          this.notFound(entityIsNull),
          this.json(this.respond(e.ref('entity'))),
        ];
      case 'remove':
        return [
          ...this.keyGuard(),
          s.const('removed', this.records('remove', e.ref('key'))),
          this.notFound(e.not(e.ref('removed'))),
          this.noContent(),
        ];
      case 'lookup': {
        const field = endpoint.lookupField;
        if (!field) return [];
        return [
          s.const('value', e.call('parseStringParam', e.index(e.path('req.params'), e.lit('value')))),
          this.notFound(e.binary(e.ref('value'), '===', e.lit(null))),
          s.const('entity', this.records('findBy', e.lit(field.name), e.ref('value'))),
          this.notFound(entityIsNull),
          this.json(this.respond(e.ref('entity'))),
        ];
      }
      case 'list-members': {
        const relation = endpoint.relation;
        if (!relation) return [];
        return [
          ...this.keyGuard(),
          s.const('members', this.members(relation.accessor, 'list', e.ref('key'))),
          this.json(e.ref('members')),
        ];
      }
      case 'add-member': {
        const relation = endpoint.relation;
        const params = endpoint.memberParams ?? [];
        if (!relation || params.length === 0) return [];
        const target = findEntity(this.context.model, relation.targetEntity);
        const shape = e.props(params.map((p): [string, Expr] => [p.name, zodBase(p.field)]));
        const memberKey = params.length === 1
          ? e.path(`body.data.${params[0].name}`)
          : e.props(params.map((p, i): [string, Expr] => [target.primaryKey[i], e.path(`body.data.${p.name}`)]));
        return [
          ...this.keyGuard(),
          ...this.parseBody(e.call('z.object', shape)),
          s.expr(this.members(relation.accessor, 'add', e.ref('key'), memberKey)),
          this.noContent(),
        ];
      }
      case 'remove-member': {
        const relation = endpoint.relation;
        const params = endpoint.memberParams ?? [];
        if (!relation || params.length === 0) return [];
        const target = findEntity(this.context.model, relation.targetEntity);
        const parts = parseParts(params, e.path('req.params'), target.primaryKey);
        return [
          ...this.keyGuard(),
          ...parts.statements,
          this.notFound(parts.test, target.name),
          s.const('removed', this.members(relation.accessor, 'remove', e.ref('key'), parts.key)),
          this.notFound(e.not(e.ref('removed')), target.name),
          this.noContent(),
        ];
      }
    }
  }
}

function handlerModule(entity: EntityModel, context: GeneratorContext): ModuleUnit {
  const path = paths.handler(entity);
  const endpoints = endpointsFor(entity, context.model);
  const manyToMany = manyToManyRelations(entity);
  const bodies = new HandlerBodies(entity, context);

  const repositoryMembers: PropertySignature[] = [
    prop('records', t.named(
      'Repository',
      t.named(entity.name),
      t.named(keyTypeName(entity.name)),
      t.named(createInputName(entity)),
      t.named(updateInputName(entity)),
      t.named(relatedTypeName(entity))
    )),
  ];
  if (manyToMany.length > 0) {
    repositoryMembers.push(prop('members', t.object(manyToMany.map((relation) =>
      prop(relation.accessor, t.named(
        'MemberRepository',
        t.named(keyTypeName(entity.name)),
        t.named(keyTypeName(relation.targetEntity)),
        t.named(relation.targetEntity)
      ))
    ))));
  }

  const requestParams = [param('req', t.named('Request')), param('res', t.named('Response'))];
  const handlers = e.props(endpoints.map((endpoint): [string, Expr] => [
    endpoint.handler,
    e.arrow(requestParams, bodies.body(endpoint), { async: true, returns: promise(t.named('void')) }),
  ]));

  const factory: Declaration = {
    kind: 'function',
    name: handlerFactoryName(entity),
    exported: true,
    doc: `Request handlers for ${entity.routePath}`,
    params: [param('repositories', t.named(repositoriesTypeName(entity)))],
    body: [
      s.const('respond', e.arrow(
        [param('entity', t.named(entity.name))],
        e.call(responseMapperName(entity), e.ref('entity'), e.await(e.call('repositories.records.related', e.ref('entity')))),
        { async: true, returns: promise(t.named(responseTypeName(entity))) }
      )),
      s.return(handlers),
    ],
  };

  const usedHelpers = new Set(['parseListQuery', 'sendNotFound', 'sendValidationError']);
  for (const field of keyFields(entity)) usedHelpers.add(paramParser(field));
  if (entity.uniqueLookups.length > 0) usedHelpers.add('parseStringParam');
  for (const endpoint of endpoints) {
    if (endpoint.operation !== 'remove-member') continue;
    for (const p of endpoint.memberParams ?? []) usedHelpers.add(paramParser(p.field));
  }

  const entityTypes: TypeRef[] = [t.named(entity.name), t.named(keyTypeName(entity.name))];
  for (const relation of manyToMany) {
    entityTypes.push(t.named(keyTypeName(relation.targetEntity)), t.named(relation.targetEntity));
  }

  const transformerPath = importPath(path, paths.transformer(entity));
  const repositoryPath = importPath(path, paths.repository);

  return {
    kind: 'module',
    path,
    header: GENERATED_HEADER,
    imports: [
      { from: 'express', names: ['Request', 'Response'], typeOnly: true },
      ...(manyToMany.length > 0 ? [{ from: 'zod', names: ['z'] }] : []),
      ...entityTypeImports(path, entityTypes, context.model),
      { from: transformerPath, names: [createSchemaName(entity), responseMapperName(entity), updateSchemaName(entity)] },
      {
        from: transformerPath,
        names: [createInputName(entity), relatedTypeName(entity), responseTypeName(entity), updateInputName(entity)],
        typeOnly: true,
      },
      { from: repositoryPath, names: [...usedHelpers].sort(compareStrings) },
      { from: repositoryPath, names: manyToMany.length > 0 ? ['MemberRepository', 'Repository'] : ['Repository'], typeOnly: true },
    ],
    declarations: [
      {
        kind: 'interface',
        name: repositoriesTypeName(entity),
        exported: true,
        members: repositoryMembers,
      },
      keyParser(entity),
      factory,
      {
        kind: 'type-alias',
        name: handlersTypeName(entity),
        exported: true,
        type: t.named('ReturnType', t.typeOf(handlerFactoryName(entity))),
      },
    ],
  };
}

export const handlersGenerator: ArtifactGenerator = {
  kind: 'handlers',
  generate(context: GeneratorContext): OutputUnit[] {
    return [repositoryContract(), ...context.model.entities.map((entity) => handlerModule(entity, context))];
  },
};
