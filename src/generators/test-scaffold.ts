/**
 * Test Scaffold Generator
 *
 * One Vitest module per entity: property-based cases (fast-check) checking
 * that the request schemas accept every well-formed payload, and
 * example-based cases for required fields, response mapping and metadata.
 *
 * @module generators/test-scaffold
 */

import type { EntityField, EntityModel, FieldKind } from '../contracts/types.js';
import { compareStrings } from '../utils/collections.js';
import { e, fromData, param, s, t } from './code-model.js';
import type { DocumentValue, Expr, ModuleUnit, OutputUnit, Stmt } from './code-model.js';
import { relationStyleStrategy } from './relation-styles.js';
import { relatedTypeName } from './transformers.js';
import {
  createSchemaName,
  entityVar,
  findEntity,
  importPath,
  metaName,
  paths,
  responseMapperName,
  responseRelations,
  updateSchemaName,
  writableFields,
} from './shared.js';
import { GENERATED_HEADER } from './types.js';
import type { ArtifactGenerator, GeneratorContext } from './types.js';

// =============================================================================
// VALUES
// =============================================================================

const fc = (name: string, ...args: Expr[]): Expr => e.call(`fc.${name}`, ...args);

const DATE_RANGE = e.props([
  ['min', e.newOf('Date', e.lit('1970-01-01T00:00:00.000Z'))],
  ['max', e.newOf('Date', e.lit('2099-12-31T23:59:59.999Z'))],
  ['noInvalidDate', e.lit(true)],
]);

/** `date.toISOString().slice(start, end)` mapper */
function isoMapper(start: number | null, end: number | null): Expr {
  const iso = e.chain(e.ref('date'), ['toISOString']);
  if (start === null) return e.arrow([param('date')], iso);
  const args = end === null ? [e.lit(start)] : [e.lit(start), e.lit(end)];
  return e.arrow([param('date')], e.call(e.member(iso, 'slice'), ...args));
}

const ARBITRARIES: Record<FieldKind, (field: EntityField) => Expr> = {
  integer: () => fc('integer'),
  bigint: () => fc('integer'),
  decimal: () => e.chain(fc('integer'), ['map', e.ref('String')]),
  float: () => fc('double', e.props([['noNaN', e.lit(true)], ['noDefaultInfinity', e.lit(true)]])),
  string: (field) => (field.spec.length !== null ? fc('string', e.props([['maxLength', e.lit(field.spec.length)]])) : fc('string')),
  text: () => fc('string'),
  boolean: () => fc('boolean'),
  date: () => e.chain(fc('date', DATE_RANGE), ['map', isoMapper(0, 10)]),
  datetime: () => e.chain(fc('date', DATE_RANGE), ['map', isoMapper(null, null)]),
  time: () => e.chain(fc('date', DATE_RANGE), ['map', isoMapper(11, 19)]),
  interval: () => fc('string'),
  uuid: () => fc('uuid'),
  json: () => fc('jsonValue'),
  binary: () => fc('base64String'),
  inet: () => fc('ipV4'),
  opaque: () => fc('string'),
};

export function arbitraryFor(field: EntityField): Expr {
  let arbitrary = ARBITRARIES[field.spec.kind](field);
  if (field.spec.array) arbitrary = fc('array', arbitrary);
  if (field.nullable) arbitrary = fc('option', arbitrary, e.props([['nil', e.lit(null)]]));
  return arbitrary;
}

const SAMPLES: Record<FieldKind, DocumentValue> = {
  integer: 1,
  bigint: 1,
  decimal: '12.50',
  float: 1.5,
  string: 'sample',
  text: 'sample text',
  boolean: true,
  date: '2024-01-15',
  datetime: '2024-01-15T10:30:00Z',
  time: '10:30:00',
  interval: '1 day',
  uuid: '00000000-0000-4000-8000-000000000001',
  json: { key: 'value' },
  binary: 'c2FtcGxl',
  inet: '192.0.2.1',
  opaque: 'sample',
};

/** Example value accepted by the field's request schema */
export function sampleValue(field: EntityField): DocumentValue {
  let value = SAMPLES[field.spec.kind];
  if (typeof value === 'string' && field.spec.length !== null && field.spec.kind === 'string') {
    value = value.slice(0, field.spec.length);
  }
  return field.spec.array ? [value] : value;
}

function sampleRow(entity: EntityModel): Expr {
  return e.props(entity.fields.map((field): [string, Expr] => [field.name, fromData(sampleValue(field))]));
}

function requiredFields(entity: EntityModel): EntityField[] {
  return writableFields(entity).filter((field) => !field.nullable && field.spec.default.kind === 'none');
}

// =============================================================================
// MODULE
// =============================================================================

const it = (title: string, body: Stmt[]): Stmt => s.expr(e.call('it', e.lit(title), e.arrow([], body)));
const describe = (title: string, body: Stmt[]): Stmt => s.expr(e.call('describe', e.lit(title), e.arrow([], body)));
const expectThat = (actual: Expr, matcher: string, expected: Expr): Stmt =>
  s.expr(e.call(e.member(e.call('expect', actual), matcher), expected));

function testModule(entity: EntityModel, context: GeneratorContext): ModuleUnit {
  const path = paths.test(entity);
  const strategy = relationStyleStrategy(context.relationStyle);
  const variable = entityVar(entity);
  const sampleName = `sample${entity.name}`;
  const arbitraryName = `${variable}CreateArbitrary`;
  const writable = writableFields(entity);
  const required = requiredFields(entity);

  const relatedEntries: [string, Expr][] = [];
  for (const relation of responseRelations(entity)) {
    const value = strategy.sampleRelated(relation, (name) => sampleRow(findEntity(context.model, name)));
    if (value) relatedEntries.push([relation.accessor, value]);
  }

  const responseKeys = [
    ...entity.fields.map((field) => field.name),
    ...responseRelations(entity).map((relation) => relation.accessor),
  ].sort(compareStrings);

  const transformerCases: Stmt[] = [
    it('accepts every generated create payload', [
      s.expr(fc('assert', fc('property', e.ref(arbitraryName), e.arrow([param('payload')], [
        expectThat(e.member(e.call(e.path(`${createSchemaName(entity)}.safeParse`), e.ref('payload')), 'success'), 'toBe', e.lit(true)),
      ])))),
    ]),
    it('accepts an empty update payload', [
      expectThat(e.member(e.call(e.path(`${updateSchemaName(entity)}.safeParse`), e.object([])), 'success'), 'toBe', e.lit(true)),
    ]),
  ];

  if (required.length > 0) {
    const [omitted, ...rest] = required;
    transformerCases.push(
      it(`rejects a create payload without ${omitted.name}`, [
        s.const('payload', e.props(rest.map((field): [string, Expr] => [field.name, fromData(sampleValue(field))]))),
        expectThat(e.member(e.call(e.path(`${createSchemaName(entity)}.safeParse`), e.ref('payload')), 'success'), 'toBe', e.lit(false)),
      ])
    );
  }

  transformerCases.push(
    it('maps every column into the response', [
      s.const('response', e.call(responseMapperName(entity), e.ref(sampleName), e.ref('related'))),
      expectThat(e.chain(e.call('Object.keys', e.ref('response')), ['sort']), 'toEqual', fromData(responseKeys)),
      ...entity.fields.map((field) =>
        expectThat(e.member(e.ref('response'), field.name), 'toEqual', e.member(e.ref(sampleName), field.name))
      ),
    ])
  );

  const metadataCases: Stmt[] = [
    it('describes the primary key', [
      expectThat(e.path(`${metaName(entity)}.primaryKey`), 'toEqual', fromData([...entity.primaryKey])),
    ]),
    it('lists every column', [
      expectThat(e.chain(e.call('Object.keys', e.path(`${metaName(entity)}.fields`)), ['sort']), 'toEqual',
        fromData(entity.fields.map((field) => field.name).sort(compareStrings))),
    ]),
    it('lists every relation accessor', [
      expectThat(e.call(e.path(`${metaName(entity)}.relations.map`), e.arrow([param('relation')], e.path('relation.accessor'))),
        'toEqual', fromData(entity.relations.map((relation) => relation.accessor))),
    ]),
  ];

  const entityPath = importPath(path, paths.entity(entity));
  const transformerPath = importPath(path, paths.transformer(entity));

  return {
    kind: 'module',
    path,
    header: GENERATED_HEADER,
    imports: [
      { from: 'vitest', names: ['describe', 'expect', 'it'] },
      { from: 'fast-check', defaultName: 'fc' },
      { from: entityPath, names: [metaName(entity)] },
      { from: entityPath, names: [entity.name], typeOnly: true },
      { from: transformerPath, names: [createSchemaName(entity), responseMapperName(entity), updateSchemaName(entity)] },
      { from: transformerPath, names: [relatedTypeName(entity)], typeOnly: true },
    ],
    declarations: [
      {
        kind: 'const',
        name: arbitraryName,
        exported: false,
        value: e.call('fc.record',
          e.props(writable.map((field): [string, Expr] => [field.name, arbitraryFor(field)])),
          e.props([['requiredKeys', fromData(required.map((field) => field.name))]])
        ),
      },
      { kind: 'const', name: sampleName, exported: false, type: t.named(entity.name), value: sampleRow(entity) },
      { kind: 'const', name: 'related', exported: false, type: t.named(relatedTypeName(entity)), value: e.props(relatedEntries) },
      { kind: 'statement', statement: describe(`${entity.name} transformers`, transformerCases) },
      { kind: 'statement', statement: describe(`${entity.name} metadata`, metadataCases) },
    ],
  };
}

export const testScaffoldGenerator: ArtifactGenerator = {
  kind: 'tests',
  generate(context: GeneratorContext): OutputUnit[] {
    return context.model.entities.map((entity) => testModule(entity, context));
  },
};
