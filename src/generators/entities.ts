/**
 * Entity generator
 *
 * One module per entity holding its row interface, key type and table
 * metadata, a shared metadata contract, and a barrel that re-exports every
 * entity in dependency order.
 *
 * @module generators/entities
 */

import type { EntityField, EntityModel, EntityRelation } from '../contracts/types.js';
import { FIELD_KINDS } from '../pipeline/type-mapper.js';
import { compareStrings } from '../utils/collections.js';
import { e, fromData, prop, t } from './code-model.js';
import type { Declaration, DocumentValue, ImportSpec, ModuleUnit, OutputUnit, PropertySignature, TypeRef } from './code-model.js';
import { fieldType, importPath, keyType, keyTypeName, metaName, paths } from './shared.js';
import { GENERATED_HEADER } from './types.js';
import type { ArtifactGenerator, GeneratorContext } from './types.js';

// =============================================================================
// METADATA CONTRACT
// =============================================================================

function metaContract(): ModuleUnit {
  const strings = t.array(t.named('string'));
  return {
    kind: 'module',
    path: paths.entityMeta,
    header: GENERATED_HEADER,
    imports: [],
    declarations: [
      {
        kind: 'type-alias',
        name: 'FieldKind',
        exported: true,
        type: t.union(...FIELD_KINDS.map((kind) => t.lit(kind))),
      },
      {
        kind: 'interface',
        name: 'FieldMeta',
        exported: true,
        doc: 'Column-level metadata for one entity field',
        members: [
          prop('column', t.named('string')),
          prop('kind', t.named('FieldKind')),
          prop('nativeType', t.named('string')),
          prop('array', t.named('boolean')),
          prop('nullable', t.named('boolean')),
          prop('primaryKey', t.named('boolean')),
          prop('unique', t.named('boolean')),
          prop('readOnly', t.named('boolean'), { doc: 'Assigned by the database' }),
          prop('default', t.union(t.named('string'), t.named('number'), t.named('boolean'), t.named('null')), {
            optional: true,
            doc: 'Constant column default',
          }),
          prop('serverDefault', t.named('boolean'), { doc: 'The database computes the default' }),
          prop('maxLength', t.nullable(t.named('number'))),
          prop('precision', t.nullable(t.named('number'))),
          prop('scale', t.nullable(t.named('number'))),
        ],
      },
      {
        kind: 'interface',
        name: 'RelationMeta',
        exported: true,
        members: [
          prop('accessor', t.named('string')),
          prop('kind', t.union(t.lit('many-to-one'), t.lit('one-to-one'), t.lit('many-to-many'))),
          prop('direction', t.union(t.lit('forward'), t.lit('reverse'))),
          prop('cardinality', t.union(t.lit('one'), t.lit('many'))),
          prop('target', t.named('string')),
          prop('localFields', strings),
          prop('remoteFields', strings),
          prop('nullable', t.named('boolean')),
          prop('deferred', t.named('boolean'), { doc: 'Declared after its target to break a dependency cycle' }),
          prop('junction', t.object([
            prop('table', t.named('string')),
            prop('localColumns', strings),
            prop('remoteColumns', strings),
          ]), { optional: true }),
        ],
      },
      {
        kind: 'interface',
        name: 'EntityMeta',
        exported: true,
        members: [
          prop('name', t.named('string')),
          prop('table', t.named('string')),
          prop('routePath', t.named('string')),
          prop('primaryKey', strings),
          prop('fields', t.named('Record', t.named('string'), t.named('FieldMeta'))),
          prop('relations', t.array(t.named('RelationMeta'))),
          prop('uniqueLookups', strings),
          prop('uniqueTogether', t.array(strings)),
        ],
      },
    ],
  };
}

// =============================================================================
// ENTITY MODULES
// =============================================================================

function describeField(field: EntityField): string {
  const notes = [`Column "${field.column}" (${field.spec.nativeType})`];
  if (field.primaryKey) notes.push('primary key');
  if (field.readOnly) notes.push('read-only');
  return notes.join(', ');
}

function describeRelation(relation: EntityRelation): string {
  const lines = [
    relation.direction === 'forward' || relation.kind === 'many-to-many'
      ? `${relation.kind}: ${relation.targetEntity}`
      : `${relation.kind} (reverse): ${relation.targetEntity} records pointing here`,
  ];
  if (relation.junction) lines.push(`Through junction table "${relation.junction.table}"`);
  if (relation.deferred) lines.push('Deferred to break a dependency cycle; always nullable');
  return lines.join('\n');
}

function relationType(relation: EntityRelation): TypeRef {
  const target = t.named(relation.targetEntity);
  if (relation.cardinality === 'many') return t.array(target);
  return relation.nullable ? t.nullable(target) : target;
}

function fieldMeta(field: EntityField): DocumentValue {
  const { default: fallback } = field.spec;
  return {
    column: field.column,
    kind: field.spec.kind,
    nativeType: field.spec.nativeType,
    array: field.spec.array,
    nullable: field.nullable,
    primaryKey: field.primaryKey,
    unique: field.unique,
    readOnly: field.readOnly,
    ...(fallback.kind === 'constant' ? { default: fallback.value } : {}),
    serverDefault: fallback.kind === 'server',
    maxLength: field.spec.length,
    precision: field.spec.precision,
    scale: field.spec.scale,
  };
}

function relationMeta(relation: EntityRelation): DocumentValue {
  const meta: { [key: string]: DocumentValue } = {
    accessor: relation.accessor,
    kind: relation.kind,
    direction: relation.direction,
    cardinality: relation.cardinality,
    target: relation.targetEntity,
    localFields: [...relation.localFields],
    remoteFields: [...relation.remoteFields],
    nullable: relation.nullable,
    deferred: relation.deferred,
  };
  if (relation.junction) {
    meta.junction = {
      table: relation.junction.table,
      localColumns: [...relation.junction.localColumns],
      remoteColumns: [...relation.junction.remoteColumns],
    };
  }
  return meta;
}

function entityMeta(entity: EntityModel): DocumentValue {
  const fields: { [key: string]: DocumentValue } = {};
  for (const field of entity.fields) fields[field.name] = fieldMeta(field);
  return {
    name: entity.name,
    table: entity.table,
    routePath: entity.routePath,
    primaryKey: [...entity.primaryKey],
    fields,
    relations: entity.relations.map(relationMeta),
    uniqueLookups: [...entity.uniqueLookups],
    uniqueTogether: entity.uniqueTogether.map((key) => [...key]),
  };
}

function entityModule(entity: EntityModel, context: GeneratorContext): ModuleUnit {
  const path = paths.entity(entity);
  const targets = [...new Set(entity.relations.map((rel) => rel.targetEntity))]
    .filter((name) => name !== entity.name)
    .sort(compareStrings);

  const imports: ImportSpec[] = [{ from: importPath(path, paths.entityMeta), names: ['EntityMeta'], typeOnly: true }];
  for (const name of targets) {
    const target = context.model.entities.find((candidate) => candidate.name === name);
    if (target) imports.push({ from: importPath(path, paths.entity(target)), names: [name], typeOnly: true });
  }

  const members: PropertySignature[] = [
    ...entity.fields.map((field) => prop(field.name, fieldType(field), { doc: describeField(field) })),
    ...entity.relations.map((relation) =>
      prop(relation.accessor, relationType(relation), { optional: true, doc: describeRelation(relation) })
    ),
  ];

  const declarations: Declaration[] = [
    { kind: 'interface', name: entity.name, exported: true, doc: `Row of table "${entity.table}"`, members },
    { kind: 'type-alias', name: keyTypeName(entity.name), exported: true, type: keyType(entity) },
    {
      kind: 'const',
      name: metaName(entity),
      exported: true,
      type: t.named('EntityMeta'),
      value: fromData(entityMeta(entity)),
    },
  ];

  return { kind: 'module', path, header: GENERATED_HEADER, imports, declarations };
}

function barrel(context: GeneratorContext): ModuleUnit {
  const path = paths.entityBarrel;
  const { entities } = context.model;
  return {
    kind: 'module',
    path,
    header: GENERATED_HEADER,
    imports: [
      { from: importPath(path, paths.entityMeta), names: ['EntityMeta'], typeOnly: true },
      ...entities.map((entity) => ({ from: importPath(path, paths.entity(entity)), names: [metaName(entity)] })),
    ],
    declarations: [
      { kind: 'export-from', from: importPath(path, paths.entityMeta) },
      ...entities.map((entity): Declaration => ({ kind: 'export-from', from: importPath(path, paths.entity(entity)) })),
      {
        kind: 'const',
        name: 'entityMetas',
        exported: true,
        doc: 'Every entity, referenced entities first',
        type: t.array(t.named('EntityMeta')),
        value: e.array(entities.map((entity) => e.ref(metaName(entity)))),
      },
    ],
  };
}

export const entitiesGenerator: ArtifactGenerator = {
  kind: 'entities',
  generate(context: GeneratorContext): OutputUnit[] {
    return [metaContract(), ...context.model.entities.map((entity) => entityModule(entity, context)), barrel(context)];
  },
};
