/**
 * Relation rendering strategies
 *
 * One strategy per `relation_style`. A strategy decides what a response
 * carries for each forward to-one and many-to-many relation, what related
 * data the response mapper needs, and how the API description shows it.
 *
 * @module generators/relation-styles
 */

import type { EntityModel, EntityRelation, RelationStyle, ResolvedModel } from '../contracts/types.js';
import { e, t } from './code-model.js';
import type { DocumentValue, Expr, TypeRef } from './code-model.js';
import { apiKeySchema, findEntity, findField, keyFields, keyTypeName } from './shared.js';

export interface RelationStyleStrategy {
  readonly style: RelationStyle;
  /** Type of the related data the mapper receives, or null when the row carries everything */
  relatedType(relation: EntityRelation): TypeRef | null;
  responseType(relation: EntityRelation): TypeRef;
  /** Response value built from `entity` (the row) and `related` */
  responseValue(relation: EntityRelation, entity: EntityModel, model: ResolvedModel): Expr;
  apiSchema(relation: EntityRelation, model: ResolvedModel): DocumentValue;
  /** Related data for a sample row; `sample` builds a sample of another entity */
  sampleRelated(relation: EntityRelation, sample: (entity: string) => Expr): Expr | null;
}

// =============================================================================
// HELPERS
// =============================================================================

const row = (field: string): Expr => e.member(e.ref('entity'), field);

/** `value`, or null when any nullable owning field of the relation is null */
function guardNulls(relation: EntityRelation, entity: EntityModel, value: Expr): Expr {
  if (!relation.nullable) return value;
  const checks = relation.localFields
    .filter((name) => findField(entity, name).nullable)
    .map((name) => e.binary(row(name), '===', e.lit(null)));
  if (checks.length === 0) return value;
  const test = checks.reduce((left, right) => e.binary(left, '||', right));
  return e.cond(test, e.lit(null), value);
}

/** Key of the related row from the owning fields */
function foreignKey(relation: EntityRelation): Expr {
  if (relation.localFields.length === 1) return row(relation.localFields[0]);
  return e.props(relation.remoteFields.map((remote, i): [string, Expr] => [remote, row(relation.localFields[i])]));
}

/** Link template `/route/${a}/${b}` from key part expressions */
function linkTemplate(target: EntityModel, parts: Expr[]): Expr {
  const pieces: (string | Expr)[] = [];
  parts.forEach((part, i) => {
    pieces.push(i === 0 ? `${target.routePath}/` : '/', part);
  });
  return e.template(...pieces);
}

function nullableType(relation: EntityRelation, type: TypeRef): TypeRef {
  return relation.nullable ? t.nullable(type) : type;
}

function nullableSchema(relation: EntityRelation, schema: { [key: string]: DocumentValue }): DocumentValue {
  if (!relation.nullable) return schema;
  if ('$ref' in schema) return { allOf: [schema], nullable: true };
  return { ...schema, nullable: true };
}

function manyRelated(relation: EntityRelation, element: TypeRef): TypeRef | null {
  return relation.kind === 'many-to-many' ? t.array(element) : null;
}

const related = (relation: EntityRelation): Expr => e.member(e.ref('related'), relation.accessor);

// =============================================================================
// STRATEGIES
// =============================================================================

/** Relations render as the related row's key */
export const keyStyle: RelationStyleStrategy = {
  style: 'key',
  relatedType: (relation) => manyRelated(relation, t.named(keyTypeName(relation.targetEntity))),
  responseType: (relation) =>
    relation.kind === 'many-to-many'
      ? t.array(t.named(keyTypeName(relation.targetEntity)))
      : nullableType(relation, t.named(keyTypeName(relation.targetEntity))),
  responseValue: (relation, entity) => {
    if (relation.kind === 'many-to-many') return related(relation);
    if (relation.localFields.length === 1) return foreignKey(relation);
    return guardNulls(relation, entity, foreignKey(relation));
  },
  apiSchema: (relation, model) => {
    const schema = apiKeySchema(findEntity(model, relation.targetEntity));
    return relation.kind === 'many-to-many' ? { type: 'array', items: schema } : nullableSchema(relation, schema);
  },
  sampleRelated: (relation) => (relation.kind === 'many-to-many' ? e.array([]) : null),
};

/** Relations render as links to the related resource */
export const linkStyle: RelationStyleStrategy = {
  style: 'link',
  relatedType: (relation) => manyRelated(relation, t.named(keyTypeName(relation.targetEntity))),
  responseType: (relation) =>
    relation.kind === 'many-to-many' ? t.array(t.named('string')) : nullableType(relation, t.named('string')),
  responseValue: (relation, entity, model) => {
    const target = findEntity(model, relation.targetEntity);
    if (relation.kind === 'many-to-many') {
      const fields = keyFields(target);
      const parts = fields.length === 1 ? [e.ref('key')] : fields.map((field) => e.member(e.ref('key'), field.name));
      return e.call(e.member(related(relation), 'map'), e.arrow([{ name: 'key' }], linkTemplate(target, parts)));
    }
    return guardNulls(relation, entity, linkTemplate(target, relation.localFields.map(row)));
  },
  apiSchema: (relation) => {
    const link = { type: 'string', format: 'uri-reference' };
    return relation.kind === 'many-to-many' ? { type: 'array', items: link } : nullableSchema(relation, link);
  },
  sampleRelated: (relation) => (relation.kind === 'many-to-many' ? e.array([]) : null),
};

/** Relations render as the related row itself */
export const embeddedStyle: RelationStyleStrategy = {
  style: 'embedded',
  relatedType: (relation) =>
    relation.kind === 'many-to-many'
      ? t.array(t.named(relation.targetEntity))
      : nullableType(relation, t.named(relation.targetEntity)),
  responseType: (relation) =>
    relation.kind === 'many-to-many'
      ? t.array(t.named(relation.targetEntity))
      : nullableType(relation, t.named(relation.targetEntity)),
  responseValue: (relation) => related(relation),
  apiSchema: (relation) => {
    const ref = { $ref: `#/components/schemas/${relation.targetEntity}` };
    return relation.kind === 'many-to-many' ? { type: 'array', items: ref } : nullableSchema(relation, ref);
  },
  sampleRelated: (relation, sample) => {
    if (relation.kind === 'many-to-many') return e.array([]);
    return relation.nullable ? e.lit(null) : sample(relation.targetEntity);
  },
};

const STRATEGIES: Record<RelationStyle, RelationStyleStrategy> = {
  key: keyStyle,
  link: linkStyle,
  embedded: embeddedStyle,
};

export function relationStyleStrategy(style: RelationStyle): RelationStyleStrategy {
  return STRATEGIES[style];
}
