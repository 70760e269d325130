/**
 * Transformer generator
 *
 * Per entity: zod schemas validating create and update payloads, and a
 * response mapper shaped by the configured relation style.
 *
 * @module generators/transformers
 */

import type { EntityModel } from '../contracts/types.js';
import { e, param, prop, s, t } from './code-model.js';
import type { Declaration, Expr, ModuleUnit, OutputUnit, PropertySignature, TypeRef } from './code-model.js';
import { relationStyleStrategy } from './relation-styles.js';
import type { RelationStyleStrategy } from './relation-styles.js';
import {
  createSchemaName,
  entityTypeImports,
  fieldType,
  importPath,
  paths,
  responseMapperName,
  responseRelations,
  updateSchemaName,
  writableFields,
  zodField,
} from './shared.js';
import { GENERATED_HEADER } from './types.js';
import type { ArtifactGenerator, GeneratorContext } from './types.js';

export function relatedTypeName(entity: EntityModel): string {
  return `${entity.name}Related`;
}

export function responseTypeName(entity: EntityModel): string {
  return `${entity.name}Response`;
}

export function createInputName(entity: EntityModel): string {
  return `${entity.name}CreateInput`;
}

export function updateInputName(entity: EntityModel): string {
  return `${entity.name}UpdateInput`;
}

/** Members of the related-data interface the mapper takes */
export function relatedMembers(entity: EntityModel, strategy: RelationStyleStrategy): PropertySignature[] {
  const members: PropertySignature[] = [];
  for (const relation of responseRelations(entity)) {
    const type = strategy.relatedType(relation);
    if (type) members.push(prop(relation.accessor, type));
  }
  return members;
}

function transformerModule(entity: EntityModel, context: GeneratorContext): ModuleUnit {
  const path = paths.transformer(entity);
  const strategy = relationStyleStrategy(context.relationStyle);
  const relations = responseRelations(entity);

  const related = relatedMembers(entity, strategy);
  const responseMembers: PropertySignature[] = [
    ...entity.fields.map((field) => prop(field.name, fieldType(field))),
    ...relations.map((relation) => prop(relation.accessor, strategy.responseType(relation))),
  ];
  const referencedTypes: TypeRef[] = [
    t.named(entity.name),
    ...related.map((member) => member.type),
    ...responseMembers.map((member) => member.type),
  ];

  const createShape = e.props(writableFields(entity).map((field): [string, Expr] => [field.name, zodField(field)]));
  const responseValue = e.props([
    ...entity.fields.map((field): [string, Expr] => [field.name, e.member(e.ref('entity'), field.name)]),
    ...relations.map((relation): [string, Expr] => [relation.accessor, strategy.responseValue(relation, entity, context.model)]),
  ]);

  const declarations: Declaration[] = [
    {
      kind: 'const',
      name: createSchemaName(entity),
      exported: true,
      doc: `Request body for creating a ${entity.name}`,
      value: e.call('z.object', createShape),
    },
    {
      kind: 'const',
      name: updateSchemaName(entity),
      exported: true,
      doc: 'Partial update; every field is optional',
      value: e.chain(e.ref(createSchemaName(entity)), ['partial']),
    },
    {
      kind: 'type-alias',
      name: createInputName(entity),
      exported: true,
      type: t.named('z.infer', t.typeOf(createSchemaName(entity))),
    },
    {
      kind: 'type-alias',
      name: updateInputName(entity),
      exported: true,
      type: t.named('z.infer', t.typeOf(updateSchemaName(entity))),
    },
    {
      kind: 'interface',
      name: relatedTypeName(entity),
      exported: true,
      doc: 'Related data loaded alongside the row',
      members: related,
    },
    { kind: 'interface', name: responseTypeName(entity), exported: true, members: responseMembers },
    {
      kind: 'function',
      name: responseMapperName(entity),
      exported: true,
      params: [
        param('entity', t.named(entity.name)),
        param(related.length > 0 ? 'related' : '_related', t.named(relatedTypeName(entity))),
      ],
      returns: t.named(responseTypeName(entity)),
      body: [s.return(responseValue)],
    },
  ];

  return {
    kind: 'module',
    path,
    header: GENERATED_HEADER,
    imports: [{ from: 'zod', names: ['z'] }, ...entityTypeImports(path, referencedTypes, context.model)],
    declarations,
  };
}

export const transformersGenerator: ArtifactGenerator = {
  kind: 'transformers',
  generate(context: GeneratorContext): OutputUnit[] {
    return context.model.entities.map((entity) => transformerModule(entity, context));
  },
};
