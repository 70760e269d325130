/**
 * Admin descriptor generator
 *
 * @module generators/admin
 */

import type { EntityField, EntityModel } from '../contracts/types.js';
import { e, fromData, prop, t } from './code-model.js';
import type { DocumentValue, ModuleUnit, OutputUnit } from './code-model.js';
import { paths } from './shared.js';
import { GENERATED_HEADER } from './types.js';
import type { ArtifactGenerator, GeneratorContext } from './types.js';

const LIST_LIMIT = 5;
/** Strings up to this length are treated as enum-like and offered as filters */
const FILTERABLE_STRING_LENGTH = 32;

const DISPLAY_KINDS = new Set(['string', 'text', 'uuid']);
const SEARCH_KINDS = new Set(['string', 'text']);

function isFilterable(field: EntityField): boolean {
  if (field.spec.array) return false;
  switch (field.spec.kind) {
    case 'boolean':
    case 'date':
    case 'datetime':
      return true;
    case 'string':
      return field.spec.length !== null && field.spec.length <= FILTERABLE_STRING_LENGTH;
    default:
      return false;
  }
}

/** Display and filter columns for one entity */
export function adminDescriptor(entity: EntityModel): { [key: string]: DocumentValue } {
  const scalars = entity.fields.filter((field) => !field.primaryKey && field.relationshipId === undefined);
  const forward = entity.relations.filter((rel) => rel.direction === 'forward' && rel.cardinality === 'one');

  const listDisplay = [
    ...entity.primaryKey,
    ...scalars.filter((field) => DISPLAY_KINDS.has(field.spec.kind) && !field.spec.array).map((field) => field.name),
    ...forward.map((rel) => rel.accessor),
  ].slice(0, LIST_LIMIT);

  const listFilter = [
    ...scalars.filter(isFilterable).map((field) => field.name),
    ...forward.map((rel) => rel.accessor),
  ].slice(0, LIST_LIMIT);

  return {
    entity: entity.name,
    routePath: entity.routePath,
    listDisplay,
    searchFields: scalars.filter((field) => SEARCH_KINDS.has(field.spec.kind) && !field.spec.array).map((field) => field.name),
    listFilter,
    readonlyFields: entity.fields
      .filter((field) => field.readOnly || field.spec.default.kind === 'server')
      .map((field) => field.name),
    ordering: [...entity.primaryKey],
  };
}

function adminModule(context: GeneratorContext): ModuleUnit {
  const strings = t.array(t.named('string'));
  return {
    kind: 'module',
    path: paths.admin,
    header: GENERATED_HEADER,
    imports: [],
    declarations: [
      {
        kind: 'interface',
        name: 'AdminDescriptor',
        exported: true,
        doc: 'How an admin interface lists, searches and edits one entity',
        members: [
          prop('entity', t.named('string')),
          prop('routePath', t.named('string')),
          prop('listDisplay', strings, { doc: `At most ${LIST_LIMIT} columns` }),
          prop('searchFields', strings),
          prop('listFilter', strings, { doc: `At most ${LIST_LIMIT} filters` }),
          prop('readonlyFields', strings),
          prop('ordering', strings),
        ],
      },
      {
        kind: 'const',
        name: 'adminDescriptors',
        exported: true,
        type: t.array(t.named('AdminDescriptor')),
        value: e.array(context.model.entities.map((entity) => fromData(adminDescriptor(entity)))),
      },
    ],
  };
}

export const adminGenerator: ArtifactGenerator = {
  kind: 'admin',
  generate(context: GeneratorContext): OutputUnit[] {
    return [adminModule(context)];
  },
};
