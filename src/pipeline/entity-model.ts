/**
 * Entity assembly
 *
 * Combines the schema, relationship, type, naming and ordering results into
 * the frozen ResolvedModel that every generator reads.
 *
 * @module pipeline/entity-model
 */

import type {
  DependencyOrder,
  EntityField,
  EntityModel,
  EntityNames,
  EntityRelation,
  NameAssignment,
  RelationshipInfo,
  RelationshipResolution,
  ResolvedModel,
  SchemaModel,
  Table,
  TypeMapping,
} from '../contracts/types.js';
import { compareStrings, deepFreeze } from '../utils/collections.js';
import { uniqueKeysOf } from './schema-model.js';
import { fieldKey } from './type-mapper.js';

export interface AssemblyInput {
  schema: SchemaModel;
  resolution: RelationshipResolution;
  types: TypeMapping;
  names: NameAssignment;
  order: DependencyOrder;
}

/** Look up a map entry the earlier stages guarantee */
function required<K, V>(map: ReadonlyMap<K, V>, key: K, what: string): V {
  const value = map.get(key);
  if (value === undefined) {
    throw new Error(`Internal error: missing ${what} for ${String(key)}`);
  }
  return value;
}

function fieldNames(names: EntityNames, columns: readonly string[]): string[] {
  return columns.map((column) => required(names.fields, column, 'field name'));
}

export function assembleModel(input: AssemblyInput): ResolvedModel {
  const { schema, resolution, order } = input;

  const entities = order.order.map((tableName) => buildEntity(required(schema.tables, tableName, 'table'), input));

  return deepFreeze({
    entities,
    relationships: [...resolution.relationships],
    junctionTables: [...resolution.junctionTables].sort(compareStrings),
    deferred: [...order.deferred].sort(compareStrings),
  });
}

function buildEntity(table: Table, ctx: AssemblyInput): EntityModel {
  const { resolution, names } = ctx;
  const own = required(names, table.name, 'entity names');
  const deferred = ctx.order.deferred;

  const forwardToOne = resolution.relationships.filter(
    (rel) => rel.kind !== 'many-to-many' && rel.sourceTable === table.name
  );
  const owningRelationship = new Map<string, RelationshipInfo>();
  for (const rel of forwardToOne) {
    for (const column of rel.owningColumns) {
      if (!owningRelationship.has(column)) owningRelationship.set(column, rel);
    }
  }

  const uniqueKeys = uniqueKeysOf(table);
  const singleUnique = new Set(uniqueKeys.filter((key) => key.length === 1).map((key) => key[0]));

  const fields = table.columns.map((column): EntityField => {
    const spec = required(ctx.types, fieldKey(table.name, column.name), 'field spec');
    const rel = owningRelationship.get(column.name);
    const primaryKey = table.primaryKey.includes(column.name);
    const field: EntityField = {
      name: required(own.fields, column.name, 'field name'),
      column: column.name,
      spec,
      nullable: spec.nullable || (rel !== undefined && deferred.has(rel.id)),
      primaryKey,
      unique: singleUnique.has(column.name),
      readOnly: spec.autoIncrement || (primaryKey && spec.default.kind === 'server'),
    };
    return rel ? { ...field, relationshipId: rel.id } : field;
  });

  const relations: EntityRelation[] = [];
  for (const rel of resolution.relationships) {
    const isDeferred = deferred.has(rel.id);

    if (rel.kind !== 'many-to-many') {
      if (rel.sourceTable === table.name) {
        const target = required(names, rel.targetTable, 'entity names');
        relations.push({
          accessor: required(own.forwardAccessors, rel.id, 'forward accessor'),
          relationshipId: rel.id,
          kind: rel.kind,
          direction: 'forward',
          cardinality: 'one',
          targetEntity: target.entityName,
          targetTable: rel.targetTable,
          nullable: rel.nullable || isDeferred,
          deferred: isDeferred,
          selfReferential: rel.selfReferential,
          localFields: fieldNames(own, rel.owningColumns),
          remoteFields: fieldNames(target, rel.targetColumns),
        });
      }
      if (rel.targetTable === table.name) {
        const source = required(names, rel.sourceTable, 'entity names');
        relations.push({
          accessor: required(own.reverseAccessors, rel.id, 'reverse accessor'),
          relationshipId: rel.id,
          kind: rel.kind,
          direction: 'reverse',
          cardinality: rel.kind === 'one-to-one' ? 'one' : 'many',
          targetEntity: source.entityName,
          targetTable: rel.sourceTable,
          nullable: rel.kind === 'one-to-one',
          deferred: isDeferred,
          selfReferential: rel.selfReferential,
          localFields: fieldNames(own, rel.targetColumns),
          remoteFields: fieldNames(source, rel.owningColumns),
        });
      }
      continue;
    }

    const junction = rel.junction;
    if (!junction) continue;

    if (rel.sourceTable === table.name) {
      const target = required(names, rel.targetTable, 'entity names');
      relations.push({
        accessor: required(own.forwardAccessors, rel.id, 'many-to-many accessor'),
        relationshipId: rel.id,
        kind: rel.kind,
        direction: 'forward',
        cardinality: 'many',
        targetEntity: target.entityName,
        targetTable: rel.targetTable,
        nullable: false,
        deferred: false,
        selfReferential: rel.selfReferential,
        localFields: fieldNames(own, junction.sourceReferencedColumns),
        remoteFields: fieldNames(target, junction.targetReferencedColumns),
        junction: {
          table: junction.table,
          localColumns: junction.sourceColumns,
          remoteColumns: junction.targetColumns,
        },
      });
    }
    if (rel.targetTable === table.name) {
      const source = required(names, rel.sourceTable, 'entity names');
      relations.push({
        accessor: required(own.reverseAccessors, rel.id, 'many-to-many accessor'),
        relationshipId: rel.id,
        kind: rel.kind,
        direction: 'reverse',
        cardinality: 'many',
        targetEntity: source.entityName,
        targetTable: rel.sourceTable,
        nullable: false,
        deferred: false,
        selfReferential: rel.selfReferential,
        localFields: fieldNames(own, junction.targetReferencedColumns),
        remoteFields: fieldNames(source, junction.sourceReferencedColumns),
        junction: {
          table: junction.table,
          localColumns: junction.targetColumns,
          remoteColumns: junction.sourceColumns,
        },
      });
    }
  }

  relations.sort((a, b) => relationRank(a) - relationRank(b) || compareStrings(a.accessor, b.accessor));

  const primaryKeyColumns = new Set(table.primaryKey);
  const uniqueLookups = table.columns
    .filter((c) => singleUnique.has(c.name) && !primaryKeyColumns.has(c.name))
    .map((c) => required(own.fields, c.name, 'field name'));

  const seenTogether = new Set<string>([[...table.primaryKey].sort(compareStrings).join(',')]);
  const uniqueTogether: string[][] = [];
  for (const key of uniqueKeys) {
    if (key.length < 2) continue;
    const id = [...key].sort(compareStrings).join(',');
    if (seenTogether.has(id)) continue;
    seenTogether.add(id);
    uniqueTogether.push(fieldNames(own, key));
  }

  return {
    table: table.name,
    name: own.entityName,
    fileName: own.fileName,
    routePath: own.routePath,
    primaryKey: fieldNames(own, table.primaryKey),
    fields,
    relations,
    uniqueLookups,
    uniqueTogether,
  };
}

/** Forward to-one, many-to-many, then reverse */
function relationRank(relation: EntityRelation): number {
  if (relation.kind === 'many-to-many') return 1;
  return relation.direction === 'forward' ? 0 : 2;
}
