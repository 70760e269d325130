/**
 * Relationship Resolver
 *
 * Classifies every foreign key into a relationship shape, collapses pure
 * junction tables into many-to-many relationships and assigns each
 * relationship a deterministic identity and resolution priority.
 *
 * Junction policy: a table is a junction when it has exactly two foreign
 * keys, neither pointing back at itself (both may point at the same table,
 * which yields a self-referential many-to-many), their column sets are
 * disjoint and together form the whole primary key, and every remaining
 * column is a configured housekeeping column. Extra columns of any kind,
 * nullable or not, disqualify the table, as does being the target of
 * another table's foreign key.
 *
 * @module pipeline/relationships
 */

import type {
  JunctionInfo,
  RelationshipInfo,
  RelationshipKind,
  RelationshipResolution,
  SchemaModel,
  Table,
} from '../contracts/types.js';
import { ERROR_CODES, SchemaConsistencyError } from '../contracts/errors.js';
import type { Diagnostics } from '../utils/diagnostics.js';
import { compareStrings, deepFreeze, isSubset, sameMembers } from '../utils/collections.js';
import { uniqueKeysOf } from './schema-model.js';

export interface RelationshipOptions {
  /** Columns a junction table may carry besides its two foreign keys */
  housekeepingColumns?: readonly string[];
}

/** A foreign key whose target exists and whose shape has been checked */
interface ResolvedForeignKey {
  readonly table: string;
  readonly name: string;
  readonly columns: readonly string[];
  readonly referencedTable: string;
  readonly referencedColumns: readonly string[];
}

type PendingRelationship = Omit<RelationshipInfo, 'priority'> & { readonly originTable: string };

// =============================================================================
// RESOLUTION
// =============================================================================

/**
 * Resolve all relationships of the schema.
 *
 * @throws SchemaConsistencyError when a foreign key's column count differs
 * from its referenced key or names columns the target lacks
 */
export function resolveRelationships(
  model: SchemaModel,
  options: RelationshipOptions,
  diagnostics: Diagnostics
): RelationshipResolution {
  const housekeeping = new Set(options.housekeepingColumns ?? []);
  const pending: PendingRelationship[] = [];
  const junctionTables = new Set<string>();

  // A table other tables point at is an entity in its own right
  const referencedElsewhere = new Set<string>();
  for (const table of model.tables.values()) {
    for (const constraint of table.constraints) {
      if (constraint.kind === 'foreign-key' && constraint.referencedTable !== undefined && constraint.referencedTable !== table.name) {
        referencedElsewhere.add(constraint.referencedTable);
      }
    }
  }

  for (const table of model.tables.values()) {
    const foreignKeys = resolveForeignKeys(table, model, diagnostics);

    const junction = referencedElsewhere.has(table.name)
      ? null
      : classifyJunction(table, foreignKeys, housekeeping, diagnostics);
    if (junction) {
      junctionTables.add(table.name);
      pending.push(manyToMany(table, junction[0], junction[1]));
      continue;
    }

    for (const fk of foreignKeys) {
      pending.push(toOneRelationship(table, fk));
    }
  }

  const relationships = pending
    .sort((a, b) =>
      compareStrings(a.originTable, b.originTable) ||
      compareStrings(a.owningColumns.join(','), b.owningColumns.join(',')) ||
      compareStrings(a.targetTable, b.targetTable)
    )
    .map(({ originTable: _origin, ...rel }, priority): RelationshipInfo => ({ ...rel, priority }));

  return deepFreeze({ relationships, junctionTables });
}

/**
 * Check each FK on the table, dropping dangling ones with a warning and
 * collapsing duplicates over the same columns to the same target.
 */
function resolveForeignKeys(table: Table, model: SchemaModel, diagnostics: Diagnostics): ResolvedForeignKey[] {
  const resolved: ResolvedForeignKey[] = [];
  const seen = new Set<string>();

  const foreignKeys = table.constraints
    .filter((c) => c.kind === 'foreign-key')
    .sort((a, b) => compareStrings(a.name, b.name));

  for (const fk of foreignKeys) {
    const referencedName = fk.referencedTable ?? '';
    const referenced = model.tables.get(referencedName);
    if (!referenced) {
      diagnostics.warn(
        ERROR_CODES.DANGLING_REFERENCE,
        `Foreign key "${fk.name}" on "${table.name}" (${fk.columns.join(', ')}) references "${referencedName}", which is not in the schema; relationship dropped`,
        { table: table.name, constraint: fk.name, referencedTable: referencedName }
      );
      continue;
    }

    const referencedColumns = fk.referencedColumns ?? referenced.primaryKey;
    if (referencedColumns.length !== fk.columns.length) {
      throw new SchemaConsistencyError(
        `Foreign key "${fk.name}" on "${table.name}" has ${fk.columns.length} column(s) but "${referenced.name}" key (${referencedColumns.join(', ')}) has ${referencedColumns.length}`,
        { table: table.name, constraint: fk.name, referencedTable: referenced.name }
      );
    }
    const targetColumns = new Set(referenced.columns.map((c) => c.name));
    for (const column of referencedColumns) {
      if (!targetColumns.has(column)) {
        throw new SchemaConsistencyError(
          `Foreign key "${fk.name}" on "${table.name}" references unknown column "${referenced.name}.${column}"`,
          { table: table.name, constraint: fk.name, referencedTable: referenced.name, column }
        );
      }
    }

    const key = `${fk.columns.join(',')}->${referenced.name}(${referencedColumns.join(',')})`;
    if (seen.has(key)) continue;
    seen.add(key);

    resolved.push({
      table: table.name,
      name: fk.name,
      columns: fk.columns,
      referencedTable: referenced.name,
      referencedColumns,
    });
  }

  return resolved;
}

/**
 * Returns the FK pair ordered (source side, target side) when the table is a
 * pure junction, null otherwise.
 */
function classifyJunction(
  table: Table,
  foreignKeys: readonly ResolvedForeignKey[],
  housekeeping: ReadonlySet<string>,
  diagnostics: Diagnostics
): [ResolvedForeignKey, ResolvedForeignKey] | null {
  if (foreignKeys.length !== 2) return null;
  const [first, second] = [...foreignKeys].sort(
    (a, b) =>
      compareStrings(a.referencedTable, b.referencedTable) ||
      compareStrings(a.columns.join(','), b.columns.join(','))
  );
  if (first.referencedTable === table.name || second.referencedTable === table.name) return null;

  const fkColumns = [...first.columns, ...second.columns];
  const disjoint = new Set(fkColumns).size === fkColumns.length;
  const keyIsUnion = disjoint && sameMembers(fkColumns, table.primaryKey);

  const extras = table.columns.map((c) => c.name).filter((name) => !fkColumns.includes(name));
  const onlyHousekeeping = extras.every((name) => housekeeping.has(name));

  if (keyIsUnion && onlyHousekeeping) {
    return [first, second];
  }

  if (keyIsUnion !== onlyHousekeeping) {
    const reason = keyIsUnion
      ? `it carries extra column(s) ${extras.filter((n) => !housekeeping.has(n)).join(', ')}`
      : `its primary key (${table.primaryKey.join(', ')}) is not exactly the two foreign keys`;
    diagnostics.warn(
      ERROR_CODES.RELATIONSHIP_AMBIGUOUS,
      `Table "${table.name}" links "${first.referencedTable}" and "${second.referencedTable}" but is not treated as a junction because ${reason}; generating two many-to-one relationships`,
      { table: table.name }
    );
  }
  return null;
}

// =============================================================================
// RELATIONSHIP CONSTRUCTION
// =============================================================================

function relationshipId(kind: RelationshipKind, origin: string, owning: readonly string[], target: string): string {
  return `${kind}:${origin}(${owning.join(',')})->${target}`;
}

function reverseKeyOf(kind: RelationshipKind, origin: string, owning: readonly string[]): string {
  return `${origin}:${kind}:${owning.join(',')}`;
}

function toOneRelationship(table: Table, fk: ResolvedForeignKey): PendingRelationship {
  const unique = uniqueKeysOf(table).some((key) => isSubset(key, fk.columns));
  const kind: RelationshipKind = unique ? 'one-to-one' : 'many-to-one';
  const nullable = fk.columns.some((name) => table.columns.find((c) => c.name === name)?.nullable === true);

  return {
    originTable: table.name,
    id: relationshipId(kind, table.name, fk.columns, fk.referencedTable),
    kind,
    selfReferential: fk.referencedTable === table.name,
    sourceTable: table.name,
    targetTable: fk.referencedTable,
    owningColumns: fk.columns,
    targetColumns: fk.referencedColumns,
    nullable,
    constraintName: fk.name,
    reverseKey: reverseKeyOf(kind, table.name, fk.columns),
  };
}

function manyToMany(junctionTable: Table, source: ResolvedForeignKey, target: ResolvedForeignKey): PendingRelationship {
  const kind: RelationshipKind = 'many-to-many';
  const junction: JunctionInfo = {
    table: junctionTable.name,
    sourceColumns: source.columns,
    sourceReferencedColumns: source.referencedColumns,
    targetColumns: target.columns,
    targetReferencedColumns: target.referencedColumns,
  };

  return {
    originTable: junctionTable.name,
    id: relationshipId(kind, junctionTable.name, source.columns, target.referencedTable),
    kind,
    selfReferential: source.referencedTable === target.referencedTable,
    sourceTable: source.referencedTable,
    targetTable: target.referencedTable,
    owningColumns: source.columns,
    targetColumns: target.referencedColumns,
    nullable: false,
    constraintName: junctionTable.name,
    reverseKey: reverseKeyOf(kind, junctionTable.name, source.columns),
    junction,
  };
}
