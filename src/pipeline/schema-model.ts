/**
 * Schema Model
 *
 * Builds the immutable in-memory schema from an introspection snapshot:
 * applies table filters, checks structural consistency and keys tables by
 * name in sorted order so the model is independent of snapshot order.
 *
 * @module pipeline/schema-model
 */

import type { Column, Constraint, Index, RawTable, SchemaModel, SchemaSnapshot, Table } from '../contracts/types.js';
import { ERROR_CODES, SchemaConsistencyError } from '../contracts/errors.js';
import type { Diagnostics } from '../utils/diagnostics.js';
import { byName, deepFreeze } from '../utils/collections.js';

export interface TableFilters {
  /** When set, only these tables are kept */
  include?: readonly string[];
  exclude?: readonly string[];
}

/**
 * Build the Schema Model.
 *
 * @throws SchemaConsistencyError on duplicate tables/columns, multiple primary
 * keys, constraints over unknown columns, or filter entries naming unknown tables
 */
export function buildSchemaModel(
  snapshot: SchemaSnapshot,
  filters: TableFilters,
  diagnostics: Diagnostics
): SchemaModel {
  const byTableName = new Map<string, RawTable>();
  for (const table of snapshot.tables) {
    if (byTableName.has(table.name)) {
      throw new SchemaConsistencyError(`Duplicate table "${table.name}"`, { table: table.name });
    }
    byTableName.set(table.name, table);
  }

  checkFilter('include_tables', filters.include ?? [], byTableName);
  checkFilter('exclude_tables', filters.exclude ?? [], byTableName);

  const include = filters.include ? new Set(filters.include) : null;
  const exclude = new Set(filters.exclude ?? []);

  const tables = new Map<string, Table>();
  for (const raw of [...byTableName.values()].sort(byName)) {
    if (include && !include.has(raw.name)) continue;
    if (exclude.has(raw.name)) continue;

    const table = buildTable(raw);
    if (table.primaryKey.length === 0) {
      diagnostics.warn(
        ERROR_CODES.TABLE_WITHOUT_PRIMARY_KEY,
        `Table "${raw.name}" has no primary key and is skipped`,
        { table: raw.name }
      );
      continue;
    }
    tables.set(table.name, table);
  }

  return deepFreeze({ tables });
}

/**
 * Column sets guaranteed unique on a table: the primary key, unique
 * constraints and unique indexes over plain columns. Expression and partial
 * indexes do not qualify.
 */
export function uniqueKeysOf(table: Table): readonly (readonly string[])[] {
  const keys: (readonly string[])[] = [];
  if (table.primaryKey.length > 0) keys.push(table.primaryKey);
  for (const constraint of table.constraints) {
    if (constraint.kind === 'unique' && constraint.columns.length > 0) keys.push(constraint.columns);
  }
  for (const index of table.indexes) {
    if (index.unique && !index.expression && index.columns.length > 0) keys.push(index.columns);
  }
  return keys;
}

function checkFilter(option: string, names: readonly string[], known: ReadonlyMap<string, RawTable>): void {
  for (const name of names) {
    if (!known.has(name)) {
      throw new SchemaConsistencyError(`${option} names unknown table "${name}"`, { option, table: name });
    }
  }
}

function buildTable(raw: RawTable): Table {
  const columnNames = new Set<string>();
  for (const column of raw.columns) {
    if (columnNames.has(column.name)) {
      throw new SchemaConsistencyError(`Duplicate column "${raw.name}.${column.name}"`, {
        table: raw.name,
        column: column.name,
      });
    }
    columnNames.add(column.name);
  }

  const primaryKeys = raw.constraints.filter((c) => c.kind === 'primary-key');
  if (primaryKeys.length > 1) {
    throw new SchemaConsistencyError(
      `Table "${raw.name}" defines ${primaryKeys.length} primary keys (${primaryKeys.map((c) => c.name).join(', ')})`,
      { table: raw.name }
    );
  }

  for (const constraint of raw.constraints) {
    if (constraint.kind === 'check' && constraint.columns.length === 0) continue;
    if (constraint.columns.length === 0) {
      throw new SchemaConsistencyError(`Constraint "${constraint.name}" on "${raw.name}" has no columns`, {
        table: raw.name,
        constraint: constraint.name,
      });
    }
    checkColumns(raw.name, constraint.name, constraint.columns, columnNames);
  }

  for (const index of raw.indexes) {
    checkColumns(raw.name, index.name, index.columns, columnNames);
  }

  const columns: Column[] = raw.columns.map((c) => ({ ...c }));
  const constraints: Constraint[] = raw.constraints.map((c) => ({ ...c, columns: [...c.columns] }));
  const indexes: Index[] = raw.indexes.map((i) => ({ ...i, columns: [...i.columns] }));

  return {
    name: raw.name,
    columns,
    constraints,
    indexes,
    primaryKey: primaryKeys.length === 1 ? [...primaryKeys[0].columns] : [],
  };
}

function checkColumns(table: string, owner: string, columns: readonly string[], known: ReadonlySet<string>): void {
  for (const column of columns) {
    if (!known.has(column)) {
      throw new SchemaConsistencyError(`"${owner}" on "${table}" references unknown column "${column}"`, {
        table,
        constraint: owner,
        column,
      });
    }
  }
}
