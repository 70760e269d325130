/**
 * PostgreSQL Schema Introspector
 *
 * Reads tables, columns, constraints and indexes of one schema from
 * information_schema and pg_catalog inside a single read-only transaction.
 */

import pg from 'pg';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import type { SchemaIntrospector } from './index.js';
import type {
  ConstraintKind,
  RawColumn,
  RawConstraint,
  RawIndex,
  RawTable,
  SchemaSnapshot,
} from '../contracts/types.js';

/**
 * The slice of a pg client the introspector needs
 */
export interface CatalogClient {
  connect(): Promise<void>;
  query(sql: string, params?: unknown[]): Promise<Record<string, unknown>[]>;
  end(): Promise<void>;
}

export type CatalogClientFactory = (connectionString: string) => CatalogClient;

/**
 * Default factory backed by pg.Client
 */
export const createPgCatalogClient: CatalogClientFactory = (connectionString) => {
  const client = new pg.Client({ connectionString });
  // Attach error handler to prevent unhandled error crashes on connection termination
  client.on('error', (err) => {
    logger.warn('PostgreSQL client error (connection may have been terminated)', { error: err.message });
  });
  return {
    connect: () => client.connect(),
    query: async (sql, params) => (await client.query(sql, params)).rows,
    end: () => client.end(),
  };
};

// =============================================================================
// CATALOG QUERIES
// =============================================================================

const TABLES_QUERY = `
  SELECT t.table_name
  FROM information_schema.tables t
  WHERE t.table_schema = $1
    AND t.table_type = 'BASE TABLE'
  ORDER BY t.table_name
`;

const COLUMNS_QUERY = `
  SELECT
    c.table_name,
    c.column_name,
    c.data_type,
    c.udt_name,
    c.is_nullable,
    c.column_default,
    c.is_identity,
    c.character_maximum_length,
    c.numeric_precision,
    c.numeric_scale
  FROM information_schema.columns c
  WHERE c.table_schema = $1
  ORDER BY c.table_name, c.ordinal_position
`;

const CONSTRAINTS_QUERY = `
  SELECT
    con.conname AS constraint_name,
    rel.relname AS table_name,
    con.contype AS constraint_type,
    ARRAY(
      SELECT att.attname
      FROM unnest(con.conkey) WITH ORDINALITY AS k(attnum, ord)
      JOIN pg_attribute att ON att.attrelid = con.conrelid AND att.attnum = k.attnum
      ORDER BY k.ord
    )::text[] AS columns,
    frel.relname AS referenced_table,
    ARRAY(
      SELECT att.attname
      FROM unnest(con.confkey) WITH ORDINALITY AS k(attnum, ord)
      JOIN pg_attribute att ON att.attrelid = con.confrelid AND att.attnum = k.attnum
      ORDER BY k.ord
    )::text[] AS referenced_columns,
    pg_get_constraintdef(con.oid) AS definition
  FROM pg_constraint con
  JOIN pg_class rel ON rel.oid = con.conrelid
  JOIN pg_namespace nsp ON nsp.oid = rel.relnamespace
  LEFT JOIN pg_class frel ON frel.oid = con.confrelid
  WHERE nsp.nspname = $1
    AND con.contype IN ('p', 'u', 'c', 'f')
  ORDER BY rel.relname, con.conname
`;

const INDEXES_QUERY = `
  SELECT
    i.relname AS index_name,
    t.relname AS table_name,
    ix.indisunique AS is_unique,
    (ix.indexprs IS NOT NULL OR ix.indpred IS NOT NULL) AS is_expression,
    ARRAY(
      SELECT a.attname
      FROM unnest(ix.indkey::int2[]) WITH ORDINALITY AS k(attnum, ord)
      JOIN pg_attribute a ON a.attrelid = t.oid AND a.attnum = k.attnum
      ORDER BY k.ord
    )::text[] AS columns
  FROM pg_index ix
  JOIN pg_class t ON t.oid = ix.indrelid
  JOIN pg_class i ON i.oid = ix.indexrelid
  JOIN pg_namespace n ON n.oid = t.relnamespace
  WHERE n.nspname = $1
    AND NOT ix.indisprimary
  ORDER BY t.relname, i.relname
`;

// =============================================================================
// ROW SCHEMAS
// =============================================================================

/** pg returns int4 as number and int8/numeric as string */
const count = z.union([z.number().int(), z.string().regex(/^\d+$/).transform(Number)]).nullable();

const TableRowSchema = z.object({ table_name: z.string() });

const ColumnRowSchema = z.object({
  table_name: z.string(),
  column_name: z.string(),
  data_type: z.string(),
  udt_name: z.string(),
  is_nullable: z.string(),
  column_default: z.string().nullable(),
  is_identity: z.string().nullable(),
  character_maximum_length: count,
  numeric_precision: count,
  numeric_scale: count,
});

const ConstraintRowSchema = z.object({
  constraint_name: z.string(),
  table_name: z.string(),
  constraint_type: z.enum(['p', 'u', 'c', 'f']),
  columns: z.array(z.string()),
  referenced_table: z.string().nullable(),
  referenced_columns: z.array(z.string()),
  definition: z.string().nullable(),
});

const IndexRowSchema = z.object({
  index_name: z.string(),
  table_name: z.string(),
  is_unique: z.boolean(),
  is_expression: z.boolean(),
  columns: z.array(z.string()),
});

const CONSTRAINT_KINDS: Record<'p' | 'u' | 'c' | 'f', ConstraintKind> = {
  p: 'primary-key',
  u: 'unique',
  c: 'check',
  f: 'foreign-key',
};

/** Types whose information_schema precision is a meaningful column facet */
const PRECISION_TYPES = new Set(['numeric', 'decimal']);

// =============================================================================
// INTROSPECTOR
// =============================================================================

export class PostgresIntrospector implements SchemaIntrospector {
  private client: CatalogClient | null = null;

  constructor(
    private readonly connectionString: string,
    private readonly schema: string = 'public',
    private readonly clientFactory: CatalogClientFactory = createPgCatalogClient
  ) {}

  async connect(): Promise<void> {
    const client = this.clientFactory(this.connectionString);
    try {
      await client.connect();
    } catch (error) {
      logger.error('Failed to connect to PostgreSQL', error);
      throw error;
    }
    this.client = client;
    logger.debug('Connected to PostgreSQL database');
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      await this.client.end();
      this.client = null;
      logger.debug('Disconnected from PostgreSQL database');
    }
  }

  async introspect(): Promise<SchemaSnapshot> {
    const client = this.client;
    if (!client) {
      throw new Error('Not connected to database');
    }

    await client.query('BEGIN ISOLATION LEVEL REPEATABLE READ READ ONLY');
    try {
      const params = [this.schema];
      const tableRows = z.array(TableRowSchema).parse(await client.query(TABLES_QUERY, params));
      const columnRows = z.array(ColumnRowSchema).parse(await client.query(COLUMNS_QUERY, params));
      const constraintRows = z.array(ConstraintRowSchema).parse(await client.query(CONSTRAINTS_QUERY, params));
      const indexRows = z.array(IndexRowSchema).parse(await client.query(INDEXES_QUERY, params));
      await client.query('COMMIT');

      const tables = new Map<string, RawTable>();
      for (const row of tableRows) {
        tables.set(row.table_name, { name: row.table_name, columns: [], constraints: [], indexes: [] });
      }

      for (const row of columnRows) {
        tables.get(row.table_name)?.columns.push(toRawColumn(row));
      }

      for (const row of constraintRows) {
        tables.get(row.table_name)?.constraints.push(toRawConstraint(row));
      }

      for (const row of indexRows) {
        const index: RawIndex = {
          name: row.index_name,
          columns: row.columns,
          unique: row.is_unique,
          expression: row.is_expression,
        };
        tables.get(row.table_name)?.indexes.push(index);
      }

      logger.debug(`Introspected ${tables.size} tables from schema ${this.schema}`);
      return { tables: [...tables.values()] };
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    }
  }
}

function toRawColumn(row: z.infer<typeof ColumnRowSchema>): RawColumn {
  const isSerial = row.column_default !== null && row.column_default.startsWith('nextval(');
  return {
    name: row.column_name,
    nativeType: nativeTypeOf(row.data_type, row.udt_name),
    length: row.character_maximum_length,
    precision: PRECISION_TYPES.has(row.data_type) ? row.numeric_precision : null,
    scale: PRECISION_TYPES.has(row.data_type) ? row.numeric_scale : null,
    nullable: row.is_nullable === 'YES',
    default: isSerial ? null : row.column_default,
    autoIncrement: isSerial || row.is_identity === 'YES',
  };
}

/**
 * information_schema reports arrays as "ARRAY" and enums/domains as
 * "USER-DEFINED"; the udt name carries the real type in both cases.
 */
function nativeTypeOf(dataType: string, udtName: string): string {
  if (dataType === 'ARRAY') {
    return `${udtName.replace(/^_/, '')}[]`;
  }
  if (dataType === 'USER-DEFINED') {
    return udtName;
  }
  return dataType;
}

function toRawConstraint(row: z.infer<typeof ConstraintRowSchema>): RawConstraint {
  const kind = CONSTRAINT_KINDS[row.constraint_type];
  const constraint: RawConstraint = { name: row.constraint_name, kind, columns: row.columns };
  if (kind === 'foreign-key' && row.referenced_table !== null) {
    constraint.referencedTable = row.referenced_table;
    constraint.referencedColumns = row.referenced_columns;
  }
  if (kind === 'check' && row.definition !== null) {
    constraint.definition = row.definition;
  }
  return constraint;
}
