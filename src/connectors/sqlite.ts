/**
 * SQLite Schema Introspector
 *
 * Reads a database file through better-sqlite3 PRAGMA queries. The file is
 * opened read-only and must already exist.
 */

import Database from 'better-sqlite3';
import { z } from 'zod';
import { ERROR_CODES, IntrospectionError } from '../contracts/errors.js';
import { compareStrings } from '../utils/collections.js';
import { FileWriter } from '../utils/file-writer.js';
import { logger } from '../utils/logger.js';
import type { SchemaIntrospector } from './index.js';
import type { RawColumn, RawConstraint, RawIndex, RawTable, SchemaSnapshot } from '../contracts/types.js';

const TableInfoSchema = z.object({
  cid: z.number(),
  name: z.string(),
  type: z.string(),
  notnull: z.number(),
  dflt_value: z.string().nullable(),
  pk: z.number(),
});

const ForeignKeySchema = z.object({
  id: z.number(),
  seq: z.number(),
  table: z.string(),
  from: z.string(),
  to: z.string().nullable(),
});

const IndexListSchema = z.object({
  name: z.string(),
  unique: z.number(),
  origin: z.string(),
  partial: z.number(),
});

const IndexInfoSchema = z.object({
  seqno: z.number(),
  cid: z.number(),
  name: z.string().nullable(),
});

/** Splits "DECIMAL(10, 2)" into its base type and numeric parameters */
export function parseDeclaredType(declared: string): { base: string; params: number[] } {
  const match = /^\s*([^(]*?)\s*(?:\(\s*([^)]*)\))?\s*$/.exec(declared);
  const base = (match?.[1] ?? declared).trim().toLowerCase();
  const params = (match?.[2] ?? '')
    .split(',')
    .map((p) => p.trim())
    .filter((p) => /^\d+$/.test(p))
    .map(Number);
  return { base: base === '' ? 'blob' : base, params };
}

function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

const LENGTH_TYPES = new Set(['varchar', 'character varying', 'char', 'character', 'nvarchar', 'nchar', 'varying character', 'native character']);

export class SqliteIntrospector implements SchemaIntrospector {
  private db: Database.Database | null = null;

  constructor(private readonly filePath: string) {}

  async connect(): Promise<void> {
    if (!(await FileWriter.validateFileExists(this.filePath))) {
      throw new IntrospectionError(ERROR_CODES.INTROSPECTION_FAILED, `SQLite database not found: ${this.filePath}`, {
        path: this.filePath,
      });
    }
    this.db = new Database(this.filePath, { readonly: true, fileMustExist: true });
    logger.debug('Opened SQLite database', { path: this.filePath });
  }

  async disconnect(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
      logger.debug('Closed SQLite database');
    }
  }

  async introspect(): Promise<SchemaSnapshot> {
    const db = this.db;
    if (!db) {
      throw new Error('Not connected to database');
    }

    const names = z
      .array(z.object({ name: z.string() }))
      .parse(
        db
          .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
          .all()
      );

    const read = db.transaction(() => names.map(({ name }) => this.readTable(db, name)));
    const tables = read();

    logger.debug(`Introspected ${tables.length} tables from ${this.filePath}`);
    return { tables };
  }

  private readTable(db: Database.Database, name: string): RawTable {
    const quoted = quoteIdentifier(name);
    const info = z.array(TableInfoSchema).parse(db.pragma(`table_info(${quoted})`));
    const pkColumns = info.filter((c) => c.pk > 0).sort((a, b) => a.pk - b.pk);

    const columns = info.map((c): RawColumn => {
      const { base, params } = parseDeclaredType(c.type);
      const isRowidAlias = pkColumns.length === 1 && c.pk === 1 && base === 'integer';
      const hasLength = LENGTH_TYPES.has(base);
      return {
        name: c.name,
        nativeType: base,
        length: hasLength ? (params[0] ?? null) : null,
        precision: !hasLength ? (params[0] ?? null) : null,
        scale: !hasLength ? (params[1] ?? null) : null,
        nullable: c.notnull === 0 && c.pk === 0,
        default: c.dflt_value,
        autoIncrement: isRowidAlias,
      };
    });

    const constraints: RawConstraint[] = [];
    if (pkColumns.length > 0) {
      constraints.push({ name: `${name}_pkey`, kind: 'primary-key', columns: pkColumns.map((c) => c.name) });
    }

    const fkRows = z.array(ForeignKeySchema).parse(db.pragma(`foreign_key_list(${quoted})`));
    const fkIds = [...new Set(fkRows.map((r) => r.id))].sort((a, b) => a - b);
    for (const id of fkIds) {
      const parts = fkRows.filter((r) => r.id === id).sort((a, b) => a.seq - b.seq);
      const from = parts.map((p) => p.from);
      const to = parts.map((p) => p.to);
      const constraint: RawConstraint = {
        name: `${name}_${from.join('_')}_fkey`,
        kind: 'foreign-key',
        columns: from,
        referencedTable: parts[0].table,
      };
      const explicit = to.filter((col): col is string => col !== null);
      if (explicit.length === to.length) {
        constraint.referencedColumns = explicit;
      }
      constraints.push(constraint);
    }

    const indexes: RawIndex[] = [];
    const indexList = z.array(IndexListSchema).parse(db.pragma(`index_list(${quoted})`));
    for (const entry of [...indexList].sort((a, b) => compareStrings(a.name, b.name))) {
      if (entry.origin === 'pk') continue;
      const indexInfo = z
        .array(IndexInfoSchema)
        .parse(db.pragma(`index_info(${quoteIdentifier(entry.name)})`))
        .sort((a, b) => a.seqno - b.seqno);
      const expression = entry.partial === 1 || indexInfo.some((c) => c.cid < 0);
      const indexColumns = indexInfo.map((c) => c.name).filter((n): n is string => n !== null);

      if (entry.origin === 'u' && !expression) {
        constraints.push({ name: entry.name, kind: 'unique', columns: indexColumns });
      } else {
        indexes.push({ name: entry.name, columns: indexColumns, unique: entry.unique === 1, expression });
      }
    }

    return { name, columns, constraints, indexes };
  }
}
