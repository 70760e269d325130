/**
 * Unit tests for the SQLite introspector
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { parseDeclaredType, SqliteIntrospector } from '../../src/connectors/sqlite.js';
import { readSchemaSnapshot } from '../../src/connectors/index.js';
import { ERROR_CODES } from '../../src/contracts/errors.js';

describe('parseDeclaredType', () => {
  it('splits the base type from its parameters', () => {
    expect(parseDeclaredType('DECIMAL(10, 2)')).toEqual({ base: 'decimal', params: [10, 2] });
    expect(parseDeclaredType('VARCHAR(40)')).toEqual({ base: 'varchar', params: [40] });
    expect(parseDeclaredType('unsigned big int')).toEqual({ base: 'unsigned big int', params: [] });
  });

  it('treats an undeclared type as blob', () => {
    expect(parseDeclaredType('')).toEqual({ base: 'blob', params: [] });
  });
});

describe('SqliteIntrospector', () => {
  let testDir: string;
  let dbPath: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tablewright-sqlite-'));
    dbPath = path.join(testDir, 'blog.db');
    const db = new Database(dbPath);
    db.exec(`
      CREATE TABLE authors (
        id INTEGER PRIMARY KEY,
        name VARCHAR(120) NOT NULL,
        email TEXT NOT NULL UNIQUE,
        rating DECIMAL(3, 1)
      );
      CREATE TABLE posts (
        id INTEGER PRIMARY KEY,
        author_id INTEGER NOT NULL REFERENCES authors(id),
        title TEXT NOT NULL DEFAULT 'untitled'
      );
      CREATE UNIQUE INDEX posts_title_lower ON posts (lower(title));
    `);
    db.close();
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('reads columns with their facets', async () => {
    const snapshot = await readSchemaSnapshot(new SqliteIntrospector(dbPath));

    expect(snapshot.tables.map((table) => table.name)).toEqual(['authors', 'posts']);
    expect(snapshot.tables[0].columns).toEqual([
      { name: 'id', nativeType: 'integer', length: null, precision: null, scale: null, nullable: false, default: null, autoIncrement: true },
      { name: 'name', nativeType: 'varchar', length: 120, precision: null, scale: null, nullable: false, default: null, autoIncrement: false },
      { name: 'email', nativeType: 'text', length: null, precision: null, scale: null, nullable: false, default: null, autoIncrement: false },
      { name: 'rating', nativeType: 'decimal', length: null, precision: 3, scale: 1, nullable: true, default: null, autoIncrement: false },
    ]);
    expect(snapshot.tables[1].columns[2].default).toBe("'untitled'");
  });

  it('reads keys, foreign keys and unique constraints', async () => {
    const snapshot = await readSchemaSnapshot(new SqliteIntrospector(dbPath));
    const [authors, posts] = snapshot.tables;

    expect(authors.constraints).toEqual([
      { name: 'authors_pkey', kind: 'primary-key', columns: ['id'] },
      { name: 'sqlite_autoindex_authors_1', kind: 'unique', columns: ['email'] },
    ]);
    expect(posts.constraints).toEqual([
      { name: 'posts_pkey', kind: 'primary-key', columns: ['id'] },
      { name: 'posts_author_id_fkey', kind: 'foreign-key', columns: ['author_id'], referencedTable: 'authors', referencedColumns: ['id'] },
    ]);
  });

  it('keeps expression indexes apart from unique constraints', async () => {
    const snapshot = await readSchemaSnapshot(new SqliteIntrospector(dbPath));
    expect(snapshot.tables[1].indexes).toEqual([
      { name: 'posts_title_lower', columns: [], unique: true, expression: true },
    ]);
  });

  it('fails for a missing database file', async () => {
    await expect(readSchemaSnapshot(new SqliteIntrospector(path.join(testDir, 'missing.db')))).rejects.toMatchObject({
      code: ERROR_CODES.INTROSPECTION_FAILED,
    });
  });
});
