/**
 * Unit tests for the snapshot introspector
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';
import { SnapshotIntrospector } from '../../src/connectors/snapshot.js';
import { getSchemaIntrospector, readSchemaSnapshot } from '../../src/connectors/index.js';
import { PostgresIntrospector } from '../../src/connectors/postgres.js';
import { SqliteIntrospector } from '../../src/connectors/sqlite.js';
import { ERROR_CODES } from '../../src/contracts/errors.js';
import { computeSchemaHash } from '../../src/utils/hash.js';
import { blogSnapshot } from '../fixtures.js';

const BLOG_SNAPSHOT = fileURLToPath(new URL('../../config/blog.snapshot.yaml', import.meta.url));

describe('SnapshotIntrospector', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tablewright-snapshot-'));
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('loads a YAML snapshot and fills omitted facets', async () => {
    const snapshot = await readSchemaSnapshot(new SnapshotIntrospector(BLOG_SNAPSHOT));

    expect(snapshot.tables.map((table) => table.name)).toEqual(['authors', 'posts', 'tags', 'post_tags']);
    expect(snapshot.tables[0].columns[3]).toEqual({
      name: 'bio',
      nativeType: 'text',
      length: null,
      precision: null,
      scale: null,
      nullable: true,
      default: null,
      autoIncrement: false,
    });
    expect(computeSchemaHash(snapshot)).toBe(computeSchemaHash(blogSnapshot()));
  });

  it('loads a JSON snapshot', async () => {
    const filePath = path.join(testDir, 'schema.json');
    await fs.writeFile(filePath, JSON.stringify({
      tables: [{ name: 'notes', columns: [{ name: 'id', nativeType: 'uuid', nullable: false }] }],
    }));

    const snapshot = await readSchemaSnapshot(new SnapshotIntrospector(filePath));
    expect(snapshot.tables[0]).toMatchObject({ name: 'notes', constraints: [], indexes: [] });
  });

  it('rejects a snapshot of the wrong shape', async () => {
    const filePath = path.join(testDir, 'schema.yaml');
    await fs.writeFile(filePath, 'tables:\n  - name: notes\n    columns: []\n');

    await expect(readSchemaSnapshot(new SnapshotIntrospector(filePath))).rejects.toMatchObject({
      code: ERROR_CODES.SNAPSHOT_INVALID,
      message: `Snapshot file ${filePath} is invalid: tables.0.columns: Array must contain at least 1 element(s)`,
    });
  });

  it('rejects a foreign key without a target', async () => {
    const filePath = path.join(testDir, 'schema.json');
    await fs.writeFile(filePath, JSON.stringify({
      tables: [{
        name: 'notes',
        columns: [{ name: 'owner_id', nativeType: 'integer' }],
        constraints: [{ name: 'notes_owner_fkey', kind: 'foreign-key', columns: ['owner_id'] }],
      }],
    }));

    await expect(readSchemaSnapshot(new SnapshotIntrospector(filePath))).rejects.toThrow(
      'tables.0.constraints.0.referencedTable: Foreign key "notes_owner_fkey" on "notes" has no referenced table'
    );
  });

  it('fails for a missing or unparseable file', async () => {
    await expect(readSchemaSnapshot(new SnapshotIntrospector(path.join(testDir, 'missing.yaml')))).rejects.toMatchObject({
      code: ERROR_CODES.SNAPSHOT_INVALID,
    });

    const filePath = path.join(testDir, 'broken.json');
    await fs.writeFile(filePath, '{ "tables": ');
    await expect(readSchemaSnapshot(new SnapshotIntrospector(filePath))).rejects.toThrow(/^Snapshot file is not parseable: /);
  });
});

describe('getSchemaIntrospector', () => {
  it('picks the introspector for the source type', () => {
    expect(getSchemaIntrospector({ type: 'snapshot', path: '/tmp/schema.yaml' })).toBeInstanceOf(SnapshotIntrospector);
    expect(getSchemaIntrospector({ type: 'sqlite', path: '/tmp/blog.db' })).toBeInstanceOf(SqliteIntrospector);
    expect(getSchemaIntrospector({ type: 'postgres', connectionString: 'postgres://localhost/blog', schema: 'public' }))
      .toBeInstanceOf(PostgresIntrospector);
  });
});
