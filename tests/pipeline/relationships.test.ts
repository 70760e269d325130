/**
 * Unit tests for the Relationship Resolver
 */

import { describe, it, expect } from 'vitest';
import { buildSchemaModel } from '../../src/pipeline/schema-model.js';
import { resolveRelationships } from '../../src/pipeline/relationships.js';
import type { RelationshipOptions } from '../../src/pipeline/relationships.js';
import { ERROR_CODES, SchemaConsistencyError } from '../../src/contracts/errors.js';
import type { SchemaSnapshot } from '../../src/contracts/types.js';
import { Diagnostics } from '../../src/utils/diagnostics.js';
import {
  blogSnapshot,
  col,
  employeeSnapshot,
  fk,
  followSnapshot,
  pk,
  serial,
  shipmentSnapshot,
  table,
  unique,
} from '../fixtures.js';

function resolveSnapshot(snapshot: SchemaSnapshot, options: RelationshipOptions = {}, exclude: string[] = []) {
  const diagnostics = new Diagnostics();
  const model = buildSchemaModel(snapshot, { exclude }, diagnostics);
  return { resolution: resolveRelationships(model, options, diagnostics), diagnostics };
}

/** Blog schema whose post_tags also records when the tag was applied */
function timestampedTagsSnapshot(): SchemaSnapshot {
  const snapshot = blogSnapshot();
  return {
    tables: snapshot.tables.map((t) =>
      t.name === 'post_tags' ? { ...t, columns: [...t.columns, col('created_at', 'timestamp with time zone')] } : t
    ),
  };
}

describe('resolveRelationships', () => {
  it('resolves a plain foreign key as many-to-one', () => {
    const { resolution } = resolveSnapshot(blogSnapshot());
    const postAuthor = resolution.relationships.find((rel) => rel.sourceTable === 'posts');

    expect(postAuthor).toMatchObject({
      id: 'many-to-one:posts(author_id)->authors',
      kind: 'many-to-one',
      selfReferential: false,
      targetTable: 'authors',
      owningColumns: ['author_id'],
      targetColumns: ['id'],
      nullable: false,
      constraintName: 'posts_author_id_fkey',
      priority: 1,
    });
  });

  it('collapses a pure junction table into many-to-many', () => {
    const { resolution, diagnostics } = resolveSnapshot(blogSnapshot());

    expect([...resolution.junctionTables]).toEqual(['post_tags']);
    expect(resolution.relationships[0]).toMatchObject({
      id: 'many-to-many:post_tags(post_id)->tags',
      kind: 'many-to-many',
      sourceTable: 'posts',
      targetTable: 'tags',
      constraintName: 'post_tags',
      priority: 0,
      junction: {
        table: 'post_tags',
        sourceColumns: ['post_id'],
        sourceReferencedColumns: ['id'],
        targetColumns: ['tag_id'],
        targetReferencedColumns: ['id'],
      },
    });
    expect(diagnostics.count).toBe(0);
  });

  it('keeps a linking table with extra columns as an entity and warns', () => {
    const { resolution, diagnostics } = resolveSnapshot(timestampedTagsSnapshot());

    expect(resolution.junctionTables.size).toBe(0);
    expect(resolution.relationships.map((rel) => rel.id)).toEqual([
      'many-to-one:post_tags(post_id)->posts',
      'many-to-one:post_tags(tag_id)->tags',
      'many-to-one:posts(author_id)->authors',
    ]);
    expect(diagnostics.byCode(ERROR_CODES.RELATIONSHIP_AMBIGUOUS).map((w) => w.message)).toEqual([
      'Table "post_tags" links "posts" and "tags" but is not treated as a junction because it carries extra column(s) created_at; generating two many-to-one relationships',
    ]);
  });

  it('accepts configured housekeeping columns on a junction', () => {
    const { resolution, diagnostics } = resolveSnapshot(timestampedTagsSnapshot(), { housekeepingColumns: ['created_at'] });

    expect([...resolution.junctionTables]).toEqual(['post_tags']);
    expect(diagnostics.count).toBe(0);
  });

  it('marks a self-referential foreign key', () => {
    const { resolution } = resolveSnapshot(employeeSnapshot());

    expect(resolution.relationships).toHaveLength(1);
    expect(resolution.relationships[0]).toMatchObject({
      id: 'many-to-one:employees(manager_id)->employees',
      selfReferential: true,
      nullable: true,
    });
  });

  it('keeps two foreign keys to the same table distinct', () => {
    const { resolution, diagnostics } = resolveSnapshot(shipmentSnapshot());

    expect(resolution.junctionTables.size).toBe(0);
    expect(resolution.relationships.map((rel) => [rel.id, rel.priority])).toEqual([
      ['many-to-one:shipments(billing_address_id)->addresses', 0],
      ['many-to-one:shipments(shipping_address_id)->addresses', 1],
    ]);
    expect(diagnostics.count).toBe(0);
  });

  it('resolves a self-referential many-to-many', () => {
    const { resolution } = resolveSnapshot(followSnapshot());

    expect(resolution.relationships).toHaveLength(1);
    expect(resolution.relationships[0]).toMatchObject({
      id: 'many-to-many:follows(followee_id)->users',
      selfReferential: true,
      sourceTable: 'users',
      targetTable: 'users',
      junction: { table: 'follows', sourceColumns: ['followee_id'], targetColumns: ['follower_id'] },
    });
  });

  it('classifies a foreign key covered by a unique key as one-to-one', () => {
    const snapshot = {
      tables: [
        table('users', [serial()], [pk('users', 'id')]),
        table('profiles', [serial(), col('user_id')], [pk('profiles', 'id'), unique('profiles', 'user_id'), fk('profiles', ['user_id'], 'users')]),
      ],
    };
    const { resolution } = resolveSnapshot(snapshot);
    expect(resolution.relationships.map((rel) => rel.id)).toEqual(['one-to-one:profiles(user_id)->users']);
  });

  it('never treats a table referenced by another table as a junction', () => {
    const snapshot = blogSnapshot();
    snapshot.tables.push(
      table('tag_votes', [serial(), col('post_id'), col('tag_id')], [
        pk('tag_votes', 'id'),
        fk('tag_votes', ['post_id', 'tag_id'], 'post_tags', ['post_id', 'tag_id']),
      ])
    );
    const { resolution } = resolveSnapshot(snapshot);

    expect(resolution.junctionTables.size).toBe(0);
    expect(resolution.relationships.map((rel) => rel.id)).toContain('many-to-one:tag_votes(post_id,tag_id)->post_tags');
  });

  it('drops a foreign key to an excluded table with a warning', () => {
    const { resolution, diagnostics } = resolveSnapshot(blogSnapshot(), {}, ['authors']);

    expect(resolution.relationships.map((rel) => rel.id)).toEqual(['many-to-many:post_tags(post_id)->tags']);
    expect(diagnostics.byCode(ERROR_CODES.DANGLING_REFERENCE).map((w) => w.message)).toEqual([
      'Foreign key "posts_author_id_fkey" on "posts" (author_id) references "authors", which is not in the schema; relationship dropped',
    ]);
  });

  it('rejects a foreign key whose column count differs from the referenced key', () => {
    const snapshot = {
      tables: [
        table('orders', [serial()], [pk('orders', 'id')]),
        table('notes', [serial(), col('order_id'), col('order_line')], [
          pk('notes', 'id'),
          fk('notes', ['order_id', 'order_line'], 'orders'),
        ]),
      ],
    };
    expect(() => resolveSnapshot(snapshot)).toThrow(SchemaConsistencyError);
  });

  it('assigns identities independent of snapshot order', () => {
    const forward = resolveSnapshot(blogSnapshot()).resolution.relationships;
    const reversed = resolveSnapshot({ tables: [...blogSnapshot().tables].reverse() }).resolution.relationships;
    expect(reversed).toEqual(forward);
  });
});
