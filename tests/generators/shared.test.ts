/**
 * Unit tests for the helpers shared by the generators
 */

import { describe, it, expect } from 'vitest';
import { TypeScriptRenderer } from '../../src/generators/renderer.js';
import {
  apiKeySchema,
  detailPath,
  findField,
  importPath,
  keyType,
  keyTypeName,
  memberParams,
  paths,
  zodField,
} from '../../src/generators/shared.js';
import { handlersTypeName } from '../../src/generators/handlers.js';
import { createInputName, relatedTypeName, responseTypeName, updateInputName } from '../../src/generators/transformers.js';
import { DERIVED_TYPE_SUFFIXES } from '../../src/pipeline/naming.js';
import { blogSnapshot, col, contextFor, followSnapshot, pk, table } from '../fixtures.js';

const renderer = new TypeScriptRenderer();

describe('importPath', () => {
  it('resolves siblings, parents and cousins with a .js ending', () => {
    expect(importPath('src/transformers/post.ts', 'src/entities/post.ts')).toBe('../entities/post.js');
    expect(importPath('src/routes.ts', 'src/handlers/post.ts')).toBe('./handlers/post.js');
    expect(importPath('tests/post.test.ts', 'src/entities/post.ts')).toBe('../src/entities/post.js');
    expect(importPath('src/entities/index.ts', 'src/entities/meta.ts')).toBe('./meta.js');
  });
});

describe('paths', () => {
  it('places modules by file name', () => {
    const entity = { fileName: 'order-item' };
    expect(paths.entity(entity)).toBe('src/entities/order-item.ts');
    expect(paths.handler(entity)).toBe('src/handlers/order-item.ts');
    expect(paths.test(entity)).toBe('tests/order-item.test.ts');
  });
});

describe('field helpers', () => {
  const { model } = contextFor(blogSnapshot());
  const [author, post] = model.entities;

  it('marks defaulted and nullable fields optional on create', () => {
    expect(renderer.renderExpr(zodField(findField(post, 'title')), '')).toBe('z.string().max(200)');
    expect(renderer.renderExpr(zodField(findField(post, 'published')), '')).toBe('z.boolean().optional()');
    expect(renderer.renderExpr(zodField(findField(author, 'bio')), '')).toBe('z.string().nullable().optional()');
  });

  it('uses the field type for single keys', () => {
    expect(renderer.renderType(keyType(post), '')).toBe('number');
    expect(detailPath(post)).toBe('/posts/:id');
  });
});

describe('derived type names', () => {
  it('stay within the suffixes entity names are checked against', () => {
    const { model } = contextFor(blogSnapshot());
    const post = model.entities[1];
    const derived = [
      keyTypeName(post.name),
      createInputName(post),
      updateInputName(post),
      relatedTypeName(post),
      responseTypeName(post),
      handlersTypeName(post),
    ];

    expect(post.name).toBe('Post');
    for (const name of derived) {
      expect(DERIVED_TYPE_SUFFIXES.map((suffix) => `Post${suffix}`)).toContain(name);
    }
  });
});

describe('json fields', () => {
  const { model } = contextFor({
    tables: [
      table('events', [
        col('id', 'integer', { autoIncrement: true }),
        col('payload', 'jsonb'),
        col('extra', 'jsonb', { nullable: true }),
        col('settings', 'jsonb', { default: "'{}'::jsonb" }),
      ], [pk('events', 'id')]),
    ],
  });
  const [event] = model.entities;

  it('rejects a missing value when the column is required', () => {
    expect(renderer.renderExpr(zodField(findField(event, 'payload')), '')).toBe(
      "z.unknown().refine((value) => value !== undefined, 'Required')"
    );
  });

  it('leaves nullable and defaulted columns optional', () => {
    expect(renderer.renderExpr(zodField(findField(event, 'extra')), '')).toBe('z.unknown().nullable().optional()');
    expect(renderer.renderExpr(zodField(findField(event, 'settings')), '')).toBe('z.unknown().optional()');
  });
});

describe('composite keys', () => {
  const { model } = contextFor({
    tables: [
      table('seats', [col('row_label', 'character varying', { length: 2 }), col('seat_number')], [pk('seats', 'row_label', 'seat_number')]),
    ],
  });
  const [seat] = model.entities;

  it('renders composite keys as objects', () => {
    expect(renderer.renderType(keyType(seat), '')).toBe('{ rowLabel: string; seatNumber: number }');
    expect(detailPath(seat)).toBe('/seats/:rowLabel/:seatNumber');
    expect(apiKeySchema(seat)).toEqual({
      type: 'object',
      required: ['rowLabel', 'seatNumber'],
      properties: {
        rowLabel: { type: 'string', maxLength: 2 },
        seatNumber: { type: 'integer', format: 'int32' },
      },
    });
  });
});

describe('memberParams', () => {
  it('prefixes the target key with the singular target name', () => {
    const { model } = contextFor(blogSnapshot());
    const [, post] = model.entities;
    const tags = post.relations.find((relation) => relation.accessor === 'tags');
    expect(tags ? memberParams(post, tags, model).map((p) => p.name) : []).toEqual(['tagId']);
  });

  it('keeps self-referential member names distinct from the key', () => {
    const { model } = contextFor(followSnapshot());
    const [user] = model.entities;
    const relation = user.relations.find((candidate) => candidate.kind === 'many-to-many');
    expect(relation ? memberParams(user, relation, model).map((p) => p.name) : []).toEqual(['userId']);
  });
});
