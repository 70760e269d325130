/**
 * Unit tests for the test scaffold generator
 */

import { describe, it, expect } from 'vitest';
import { arbitraryFor, sampleValue, testScaffoldGenerator } from '../../src/generators/test-scaffold.js';
import { TypeScriptRenderer, renderUnit } from '../../src/generators/renderer.js';
import { findField } from '../../src/generators/shared.js';
import { blogSnapshot, col, contextFor, pk, serial, table } from '../fixtures.js';

function postScaffold(): string[] {
  const units = testScaffoldGenerator.generate(contextFor(blogSnapshot()));
  const unit = units.find((candidate) => candidate.path === 'tests/post.test.ts');
  return unit ? renderUnit(unit).split('\n') : [];
}

describe('arbitraryFor', () => {
  const { model } = contextFor({
    tables: [
      table('readings', [
        serial(),
        col('taken_on', 'date'),
        col('amount', 'numeric', { precision: 10, scale: 2 }),
        col('note', 'text', { nullable: true }),
        col('labels', 'text[]'),
      ], [pk('readings', 'id')]),
    ],
  });
  const [reading] = model.entities;
  const renderer = new TypeScriptRenderer();

  it('builds arbitraries that satisfy the field schema', () => {
    expect(renderer.renderExpr(arbitraryFor(findField(reading, 'amount')), '')).toBe('fc.integer().map(String)');
    expect(renderer.renderExpr(arbitraryFor(findField(reading, 'note')), '')).toBe('fc.option(fc.string(), { nil: null })');
    expect(renderer.renderExpr(arbitraryFor(findField(reading, 'labels')), '')).toBe('fc.array(fc.string())');
  });

  it('slices dates to the calendar day', () => {
    const rendered = renderer.renderExpr(arbitraryFor(findField(reading, 'takenOn')), '');
    expect(rendered.split('\n').at(-1)).toBe('}).map((date) => date.toISOString().slice(0, 10))');
  });

  it('provides a sample per kind, wrapped for arrays', () => {
    expect(sampleValue(findField(reading, 'amount'))).toBe('12.50');
    expect(sampleValue(findField(reading, 'takenOn'))).toBe('2024-01-15');
    expect(sampleValue(findField(reading, 'labels'))).toEqual(['sample text']);
  });
});

describe('testScaffoldGenerator', () => {
  it('writes one test module per entity', () => {
    const units = testScaffoldGenerator.generate(contextFor(blogSnapshot()));
    expect(units.map((unit) => unit.path)).toEqual(['tests/author.test.ts', 'tests/post.test.ts', 'tests/tag.test.ts']);
  });

  it('imports the runner, fast-check and the entity modules', () => {
    expect(postScaffold().filter((line) => line.startsWith('import'))).toEqual([
      "import { describe, expect, it } from 'vitest';",
      "import fc from 'fast-check';",
      "import { postMeta } from '../src/entities/post.js';",
      "import type { Post } from '../src/entities/post.js';",
      "import { postCreateSchema, toPostResponse, postUpdateSchema } from '../src/transformers/post.js';",
      "import type { PostRelated } from '../src/transformers/post.js';",
    ]);
  });

  it('builds a create payload arbitrary from the writable fields', () => {
    const lines = postScaffold();
    const start = lines.indexOf('const postCreateArbitrary = fc.record({');

    expect(lines.slice(start, start + 6)).toEqual([
      'const postCreateArbitrary = fc.record({',
      '  authorId: fc.integer(),',
      '  title: fc.string({ maxLength: 200 }),',
      '  slug: fc.string({ maxLength: 200 }),',
      '  body: fc.string(),',
      '  published: fc.boolean(),',
    ]);
    expect(lines).toContain('    noInvalidDate: true,');
    expect(lines).toContain('  }).map((date) => date.toISOString()),');
    expect(lines).toContain("}, { requiredKeys: ['authorId', 'title', 'slug', 'body'] });");
  });

  it('fills related data for many-to-many relations only in key style', () => {
    expect(postScaffold()).toContain('const related: PostRelated = { tags: [] };');
  });

  it('checks schemas with properties and examples', () => {
    const lines = postScaffold();
    const start = lines.indexOf("describe('Post transformers', () => {");

    expect(lines.slice(start + 1, start + 5)).toEqual([
      "  it('accepts every generated create payload', () => {",
      '    fc.assert(fc.property(postCreateArbitrary, (payload) => {',
      '      expect(postCreateSchema.safeParse(payload).success).toBe(true);',
      '    }));',
    ]);
    expect(lines).toContain("  it('rejects a create payload without authorId', () => {");
    expect(lines).toContain("    const payload = { title: 'sample', slug: 'sample', body: 'sample text' };");
    expect(lines).toContain("    expect(postMeta.primaryKey).toEqual(['id']);");
  });
});
