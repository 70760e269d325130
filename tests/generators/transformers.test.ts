/**
 * Unit tests for the transformer generator
 */

import { describe, it, expect } from 'vitest';
import { transformersGenerator } from '../../src/generators/transformers.js';
import { renderUnit } from '../../src/generators/renderer.js';
import type { RelationStyle, SchemaSnapshot } from '../../src/contracts/types.js';
import { blogSnapshot, contextFor, employeeSnapshot } from '../fixtures.js';

function transformer(snapshot: SchemaSnapshot, path: string, relationStyle: RelationStyle = 'key'): string {
  const unit = transformersGenerator.generate(contextFor(snapshot, { relation_style: relationStyle })).find((u) => u.path === path);
  if (!unit) throw new Error(`missing ${path}`);
  return renderUnit(unit);
}

function section(content: string, first: string): string[] {
  const lines = content.split('\n');
  const start = lines.indexOf(first);
  if (start < 0) throw new Error(`missing line ${first}`);
  const end = lines.indexOf('', start);
  return lines.slice(start, end < 0 ? undefined : end);
}

describe('transformersGenerator', () => {
  it('validates writable fields in the create schema', () => {
    const content = transformer(blogSnapshot(), 'src/transformers/post.ts');

    expect(section(content, '/** Request body for creating a Post */')).toEqual([
      '/** Request body for creating a Post */',
      'export const postCreateSchema = z.object({',
      '  authorId: z.number().int(),',
      '  title: z.string().max(200),',
      '  slug: z.string().max(200),',
      '  body: z.string(),',
      '  published: z.boolean().optional(),',
      '  createdAt: z.string().datetime({ offset: true }).optional(),',
      '});',
    ]);
    expect(content).toContain('export const postUpdateSchema = postCreateSchema.partial();\n');
    expect(content).toContain('export type PostCreateInput = z.infer<typeof postCreateSchema>;\n');
  });

  it('makes nullable fields nullable and optional', () => {
    const content = transformer(blogSnapshot(), 'src/transformers/author.ts');
    expect(content.split('\n')).toContain('  bio: z.string().nullable().optional(),');
  });

  it('imports only the entity types it mentions', () => {
    const content = transformer(blogSnapshot(), 'src/transformers/post.ts');
    expect(content.split('\n').slice(2, 6)).toEqual([
      "import { z } from 'zod';",
      "import type { AuthorKey } from '../entities/author.js';",
      "import type { Post } from '../entities/post.js';",
      "import type { TagKey } from '../entities/tag.js';",
    ]);
  });

  it('renders relations as keys', () => {
    const content = transformer(blogSnapshot(), 'src/transformers/post.ts');

    expect(section(content, 'export interface PostRelated {')).toEqual(['export interface PostRelated {', '  tags: TagKey[];', '}']);
    expect(content.split('\n')).toContain('  author: AuthorKey;');
    expect(section(content, 'export function toPostResponse(entity: Post, related: PostRelated): PostResponse {')).toEqual([
      'export function toPostResponse(entity: Post, related: PostRelated): PostResponse {',
      '  return {',
      '    id: entity.id,',
      '    authorId: entity.authorId,',
      '    title: entity.title,',
      '    slug: entity.slug,',
      '    body: entity.body,',
      '    published: entity.published,',
      '    createdAt: entity.createdAt,',
      '    author: entity.authorId,',
      '    tags: related.tags,',
      '  };',
      '}',
    ]);
  });

  it('takes no related data when the response carries no relations', () => {
    const content = transformer(blogSnapshot(), 'src/transformers/author.ts');
    expect(content).toContain('export interface AuthorRelated {}\n');
    expect(content).toContain('export function toAuthorResponse(entity: Author, _related: AuthorRelated): AuthorResponse {\n');
  });

  it('renders relations as links', () => {
    const lines = transformer(blogSnapshot(), 'src/transformers/post.ts', 'link').split('\n');
    expect(lines).toContain('  author: string;');
    expect(lines).toContain('  tags: string[];');
    expect(lines).toContain('    author: `/authors/${entity.authorId}`,');
    expect(lines).toContain('    tags: related.tags.map((key) => `/tags/${key}`),');
  });

  it('guards nullable links', () => {
    const lines = transformer(employeeSnapshot(), 'src/transformers/employee.ts', 'link').split('\n');
    expect(lines).toContain('  manager: string | null;');
    expect(lines).toContain('    manager: entity.managerId === null ? null : `/employees/${entity.managerId}`,');
  });

  it('renders relations as embedded rows', () => {
    const lines = transformer(blogSnapshot(), 'src/transformers/post.ts', 'embedded').split('\n');
    expect(section(lines.join('\n'), 'export interface PostRelated {')).toEqual([
      'export interface PostRelated {',
      '  author: Author;',
      '  tags: Tag[];',
      '}',
    ]);
    expect(lines).toContain('    author: related.author,');
  });
});
