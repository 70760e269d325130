/**
 * Unit tests for the handler generator
 */

import { describe, it, expect } from 'vitest';
import { handlersGenerator } from '../../src/generators/handlers.js';
import { renderUnit } from '../../src/generators/renderer.js';
import { blogSnapshot, contextFor } from '../fixtures.js';

function renderedLines(path: string): string[] {
  const unit = handlersGenerator.generate(contextFor(blogSnapshot())).find((u) => u.path === path);
  if (!unit) throw new Error(`missing ${path}`);
  return renderUnit(unit).split('\n');
}

/** Lines from `first` up to and including the next line equal to `last` */
function block(lines: string[], first: string, last: string): string[] {
  const start = lines.indexOf(first);
  if (start < 0) throw new Error(`missing line ${first}`);
  return lines.slice(start, lines.indexOf(last, start) + 1);
}

describe('handlersGenerator', () => {
  it('writes the repository contract and one module per entity', () => {
    const paths = handlersGenerator.generate(contextFor(blogSnapshot())).map((unit) => unit.path);
    expect(paths).toEqual(['src/handlers/repository.ts', 'src/handlers/author.ts', 'src/handlers/post.ts', 'src/handlers/tag.ts']);
  });

  it('renders pagination limits and path parsers in the contract', () => {
    const lines = renderedLines('src/handlers/repository.ts');

    expect(lines).toContain('export const DEFAULT_PAGE_SIZE = 50;');
    expect(lines).toContain('export const MAX_PAGE_SIZE = 500;');
    expect(block(lines, 'export function parseIntegerParam(value: string | undefined): number | null {', '}')).toEqual([
      'export function parseIntegerParam(value: string | undefined): number | null {',
      '  if (value === undefined || !/^-?\\d+$/.test(value)) {',
      '    return null;',
      '  }',
      '  const parsed = Number(value);',
      '  return Number.isSafeInteger(parsed) ? parsed : null;',
      '}',
    ]);
    expect(lines).toContain("  const parsed = typeof raw === 'string' ? Number(raw) : Number.NaN;");
  });

  it('imports what the entity handlers use', () => {
    const lines = renderedLines('src/handlers/post.ts');
    expect(lines.filter((line) => line.startsWith('import'))).toEqual([
      "import type { Request, Response } from 'express';",
      "import { z } from 'zod';",
      "import type { Post, PostKey } from '../entities/post.js';",
      "import type { Tag, TagKey } from '../entities/tag.js';",
      "import { postCreateSchema, toPostResponse, postUpdateSchema } from '../transformers/post.js';",
      "import type { PostCreateInput, PostRelated, PostResponse, PostUpdateInput } from '../transformers/post.js';",
      "import { parseIntegerParam, parseListQuery, parseStringParam, sendNotFound, sendValidationError } from './repository.js';",
      "import type { MemberRepository, Repository } from './repository.js';",
    ]);
  });

  it('declares record and member repositories', () => {
    expect(block(renderedLines('src/handlers/post.ts'), 'export interface PostRepositories {', '}')).toEqual([
      'export interface PostRepositories {',
      '  records: Repository<Post, PostKey, PostCreateInput, PostUpdateInput, PostRelated>;',
      '  members: { tags: MemberRepository<PostKey, TagKey, Tag> };',
      '}',
    ]);
  });

  it('parses the key from route parameters', () => {
    expect(block(renderedLines('src/handlers/post.ts'), 'export function parsePostKey(params: Record<string, string | undefined>): PostKey | null {', '}')).toEqual([
      'export function parsePostKey(params: Record<string, string | undefined>): PostKey | null {',
      "  const idValue = parseIntegerParam(params['id']);",
      '  if (idValue === null) {',
      '    return null;',
      '  }',
      '  return idValue;',
      '}',
    ]);
  });

  it('renders handlers in route order', () => {
    const lines = renderedLines('src/handlers/post.ts');
    const handlers = lines
      .filter((line) => line.endsWith(': async (req: Request, res: Response): Promise<void> => {'))
      .map((line) => line.trim().split(':')[0]);
    expect(handlers).toEqual([
      'list',
      'create',
      'retrieveBySlug',
      'retrieve',
      'update',
      'remove',
      'listTags',
      'addToTags',
      'removeFromTags',
    ]);
  });

  it('validates the body and answers 201 on create', () => {
    expect(block(renderedLines('src/handlers/post.ts'), '    create: async (req: Request, res: Response): Promise<void> => {', '    },')).toEqual([
      '    create: async (req: Request, res: Response): Promise<void> => {',
      '      const body = postCreateSchema.safeParse(req.body);',
      '      if (!body.success) {',
      '        sendValidationError(res, body.error);',
      '        return;',
      '      }',
      '      const entity = await repositories.records.create(body.data);',
      '      res.status(201).json(await respond(entity));',
      '    },',
    ]);
  });

  it('answers 404 for a malformed key or a missing row', () => {
    expect(block(renderedLines('src/handlers/post.ts'), '    retrieve: async (req: Request, res: Response): Promise<void> => {', '    },')).toEqual([
      '    retrieve: async (req: Request, res: Response): Promise<void> => {',
      '      const key = parsePostKey(req.params);',
      '      if (key === null) {',
      "        sendNotFound(res, 'Post');",
      '        return;',
      '      }',
      '      const entity = await repositories.records.get(key);',
      '      if (entity === null) {',
      "        sendNotFound(res, 'Post');",
      '        return;',
      '      }',
      '      res.json(await respond(entity));',
      '    },',
    ]);
  });

  it('looks rows up by a unique field', () => {
    const lines = block(renderedLines('src/handlers/post.ts'), '    retrieveBySlug: async (req: Request, res: Response): Promise<void> => {', '    },');
    expect(lines).toContain("      const value = parseStringParam(req.params['value']);");
    expect(lines).toContain("      const entity = await repositories.records.findBy('slug', value);");
  });

  it('links members from a validated body and unlinks them by path', () => {
    const lines = renderedLines('src/handlers/post.ts');
    const add = block(lines, '    addToTags: async (req: Request, res: Response): Promise<void> => {', '    },');
    const remove = block(lines, '    removeFromTags: async (req: Request, res: Response): Promise<void> => {', '    },');

    expect(add).toContain('      const body = z.object({ tagId: z.number().int() }).safeParse(req.body);');
    expect(add).toContain('      await repositories.members.tags.add(key, body.data.tagId);');
    expect(add).toContain('      res.status(204).end();');
    expect(remove).toContain("      const tagIdValue = parseIntegerParam(req.params['tagId']);");
    expect(remove).toContain('      const removed = await repositories.members.tags.remove(key, tagIdValue);');
    expect(remove.filter((line) => line === "        sendNotFound(res, 'Tag');")).toHaveLength(2);
  });

  it('exports the handler object type', () => {
    expect(renderedLines('src/handlers/post.ts')).toContain('export type PostHandlers = ReturnType<typeof createPostHandlers>;');
  });

  it('omits member repositories and zod for entities without many-to-many relations', () => {
    const lines = renderedLines('src/handlers/author.ts');
    expect(lines).not.toContain("import { z } from 'zod';");
    expect(block(lines, 'export interface AuthorRepositories {', '}')).toEqual([
      'export interface AuthorRepositories {',
      '  records: Repository<Author, AuthorKey, AuthorCreateInput, AuthorUpdateInput, AuthorRelated>;',
      '}',
    ]);
  });
});
