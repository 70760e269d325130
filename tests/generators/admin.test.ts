/**
 * Unit tests for the admin descriptor generator
 */

import { describe, it, expect } from 'vitest';
import { adminDescriptor, adminGenerator } from '../../src/generators/admin.js';
import { renderUnit } from '../../src/generators/renderer.js';
import { blogSnapshot, contextFor } from '../fixtures.js';

describe('adminDescriptor', () => {
  const { model } = contextFor(blogSnapshot());
  const [author, post, tag] = model.entities;

  it('lists keys, text columns and forward relations, capped at five', () => {
    expect(adminDescriptor(post)).toEqual({
      entity: 'Post',
      routePath: '/posts',
      listDisplay: ['id', 'title', 'slug', 'body', 'author'],
      searchFields: ['title', 'slug', 'body'],
      listFilter: ['published', 'createdAt', 'author'],
      readonlyFields: ['id', 'createdAt'],
      ordering: ['id'],
    });
  });

  it('offers short strings as filters and long ones as search fields only', () => {
    expect(adminDescriptor(author)).toMatchObject({
      listDisplay: ['id', 'name', 'email', 'bio'],
      searchFields: ['name', 'email', 'bio'],
      listFilter: [],
      readonlyFields: ['id'],
    });
    expect(adminDescriptor(tag)).toMatchObject({
      listDisplay: ['id', 'label'],
      searchFields: ['label'],
      listFilter: ['label'],
    });
  });
});

describe('adminGenerator', () => {
  it('renders one descriptor per entity in dependency order', () => {
    const [unit] = adminGenerator.generate(contextFor(blogSnapshot()));
    const lines = renderUnit(unit).split('\n');

    expect(unit.path).toBe('src/admin.ts');
    expect(lines).toContain('export const adminDescriptors: AdminDescriptor[] = [');
    expect(lines.filter((line) => line.startsWith('    entity: '))).toEqual([
      "    entity: 'Author',",
      "    entity: 'Post',",
      "    entity: 'Tag',",
    ]);
    expect(lines).toContain("    listDisplay: ['id', 'title', 'slug', 'body', 'author'],");
    expect(lines).toContain('    listFilter: [],');
  });
});
