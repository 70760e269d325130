/**
 * Unit tests for the Naming Resolver
 */

import { describe, it, expect } from 'vitest';
import {
  camelCase,
  kebabCase,
  pascalCase,
  pluralWords,
  singularWords,
  splitWords,
} from '../../src/pipeline/naming.js';
import { NamingCollisionError } from '../../src/contracts/errors.js';
import type { SchemaSnapshot } from '../../src/contracts/types.js';
import { col, fk, pk, resolve, serial, table } from '../fixtures.js';
import { blogSnapshot, employeeSnapshot, followSnapshot, shipmentSnapshot } from '../fixtures.js';

function entity(snapshot: SchemaSnapshot, tableName: string) {
  const found = resolve(snapshot).model.entities.find((e) => e.table === tableName);
  if (!found) throw new Error(`no entity for ${tableName}`);
  return found;
}

describe('case transforms', () => {
  it('splits identifiers on separators and case boundaries', () => {
    expect(splitWords('billing_address_id')).toEqual(['billing', 'address', 'id']);
    expect(splitWords('billingAddressID')).toEqual(['billing', 'address', 'id']);
    expect(splitWords('BillingAddressId')).toEqual(['billing', 'address', 'id']);
    expect(splitWords('HTTPServer')).toEqual(['http', 'server']);
    expect(splitWords('order-items')).toEqual(['order', 'items']);
  });

  it('joins words in each case', () => {
    expect(pascalCase(['order', 'item'])).toBe('OrderItem');
    expect(camelCase(['order', 'item'])).toBe('orderItem');
    expect(kebabCase(['order', 'item'])).toBe('order-item');
    expect(camelCase([])).toBe('');
  });

  it('inflects only the last word', () => {
    expect(singularWords(['order', 'items'])).toEqual(['order', 'item']);
    expect(pluralWords(['blog', 'post'])).toEqual(['blog', 'posts']);
    expect(pluralWords(['person'])).toEqual(['people']);
  });
});

describe('resolveNames', () => {
  it('names entities in singular PascalCase with plural kebab-case routes', () => {
    const snapshot = { tables: [table('order_items', [serial()], [pk('order_items', 'id')])] };
    expect(entity(snapshot, 'order_items')).toMatchObject({
      name: 'OrderItem',
      fileName: 'order-item',
      routePath: '/order-items',
    });
  });

  it('names fields in camelCase and escapes reserved words', () => {
    const snapshot = {
      tables: [
        table('widgets', [serial(), col('class', 'text'), col('default', 'text'), col('2fa_code', 'text'), col('created_at', 'date')], [
          pk('widgets', 'id'),
        ]),
      ],
    };
    expect(entity(snapshot, 'widgets').fields.map((f) => f.name)).toEqual(['id', 'class_', 'default_', '_2faCode', 'createdAt']);
  });

  it('suffixes entity names that shadow globals', () => {
    const snapshot = { tables: [table('dates', [serial()], [pk('dates', 'id')])] };
    expect(entity(snapshot, 'dates')).toMatchObject({
      name: 'DateEntity',
      fileName: 'date-entity',
      routePath: '/date-entities',
    });
  });

  it('derives forward accessors from owning columns and reverse accessors from the source entity', () => {
    const post = entity(blogSnapshot(), 'posts');
    const author = entity(blogSnapshot(), 'authors');
    const tag = entity(blogSnapshot(), 'tags');

    expect(post.relations.map((r) => [r.accessor, r.direction, r.kind])).toEqual([
      ['author', 'forward', 'many-to-one'],
      ['tags', 'forward', 'many-to-many'],
    ]);
    expect(author.relations.map((r) => [r.accessor, r.direction, r.cardinality])).toEqual([['posts', 'reverse', 'many']]);
    expect(tag.relations.map((r) => [r.accessor, r.direction, r.kind])).toEqual([['posts', 'reverse', 'many-to-many']]);
  });

  it('always suffixes reverse accessors of self-referential relationships', () => {
    const employee = entity(employeeSnapshot(), 'employees');
    expect(employee.relations.map((r) => [r.accessor, r.direction])).toEqual([
      ['manager', 'forward'],
      ['employeesByManager', 'reverse'],
    ]);
  });

  it('disambiguates parallel relationships with column-derived suffixes', () => {
    const address = entity(shipmentSnapshot(), 'addresses');
    const shipment = entity(shipmentSnapshot(), 'shipments');

    expect(shipment.relations.map((r) => r.accessor)).toEqual(['billingAddress', 'shippingAddress']);
    expect(address.relations.map((r) => r.accessor)).toEqual(['shipmentsByBillingAddress', 'shipmentsByShippingAddress']);
  });

  it('names both sides of a self-referential many-to-many', () => {
    const user = entity(followSnapshot(), 'users');
    expect(user.relations.map((r) => [r.accessor, r.direction])).toEqual([
      ['usersByFollowee', 'reverse'],
      ['usersByFollower', 'forward'],
    ]);
  });

  it('suffixes a forward accessor that collides with a field', () => {
    const snapshot = {
      tables: [
        table('authors', [serial()], [pk('authors', 'id')]),
        table('books', [serial(), col('author', 'text'), col('author_id')], [pk('books', 'id'), fk('books', ['author_id'], 'authors')]),
      ],
    };
    expect(entity(snapshot, 'books').relations.map((r) => r.accessor)).toEqual(['authorViaAuthor']);
  });

  it('reports colliding fields with both originals', () => {
    const snapshot = {
      tables: [table('people', [serial(), col('user_name', 'text'), col('userName', 'text')], [pk('people', 'id')])],
    };
    expect(() => resolve(snapshot)).toThrow('field on "people": "people.user_name" and "people.userName" both resolve to "userName"');
  });

  it('reports colliding entity names', () => {
    const snapshot = {
      tables: [
        table('person', [serial()], [pk('person', 'id')]),
        table('Person', [serial()], [pk('Person', 'id')]),
      ],
    };
    let caught: unknown;
    try {
      resolve(snapshot);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(NamingCollisionError);
    expect(caught instanceof NamingCollisionError && caught.originals).toEqual(['Person', 'person']);
  });

  it('reports an entity named like a type derived from another entity', () => {
    const snapshot = {
      tables: [
        table('posts', [serial()], [pk('posts', 'id')]),
        table('post_pages', [serial()], [pk('post_pages', 'id')]),
      ],
    };
    expect(() => resolve(snapshot)).toThrow('type name: "post_pages" and "posts" both resolve to "PostPage"');
  });

  it('suffixes entity names that shadow names used by generated code', () => {
    const snapshot = {
      tables: [
        table('validation_errors', [serial()], [pk('validation_errors', 'id')]),
        table('zod_errors', [serial()], [pk('zod_errors', 'id')]),
      ],
    };
    expect(entity(snapshot, 'validation_errors').name).toBe('ValidationErrorEntity');
    expect(entity(snapshot, 'zod_errors').name).toBe('ZodErrorEntity');
  });
});
