/**
 * Snapshot Introspector
 *
 * Serves a schema snapshot previously captured to a JSON or YAML file.
 * Useful for generating offline and for regression fixtures.
 */

import { promises as fs } from 'fs';
import path from 'path';
import * as yaml from 'js-yaml';
import { logger } from '../utils/logger.js';
import { ERROR_CODES, IntrospectionError } from '../contracts/errors.js';
import { formatValidationErrors, validateSnapshot } from '../contracts/validators.js';
import type { SchemaIntrospector } from './index.js';
import type { SchemaSnapshot } from '../contracts/types.js';

export class SnapshotIntrospector implements SchemaIntrospector {
  private content: string | null = null;

  constructor(private readonly filePath: string) {}

  async connect(): Promise<void> {
    try {
      this.content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      throw new IntrospectionError(ERROR_CODES.SNAPSHOT_INVALID, `Snapshot file not readable: ${this.filePath}`, {
        path: this.filePath,
        originalError: error instanceof Error ? error.message : String(error),
      });
    }
  }

  async disconnect(): Promise<void> {
    this.content = null;
  }

  async introspect(): Promise<SchemaSnapshot> {
    if (this.content === null) {
      throw new Error('Snapshot not loaded');
    }

    let parsed: unknown;
    try {
      parsed = path.extname(this.filePath).toLowerCase() === '.json'
        ? JSON.parse(this.content)
        : yaml.load(this.content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new IntrospectionError(ERROR_CODES.SNAPSHOT_INVALID, `Snapshot file is not parseable: ${message}`, {
        path: this.filePath,
      });
    }

    const result = validateSnapshot(parsed);
    if (!result.success) {
      throw new IntrospectionError(
        ERROR_CODES.SNAPSHOT_INVALID,
        `Snapshot file ${this.filePath} is invalid: ${formatValidationErrors(result.errors)}`,
        { path: this.filePath, errors: result.errors }
      );
    }

    logger.debug('Loaded schema snapshot', { path: this.filePath, tables: result.data.tables.length });
    return result.data;
  }
}
