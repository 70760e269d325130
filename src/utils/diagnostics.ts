/**
 * Warning collector threaded through the pipeline stages.
 *
 * @module utils/diagnostics
 */

import { createWarning } from '../contracts/errors.js';
import type { WarningCode } from '../contracts/errors.js';
import type { GenerationWarning } from '../contracts/types.js';
import { logger } from './logger.js';

export class Diagnostics {
  private readonly items: GenerationWarning[] = [];
  private readonly seen = new Set<string>();

  /** Record a warning; identical code+message pairs are kept once */
  warn(code: WarningCode, message: string, context?: Record<string, unknown>): void {
    const key = `${code}\u0000${message}`;
    if (this.seen.has(key)) return;
    this.seen.add(key);
    this.items.push(createWarning(code, message, context));
    logger.debug(message, { code, ...context });
  }

  get warnings(): readonly GenerationWarning[] {
    return this.items;
  }

  byCode(code: WarningCode): GenerationWarning[] {
    return this.items.filter((w) => w.code === code);
  }

  get count(): number {
    return this.items.length;
  }
}
