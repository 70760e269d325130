/**
 * File Writer Utility
 *
 * Atomic file writing for generated artifacts. Every write goes to a unique
 * temp file beside the target and is renamed into place, so a failed write
 * never leaves a half-written artifact behind.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { logger } from './logger.js';
import { OutputWriteError } from '../contracts/errors.js';

let tempCounter = 0;

/**
 * FileWriter class with static methods for file operations
 */
export class FileWriter {
  /**
   * Write file atomically (write to temp file, then rename)
   * Implements retry logic: retries once on failure
   *
   * @throws OutputWriteError if write fails after retry
   */
  static async writeFileAtomic(filePath: string, content: string): Promise<void> {
    const tempPath = `${filePath}.${process.pid}.${++tempCounter}.tmp`;
    let attempt = 0;
    const maxAttempts = 2; // Initial attempt + one retry

    while (attempt < maxAttempts) {
      try {
        await this.ensureDirectoryExists(path.dirname(filePath));

        await fs.writeFile(tempPath, content, 'utf8');

        // Atomic rename
        await fs.rename(tempPath, filePath);
        return;
      } catch (error) {
        attempt++;
        const errorMessage = error instanceof Error ? error.message : String(error);

        await fs.rm(tempPath, { force: true });

        if (attempt >= maxAttempts) {
          const writeError = new OutputWriteError(
            `Failed to write file ${filePath} after ${maxAttempts} attempts: ${errorMessage}`,
            { filePath, attempt, originalError: errorMessage }
          );
          logger.error(writeError.message, { code: writeError.code, context: writeError.context });
          throw writeError;
        }

        logger.warn(`File write failed for ${filePath}, retrying... (attempt ${attempt}/${maxAttempts})`, {
          error: errorMessage,
        });

        await new Promise((resolve) => setTimeout(resolve, 100 * attempt));
      }
    }
  }

  /**
   * Ensure directory exists, creating it recursively if needed
   *
   * @throws OutputWriteError if directory creation fails
   */
  static async ensureDirectoryExists(dirPath: string): Promise<void> {
    try {
      await fs.mkdir(dirPath, { recursive: true });
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new OutputWriteError(`Failed to create directory ${dirPath}: ${errorMessage}`, {
        dirPath,
        originalError: errorMessage,
      });
    }
  }

  /**
   * Resolve a relative artifact path under the output root.
   * Rejects absolute paths and paths that climb out of the root.
   */
  static resolveInside(root: string, relativePath: string): string {
    const resolvedRoot = path.resolve(root);
    const target = path.resolve(resolvedRoot, relativePath);
    const relative = path.relative(resolvedRoot, target);
    if (path.isAbsolute(relativePath) || relative.startsWith('..') || relative === '') {
      throw new OutputWriteError(`Artifact path escapes output directory: ${relativePath}`, {
        root: resolvedRoot,
        relativePath,
      });
    }
    return target;
  }

  /**
   * Validate that a file exists and is readable
   */
  static async validateFileExists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath, fs.constants.F_OK | fs.constants.R_OK);
      return true;
    } catch {
      return false;
    }
  }
}
