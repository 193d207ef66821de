import { randomBytes } from 'node:crypto';
import { open, readFile, rename, rm } from 'node:fs/promises';
import * as path from 'node:path';
import { PersistenceError } from '../errors/mesh-error.js';
import type { Logger } from '../observability/logger.js';
import { noopLogger } from '../observability/logger.js';
import type { Recipe } from '../types/recipe.js';
import type { RecordPersistence } from './persistence.js';

function tempPathFor(filePath: string): string {
  const dir = path.dirname(filePath);
  const base = path.basename(filePath);
  return path.join(dir, `.${base}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Stores the whole record list as one JSON document.
 *
 * Every save writes a temp file next to the target, fsyncs it and renames it
 * over the target, so a reader sees either the previous or the new content.
 * The directory is assumed to belong to a single node process.
 */
export class FilePersistence implements RecordPersistence {
  readonly location: string;
  private readonly logger: Logger;

  constructor(filePath: string, logger: Logger = noopLogger) {
    this.location = path.resolve(filePath);
    this.logger = logger;
  }

  async load(): Promise<unknown[]> {
    let content: string;
    try {
      content = await readFile(this.location, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.debug('No store file yet, starting empty', { path: this.location });
        return [];
      }
      throw new PersistenceError(
        'MESH_S301',
        `Failed to read ${this.location}`,
        { path: this.location },
        asError(error)
      );
    }

    if (content.trim() === '') {
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new PersistenceError(
        'MESH_S301',
        `${this.location} does not contain valid JSON`,
        { path: this.location },
        asError(error)
      );
    }

    if (!Array.isArray(parsed)) {
      throw new PersistenceError('MESH_S301', `${this.location} does not contain a JSON array`, {
        path: this.location,
      });
    }
    return parsed;
  }

  async save(records: readonly Recipe[]): Promise<void> {
    const tmpPath = tempPathFor(this.location);
    try {
      const handle = await open(tmpPath, 'w');
      try {
        await handle.writeFile(JSON.stringify(records, null, 2));
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tmpPath, this.location);
    } catch (error) {
      await rm(tmpPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.warn('Could not remove temp file', {
          path: tmpPath,
          reason: asError(cleanupError).message,
        });
      });
      throw new PersistenceError(
        'MESH_S300',
        `Failed to write ${this.location}`,
        { path: this.location, count: records.length },
        asError(error)
      );
    }
    this.logger.debug('Store persisted', { path: this.location, count: records.length });
  }
}

/**
 * Create a file-backed persistence backend.
 */
export function createFilePersistence(filePath: string, logger?: Logger): FilePersistence {
  return new FilePersistence(filePath, logger);
}
