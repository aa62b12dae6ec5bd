/**
 * File Layout Storage
 *
 * One JSON file per cache name under a directory. Writes go to a temporary
 * file that is renamed over the record, so readers see the old or the new
 * record, never a partial one.
 *
 * @module layout/file-layout-storage
 */

import { randomUUID } from 'crypto';
import fs from 'fs';
import path from 'path';
import { ResultsControllerError } from '../shared/errors/results-controller.error.js';
import { PersistedLayoutSchema, type PersistedLayout } from './layout.schemas.js';
import type { LayoutStorage } from './layout-storage.js';

/** Suffix of record files; anything else in the directory is ignored */
const RECORD_EXTENSION = '.layout.json';

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Inverse of the file name encoding. Undefined for names this storage
 * could not have written.
 */
function decodeCacheName(encoded: string): string | undefined {
  try {
    const cacheName = decodeURIComponent(encoded);
    return encodeURIComponent(cacheName) === encoded ? cacheName : undefined;
  } catch {
    return undefined;
  }
}

export class FileLayoutStorage implements LayoutStorage {
  readonly directory: string;
  readonly location: string;

  constructor(directory: string) {
    this.directory = directory;
    this.location = `file:${path.resolve(directory)}`;
  }

  /**
   * Path of the record file for a cache name.
   * Names are URI-encoded so any string maps to a single file name.
   */
  fileFor(cacheName: string): string {
    return path.join(this.directory, `${encodeURIComponent(cacheName)}${RECORD_EXTENSION}`);
  }

  read(cacheName: string): PersistedLayout | undefined {
    const file = this.fileFor(cacheName);
    let raw: string;
    try {
      if (!fs.existsSync(file)) {
        return undefined;
      }
      raw = fs.readFileSync(file, 'utf8');
    } catch (error) {
      throw ResultsControllerError.cacheIo('read', cacheName, toError(error));
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw ResultsControllerError.cacheIo('read', cacheName, toError(error));
    }

    const result = PersistedLayoutSchema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
      throw ResultsControllerError.cacheIo(
        'read',
        cacheName,
        new Error(`Malformed layout record (${issues.join('; ')})`)
      );
    }
    return result.data;
  }

  write(cacheName: string, record: PersistedLayout): void {
    const file = this.fileFor(cacheName);
    const tempFile = `${file}.${randomUUID()}.tmp`;
    try {
      fs.mkdirSync(this.directory, { recursive: true });
      fs.writeFileSync(tempFile, JSON.stringify(record), 'utf8');
      fs.renameSync(tempFile, file);
    } catch (error) {
      fs.rmSync(tempFile, { force: true });
      throw ResultsControllerError.cacheIo('write', cacheName, toError(error));
    }
  }

  remove(cacheName: string): boolean {
    const file = this.fileFor(cacheName);
    try {
      if (!fs.existsSync(file)) {
        return false;
      }
      fs.rmSync(file);
      return true;
    } catch (error) {
      throw ResultsControllerError.cacheIo('remove', cacheName, toError(error));
    }
  }

  removeAll(): number {
    let removed = 0;
    for (const cacheName of this.list()) {
      if (this.remove(cacheName)) {
        removed++;
      }
    }
    return removed;
  }

  list(): string[] {
    try {
      if (!fs.existsSync(this.directory)) {
        return [];
      }
      return fs
        .readdirSync(this.directory)
        .filter((entry) => entry.endsWith(RECORD_EXTENSION))
        .map((entry) => decodeCacheName(entry.slice(0, -RECORD_EXTENSION.length)))
        .filter((cacheName): cacheName is string => cacheName !== undefined);
    } catch (error) {
      throw ResultsControllerError.cacheIo('list', undefined, toError(error));
    }
  }
}
