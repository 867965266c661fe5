import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { StorageProvider } from '../interfaces/storage.js';
import { ValidationError } from '../errors/index.js';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * FileStorageProvider
 * Stores each key as a UTF-8 file inside one directory (created on first write).
 */
export class FileStorageProvider implements StorageProvider {
  readonly dir: string;

  constructor(dir: string = join(tmpdir(), 'httpframe')) {
    this.dir = dir;
  }

  private pathFor(key: string): string {
    if (key.length === 0 || key.includes('/') || key.includes('\\') || key === '.' || key === '..') {
      throw new ValidationError(`Invalid storage key '${key}'`, { key });
    }
    return join(this.dir, key);
  }

  async read(key: string): Promise<string | null> {
    try {
      return await readFile(this.pathFor(key), 'utf8');
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
  }

  async write(key: string, value: string): Promise<void> {
    const path = this.pathFor(key);
    await mkdir(this.dir, { recursive: true });
    await writeFile(path, value, 'utf8');
  }

  async remove(key: string): Promise<void> {
    await rm(this.pathFor(key), { force: true });
  }
}
