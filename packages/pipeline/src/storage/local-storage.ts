import type { Storage } from './storage';

import { existsSync } from 'node:fs';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { dirname, isAbsolute, relative, resolve } from 'node:path';

import { StorageKeyNotFoundError } from './storage';

/**
 * Storage backed by a directory on the local file system.
 */
export class LocalStorage implements Storage {
  private readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  async open(key: string): Promise<Buffer> {
    const path = this.resolveKey(key);
    if (!existsSync(path)) {
      throw new StorageKeyNotFoundError(key);
    }
    return readFile(path);
  }

  async save(key: string, data: Buffer): Promise<void> {
    const path = this.resolveKey(key);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, data);
  }

  async delete(key: string): Promise<void> {
    await rm(this.resolveKey(key), { force: true });
  }

  async exists(key: string): Promise<boolean> {
    return existsSync(this.resolveKey(key));
  }

  /** Absolute path of a key; keys may not leave the root */
  resolveKey(key: string): string {
    const path = resolve(this.root, key);
    const rel = relative(this.root, path);
    if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
      throw new Error(`[LocalStorage] Key escapes storage root: ${key}`);
    }
    return path;
  }
}
