import type { Storage } from './storage';

import { StorageKeyNotFoundError } from './storage';

/** In-process storage, used by tests and dry runs */
export class MemoryStorage implements Storage {
  private readonly blobs = new Map<string, Buffer>();

  async open(key: string): Promise<Buffer> {
    const data = this.blobs.get(key);
    if (!data) {
      throw new StorageKeyNotFoundError(key);
    }
    return Buffer.from(data);
  }

  async save(key: string, data: Buffer): Promise<void> {
    this.blobs.set(key, Buffer.from(data));
  }

  async delete(key: string): Promise<void> {
    this.blobs.delete(key);
  }

  async exists(key: string): Promise<boolean> {
    return this.blobs.has(key);
  }

  keys(): string[] {
    return [...this.blobs.keys()].sort();
  }
}
