/**
 * Key/value blob store for page PDFs, images and thumbnails.
 * Keys are `/` separated relative paths.
 */
export interface Storage {
  open(key: string): Promise<Buffer>;
  save(key: string, data: Buffer): Promise<void>;
  delete(key: string): Promise<void>;
  exists(key: string): Promise<boolean>;
}

export class StorageKeyNotFoundError extends Error {
  public readonly name = 'StorageKeyNotFoundError';

  constructor(public readonly key: string) {
    super(`Storage key ${key} not found`);
  }
}
