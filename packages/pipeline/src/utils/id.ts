import { randomUUID } from 'node:crypto';

export type IdPrefix = 'doc' | 'page' | 'img' | 'ocrp' | 'dlp' | 'job';

/** e.g. `doc_4f0c…` */
export function createId(prefix: IdPrefix): string {
  return `${prefix}_${randomUUID()}`;
}

export function now(): string {
  return new Date().toISOString();
}
