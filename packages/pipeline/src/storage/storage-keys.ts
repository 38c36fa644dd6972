import type { Document } from '@pagemill/model';

import { cleanFilename } from '@pagemill/ocr';

import { STORAGE_KEYS } from '../config/constants';

type DocumentLocation = Pick<Document, 'id' | 'collection' | 'title'>;

/** The id segment keeps documents that share a title apart */
function documentPrefix(doc: DocumentLocation): string {
  return `${doc.collection}/${cleanFilename(doc.title)}/${doc.id}`;
}

/** Uploaded source PDF */
export function sourceKey(doc: DocumentLocation): string {
  return `${documentPrefix(doc)}/${cleanFilename(doc.title)}.pdf`;
}

export function pagePdfKey(doc: DocumentLocation, pageNumber: number): string {
  return `${documentPrefix(doc)}/${pageNumber}/page-${pageNumber}.pdf`;
}

export function imageKey(
  doc: DocumentLocation,
  pageNumber: number,
  fileName: string,
): string {
  return `${documentPrefix(doc)}/${pageNumber}/images/${fileName}`;
}

export function overlayKey(doc: DocumentLocation, pageNumber: number): string {
  return `${documentPrefix(doc)}/${pageNumber}/page-${pageNumber}${STORAGE_KEYS.OVERLAY_SUFFIX}`;
}

export function thumbnailKey(doc: DocumentLocation): string {
  return `${documentPrefix(doc)}/${cleanFilename(doc.title)}${STORAGE_KEYS.THUMBNAIL_SUFFIX}`;
}
