import type { Document, Page } from '@pagemill/model';

import type { DocumentRepository } from '../db/repositories/document-repository';
import type { PageRepository } from '../db/repositories/page-repository';

import { z } from 'zod';

import { SEARCH } from '../config/constants';
import { SearchQueryError } from '../errors/pipeline-errors';
import { createSnippet, foldCase } from './snippet';
import { trigramSimilarity } from './trigram';

export const searchQuerySchema = z.object({
  /** Matched case-insensitively as a substring; empty lists every page */
  query: z.string().trim().default(''),
  /** Substring of the document title, case-insensitive */
  documentTitle: z.string().trim().optional(),
  /** Substring of the collection name, case-insensitive */
  collection: z.string().trim().optional(),
  minScore: z.number().min(0).max(1).default(SEARCH.DEFAULT_MIN_SCORE),
  /** Maximum number of documents returned */
  limit: z.number().int().positive().default(SEARCH.DEFAULT_LIMIT),
});

export type SearchQuery = z.input<typeof searchQuerySchema>;

export interface SearchPageHit {
  pageId: string;
  pageNumber: number;
  snippet: string;
  score: number;
}

export interface SearchDocumentHit {
  documentId: string;
  title: string;
  collection: string;
  thumbnailKey: string | null;
  maxScore: number;
  /** Best score first */
  pages: SearchPageHit[];
}

export interface SearchResult {
  documents: SearchDocumentHit[];
  /** Matching pages across all documents, before `limit` */
  totalResults: number;
}

function containsIgnoreCase(value: string, part: string | undefined): boolean {
  return !part || foldCase(value).includes(foldCase(part));
}

/**
 * Full-text search over the Markdown of completed pages, grouped per
 * document.
 */
export class SearchService {
  constructor(
    private readonly documents: DocumentRepository,
    private readonly pages: PageRepository,
  ) {}

  /**
   * @throws SearchQueryError
   */
  search(input: SearchQuery): SearchResult {
    const parsed = searchQuerySchema.safeParse(input);
    if (!parsed.success) {
      throw new SearchQueryError(
        parsed.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      );
    }
    const params = parsed.data;

    const documentsById = new Map(
      this.documents
        .list()
        .filter(
          (doc) =>
            containsIgnoreCase(doc.title, params.documentTitle) &&
            containsIgnoreCase(doc.collection, params.collection),
        )
        .map((doc) => [doc.id, doc]),
    );

    const groups = new Map<string, SearchDocumentHit>();
    let totalResults = 0;

    for (const page of this.pages.listByStatus('completed')) {
      const document = documentsById.get(page.documentId);
      if (!document || page.markdown.trim() === '') {
        continue;
      }

      const score = this.score(page, params.query);
      if (score === null || score < params.minScore) {
        continue;
      }

      totalResults++;
      const group = groups.get(document.id) ?? this.newGroup(document);
      group.pages.push({
        pageId: page.id,
        pageNumber: page.pageNumber,
        snippet: createSnippet(page.markdown, params.query),
        score,
      });
      group.maxScore = Math.max(group.maxScore, score);
      groups.set(document.id, group);
    }

    const ranked = [...groups.values()]
      .map((group) => ({
        ...group,
        pages: group.pages.sort(
          (a, b) => b.score - a.score || a.pageNumber - b.pageNumber,
        ),
      }))
      .sort((a, b) => b.maxScore - a.maxScore);

    return { documents: ranked.slice(0, params.limit), totalResults };
  }

  /**
   * @returns `null` when the page does not contain the query
   */
  private score(page: Page, query: string): number | null {
    if (query === '') {
      return 1;
    }
    if (!foldCase(page.markdown).includes(foldCase(query))) {
      return null;
    }
    return trigramSimilarity(page.markdown, query);
  }

  private newGroup(document: Document): SearchDocumentHit {
    return {
      documentId: document.id,
      title: document.title,
      collection: document.collection,
      thumbnailKey: document.thumbnailKey,
      maxScore: 0,
      pages: [],
    };
  }
}
