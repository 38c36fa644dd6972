import type { LoggerMethods } from '@pagemill/logger';
import type { Document, DocumentProgress, ProcessingStatus } from '@pagemill/model';

import type { DocumentRepository } from '../db/repositories/document-repository';
import type { PageRepository } from '../db/repositories/page-repository';

import { isTerminalStatus } from '@pagemill/model';

function toPercent(processedPages: number, pageCount: number): number {
  if (pageCount === 0) {
    return 0;
  }
  return Math.round((processedPages / pageCount) * 100 * 100) / 100;
}

function toProgress(document: Document): DocumentProgress {
  return {
    documentId: document.id,
    status: document.status,
    processedPages: document.processedPages,
    pageCount: document.pageCount,
    percent: toPercent(document.processedPages, document.pageCount),
  };
}

export interface ProgressAggregatorOptions {
  /** Called when a document moves into `completed` or `failed` */
  onSettled?: (documentId: string, status: ProcessingStatus) => void;
}

/**
 * Derives document status and counters from its pages.
 *
 * Every call recounts the full page set, so concurrent page jobs calling
 * {@link ProgressAggregator.update} converge on the same result.
 */
export class ProgressAggregator {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly documents: DocumentRepository,
    private readonly pages: PageRepository,
    private readonly options: ProgressAggregatorOptions = {},
  ) {}

  update(documentId: string): DocumentProgress {
    const document = this.documents.getById(documentId);
    const statuses = this.pages.listStatuses(documentId);

    const processedPages = statuses.filter((s) => s === 'completed').length;
    const terminalPages = statuses.filter(isTerminalStatus).length;
    const status = this.deriveStatus(
      document,
      processedPages,
      terminalPages,
    );

    const updated = this.documents.update(documentId, {
      processedPages,
      status,
    });

    if (status !== document.status) {
      this.logger.info(
        `[ProgressAggregator] Document ${documentId} is now ${status} (${processedPages}/${updated.pageCount})`,
      );
      if (isTerminalStatus(status)) {
        this.options.onSettled?.(documentId, status);
      }
    }
    return toProgress(updated);
  }

  getProgress(documentId: string): DocumentProgress {
    return toProgress(this.documents.getById(documentId));
  }

  private deriveStatus(
    document: Document,
    processedPages: number,
    terminalPages: number,
  ): ProcessingStatus {
    // Pages are not known yet
    if (document.pageCount === 0) {
      return document.status;
    }
    if (processedPages === document.pageCount) {
      return 'completed';
    }
    if (terminalPages === document.pageCount) {
      return 'failed';
    }
    return 'processing';
  }
}
