import type { LoggerMethods } from '@pagemill/logger';

import { EventEmitter } from 'node:events';

import { JOB_QUEUE } from '../config/constants';
import { createId } from '../utils/id';

export interface JobPayloads {
  'process-document': { documentId: string; applyTextLayer?: boolean };
  'generate-thumbnail': { documentId: string };
  'split-document': { documentId: string };
  'process-page': { pageId: string };
  'caption-image': { imageId: string };
}

export type JobKind = keyof JobPayloads;

export type JobHandler<K extends JobKind> = (
  payload: JobPayloads[K],
) => Promise<void>;

type JobHandlers = { [K in JobKind]?: JobHandler<K> };

/** Deduplication key of a job: one entry per kind and target */
const JOB_KEYS: { [K in JobKind]: (payload: JobPayloads[K]) => string } = {
  'process-document': (p) => `process-document:${p.documentId}`,
  'generate-thumbnail': (p) => `generate-thumbnail:${p.documentId}`,
  'split-document': (p) => `split-document:${p.documentId}`,
  'process-page': (p) => `process-page:${p.pageId}`,
  'caption-image': (p) => `caption-image:${p.imageId}`,
};

export interface JobInfo {
  id: string;
  kind: JobKind;
  key: string;
}

export interface JobQueueEvents {
  'job:started': [job: JobInfo];
  'job:completed': [job: JobInfo];
  'job:failed': [job: JobInfo, error: Error];
}

interface QueuedJob extends JobInfo {
  run: () => Promise<void>;
}

export interface JobQueueOptions {
  maxConcurrency?: number;
}

/**
 * In-process job queue.
 *
 * Runs at most `maxConcurrency` jobs at once and never two jobs with the
 * same key at the same time. A key that is already waiting is not queued
 * twice; a key that is running is queued and starts after the running job
 * finishes.
 */
export class JobQueue {
  private readonly queue: QueuedJob[] = [];
  private readonly activeWorkers: Map<string, Promise<void>> = new Map();
  private readonly handlers: JobHandlers = {};
  private readonly emitter = new EventEmitter();
  private readonly maxConcurrency: number;
  private idleResolvers: Array<() => void> = [];

  constructor(
    private readonly logger: LoggerMethods,
    options: JobQueueOptions = {},
  ) {
    this.maxConcurrency =
      options.maxConcurrency ?? JOB_QUEUE.DEFAULT_CONCURRENCY;
    this.emitter.setMaxListeners(100);
  }

  setHandler<K extends JobKind>(kind: K, handler: JobHandler<K>): void {
    const handlers: { [P in K]?: JobHandler<P> } = this.handlers;
    handlers[kind] = handler;
  }

  /**
   * Queue a job.
   *
   * @returns the job, or the already waiting job with the same key
   */
  enqueue<K extends JobKind>(kind: K, payload: JobPayloads[K]): JobInfo {
    const keyOf: (p: JobPayloads[K]) => string = JOB_KEYS[kind];
    const key = keyOf(payload);

    const waiting = this.queue.find((job) => job.key === key);
    if (waiting) {
      this.logger.debug(`[JobQueue] ${key} is already queued`);
      return this.toInfo(waiting);
    }

    const job: QueuedJob = {
      id: createId('job'),
      kind,
      key,
      run: () => this.dispatch(kind, payload),
    };
    this.queue.push(job);
    this.logger.debug(
      `[JobQueue] Queued ${key} (position ${this.queue.length})`,
    );

    this.processQueue();
    return this.toInfo(job);
  }

  on<E extends keyof JobQueueEvents>(
    event: E,
    listener: (...args: JobQueueEvents[E]) => void,
  ): () => void {
    this.emitter.on(event, listener);
    return () => this.emitter.off(event, listener);
  }

  /** Resolves once nothing is queued or running */
  onIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleResolvers.push(resolve);
    });
  }

  getStatus(): {
    queueLength: number;
    activeCount: number;
    maxConcurrency: number;
  } {
    return {
      queueLength: this.queue.length,
      activeCount: this.activeWorkers.size,
      maxConcurrency: this.maxConcurrency,
    };
  }

  private processQueue(): void {
    while (this.activeWorkers.size < this.maxConcurrency) {
      const index = this.queue.findIndex(
        (job) => !this.activeWorkers.has(job.key),
      );
      if (index === -1) {
        break;
      }

      const [job] = this.queue.splice(index, 1);
      const workerPromise = this.runWorker(job);
      this.activeWorkers.set(job.key, workerPromise);

      void workerPromise.finally(() => {
        this.activeWorkers.delete(job.key);
        this.processQueue();
        this.resolveIdle();
      });
    }
  }

  private async runWorker(job: QueuedJob): Promise<void> {
    const info = this.toInfo(job);
    this.emitter.emit('job:started', info);

    try {
      await job.run();
      this.emitter.emit('job:completed', info);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`[JobQueue] ${job.key} failed: ${err.message}`);
      this.emitter.emit('job:failed', info, err);
    }
  }

  private async dispatch<K extends JobKind>(
    kind: K,
    payload: JobPayloads[K],
  ): Promise<void> {
    const handler = this.handlers[kind];
    if (!handler) {
      throw new Error(`[JobQueue] No handler registered for ${kind}`);
    }
    await handler(payload);
  }

  private isIdle(): boolean {
    return this.queue.length === 0 && this.activeWorkers.size === 0;
  }

  private resolveIdle(): void {
    if (!this.isIdle()) {
      return;
    }
    const resolvers = this.idleResolvers;
    this.idleResolvers = [];
    resolvers.forEach((resolve) => resolve());
  }

  private toInfo(job: QueuedJob): JobInfo {
    return { id: job.id, kind: job.kind, key: job.key };
  }
}
