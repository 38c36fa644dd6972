import type { LogLevel } from '@pagemill/logger';

import { join, resolve } from 'node:path';
import { z } from 'zod';

import { ConfigurationError } from '../errors/pipeline-errors';
import { IMAGE_CAPTIONER, JOB_QUEUE } from './constants';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

/**
 * Environment variables read by the pipeline.
 */
export const envSchema = z.object({
  PAGEMILL_DATA_DIR: z.string().min(1).default('./data'),
  PAGEMILL_DATABASE_PATH: z.string().min(1).optional(),
  PAGEMILL_STORAGE_ROOT: z.string().min(1).optional(),
  OLLAMA_HOST: z.string().url().default('http://localhost:11434'),
  OCR_MODEL: z.string().min(1).default('deepseek-ocr'),
  IMAGE_ALT_TEXT_MODEL: z.string().min(1).default(IMAGE_CAPTIONER.DEFAULT_MODEL),
  PAGEMILL_CAPTION_IMAGES: booleanFlag,
  DOCLING_URL: z.string().url().default('http://localhost:5001'),
  PAGEMILL_CONCURRENCY: z.coerce
    .number()
    .int()
    .positive()
    .max(64)
    .default(JOB_QUEUE.DEFAULT_CONCURRENCY),
  PAGEMILL_RENDER_ZOOM: z.coerce.number().positive().max(8).default(2),
  LOG_LEVEL: z
    .enum(['debug', 'info', 'warn', 'error', 'silent'])
    .default('info'),
});

export interface PipelineConfig {
  dataDir: string;
  databasePath: string;
  storageRoot: string;
  /** Ollama OpenAI-compatible endpoint, ending in `/v1` */
  ollamaBaseUrl: string;
  ocrModel: string;
  imageAltTextModel: string;
  captionImages: boolean;
  doclingUrl: string;
  concurrency: number;
  renderZoom: number;
  logLevel: LogLevel;
}

/**
 * Validate the environment and resolve derived paths.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): PipelineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    );
  }

  const vars = parsed.data;
  const dataDir = resolve(vars.PAGEMILL_DATA_DIR);

  return {
    dataDir,
    databasePath: resolve(
      vars.PAGEMILL_DATABASE_PATH ?? join(dataDir, 'pagemill.json'),
    ),
    storageRoot: resolve(vars.PAGEMILL_STORAGE_ROOT ?? join(dataDir, 'storage')),
    ollamaBaseUrl: `${vars.OLLAMA_HOST.replace(/\/+$/, '')}/v1`,
    ocrModel: vars.OCR_MODEL,
    imageAltTextModel: vars.IMAGE_ALT_TEXT_MODEL,
    captionImages: vars.PAGEMILL_CAPTION_IMAGES,
    doclingUrl: vars.DOCLING_URL,
    concurrency: vars.PAGEMILL_CONCURRENCY,
    renderZoom: vars.PAGEMILL_RENDER_ZOOM,
    logLevel: vars.LOG_LEVEL,
  };
}
