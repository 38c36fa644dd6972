import type { LoggerMethods } from '@pagemill/logger';
import type { DoclingPreset, ExtractedRegion } from '@pagemill/model';
import type {
  AsyncConversionTask,
  ConversionOptions,
  DoclingAPIClient,
} from 'docling-sdk';

import type { OcrBackend, PageInput, PageResult } from './ocr-backend';

import { Docling } from 'docling-sdk';
import { omit } from 'es-toolkit';
import {
  createWriteStream,
  mkdirSync,
  readFileSync,
  writeFileSync,
} from 'node:fs';
import { join } from 'node:path';
import { pipeline } from 'node:stream/promises';

import { DOCLING_BACKEND } from '../config/constants';
import { imagePlaceholder } from '../parsers/image-placeholder';
import { RegionImageExtractor } from '../processors/region-image-extractor';
import { LocalFileServer } from '../utils/local-file-server';
import { extractZip } from '../utils/zip-extractor';

/** Preset fields that shape a conversion request */
export type DoclingConversionPreset = Pick<
  DoclingPreset,
  | 'name'
  | 'pipeline'
  | 'ocrEngine'
  | 'forceOcr'
  | 'ocrLanguages'
  | 'vlmModel'
  | 'enablePictureDescription'
  | 'pictureDescriptionPrompt'
  | 'enableTableStructure'
  | 'tableMode'
  | 'enableCodeEnrichment'
  | 'enableFormulaEnrichment'
  | 'filterOrphanClusters'
  | 'filterEmptyClusters'
  | 'advancedSettings'
>;

export interface DoclingBackendOptions {
  client: DoclingAPIClient;
  preset: DoclingConversionPreset;
  timeoutMs?: number;
  pollIntervalMs?: number;
}

const EMBEDDED_IMAGE_PATTERN =
  /data:image\/([a-z0-9.+-]+);base64,([A-Za-z0-9+/=]+)/gi;

/** Drop base64 payloads, leaving an empty URI in their place */
function stripEmbeddedImages(text: string): string {
  return text.replace(EMBEDDED_IMAGE_PATTERN, '');
}

const IMAGE_EXTENSIONS: Record<string, string> = {
  png: '.png',
  jpeg: '.jpg',
  jpg: '.jpg',
  gif: '.gif',
  webp: '.webp',
};

export function createDoclingClient(
  baseUrl: string,
  timeout: number = DOCLING_BACKEND.DEFAULT_TIMEOUT_MS,
): DoclingAPIClient {
  return new Docling({ api: { baseUrl, timeout } });
}

/**
 * Map a preset onto docling-serve conversion options.
 *
 * Markdown and JSON are always requested with embedded images; advanced
 * settings may override everything else.
 */
export function buildDoclingOptions(
  preset: DoclingConversionPreset,
): ConversionOptions {
  const options: ConversionOptions = {
    to_formats: ['md', 'json'],
    image_export_mode: 'embedded',
    force_ocr: preset.forceOcr,
    ocr_lang: preset.ocrLanguages.length > 0 ? preset.ocrLanguages : ['en'],
    pipeline: preset.pipeline,
    images_scale: DOCLING_BACKEND.IMAGES_SCALE,
  };

  const serveOptions: Record<string, unknown> = {
    do_ocr: true,
    ocr_engine: preset.ocrEngine,
    do_table_structure: preset.enableTableStructure,
    table_mode: preset.tableMode,
    do_code_enrichment: preset.enableCodeEnrichment,
    do_formula_enrichment: preset.enableFormulaEnrichment,
    do_picture_description: preset.enablePictureDescription,
    create_orphan_clusters: !preset.filterOrphanClusters,
    keep_empty_clusters: !preset.filterEmptyClusters,
  };
  if (preset.enablePictureDescription) {
    serveOptions.picture_description_local = {
      repo_id: DOCLING_BACKEND.PICTURE_DESCRIPTION_MODEL,
      prompt: preset.pictureDescriptionPrompt,
    };
  }
  if (preset.pipeline === 'vlm' && preset.vlmModel) {
    serveOptions.vlm_pipeline_model = preset.vlmModel;
  }

  return Object.assign(
    options,
    serveOptions,
    omit(preset.advancedSettings, ['to_formats', 'image_export_mode']),
  );
}

/**
 * Layout analysis through docling-serve.
 *
 * The page PDF is published on a loopback URL, converted asynchronously,
 * and the ZIP result is unpacked into the work directory. Embedded images
 * in the Markdown are written out and replaced by placeholders.
 */
export class DoclingBackend implements OcrBackend {
  readonly kind = 'docling' as const;

  private readonly extractor: RegionImageExtractor;
  private readonly timeoutMs: number;
  private readonly pollIntervalMs: number;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly options: DoclingBackendOptions,
    extractor?: RegionImageExtractor,
  ) {
    this.extractor = extractor ?? new RegionImageExtractor(logger);
    this.timeoutMs = options.timeoutMs ?? DOCLING_BACKEND.DEFAULT_TIMEOUT_MS;
    this.pollIntervalMs =
      options.pollIntervalMs ?? DOCLING_BACKEND.POLL_INTERVAL_MS;
  }

  async process(input: PageInput): Promise<PageResult> {
    const { pageNumber, pdfPath, workDir } = input;
    const conversionOptions = buildDoclingOptions(this.options.preset);

    this.logger.info(
      `[DoclingBackend] Converting page ${pageNumber} with preset ${this.options.preset.name}`,
    );

    const zipPath = join(workDir, 'docling-result.zip');
    await LocalFileServer.withFile(pdfPath, async (url) => {
      const task = await this.options.client.convertSourceAsync({
        sources: [{ kind: 'http', url }],
        options: conversionOptions,
        target: { kind: 'zip' },
      });
      this.logger.debug(`[DoclingBackend] Task created: ${task.taskId}`);

      await this.waitForTask(task);
      await this.downloadResult(task.taskId, zipPath);
    });

    const extractDir = join(workDir, 'docling');
    const files = await extractZip(zipPath, extractDir);
    const markdownFile = files.find((file) => file.endsWith('.md'));
    const jsonFile = files.find((file) => file.endsWith('.json'));
    if (!markdownFile) {
      throw new Error('[DoclingBackend] Conversion result has no Markdown file');
    }

    const rawMarkdown = readFileSync(join(extractDir, markdownFile), 'utf-8');
    const { markdown, images } = await this.extractEmbeddedImages(
      rawMarkdown,
      join(workDir, 'images'),
    );

    const structuredJson: unknown = jsonFile
      ? JSON.parse(
          stripEmbeddedImages(readFileSync(join(extractDir, jsonFile), 'utf-8')),
        )
      : undefined;

    return {
      rawText: stripEmbeddedImages(rawMarkdown),
      markdown,
      images,
      ...(structuredJson === undefined ? {} : { structuredJson }),
    };
  }

  private async waitForTask(task: AsyncConversionTask): Promise<void> {
    const startedAt = Date.now();

    while (true) {
      if (Date.now() - startedAt > this.timeoutMs) {
        throw new Error(
          `[DoclingBackend] Task ${task.taskId} timed out after ${this.timeoutMs}ms`,
        );
      }

      const status = await task.poll();
      if (status.task_status === 'success') {
        return;
      }
      if (status.task_status === 'failure') {
        throw new Error(
          `[DoclingBackend] Task failed: ${await this.getFailureDetails(task)}`,
        );
      }

      await new Promise((resolve) => setTimeout(resolve, this.pollIntervalMs));
    }
  }

  private async getFailureDetails(task: AsyncConversionTask): Promise<string> {
    try {
      const result = await task.getResult();
      if (result.errors?.length) {
        return result.errors
          .map((e: { message: string }) => e.message)
          .join('; ');
      }
      return `status: ${result.status ?? 'unknown'}`;
    } catch (error) {
      this.logger.error('[DoclingBackend] Failed to retrieve task result:', error);
      return 'unable to retrieve error details';
    }
  }

  private async downloadResult(taskId: string, zipPath: string): Promise<void> {
    const zipResult = await this.options.client.getTaskResultFile(taskId);
    if (!zipResult.success || !zipResult.fileStream) {
      throw new Error('[DoclingBackend] Failed to get ZIP file result');
    }
    await pipeline(zipResult.fileStream, createWriteStream(zipPath));
  }

  /**
   * Write every `data:image/*` URI to `imagesDir/image_<n>` and replace it
   * with the n-th placeholder.
   */
  private async extractEmbeddedImages(
    markdown: string,
    imagesDir: string,
  ): Promise<{ markdown: string; images: ExtractedRegion[] }> {
    const embedded: Array<{ path: string; bytes: Buffer }> = [];

    const replaced = markdown.replace(
      EMBEDDED_IMAGE_PATTERN,
      (_match, subtype: string, data: string) => {
        const regionIndex = embedded.length;
        const extension = IMAGE_EXTENSIONS[subtype.toLowerCase()] ?? '.png';
        embedded.push({
          path: join(imagesDir, `image_${regionIndex}${extension}`),
          bytes: Buffer.from(data, 'base64'),
        });
        return imagePlaceholder(regionIndex);
      },
    );

    if (embedded.length === 0) {
      return { markdown: replaced, images: [] };
    }

    mkdirSync(imagesDir, { recursive: true });
    const images: ExtractedRegion[] = [];
    for (const [regionIndex, { path, bytes }] of embedded.entries()) {
      writeFileSync(path, bytes);
      const dimensions = await this.extractor.readDimensions(path);
      if (!dimensions) {
        this.logger.warn(
          `[DoclingBackend] Region ${regionIndex}: unreadable embedded image, skipping`,
        );
        continue;
      }
      images.push({
        regionIndex,
        path,
        byteSize: bytes.length,
        width: dimensions.width,
        height: dimensions.height,
      });
    }

    this.logger.info(
      `[DoclingBackend] Extracted ${images.length}/${embedded.length} embedded images`,
    );
    return { markdown: replaced, images };
  }
}
