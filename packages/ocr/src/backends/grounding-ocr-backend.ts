import type { LoggerMethods } from '@pagemill/logger';
import type { LanguageModel } from 'ai';

import type { OcrBackend, PageInput, PageResult } from './ocr-backend';

import { createOpenAI } from '@ai-sdk/openai';
import { LLMCaller } from '@pagemill/shared';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';

import { GROUNDING_OCR } from '../config/constants';
import { placeholderUrlResolver } from '../parsers/image-placeholder';
import { parseReferences } from '../parsers/reference-parser';
import { RegionImageExtractor } from '../processors/region-image-extractor';

export interface GroundingOcrOptions {
  model: LanguageModel;
  prompt?: string;
  fallbackModel?: LanguageModel;
  maxRetries?: number;
  abortSignal?: AbortSignal;
}

/**
 * Chat model served by Ollama's OpenAI-compatible endpoint.
 *
 * @param baseURL e.g. `http://localhost:11434/v1`
 */
export function createOllamaModel(
  modelName: string,
  baseURL: string = GROUNDING_OCR.DEFAULT_BASE_URL,
): LanguageModel {
  // Ollama ignores the key but the provider requires one
  return createOpenAI({ baseURL, apiKey: 'ollama' }).chat(modelName);
}

/**
 * OCR through a grounding vision model (DeepSeek-OCR and compatible).
 *
 * The model answers with `<|ref|>type<|/ref|><|det|>[[box]]<|/det|>` segments.
 * Image regions are cropped out of the rendered page and linked from the
 * Markdown through placeholders.
 */
export class GroundingOcrBackend implements OcrBackend {
  readonly kind = 'grounding' as const;

  private readonly prompt: string;
  private readonly extractor: RegionImageExtractor;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly options: GroundingOcrOptions,
    extractor?: RegionImageExtractor,
  ) {
    this.prompt = options.prompt ?? GROUNDING_OCR.DEFAULT_PROMPT;
    this.extractor = extractor ?? new RegionImageExtractor(logger);
  }

  async process(input: PageInput): Promise<PageResult> {
    const { pageNumber, imagePath, workDir } = input;

    this.logger.info(
      `[GroundingOcrBackend] Running ${LLMCaller.extractModelName(this.options.model)} on page ${pageNumber}`,
    );

    const result = await LLMCaller.call({
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text', text: this.prompt },
            {
              type: 'image',
              image: readFileSync(imagePath),
              mediaType: 'image/png',
            },
          ],
        },
      ],
      primaryModel: this.options.model,
      fallbackModel: this.options.fallbackModel,
      maxRetries: this.options.maxRetries ?? GROUNDING_OCR.MAX_RETRIES,
      temperature: 0,
      abortSignal: this.options.abortSignal,
      component: 'GroundingOcrBackend',
      phase: 'ocr',
    });

    this.logger.debug(
      `[GroundingOcrBackend] Page ${pageNumber}: ${result.usage.totalTokens} tokens (${result.usage.modelName})`,
    );

    const { references, markdown } = parseReferences(
      result.output,
      placeholderUrlResolver,
    );
    if (references.length === 0) {
      this.logger.warn(
        `[GroundingOcrBackend] Page ${pageNumber}: no grounding tags in model output`,
      );
      return { rawText: result.output, markdown: '', references, images: [] };
    }

    const images = await this.extractor.extract(
      imagePath,
      references,
      join(workDir, 'images'),
    );
    const overlayPath = await this.extractor.renderOverlay(
      imagePath,
      references,
      join(workDir, `page-${pageNumber}-bbox.png`),
    );

    return {
      rawText: result.output,
      markdown,
      references,
      images,
      ...(overlayPath ? { overlayPath } : {}),
    };
  }
}
