import type { LoggerMethods } from '@pagemill/logger';
import type { LanguageModel } from 'ai';

import type { ImageRepository } from '../db/repositories/image-repository';
import type { Storage } from '../storage/storage';

import { LLMCaller } from '@pagemill/shared';
import { extname } from 'node:path';

import { IMAGE_CAPTIONER } from '../config/constants';

const MEDIA_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.webp': 'image/webp',
};

export interface ImageCaptionerOptions {
  model: LanguageModel;
  fallbackModel?: LanguageModel;
  maxRetries?: number;
}

/**
 * Writes a short vision-model description of a stored image as its alt text.
 */
export class ImageCaptioner {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly images: ImageRepository,
    private readonly storage: Storage,
    private readonly options: ImageCaptionerOptions,
  ) {}

  /**
   * @returns the stored alt text, or `null` when no caption was written
   */
  async caption(imageId: string): Promise<string | null> {
    const image = this.images.findById(imageId);
    if (!image) {
      this.logger.warn(`[ImageCaptioner] Image ${imageId} no longer exists`);
      return null;
    }

    try {
      const bytes = await this.storage.open(image.fileKey);
      const result = await LLMCaller.call({
        messages: [
          {
            role: 'user',
            content: [
              { type: 'text', text: IMAGE_CAPTIONER.PROMPT },
              {
                type: 'image',
                image: bytes,
                mediaType:
                  MEDIA_TYPES[extname(image.fileKey).toLowerCase()] ??
                  'image/png',
              },
            ],
          },
        ],
        primaryModel: this.options.model,
        fallbackModel: this.options.fallbackModel,
        maxRetries: this.options.maxRetries ?? IMAGE_CAPTIONER.MAX_RETRIES,
        component: 'ImageCaptioner',
        phase: 'caption',
      });

      const altText = result.output.trim();
      if (altText === '') {
        this.logger.warn(`[ImageCaptioner] Empty caption for image ${imageId}`);
        return null;
      }

      this.images.setAltText(imageId, altText);
      this.logger.debug(
        `[ImageCaptioner] Image ${imageId}: "${altText}" (${result.usage.modelName})`,
      );
      return altText;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `[ImageCaptioner] Failed to caption image ${imageId}: ${message}`,
      );
      return null;
    }
  }
}
