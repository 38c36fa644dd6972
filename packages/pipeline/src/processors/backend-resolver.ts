import type { LoggerMethods } from '@pagemill/logger';
import type { DoclingPreset, Document, OcrPreset } from '@pagemill/model';
import type { BackendConfig, OcrBackend } from '@pagemill/ocr';

import type { DocumentRepository } from '../db/repositories/document-repository';
import type { OcrSettingsService } from '../presets/ocr-settings-service';
import type {
  DoclingPresetService,
  OcrPresetService,
} from '../presets/preset-service';

import {
  createBackend,
  createDoclingClient,
  createOllamaModel,
} from '@pagemill/ocr';

export interface BackendResolverOptions {
  /** Ollama OpenAI-compatible endpoint */
  ollamaBaseUrl: string;
  doclingUrl: string;
}

export type BackendFactory = (
  logger: LoggerMethods,
  config: BackendConfig,
) => OcrBackend;

/**
 * Picks the OCR strategy of a document and keeps it for every page of that
 * document until {@link BackendResolver.invalidate} is called, which the
 * pipeline does on reprocess and once the document settles.
 *
 * - a Docling preset (or `backend: 'docling'`) selects docling-serve
 * - `backend: 'text-layer'` selects OCRmyPDF with the document's OCR preset
 * - anything else uses the grounding model from the document or the settings
 */
export class BackendResolver {
  private readonly cache = new Map<string, OcrBackend>();

  constructor(
    private readonly logger: LoggerMethods,
    private readonly documents: DocumentRepository,
    private readonly ocrPresets: OcrPresetService,
    private readonly doclingPresets: DoclingPresetService,
    private readonly settings: OcrSettingsService,
    private readonly options: BackendResolverOptions,
    private readonly factory: BackendFactory = createBackend,
  ) {}

  resolve(documentId: string): OcrBackend {
    const cached = this.cache.get(documentId);
    if (cached) {
      return cached;
    }

    const document = this.documents.getById(documentId);
    const backend = this.factory(this.logger, this.configFor(document));
    this.cache.set(documentId, backend);

    this.logger.info(
      `[BackendResolver] Document ${documentId} uses the ${backend.kind} backend`,
    );
    return backend;
  }

  invalidate(documentId: string): void {
    this.cache.delete(documentId);
  }

  private configFor(document: Document): BackendConfig {
    if (document.doclingPresetId !== null || document.backend === 'docling') {
      return {
        kind: 'docling',
        client: createDoclingClient(this.options.doclingUrl),
        preset: this.doclingPresetFor(document),
      };
    }

    if (document.backend === 'text-layer') {
      return { kind: 'text-layer', preset: this.ocrPresetFor(document) };
    }

    const settings = this.settings.get();
    return {
      kind: 'grounding',
      model: createOllamaModel(
        document.ocrModel ?? settings.model,
        this.options.ollamaBaseUrl,
      ),
      prompt: settings.prompt,
    };
  }

  private ocrPresetFor(document: Document): OcrPreset {
    if (document.ocrPresetId !== null) {
      const preset = this.ocrPresets.get(document.ocrPresetId);
      if (preset) {
        return preset;
      }
      this.logger.warn(
        `[BackendResolver] OCR preset ${document.ocrPresetId} not found, using the default`,
      );
    }
    return this.ocrPresets.getDefault();
  }

  private doclingPresetFor(document: Document): DoclingPreset {
    if (document.doclingPresetId !== null) {
      const preset = this.doclingPresets.get(document.doclingPresetId);
      if (preset) {
        return preset;
      }
      this.logger.warn(
        `[BackendResolver] Docling preset ${document.doclingPresetId} not found, using the default`,
      );
    }
    return this.doclingPresets.getDefault();
  }
}
