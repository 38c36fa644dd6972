import type { LoggerMethods } from '@pagemill/logger';

import type { DoclingBackendOptions } from './docling-backend';
import type { GroundingOcrOptions } from './grounding-ocr-backend';
import type { OcrBackend } from './ocr-backend';
import type { TextLayerOptions } from '../processors/text-layer-preprocessor';

import { DoclingBackend } from './docling-backend';
import { GroundingOcrBackend } from './grounding-ocr-backend';
import { TextLayerBackend } from './text-layer-backend';

export type BackendConfig =
  | ({ kind: 'grounding' } & GroundingOcrOptions)
  | ({ kind: 'docling' } & DoclingBackendOptions)
  | { kind: 'text-layer'; preset: TextLayerOptions };

export function createBackend(
  logger: LoggerMethods,
  config: BackendConfig,
): OcrBackend {
  switch (config.kind) {
    case 'grounding':
      return new GroundingOcrBackend(logger, config);
    case 'docling':
      return new DoclingBackend(logger, config);
    case 'text-layer':
      return new TextLayerBackend(logger, config.preset);
  }
}
