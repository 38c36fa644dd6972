export type { Document, DocumentProgress, Metadata, OcrBackendKind } from './document';
export type { ExtractedImage, Page } from './page';
export type {
  DoclingPreset,
  OcrPreset,
  OcrSettings,
  PresetKind,
} from './presets';
export {
  TERMINAL_STATUSES,
  isTerminalStatus,
  type ProcessingStatus,
} from './processing-status';
export type { ExtractedRegion, Reference } from './reference';
