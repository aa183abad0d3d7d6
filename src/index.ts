export * from '@/types/geometry';
export * from '@/types/frame';
export * from '@/types/layout';
export * from '@/types/ocr-results';
export * from '@/types/ocr-service';
export * from '@/types/ocr-errors';
export * from '@/capture/frame-channel';
export * from '@/capture/format-converter';
export * from '@/capture/latest-frame';
export * from '@/capture/screenshot-source';
export * from '@/layouts/layout-selector';
export * from '@/engines/engine-factory';
export * from '@/engines/locked-engine';
export * from '@/engines/tesseract-engine';
export * from '@/pipeline/column-clusterer';
export * from '@/pipeline/coordinate-mapper';
export * from '@/pipeline/pollable-task';
export * from '@/pipeline/text-extractor';
export * from '@/pipeline/ocr-scheduler';
export * from '@/config/settings';
export * from '@/config/settings-loader';
export * from '@/overlay/items-board';
export { OverlayRuntime, type OverlayRuntimeOptions } from '@/overlay-runtime';
export { OCRManager } from '@/ocr-manager';
export * from '@/utils/error-handling';
export {
  ImageProcessor,
  OVERLAY_TEXT_PREPROCESS,
  isPreprocessStep,
  type CropRect,
  type PreprocessStep,
} from '@/utils/image-processor';
export { encodePng, decodePng } from '@/utils/png';
export { captureFileName, saveCapture } from '@/utils/capture-writer';
export { ImageWorker, sharedImageWorker, type TransferOptions } from '@/workers/image-worker';
