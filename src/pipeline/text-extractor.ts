import type { Aabb } from '@/types/geometry';
import { translateAabb } from '@/types/geometry';
import type { RgbaImage } from '@/types/frame';
import type { Line, OcrResults, Word } from '@/types/ocr-results';
import type { RecognizedLine } from '@/types/ocr-service';
import type { LockedOcrEngine } from '@/engines/locked-engine';
import { ImageProcessor, OVERLAY_TEXT_PREPROCESS, type PreprocessStep } from '@/utils/image-processor';
import { createDegenerateCropError, createEngineFailureError } from '@/utils/error-handling';
import { sharedImageWorker } from '@/workers/image-worker';
import { DEFAULT_GAP_THRESHOLD, detectColumns } from './column-clusterer';

/** Crops `bounds` out of `image` and runs `steps` over the crop. */
export type RegionPreprocessor = (
  image: RgbaImage,
  bounds: Aabb,
  steps: readonly PreprocessStep[]
) => Promise<RgbaImage>;

/** Runs on the image worker thread; the frame's pixel buffer moves there with the job. */
export const preprocessOffThread: RegionPreprocessor = (image, bounds, steps) =>
  sharedImageWorker.cropAndPreprocess(image, bounds, steps, { transfer: true });

export const preprocessInline: RegionPreprocessor = async (image, bounds, steps) => {
  const processor = new ImageProcessor();
  return processor.preprocess(processor.crop(image, bounds), steps);
};

export interface ExtractOptions {
  gapThreshold?: number;
  /** Replaces the default preprocessing chain. */
  preprocess?: readonly PreprocessStep[];
  preprocessor?: RegionPreprocessor;
}

/**
 * Runs one OCR pass over `ocrBounds` of `image`. All returned boxes are in
 * the coordinate space of `image`.
 *
 * With the default preprocessor the pixels of `image` are handed to the
 * worker thread, so the caller must not read them afterwards.
 */
export async function extractText<TInput>(
  image: RgbaImage,
  ocrBounds: Aabb,
  engine: LockedOcrEngine<TInput>,
  options: ExtractOptions = {}
): Promise<OcrResults> {
  const crop = new ImageProcessor().cropRect(image, ocrBounds);
  if (crop.width === 0 || crop.height === 0) {
    throw createDegenerateCropError(crop.width, crop.height);
  }
  const preprocessor = options.preprocessor ?? preprocessOffThread;
  const processed = await preprocessor(image, ocrBounds, options.preprocess ?? OVERLAY_TEXT_PREPROCESS);

  let recognized: Array<RecognizedLine | null>;
  try {
    // Only the inference calls run under the lock.
    recognized = await engine.withLock(async (service) => {
      const input = await service.prepareInput(processed);
      const wordBoxes = await service.detectWords(input);
      const lineBoxes = await service.findTextLines(input, wordBoxes);
      return service.recognizeText(input, lineBoxes);
    });
  } catch (error) {
    throw createEngineFailureError(error);
  }

  if (!Array.isArray(recognized)) {
    throw createEngineFailureError(new Error('Engine returned no line list.'));
  }

  return assembleResults(recognized, ocrBounds, options.gapThreshold ?? DEFAULT_GAP_THRESHOLD);
}

/**
 * Moves recognized lines from crop space into image space, drops the ones
 * without text and clusters the remaining words into items.
 */
export function assembleResults(
  recognized: Array<RecognizedLine | null>,
  ocrBounds: Aabb,
  gapThreshold: number
): OcrResults {
  const offset = ocrBounds.min;
  const words: Word[] = [];
  const lines: Line[] = [];

  for (const line of recognized) {
    if (!line || line.text.trim().length === 0) {
      continue;
    }

    const start = words.length;
    for (const word of line.words) {
      if (word.text.trim().length === 0) {
        continue;
      }
      words.push({ text: word.text, bounds: translateAabb(word.bounds, offset) });
    }
    lines.push({
      bounds: translateAabb(line.bounds, offset),
      wordRange: { start, end: words.length },
    });
  }

  return {
    detectBounds: {
      min: { x: ocrBounds.min.x, y: ocrBounds.min.y },
      max: { x: ocrBounds.max.x, y: ocrBounds.max.y },
    },
    words,
    lines,
    items: detectColumns(words, gapThreshold),
  };
}
