import type { RgbaImage } from '@/types/frame';
import type { Aabb, Point } from '@/types/geometry';
import { ImageProcessor, isPreprocessStep, type PreprocessStep } from '@/utils/image-processor';
import { decodePng, encodePng } from '@/utils/png';

/** Pixel work the image worker runs off the polling thread. */
export type ImageJob =
  | { kind: 'cropAndPreprocess'; image: RgbaImage; bounds: Aabb; steps: PreprocessStep[] }
  | { kind: 'encodePng'; image: RgbaImage }
  | { kind: 'decodePng'; png: Uint8Array };

export type ImageJobResult =
  | { kind: 'image'; image: RgbaImage }
  | { kind: 'png'; png: Uint8Array };

export interface ImageWorkerRequest {
  id: number;
  job: ImageJob;
}

export type ImageWorkerResponse =
  | { id: number; ok: true; result: ImageJobResult }
  | { id: number; ok: false; error: string };

export function runImageJob(job: ImageJob, processor: ImageProcessor = new ImageProcessor()): ImageJobResult {
  switch (job.kind) {
    case 'cropAndPreprocess':
      return { kind: 'image', image: processor.preprocess(processor.crop(job.image, job.bounds), job.steps) };
    case 'encodePng':
      return { kind: 'png', png: encodePng(job.image) };
    case 'decodePng':
      return {
        kind: 'image',
        image: decodePng(Buffer.from(job.png.buffer, job.png.byteOffset, job.png.byteLength)),
      };
  }
}

/**
 * The buffer behind `view`, when the view spans all of it. Views into a
 * shared or pooled buffer are copied instead of moved.
 */
export function transferList(view: ArrayBufferView): ArrayBuffer[] {
  const { buffer } = view;
  return buffer instanceof ArrayBuffer && view.byteOffset === 0 && view.byteLength === buffer.byteLength
    ? [buffer]
    : [];
}

export function resultTransferList(result: ImageJobResult): ArrayBuffer[] {
  return result.kind === 'image' ? transferList(result.image.data) : transferList(result.png);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isPoint(value: unknown): value is Point {
  return isRecord(value) && typeof value.x === 'number' && typeof value.y === 'number';
}

function isAabb(value: unknown): value is Aabb {
  return isRecord(value) && isPoint(value.min) && isPoint(value.max);
}

function isRgbaImage(value: unknown): value is RgbaImage {
  return (
    isRecord(value) &&
    typeof value.width === 'number' &&
    typeof value.height === 'number' &&
    value.data instanceof Uint8ClampedArray
  );
}

export function parseImageJob(value: unknown): ImageJob | null {
  if (!isRecord(value)) {
    return null;
  }

  switch (value.kind) {
    case 'cropAndPreprocess': {
      const { image, bounds, steps } = value;
      if (!isRgbaImage(image) || !isAabb(bounds) || !Array.isArray(steps) || !steps.every(isPreprocessStep)) {
        return null;
      }
      return { kind: 'cropAndPreprocess', image, bounds, steps };
    }
    case 'encodePng': {
      const { image } = value;
      return isRgbaImage(image) ? { kind: 'encodePng', image } : null;
    }
    case 'decodePng': {
      const { png } = value;
      return png instanceof Uint8Array ? { kind: 'decodePng', png } : null;
    }
    default:
      return null;
  }
}

export function parseImageRequest(value: unknown): ImageWorkerRequest | null {
  if (!isRecord(value)) {
    return null;
  }
  const { id } = value;
  const job = parseImageJob(value.job);
  return typeof id === 'number' && job ? { id, job } : null;
}

export function parseImageResponse(value: unknown): ImageWorkerResponse | null {
  if (!isRecord(value)) {
    return null;
  }
  const { id, ok, error, result } = value;
  if (typeof id !== 'number') {
    return null;
  }
  if (ok === false) {
    return typeof error === 'string' ? { id, ok: false, error } : null;
  }
  if (ok !== true || !isRecord(result)) {
    return null;
  }

  const { image, png } = result;
  if (result.kind === 'image' && isRgbaImage(image)) {
    return { id, ok: true, result: { kind: 'image', image } };
  }
  if (result.kind === 'png' && png instanceof Uint8Array) {
    return { id, ok: true, result: { kind: 'png', png } };
  }
  return null;
}
