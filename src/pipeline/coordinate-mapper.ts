import type { Aabb, Point } from '@/types/geometry';
import type { OcrResults } from '@/types/ocr-results';
import { createProjectionFailedError } from '@/utils/error-handling';

/** Converts a point in captured-image pixels to the consumer's coordinate space. */
export interface CameraProjection {
  viewportToWorld(point: Point): Point | null;
}

export const IDENTITY_PROJECTION: CameraProjection = {
  viewportToWorld: (point) => ({ x: point.x, y: point.y }),
};

export interface ViewportProjectionOptions {
  width: number;
  height: number;
  /** World units per viewport pixel. */
  scale?: number;
}

/**
 * A 2D camera looking at the centre of a full-screen viewport: world origin
 * at the viewport centre, y pointing up.
 */
export class ViewportProjection implements CameraProjection {
  private readonly width: number;
  private readonly height: number;
  private readonly scale: number;

  constructor(options: ViewportProjectionOptions) {
    this.width = options.width;
    this.height = options.height;
    this.scale = options.scale ?? 1;
  }

  viewportToWorld(point: Point): Point | null {
    if (this.width <= 0 || this.height <= 0 || this.scale <= 0) {
      return null;
    }
    return {
      x: (point.x - this.width / 2) * this.scale,
      y: (this.height / 2 - point.y) * this.scale,
    };
  }
}

/**
 * Maps both corners and re-orders them, since projections that flip an axis
 * swap which corner is the minimum.
 */
export function toScreenSpace(aabb: Aabb, projection: CameraProjection): Aabb {
  const a = projection.viewportToWorld(aabb.min);
  const b = projection.viewportToWorld(aabb.max);
  if (!a || !b) {
    throw createProjectionFailedError();
  }

  return {
    min: { x: Math.min(a.x, b.x), y: Math.min(a.y, b.y) },
    max: { x: Math.max(a.x, b.x), y: Math.max(a.y, b.y) },
  };
}

export function mapResultsToScreen(results: OcrResults, projection: CameraProjection): OcrResults {
  return {
    detectBounds: toScreenSpace(results.detectBounds, projection),
    words: results.words.map((word) => ({ ...word, bounds: toScreenSpace(word.bounds, projection) })),
    lines: results.lines.map((line) => ({
      bounds: toScreenSpace(line.bounds, projection),
      wordRange: { ...line.wordRange },
    })),
    items: results.items.map((item) => ({ ...item, bounds: toScreenSpace(item.bounds, projection) })),
  };
}
