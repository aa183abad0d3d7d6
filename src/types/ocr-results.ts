import type { Aabb } from './geometry';

export interface Word {
  text: string;
  bounds: Aabb;
}

export interface Line {
  bounds: Aabb;
  /** Half-open index range into the words of the same result set. */
  wordRange: { start: number; end: number };
}

export interface Item {
  name: string;
  bounds: Aabb;
}

export interface OcrResults {
  /** The region OCR ran over. */
  detectBounds: Aabb;
  words: Word[];
  lines: Line[];
  items: Item[];
}
