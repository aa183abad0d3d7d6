import type { Aabb } from './geometry';
import type { RgbaImage } from './frame';

export interface RecognizedWord {
  text: string;
  /** Relative to the image handed to `prepareInput`. */
  bounds: Aabb;
}

export interface RecognizedLine {
  text: string;
  bounds: Aabb;
  words: RecognizedWord[];
}

/**
 * A stateful OCR backend. The four inference calls are split the way
 * detection/recognition models usually are; `TInput` is whatever the backend
 * needs to carry between them.
 */
export interface IOcrService<TInput = unknown> {
  readonly id: string;
  isLoading: boolean;
  load(): Promise<void>;
  prepareInput(image: RgbaImage): Promise<TInput>;
  detectWords(input: TInput): Promise<Aabb[]>;
  /** Groups word boxes into lines, each line in reading order. */
  findTextLines(input: TInput, words: Aabb[]): Promise<Aabb[][]>;
  /** One entry per line; `null` when nothing could be recognized. */
  recognizeText(input: TInput, lines: Aabb[][]): Promise<Array<RecognizedLine | null>>;
  destroy(): Promise<void>;
}
