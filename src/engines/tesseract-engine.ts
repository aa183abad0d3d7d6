import { createRequire } from 'node:module';
import { dirname, join } from 'node:path';
import { createWorker, type Worker } from 'tesseract.js';
import type { Aabb } from '@/types/geometry';
import type { RgbaImage } from '@/types/frame';
import type { IOcrService, RecognizedLine } from '@/types/ocr-service';
import { createEngineLoadError, createInvalidConfigError } from '@/utils/error-handling';
import { sharedImageWorker } from '@/workers/image-worker';

export type TesseractProgressCallback = (status: string, progress: number) => void;

export interface TesseractEngineOptions {
  language?: string;
  onProgress?: TesseractProgressCallback;
  /**
   * Directory holding `<language>.traineddata.gz`. Defaults to the
   * `@tesseract.js-data/<language>` package, so nothing is downloaded.
   */
  langPath?: string;
}

/** Model directory tesseract.js uses for the LSTM engine (OEM 1). */
const LANGUAGE_DATA_DIR = '4.0.0_best_int';

const requireFromHere = createRequire(import.meta.url);

/** Finds the installed data package for a single language. */
export function resolveLanguageDataPath(language: string): string {
  if (language.includes('+')) {
    throw createInvalidConfigError(
      `Combined languages (${language}) need engine.lang_path pointing at one directory with every traineddata file`
    );
  }
  let manifest: string;
  try {
    manifest = requireFromHere.resolve(`@tesseract.js-data/${language}/package.json`);
  } catch {
    throw createInvalidConfigError(
      `No language data installed for ${language}; add @tesseract.js-data/${language} or set engine.lang_path`
    );
  }
  return join(dirname(manifest), LANGUAGE_DATA_DIR);
}

type TesseractPage = Awaited<ReturnType<Worker['recognize']>>['data'];
type TesseractBbox = TesseractPage['lines'][number]['bbox'];

export interface TesseractInput {
  png: Buffer;
  width: number;
  height: number;
  /** Filled by `detectWords`; tesseract runs detection and recognition together. */
  page: TesseractPage | null;
}

const toAabb = (bbox: TesseractBbox): Aabb => ({
  min: { x: bbox.x0, y: bbox.y0 },
  max: { x: bbox.x1, y: bbox.y1 },
});

export class TesseractOcrService implements IOcrService<TesseractInput> {
  public readonly id = 'tesseract';
  public isLoading = false;
  private worker: Worker | null = null;
  private readonly onProgress?: TesseractProgressCallback;
  private readonly language: string;
  private readonly langPath?: string;

  constructor(options?: TesseractEngineOptions | TesseractProgressCallback) {
    if (typeof options === 'function') {
      this.onProgress = options;
      this.language = 'eng';
    } else {
      this.onProgress = options?.onProgress;
      this.language = options?.language ?? 'eng';
      this.langPath = options?.langPath;
    }
  }

  async load(): Promise<void> {
    if (this.worker) {
      return;
    }

    const langPath = this.langPath ?? resolveLanguageDataPath(this.language);
    this.isLoading = true;
    try {
      this.worker = await createWorker(this.language, 1, {
        langPath,
        // Data is read from local files; no copy is written next to the app.
        cacheMethod: 'none',
        logger: (message) => {
          if (this.onProgress) {
            this.onProgress(message.status, message.progress ?? 0);
          }
        },
      });
    } catch (error) {
      throw createEngineLoadError(this.id, error);
    } finally {
      this.isLoading = false;
    }
  }

  async prepareInput(image: RgbaImage): Promise<TesseractInput> {
    return {
      png: await sharedImageWorker.encodePng(image),
      width: image.width,
      height: image.height,
      page: null,
    };
  }

  async detectWords(input: TesseractInput): Promise<Aabb[]> {
    const worker = this.requireWorker();
    const result = await worker.recognize(input.png);
    input.page = result.data;
    return result.data.lines.flatMap((line) => line.words.map((word) => toAabb(word.bbox)));
  }

  async findTextLines(input: TesseractInput, _words: Aabb[]): Promise<Aabb[][]> {
    const page = this.requirePage(input);
    return page.lines.map((line) => line.words.map((word) => toAabb(word.bbox)));
  }

  async recognizeText(input: TesseractInput, lines: Aabb[][]): Promise<Array<RecognizedLine | null>> {
    const page = this.requirePage(input);
    return page.lines.slice(0, lines.length).map((line): RecognizedLine | null => {
      const text = line.text.trim();
      if (text.length === 0) {
        return null;
      }
      return {
        text,
        bounds: toAabb(line.bbox),
        words: line.words.map((word) => ({ text: word.text, bounds: toAabb(word.bbox) })),
      };
    });
  }

  async destroy(): Promise<void> {
    if (this.worker) {
      await this.worker.terminate();
      this.worker = null;
    }
  }

  private requireWorker(): Worker {
    if (!this.worker) {
      throw new Error('Tesseract engine not loaded.');
    }
    return this.worker;
  }

  private requirePage(input: TesseractInput): TesseractPage {
    if (!input.page) {
      throw new Error('detectWords must run before lines can be grouped or recognized.');
    }
    return input.page;
  }
}
