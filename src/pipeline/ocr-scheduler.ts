import type { RgbaImage } from '@/types/frame';
import type { Aabb } from '@/types/geometry';
import type { LayoutOption } from '@/types/layout';
import type { OcrResults } from '@/types/ocr-results';
import type { LockedOcrEngine } from '@/engines/locked-engine';
import { getOcrBounds, selectLayout } from '@/layouts/layout-selector';
import { saveCapture as writeCapture } from '@/utils/capture-writer';
import { ERROR_MESSAGES, logDebug, logError, logWarning } from '@/utils/error-handling';
import { OCRErrorCode } from '@/types/ocr-errors';
import { IDENTITY_PROJECTION, mapResultsToScreen, type CameraProjection } from './coordinate-mapper';
import { extractText, type ExtractOptions } from './text-extractor';
import { spawnDeferred, type PollableTask, type TaskSpawner } from './pollable-task';

export type SchedulerState = 'idle' | 'running';
export type TriggerOutcome = 'started' | 'busy' | 'no-frame' | 'no-layout';
export type PollOutcome = 'idle' | 'pending' | 'delivered' | 'failed';

export interface FrameSource {
  takeRgba(): RgbaImage | null;
}

export interface SchedulerSettings {
  layouts: LayoutOption[];
  gapThreshold: number;
  saveToDisk: boolean;
  captureDirectory: string;
}

export type Extractor = (
  image: RgbaImage,
  ocrBounds: Aabb,
  engine: LockedOcrEngine,
  options: ExtractOptions
) => Promise<OcrResults>;

export interface OcrSchedulerOptions {
  frames: FrameSource;
  engine: LockedOcrEngine;
  settings: SchedulerSettings;
  onResults: (results: OcrResults) => void;
  onError?: (error: unknown) => void;
  projection?: CameraProjection;
  spawn?: TaskSpawner;
  extract?: Extractor;
  saveCapture?: (image: RgbaImage, directory: string) => Promise<string>;
}

/**
 * Owns at most one OCR pass. `trigger` starts a pass when none is running and
 * returns immediately; `poll` is a cheap check meant to be called once per
 * tick that hands a finished pass to the consumer and goes back to idle.
 */
export class OcrScheduler {
  private readonly frames: FrameSource;
  private readonly engine: LockedOcrEngine;
  private readonly settings: SchedulerSettings;
  private readonly onResults: (results: OcrResults) => void;
  private readonly onError?: (error: unknown) => void;
  private readonly projection: CameraProjection;
  private readonly spawn: TaskSpawner;
  private readonly extract: Extractor;
  private readonly saveCapture: (image: RgbaImage, directory: string) => Promise<string>;
  private task: PollableTask<OcrResults> | null = null;

  constructor(options: OcrSchedulerOptions) {
    this.frames = options.frames;
    this.engine = options.engine;
    this.settings = options.settings;
    this.onResults = options.onResults;
    this.onError = options.onError;
    this.projection = options.projection ?? IDENTITY_PROJECTION;
    this.spawn = options.spawn ?? spawnDeferred;
    this.extract = options.extract ?? extractText;
    this.saveCapture = options.saveCapture ?? writeCapture;
  }

  get state(): SchedulerState {
    return this.task ? 'running' : 'idle';
  }

  trigger(): TriggerOutcome {
    if (this.task) {
      return 'busy';
    }

    const image = this.frames.takeRgba();
    if (!image) {
      logDebug(ERROR_MESSAGES[OCRErrorCode.NO_FRAME].message);
      return 'no-frame';
    }

    if (this.settings.saveToDisk) {
      void this.saveCapture(image, this.settings.captureDirectory).then(
        (path) => logDebug(`Saved capture to ${path}`),
        (error: unknown) => logError(error)
      );
    }

    const layout = selectLayout(image, this.settings.layouts);
    if (!layout) {
      logWarning(
        `${ERROR_MESSAGES[OCRErrorCode.NO_LAYOUT_MATCH].message} (${image.width}x${image.height})`
      );
      return 'no-layout';
    }

    const ocrBounds = getOcrBounds(layout, image.width, image.height);
    const engine = this.engine;
    const options: ExtractOptions = { gapThreshold: this.settings.gapThreshold };
    this.task = this.spawn(async () => {
      const started = performance.now();
      try {
        return await this.extract(image, ocrBounds, engine, options);
      } finally {
        logDebug(`OCR took ${Math.round(performance.now() - started)}ms`);
      }
    });
    return 'started';
  }

  poll(): PollOutcome {
    if (!this.task) {
      return 'idle';
    }

    const outcome = this.task.pollOnce();
    if (!outcome) {
      return 'pending';
    }
    this.task = null;

    if (!outcome.ok) {
      this.fail(outcome.error);
      return 'failed';
    }

    let results: OcrResults;
    try {
      results = mapResultsToScreen(outcome.value, this.projection);
    } catch (error) {
      this.fail(error);
      return 'failed';
    }

    this.onResults(results);
    return 'delivered';
  }

  private fail(error: unknown): void {
    logError(error);
    this.onError?.(error);
  }
}
