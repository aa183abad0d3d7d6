import type { OverlaySettings } from '@/config/settings';
import type { OcrResults } from '@/types/ocr-results';
import type { LockedOcrEngine } from '@/engines/locked-engine';
import { LatestFrame } from '@/capture/latest-frame';
import {
  createCaptureChannels,
  createCaptureSink,
  type CaptureChannels,
  type CaptureSink,
} from '@/capture/frame-channel';
import type { CameraProjection } from '@/pipeline/coordinate-mapper';
import {
  OcrScheduler,
  type Extractor,
  type PollOutcome,
  type SchedulerState,
  type TriggerOutcome,
} from '@/pipeline/ocr-scheduler';
import type { TaskSpawner } from '@/pipeline/pollable-task';
import { ItemsBoard } from '@/overlay/items-board';

export interface OverlayRuntimeOptions {
  settings: OverlaySettings;
  engine: LockedOcrEngine;
  projection?: CameraProjection;
  onResults?: (results: OcrResults) => void;
  now?: () => number;
  spawn?: TaskSpawner;
  extract?: Extractor;
}

/**
 * Glue between the capture channels, the OCR scheduler and the items board.
 * `tick` is the consumer loop body: drain the channels, poll the running pass,
 * expire old items.
 */
export class OverlayRuntime {
  readonly channels: CaptureChannels;
  readonly sink: CaptureSink;
  readonly board: ItemsBoard;
  private readonly latest = new LatestFrame();
  private readonly scheduler: OcrScheduler;
  private readonly tickIntervalMs: number;
  private readonly now: () => number;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(options: OverlayRuntimeOptions) {
    const { settings } = options;
    this.channels = createCaptureChannels();
    this.sink = createCaptureSink(this.channels);
    this.tickIntervalMs = settings.tickIntervalMs;
    this.now = options.now ?? Date.now;
    this.board = new ItemsBoard({
      maxDisplayedItems: settings.maxDisplayedItems,
      closeAfterMs: settings.closeLayoutAfter * 1000,
    });
    this.scheduler = new OcrScheduler({
      frames: this.latest,
      engine: options.engine,
      settings: {
        layouts: settings.layouts,
        gapThreshold: settings.gapThreshold,
        saveToDisk: settings.saveToDisk,
        captureDirectory: settings.captureDirectory,
      },
      projection: options.projection,
      spawn: options.spawn,
      extract: options.extract,
      onResults: (results) => {
        this.board.show(results, this.now());
        options.onResults?.(results);
      },
      onError: () => this.board.markFailed(),
    });
  }

  get state(): SchedulerState {
    return this.scheduler.state;
  }

  requestOcr(): TriggerOutcome {
    this.latest.receive(this.channels);
    const outcome = this.scheduler.trigger();
    if (outcome === 'started') {
      this.board.markScanning();
    }
    return outcome;
  }

  tick(now: number = this.now()): PollOutcome {
    this.latest.receive(this.channels);
    const outcome = this.scheduler.poll();
    this.board.clearIfExpired(now);
    return outcome;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      this.tick();
    }, this.tickIntervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
