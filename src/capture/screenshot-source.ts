import screenshot from 'screenshot-desktop';
import type { CaptureSink } from './frame-channel';
import type { RgbaImage } from '@/types/frame';
import { logError } from '@/utils/error-handling';
import { sharedImageWorker } from '@/workers/image-worker';

export interface ScreenshotSourceOptions {
  sink: CaptureSink;
  intervalMs?: number;
  /** Display id as reported by screenshot-desktop; primary display when omitted. */
  screen?: string | number;
  /** Turns the grabbed PNG into RGBA; runs on the image worker thread by default. */
  decode?: (png: Buffer) => Promise<RgbaImage>;
}

const decodeOffThread = (png: Buffer): Promise<RgbaImage> => sharedImageWorker.decodePng(png, { transfer: true });

const DEFAULT_INTERVAL_MS = 250;

/**
 * Polling capture producer. Grabs the screen as PNG, decodes it to RGBA and
 * publishes it; a tick is skipped while the previous grab is still running.
 */
export class ScreenshotCaptureSource {
  private readonly sink: CaptureSink;
  private readonly intervalMs: number;
  private readonly screen?: string | number;
  private readonly decode: (png: Buffer) => Promise<RgbaImage>;
  private timer: ReturnType<typeof setInterval> | null = null;
  private capturing = false;

  constructor(options: ScreenshotSourceOptions) {
    this.sink = options.sink;
    this.intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.screen = options.screen;
    this.decode = options.decode ?? decodeOffThread;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      void this.captureOnce();
    }, this.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** Resolves to whether a frame was published. */
  async captureOnce(): Promise<boolean> {
    if (this.capturing) {
      return false;
    }

    this.capturing = true;
    try {
      const png = await screenshot({ format: 'png', screen: this.screen });
      const image = await this.decode(png);
      this.sink.publish(new Uint8Array(image.data.buffer, image.data.byteOffset, image.data.byteLength), {
        width: image.width,
        height: image.height,
        format: 'RGBA',
      });
      return true;
    } catch (error) {
      logError(error);
      return false;
    } finally {
      this.capturing = false;
    }
  }
}
