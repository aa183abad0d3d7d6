import type { FrameMeta, RgbaImage } from '@/types/frame';
import type { CaptureChannels } from './frame-channel';
import { formatName, normalizeToRgba, requiredByteLength } from './format-converter';
import { logDebug, logInfo } from '@/utils/error-handling';

const EMPTY = new Uint8Array(0);

/**
 * Consumer-side holder for the most recent capture. Bytes and metadata arrive
 * on separate channels and may briefly disagree; a buffer that does not fit
 * the current metadata is kept until a matching metadata update lands.
 */
export class LatestFrame {
  private bytes: Uint8Array = EMPTY;
  private meta: FrameMeta = { width: 0, height: 0, format: 'BGRA' };

  receive(channels: CaptureChannels): void {
    const meta = channels.meta.tryTake();
    if (meta) {
      logInfo(`Frame meta changed: ${meta.width}x${meta.height} (${formatName(meta.format)})`);
      this.meta = meta;
    }

    const bytes = channels.frames.tryTake();
    if (bytes) {
      this.bytes = bytes;
    }
  }

  get currentMeta(): FrameMeta {
    return this.meta;
  }

  get hasFrame(): boolean {
    return this.bytes.byteLength >= 4;
  }

  /**
   * Moves the stored bytes out as an RGBA image. Leaves the bytes in place
   * when they cannot be used yet.
   */
  takeRgba(): RgbaImage | null {
    if (!this.hasFrame) {
      return null;
    }

    const { width, height, format } = this.meta;
    if (width <= 0 || height <= 0 || this.bytes.byteLength < requiredByteLength(width, height)) {
      logDebug(
        `Frame of ${this.bytes.byteLength} bytes does not fit ${width}x${height} yet, waiting for metadata`
      );
      return null;
    }
    if (typeof format !== 'string') {
      // Reported by the converter; the frame stays until the format changes.
      return normalizeToRgba(this.bytes, width, height, format);
    }

    const bytes = this.bytes;
    this.bytes = EMPTY;
    return normalizeToRgba(bytes, width, height, format);
  }
}
