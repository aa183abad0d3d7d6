import type { FrameMeta } from '@/types/frame';

/**
 * Capacity-one channel where the newest value wins. Publishing never waits:
 * an unread value is dropped and replaced, so a fast producer can only ever
 * cause the consumer to skip values, never to stall the producer.
 */
export class FrameChannel<T> {
  private slot: { value: T } | null = null;
  private droppedCount = 0;

  publish(value: T): void {
    if (this.slot) {
      this.droppedCount += 1;
    }
    this.slot = { value };
  }

  tryTake(): T | undefined {
    const slot = this.slot;
    this.slot = null;
    return slot?.value;
  }

  get hasPending(): boolean {
    return this.slot !== null;
  }

  /** Values overwritten before anyone read them. */
  get dropped(): number {
    return this.droppedCount;
  }
}

export interface CaptureChannels {
  frames: FrameChannel<Uint8Array>;
  meta: FrameChannel<FrameMeta>;
}

export function createCaptureChannels(): CaptureChannels {
  return {
    frames: new FrameChannel<Uint8Array>(),
    meta: new FrameChannel<FrameMeta>(),
  };
}

/** Producer-facing side of the capture channels. */
export interface CaptureSink {
  publishFrame(bytes: Uint8Array): void;
  publishMeta(meta: FrameMeta): void;
  publish(bytes: Uint8Array, meta: FrameMeta): void;
}

export function createCaptureSink(channels: CaptureChannels): CaptureSink {
  return {
    publishFrame: (bytes) => channels.frames.publish(bytes),
    publishMeta: (meta) => channels.meta.publish(meta),
    publish: (bytes, meta) => {
      channels.meta.publish(meta);
      channels.frames.publish(bytes);
    },
  };
}
