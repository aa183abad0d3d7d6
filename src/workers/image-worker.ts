import { Worker } from 'node:worker_threads';
import type { RgbaImage } from '@/types/frame';
import type { Aabb } from '@/types/geometry';
import type { PreprocessStep } from '@/utils/image-processor';
import { logDebug } from '@/utils/error-handling';
import {
  parseImageResponse,
  transferList,
  type ImageJob,
  type ImageJobResult,
  type ImageWorkerRequest,
} from './image-jobs';

const WORKER_URL = new URL('./image.worker.ts', import.meta.url);
// The entry is TypeScript; the thread loads it through tsx like the CLI does.
const WORKER_EXEC_ARGV = ['--import', 'tsx'];

interface PendingJob {
  resolve: (result: ImageJobResult) => void;
  reject: (error: Error) => void;
}

export interface TransferOptions {
  /**
   * Moves the pixel buffer to the worker instead of copying it. The caller's
   * view is detached afterwards.
   */
  transfer?: boolean;
}

/**
 * Runs pixel-heavy jobs on one long-lived worker thread so the polling loop
 * never waits on them. The thread starts on the first job, holds the process
 * open only while jobs are pending and is restarted after it dies.
 */
export class ImageWorker {
  private worker: Worker | null = null;
  private nextId = 1;
  private readonly pending = new Map<number, PendingJob>();

  get pendingJobs(): number {
    return this.pending.size;
  }

  get isRunning(): boolean {
    return this.worker !== null;
  }

  async cropAndPreprocess(
    image: RgbaImage,
    bounds: Aabb,
    steps: readonly PreprocessStep[],
    options: TransferOptions = {}
  ): Promise<RgbaImage> {
    const result = await this.run(
      { kind: 'cropAndPreprocess', image, bounds, steps: [...steps] },
      options.transfer ? transferList(image.data) : []
    );
    return expectImage(result);
  }

  async encodePng(image: RgbaImage): Promise<Buffer> {
    const result = await this.run({ kind: 'encodePng', image }, []);
    if (result.kind !== 'png') {
      throw new Error(`Image worker answered encodePng with ${result.kind}.`);
    }
    return Buffer.from(result.png.buffer, result.png.byteOffset, result.png.byteLength);
  }

  async decodePng(png: Uint8Array, options: TransferOptions = {}): Promise<RgbaImage> {
    const result = await this.run({ kind: 'decodePng', png }, options.transfer ? transferList(png) : []);
    return expectImage(result);
  }

  /** Stops the thread; pending jobs reject. */
  async close(): Promise<void> {
    const worker = this.worker;
    if (!worker) {
      return;
    }
    this.worker = null;
    this.rejectPending(new Error('Image worker closed.'));
    await worker.terminate();
  }

  private run(job: ImageJob, transfer: ArrayBuffer[]): Promise<ImageJobResult> {
    const worker = this.ensureWorker();
    const id = this.nextId++;

    return new Promise<ImageJobResult>((resolve, reject) => {
      this.pending.set(id, { resolve, reject });
      worker.ref();
      try {
        worker.postMessage({ id, job } satisfies ImageWorkerRequest, transfer);
      } catch (error) {
        this.pending.delete(id);
        this.releaseIfIdle();
        reject(error instanceof Error ? error : new Error(String(error)));
      }
    });
  }

  private ensureWorker(): Worker {
    if (this.worker) {
      return this.worker;
    }

    const worker = new Worker(WORKER_URL, { execArgv: WORKER_EXEC_ARGV });
    worker.unref();
    worker.on('message', (message: unknown) => this.settle(message));
    worker.on('error', (error: Error) => this.discard(worker, error));
    worker.on('exit', (code: number) => this.discard(worker, new Error(`Image worker exited with code ${code}.`)));
    this.worker = worker;
    logDebug('Image worker started');
    return worker;
  }

  private settle(message: unknown): void {
    const response = parseImageResponse(message);
    if (!response) {
      this.rejectPending(new Error('Image worker sent a malformed response.'));
      return;
    }

    const job = this.pending.get(response.id);
    if (!job) {
      return;
    }
    this.pending.delete(response.id);
    this.releaseIfIdle();

    if (response.ok) {
      job.resolve(response.result);
    } else {
      job.reject(new Error(response.error));
    }
  }

  private discard(worker: Worker, error: Error): void {
    if (this.worker !== worker) {
      return;
    }
    this.worker = null;
    this.rejectPending(error);
  }

  private releaseIfIdle(): void {
    if (this.pending.size === 0) {
      this.worker?.unref();
    }
  }

  private rejectPending(error: Error): void {
    const jobs = [...this.pending.values()];
    this.pending.clear();
    for (const job of jobs) {
      job.reject(error);
    }
  }
}

function expectImage(result: ImageJobResult): RgbaImage {
  if (result.kind !== 'image') {
    throw new Error(`Image worker answered with ${result.kind} where an image was expected.`);
  }
  return result.image;
}

/** Process-wide worker used by capture decoding, OCR preprocessing and capture saving. */
export const sharedImageWorker = new ImageWorker();
