import type { IOcrService } from '@/types/ocr-service';

/**
 * Exclusive access to one OCR service. Callers queue on a promise chain and
 * hold the service only for the duration of the callback.
 */
export class LockedOcrEngine<TInput = unknown> {
  private readonly service: IOcrService<TInput>;
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;

  constructor(service: IOcrService<TInput>) {
    this.service = service;
  }

  get id(): string {
    return this.service.id;
  }

  get isLocked(): boolean {
    return this.holders > 0;
  }

  async withLock<T>(operation: (service: IOcrService<TInput>) => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previous.then(() => current);

    await previous;
    this.holders += 1;
    try {
      return await operation(this.service);
    } finally {
      this.holders -= 1;
      release();
    }
  }

  /** Waits for any holder to finish, then destroys the service. */
  async destroy(): Promise<void> {
    await this.withLock((service) => service.destroy());
  }
}
