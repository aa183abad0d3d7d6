import type { Aabb } from '@/types/geometry';
import type { Item, OcrResults } from '@/types/ocr-results';

export type BoardStatus = 'idle' | 'scanning' | 'ready';

export interface ItemsBoardOptions {
  maxDisplayedItems: number;
  /** How long shown items stay up, in milliseconds. */
  closeAfterMs: number;
}

/**
 * What the overlay currently shows. Every result set replaces the previous
 * one; items disappear on their own once `closeAfterMs` has passed.
 */
export class ItemsBoard {
  private readonly maxDisplayedItems: number;
  private readonly closeAfterMs: number;
  private items: Item[] = [];
  private bounds: Aabb | null = null;
  private shownAt: number | null = null;
  private currentStatus: BoardStatus = 'idle';

  constructor(options: ItemsBoardOptions) {
    this.maxDisplayedItems = options.maxDisplayedItems;
    this.closeAfterMs = options.closeAfterMs;
  }

  get status(): BoardStatus {
    return this.currentStatus;
  }

  get displayedItems(): readonly Item[] {
    return this.items;
  }

  get detectBounds(): Aabb | null {
    return this.bounds;
  }

  markScanning(): void {
    this.currentStatus = 'scanning';
  }

  markFailed(): void {
    this.currentStatus = this.items.length > 0 ? 'ready' : 'idle';
  }

  show(results: OcrResults, now: number): void {
    this.items = results.items.slice(0, this.maxDisplayedItems);
    this.bounds = results.detectBounds;
    this.shownAt = now;
    this.currentStatus = 'ready';
  }

  /** Returns true when items were cleared by this call. */
  clearIfExpired(now: number): boolean {
    if (this.shownAt === null || now - this.shownAt < this.closeAfterMs) {
      return false;
    }
    this.items = [];
    this.shownAt = null;
    if (this.currentStatus === 'ready') {
      this.currentStatus = 'idle';
    }
    return true;
  }
}
