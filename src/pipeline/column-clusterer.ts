import { aabbCenter, mergeAabb } from '@/types/geometry';
import type { Item, Word } from '@/types/ocr-results';

/** Horizontal gap, in pixels, that separates two item names. */
export const DEFAULT_GAP_THRESHOLD = 15;

/**
 * Splits words into columns at every horizontal gap wider than
 * `gapThreshold` and turns each non-empty column into one item.
 *
 * This is a 1-D segmentation on x only: the target layouts put every item
 * name in its own horizontally separated field, possibly wrapped over a few
 * lines, so words of different rows in one field end up in one item.
 */
export function detectColumns(words: Word[], gapThreshold: number = DEFAULT_GAP_THRESHOLD): Item[] {
  if (words.length === 0) {
    return [];
  }

  const sorted = [...words].sort((a, b) => a.bounds.min.x - b.bounds.min.x);

  const boundaries: number[] = [];
  for (let i = 0; i < sorted.length - 1; i++) {
    const current = sorted[i];
    const next = sorted[i + 1];
    if (!current || !next) {
      continue;
    }
    const gap = next.bounds.min.x - current.bounds.max.x;
    if (gap > gapThreshold) {
      boundaries.push((current.bounds.max.x + next.bounds.min.x) / 2);
    }
  }

  const columns: Word[][] = Array.from({ length: boundaries.length + 1 }, () => []);
  for (const word of words) {
    const x = aabbCenter(word.bounds).x;
    const columnIndex = boundaries.filter((boundary) => x > boundary).length;
    columns[columnIndex]?.push(word);
  }

  const items: Item[] = [];
  for (const column of columns) {
    const [first, ...rest] = column;
    if (!first) {
      continue;
    }
    items.push({
      name: column.map((word) => word.text).join(' '),
      bounds: rest.reduce((bounds, word) => mergeAabb(bounds, word.bounds), first.bounds),
    });
  }
  return items;
}
