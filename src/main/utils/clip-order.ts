import * as path from 'path';

const CLIP_NUMBER = /clip(\d+)/;

/**
 * Number embedded in a clip filename ("clip12.mp4" → 12).
 * Names without one sort last.
 */
export function extractClipNumber(filename: string): number {
  const match = CLIP_NUMBER.exec(path.basename(filename));
  return match ? Number.parseInt(match[1], 10) : Number.POSITIVE_INFINITY;
}

/**
 * Stable sort by filename number. Clips with the same number (or none) keep
 * their given order.
 */
export function sortClipsByNumber<T>(items: readonly T[], getName: (item: T) => string): T[] {
  return items
    .map((item, index) => ({ item, index, key: extractClipNumber(getName(item)) }))
    .sort((a, b) => {
      if (a.key === b.key) return a.index - b.index;
      return a.key < b.key ? -1 : 1;
    })
    .map(({ item }) => item);
}
