/**
 * Total ordering of activity items: publish time first, video ID as tie-breaker
 */

import type { ItemPosition } from './types';

/**
 * Compare two items; negative when `a` comes first
 */
export function compareItems(a: ItemPosition, b: ItemPosition): number {
  const byTime = a.publishedAt.getTime() - b.publishedAt.getTime();
  if (byTime !== 0) {
    return byTime;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * True when `item` comes strictly after `reference`
 */
export function isAfter(item: ItemPosition, reference: ItemPosition): boolean {
  return compareItems(item, reference) > 0;
}

/**
 * Sort items oldest first (returns a new array)
 */
export function sortOldestFirst<T extends ItemPosition>(items: readonly T[]): T[] {
  return [...items].sort(compareItems);
}

/**
 * Newest item of a list, or undefined for an empty list
 */
export function newestItem<T extends ItemPosition>(items: readonly T[]): T | undefined {
  return items.reduce<T | undefined>(
    (newest, item) => (newest === undefined || isAfter(item, newest) ? item : newest),
    undefined
  );
}
