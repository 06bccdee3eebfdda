// ============================================================================
// RESULT AGGREGATOR
// ============================================================================

import type { ExtractedItem } from '../../shared/types.js';

/**
 * Accepted items for one run, capped at `limit`. Items are frozen on entry
 * and a canonical URL is accepted at most once.
 */
export class ResultAggregator {
  private items: ExtractedItem[] = [];
  private urls = new Set<string>();

  constructor(readonly limit: number) {}

  /**
   * Append an item. Returns false when full or the URL is already present.
   */
  add(item: ExtractedItem): boolean {
    if (this.isFull() || this.urls.has(item.canonicalUrl)) {
      return false;
    }
    this.urls.add(item.canonicalUrl);
    this.items.push(Object.freeze({ ...item }));
    return true;
  }

  isFull(): boolean {
    return this.items.length >= this.limit;
  }

  get count(): number {
    return this.items.length;
  }

  getItems(): ExtractedItem[] {
    return [...this.items];
  }
}
