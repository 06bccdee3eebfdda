// ============================================================================
// BASE EXTRACTOR - Abstract Base Class
// ============================================================================
// Shared plumbing for page extractors: the page handle, base URL and the
// first-match-wins tier helpers

import type { BrowserPage, DocumentScript } from '../../browser/types.js';
import { runTiers, locatorTier, type Tier, type TierMatch, type LocatorTierSpec } from '../utils/TierRunner.js';

/**
 * Context passed to extractors
 */
export interface ExtractionContext {
  page: BrowserPage;
  /** Used to resolve relative URLs when the page has none of its own */
  baseUrl: string;
}

/**
 * Abstract base class for page extractors
 */
export abstract class BaseExtractor<TResult> {
  protected page: BrowserPage;
  protected baseUrl: string;

  constructor(context: ExtractionContext) {
    this.page = context.page;
    this.baseUrl = context.baseUrl;
  }

  /**
   * Extract data from the current page. Never throws for missing markup.
   */
  abstract extract(): Promise<TResult>;

  /**
   * Get a descriptive name for this extractor
   */
  abstract getName(): string;

  /**
   * Helper: Run tiers in order and log which one matched
   */
  protected async firstMatch<T>(field: string, tiers: readonly Tier<T>[]): Promise<TierMatch<T> | null> {
    const match = await runTiers(tiers);
    if (match) {
      console.log(`[${this.getName()}] ${field} matched by tier "${match.tier}"`);
    }
    return match;
  }

  /**
   * Helper: Locator-driven tier on this extractor's page
   */
  protected locatorTier<T>(name: string, spec: LocatorTierSpec<T>): Tier<T> {
    return locatorTier(this.page, name, spec);
  }

  /**
   * Helper: Execute a self-contained script against the page document
   */
  protected evaluate<A, R>(script: DocumentScript<A, R>, arg: A): Promise<R> {
    return this.page.evaluate(script, arg);
  }

  /**
   * Helper: Current page URL, or the base URL before any navigation
   */
  protected currentUrl(): string {
    const url = this.page.url();
    return url && url !== 'about:blank' ? url : this.baseUrl;
  }
}
