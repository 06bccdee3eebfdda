// ============================================================================
// LISTING PAGE EXTRACTOR
// ============================================================================
// Reads candidate listings from a rendered results page. Strategies run in
// order and the first non-empty one wins; results are never unioned.

import type { DocumentScript } from '../../browser/types.js';
import type { CandidateListing } from '../../../shared/types.js';
import { BaseExtractor, type ExtractionContext } from './BaseExtractor.js';
import { LISTING_STRATEGIES, type ListingStrategy } from './selectors.js';
import { cleanTitle, isBoilerplateTitle, normalizeText, pickImageUrl } from '../utils/ValueExtractor.js';
import type { Tier } from '../utils/TierRunner.js';

/**
 * Raw strings read in-page for one anchor
 */
export interface RawListing {
  href: string;
  /** Title locator texts in order, anchor text last */
  titles: string[];
  priceText: string | null;
  shippingText: string | null;
  conditionText: string | null;
  /** Image attribute values in preference order */
  imageSources: string[];
}

/**
 * Batch DOM scan for one strategy. Runs inside the page, so it only
 * touches `doc` and `strategy`.
 */
export const scanListings: DocumentScript<ListingStrategy, RawListing[]> = (doc, strategy) => {
  const results: RawListing[] = [];
  const seenHrefs = new Set<string>();

  for (const anchor of Array.from(doc.querySelectorAll(strategy.anchorSelector))) {
    const href = anchor.getAttribute('href');
    if (!href || seenHrefs.has(href)) continue;
    seenHrefs.add(href);

    let container: Element | null = null;
    if (strategy.containerSelectors.length > 0) {
      for (const selector of strategy.containerSelectors) {
        container = anchor.closest(selector);
        if (container) break;
      }
      if (!container) continue;
    } else {
      container = anchor.parentElement ?? anchor;
    }

    const titles: string[] = [];
    for (const selector of strategy.titleSelectors) {
      const text = container.querySelector(selector)?.textContent?.trim();
      if (text) titles.push(text);
    }
    const anchorText = anchor.textContent?.trim();
    if (anchorText) titles.push(anchorText);

    const fieldTexts: (string | null)[] = [];
    for (const selectors of [strategy.priceSelectors, strategy.shippingSelectors, strategy.conditionSelectors]) {
      let found: string | null = null;
      for (const selector of selectors) {
        const text = container.querySelector(selector)?.textContent?.trim();
        if (text) {
          found = text;
          break;
        }
      }
      fieldTexts.push(found);
    }
    const [priceText, shippingText, conditionText] = fieldTexts;

    const imageSources: string[] = [];
    for (const selector of strategy.imageSelectors) {
      const image = container.querySelector(selector);
      if (!image) continue;
      for (const attribute of strategy.imageAttributes) {
        const value = image.getAttribute(attribute);
        if (value) imageSources.push(value);
      }
      break;
    }

    results.push({
      href,
      titles,
      priceText,
      shippingText,
      conditionText,
      imageSources,
    });
  }

  return results;
};

export interface ListingPageExtractorOptions {
  strategies?: readonly ListingStrategy[];
}

export class ListingPageExtractor extends BaseExtractor<CandidateListing[]> {
  private strategies: readonly ListingStrategy[];

  constructor(context: ExtractionContext, options: ListingPageExtractorOptions = {}) {
    super(context);
    this.strategies = options.strategies ?? LISTING_STRATEGIES;
  }

  getName(): string {
    return 'ListingPageExtractor';
  }

  /**
   * Candidate listings in page order; an empty list is a normal outcome
   */
  async extract(): Promise<CandidateListing[]> {
    const tiers: Tier<CandidateListing[]>[] = this.strategies.map((strategy) => ({
      name: strategy.name,
      run: async () => {
        const raw = await this.evaluate(scanListings, strategy);
        const candidates = this.toCandidates(raw);
        return candidates.length > 0 ? candidates : null;
      },
    }));

    const match = await this.firstMatch('listings', tiers);
    if (!match) {
      console.log(`[${this.getName()}] No listings found on ${this.currentUrl()}`);
      return [];
    }
    console.log(`[${this.getName()}] ${match.value.length} candidates via ${match.tier}`);
    return match.value;
  }

  private toCandidates(raw: RawListing[]): CandidateListing[] {
    const pageUrl = this.currentUrl();
    const candidates: CandidateListing[] = [];

    for (const listing of raw) {
      const title = listing.titles.map(cleanTitle).find((t) => !isBoilerplateTitle(t));
      if (!title) continue;

      const candidate: CandidateListing = { title, detailUrl: listing.href };

      for (const source of listing.imageSources) {
        const image = pickImageUrl(source, pageUrl);
        if (image) {
          candidate.thumbnailImage = image;
          break;
        }
      }

      const price = normalizeText(listing.priceText);
      if (price) candidate.priceTextRaw = price;
      const shipping = normalizeText(listing.shippingText);
      if (shipping) candidate.shippingTextRaw = shipping;
      const condition = normalizeText(listing.conditionText);
      if (condition) candidate.conditionTextRaw = condition;

      candidates.push(candidate);
    }

    return candidates;
  }
}
