// ============================================================================
// ITEM PAGE EXTRACTOR
// ============================================================================
// Reads price, condition, shipping, sale metadata and image from a detail
// page. Every field has an ordered fallback chain; a field nobody finds is null.

import type { DocumentScript } from '../../browser/types.js';
import { BaseExtractor, type ExtractionContext } from './BaseExtractor.js';
import {
  MODERN_PRICE_SELECTORS,
  LEGACY_PRICE_SELECTORS,
  CONDITION_SELECTORS,
  SHIPPING_SELECTORS,
  SOLD_INFO_SELECTORS,
  ITEM_IMAGE_SELECTORS,
  ITEM_IMAGE_ATTRIBUTES,
} from './selectors.js';
import { parsePrice, extractAllPrices, DEFAULT_USD_TO_GBP_RATE } from '../utils/PriceParser.js';
import { acceptCondition, normalizeText, pickImageUrl } from '../utils/ValueExtractor.js';
import type { Tier } from '../utils/TierRunner.js';

export interface DetailPrice {
  /** Amount in GBP */
  amount: number;
  /** Text the amount was parsed from */
  text: string;
  /** Name of the tier that produced it */
  tier: string;
}

export interface ItemPageFields {
  price: DetailPrice | null;
  condition: string | null;
  shipping: string | null;
  soldInfo: string | null;
  imageUrl: string | null;
}

interface StructuredPrice {
  price: string;
  currency: string | null;
}

const SOLD_INFO_PATTERN = /\b(?:sold|ended|sale)\b/i;
const MAX_SHIPPING_LENGTH = 200;

/**
 * Reads the first offer price from JSON-LD blocks, then from itemprop meta
 * tags. Runs inside the page.
 */
export const readStructuredPrice: DocumentScript<null, StructuredPrice | null> = (doc) => {
  for (const script of Array.from(doc.querySelectorAll('script[type="application/ld+json"]'))) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(script.textContent ?? '');
    } catch {
      continue;
    }

    const queue: unknown[] = [parsed];
    while (queue.length > 0) {
      const node = queue.shift();
      if (!node || typeof node !== 'object') continue;
      if (Array.isArray(node)) {
        queue.push(...node);
        continue;
      }
      if ('price' in node && (typeof node.price === 'string' || typeof node.price === 'number')) {
        const currency = 'priceCurrency' in node && typeof node.priceCurrency === 'string' ? node.priceCurrency : null;
        return { price: String(node.price), currency };
      }
      if ('offers' in node) queue.push(node.offers);
      if ('@graph' in node) queue.push(node['@graph']);
    }
  }

  const metaPrice = doc.querySelector('meta[itemprop="price"]')?.getAttribute('content');
  if (metaPrice) {
    const metaCurrency = doc.querySelector('meta[itemprop="priceCurrency"]')?.getAttribute('content');
    return { price: metaPrice, currency: metaCurrency ?? null };
  }
  return null;
};

export interface ItemPageExtractorOptions {
  usdToGbpRate?: number;
}

export class ItemPageExtractor extends BaseExtractor<ItemPageFields> {
  private usdToGbpRate: number;

  constructor(context: ExtractionContext, options: ItemPageExtractorOptions = {}) {
    super(context);
    this.usdToGbpRate = options.usdToGbpRate ?? DEFAULT_USD_TO_GBP_RATE;
  }

  getName(): string {
    return 'ItemPageExtractor';
  }

  async extract(): Promise<ItemPageFields> {
    const [price, condition, shipping, soldInfo, imageUrl] = await Promise.all([
      this.extractPrice(),
      this.extractCondition(),
      this.extractShipping(),
      this.extractSoldInfo(),
      this.extractImage(),
    ]);
    return { price, condition, shipping, soldInfo, imageUrl };
  }

  // =========================================================================
  // PRICE
  // =========================================================================

  async extractPrice(): Promise<DetailPrice | null> {
    const toPrice = (raw: string): { amount: number; text: string } | null => {
      const text = normalizeText(raw);
      const amount = parsePrice(text, this.usdToGbpRate);
      return text && amount !== undefined ? { amount, text } : null;
    };

    const tiers: Tier<{ amount: number; text: string }>[] = [
      this.locatorTier('modern', { selectors: MODERN_PRICE_SELECTORS, map: toPrice }),
      this.locatorTier('legacy', { selectors: LEGACY_PRICE_SELECTORS, map: toPrice }),
      { name: 'structured', run: () => this.structuredPrice() },
      { name: 'raw-html', run: () => this.rawHtmlPrice() },
    ];

    const match = await this.firstMatch('price', tiers);
    return match ? { ...match.value, tier: match.tier } : null;
  }

  private async structuredPrice(): Promise<{ amount: number; text: string } | null> {
    const structured = await this.evaluate(readStructuredPrice, null);
    if (!structured) return null;

    const currency = structured.currency?.toUpperCase() ?? 'GBP';
    let text: string;
    if (currency === 'GBP') {
      text = `£${structured.price}`;
    } else if (currency === 'USD') {
      text = `US $${structured.price}`;
    } else {
      console.log(`[${this.getName()}] Ignoring structured price in ${currency}`);
      return null;
    }

    const amount = parsePrice(text, this.usdToGbpRate);
    return amount !== undefined ? { amount, text } : null;
  }

  private async rawHtmlPrice(): Promise<{ amount: number; text: string } | null> {
    const html = await this.page.content();
    for (const token of extractAllPrices(html)) {
      const amount = parsePrice(token, this.usdToGbpRate);
      if (amount !== undefined && amount > 0) {
        return { amount, text: token };
      }
    }
    return null;
  }

  // =========================================================================
  // OTHER FIELDS
  // =========================================================================

  async extractCondition(): Promise<string | null> {
    const match = await this.firstMatch('condition', [
      this.locatorTier('condition', { selectors: CONDITION_SELECTORS, map: acceptCondition }),
    ]);
    return match?.value ?? null;
  }

  async extractShipping(): Promise<string | null> {
    const match = await this.firstMatch('shipping', [
      this.locatorTier('shipping', {
        selectors: SHIPPING_SELECTORS,
        map: (raw) => {
          const text = normalizeText(raw);
          return text && text.length <= MAX_SHIPPING_LENGTH ? text : null;
        },
      }),
    ]);
    return match?.value ?? null;
  }

  async extractSoldInfo(): Promise<string | null> {
    const match = await this.firstMatch('soldInfo', [
      this.locatorTier('sold-info', {
        selectors: SOLD_INFO_SELECTORS,
        map: (raw) => {
          const text = normalizeText(raw);
          return text && SOLD_INFO_PATTERN.test(text) ? text : null;
        },
      }),
    ]);
    return match?.value ?? null;
  }

  async extractImage(): Promise<string | null> {
    const pageUrl = this.currentUrl();
    const match = await this.firstMatch('image', [
      this.locatorTier('image', {
        selectors: ITEM_IMAGE_SELECTORS,
        attributes: ITEM_IMAGE_ATTRIBUTES,
        map: (raw) => pickImageUrl(raw, pageUrl),
      }),
    ]);
    return match?.value ?? null;
  }
}
