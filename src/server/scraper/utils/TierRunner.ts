// ============================================================================
// TIER RUNNER
// ============================================================================
// Ordered first-match-wins fallback over declarative extraction tiers

import type { BrowserPage } from '../../browser/types.js';

/**
 * One fallback tier. `run` resolves null on a miss; a rejection is a miss too.
 */
export interface Tier<T> {
  name: string;
  run: () => Promise<T | null>;
}

export interface TierMatch<T> {
  tier: string;
  value: T;
}

/**
 * Run tiers strictly in order and return the first hit
 */
export async function runTiers<T>(tiers: readonly Tier<T>[]): Promise<TierMatch<T> | null> {
  for (const tier of tiers) {
    let value: T | null;
    try {
      value = await tier.run();
    } catch (error) {
      console.warn(`[TierRunner] Tier "${tier.name}" failed:`, error instanceof Error ? error.message : error);
      continue;
    }
    if (value !== null) {
      return { tier: tier.name, value };
    }
  }
  return null;
}

export interface LocatorTierSpec<T> {
  selectors: readonly string[];
  /** Attributes read before falling back to text content */
  attributes?: readonly string[];
  /** Matches inspected per selector */
  maxMatches?: number;
  /** Map raw text to a value; null rejects it */
  map: (raw: string) => T | null;
}

export const DEFAULT_MAX_MATCHES = 3;

async function readSelector<T>(
  page: BrowserPage,
  selector: string,
  spec: LocatorTierSpec<T>,
  maxMatches: number
): Promise<T | null> {
  const locator = page.locate(selector);
  const count = await locator.count();

  for (let i = 0; i < Math.min(count, maxMatches); i++) {
    const element = locator.nth(i);
    const raws: (string | null)[] = [];
    if (spec.attributes && spec.attributes.length > 0) {
      for (const attribute of spec.attributes) {
        raws.push(await element.attribute(attribute));
      }
    } else {
      raws.push(await element.text());
    }

    for (const raw of raws) {
      if (raw === null) continue;
      const value = spec.map(raw);
      if (value !== null) return value;
    }
  }
  return null;
}

/**
 * Tier that reads the first `maxMatches` elements of each selector in order
 * and returns the first raw value that `map` accepts.
 */
export function locatorTier<T>(page: BrowserPage, name: string, spec: LocatorTierSpec<T>): Tier<T> {
  const maxMatches = spec.maxMatches ?? DEFAULT_MAX_MATCHES;

  return {
    name,
    run: async () => {
      for (const selector of spec.selectors) {
        try {
          const value = await readSelector(page, selector, spec, maxMatches);
          if (value !== null) return value;
        } catch (error) {
          // Invalid selector or detached element is a miss
          console.warn(`[TierRunner] ${name}: "${selector}" failed:`, error instanceof Error ? error.message : error);
        }
      }
      return null;
    },
  };
}
