// ============================================================================
// PRICE PARSER UTILITY
// ============================================================================
// Normalizes marketplace price text to GBP. USD amounts are converted with a
// configured approximate rate; it is a display estimate, not a live FX feed.

/**
 * Default USD → GBP approximation
 */
export const DEFAULT_USD_TO_GBP_RATE = 0.78;

// Digits with optional thousands separators and optional decimals
const AMOUNT = String.raw`(\d[\d,]*(?:\.\d+)?)`;

/**
 * Base currency (GBP) patterns, tried in order
 */
const GBP_PATTERNS: RegExp[] = [
  new RegExp(String.raw`£\s*${AMOUNT}`, 'i'),
  new RegExp(String.raw`\bGBP\s*${AMOUNT}`, 'i'),
  new RegExp(String.raw`${AMOUNT}\s*(?:GBP\b|£)`, 'i'),
];

/**
 * Secondary currency (USD) patterns, tried in order
 */
const USD_PATTERNS: RegExp[] = [
  new RegExp(String.raw`\bUS\s*\$\s*${AMOUNT}`, 'i'),
  new RegExp(String.raw`\$\s*${AMOUNT}`, 'i'),
  new RegExp(String.raw`\bUSD\s*${AMOUNT}`, 'i'),
  new RegExp(String.raw`${AMOUNT}\s*USD\b`, 'i'),
];

const BARE_AMOUNT = /^\d[\d,]*(?:\.\d+)?$/;

/**
 * Currency-symbol-prefixed tokens, used when scanning raw HTML.
 * Matches: £12.50, £ 1,234, $10.00, US $25.99
 */
const PRICE_TOKEN_REGEX = /(?:US\s*)?[£$]\s*\d[\d,]*(?:\.\d+)?/gi;

/**
 * Round to 2 decimal places
 */
export function roundTo2(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

function toNumber(raw: string): number | undefined {
  const value = parseFloat(raw.replace(/,/g, ''));
  return Number.isFinite(value) ? value : undefined;
}

function matchAmount(text: string, patterns: RegExp[]): number | undefined {
  for (const pattern of patterns) {
    const match = text.match(pattern);
    if (!match) continue;
    const value = toNumber(match[1]);
    if (value !== undefined) return value;
  }
  return undefined;
}

/**
 * Parse price text into a GBP amount
 * Handles:
 * - £12.50, GBP 1,234.00, 12.50 GBP → as-is
 * - US $10.00, $10, USD 10, 10 USD → converted with `usdToGbpRate`
 * - 12.50 → assumed GBP
 *
 * Returns undefined when the text holds no recognizable amount.
 */
export function parsePrice(
  priceStr: string | null | undefined,
  usdToGbpRate: number = DEFAULT_USD_TO_GBP_RATE
): number | undefined {
  if (!priceStr) return undefined;
  const text = priceStr.replace(/\u00a0/g, ' ').trim();
  if (!text) return undefined;

  const gbp = matchAmount(text, GBP_PATTERNS);
  if (gbp !== undefined) return gbp;

  const usd = matchAmount(text, USD_PATTERNS);
  if (usd !== undefined) return roundTo2(usd * usdToGbpRate);

  if (BARE_AMOUNT.test(text)) {
    return toNumber(text);
  }

  return undefined;
}

/**
 * Convert an amount with a fixed rate, rounded to 2 decimals
 */
export function convert(amount: number | null | undefined, rate: number): number | undefined {
  if (amount === null || amount === undefined) return undefined;
  return roundTo2(amount * rate);
}

/**
 * Extract every currency-prefixed price token from a text or HTML string, in document order
 */
export function extractAllPrices(text: string | null | undefined): string[] {
  if (!text) return [];
  const matches = text.match(PRICE_TOKEN_REGEX);
  return matches ? matches.map((m) => m.replace(/\s+/g, ' ').trim()) : [];
}

/**
 * Format a price value with currency symbol
 */
export function formatPrice(value: number, currency: string = '£'): string {
  if (isNaN(value)) return '';
  return `${currency}${value.toFixed(2)}`;
}
