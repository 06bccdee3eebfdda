// ============================================================================
// VALUE EXTRACTOR UTILITY
// ============================================================================
// Cleans raw strings read from the DOM: text, URLs and image sources

/**
 * Placeholder patterns to skip
 */
const PLACEHOLDER_PATTERNS = [
  'placeholder',
  'loading',
  'blank',
  'data:image',
  'spacer',
  '1x1',
  'pixel',
];

/**
 * Thumbnail-sized image variants that are never used as the item image
 */
const THUMBNAIL_PATTERNS = [/\/thumbs?\//i, /[_-]thumb(?:nail)?\b/i, /\/s-l(?:64|96)\./i];

/**
 * Low-resolution size tokens and the high-resolution token that replaces them
 */
const LOW_RES_TOKEN = /\/s-l(?:140|225|300|400|500)\./i;
const HIGH_RES_TOKEN = '/s-l1600.';

/**
 * Marketplace decorations appended to or prefixed on listing titles
 */
const TITLE_NOISE = [/opens in a new window or tab/gi, /^new listing\s*/i];

/**
 * Anchor texts that are marketplace chrome rather than a listing title
 */
// Phrases that mark a promo or separator card wherever they appear in the title
const BOILERPLATE_PHRASES = ['shop on ebay', 'results matching fewer words'];
const BOILERPLATE_TITLES = ['see all'];

/**
 * Words that identify a genuine item-condition label
 */
const CONDITION_KEYWORDS = /\b(?:new|used|pre-owned|refurbished|open box|for parts|not working|like new|very good|good|acceptable|excellent|graded|ungraded)\b/i;
const MAX_CONDITION_LENGTH = 120;

/**
 * Check if a URL is a placeholder/loading image
 */
export function isPlaceholderUrl(url: string | null | undefined): boolean {
  if (!url) return true;
  const lower = url.toLowerCase();
  return PLACEHOLDER_PATTERNS.some((pattern) => lower.includes(pattern));
}

export function isThumbnailUrl(url: string): boolean {
  return THUMBNAIL_PATTERNS.some((pattern) => pattern.test(url));
}

/**
 * Rewrite a known low-resolution size token to its high-resolution equivalent
 */
export function upgradeImageUrl(url: string): string {
  return url.replace(LOW_RES_TOKEN, HIGH_RES_TOKEN);
}

/**
 * Resolve a relative URL to absolute
 */
export function resolveUrl(url: string | null | undefined, baseUrl: string): string | null {
  if (!url) return null;
  if (url.startsWith('http://') || url.startsWith('https://') || url.startsWith('//')) {
    // Handle protocol-relative URLs
    if (url.startsWith('//')) {
      return 'https:' + url;
    }
    return url;
  }
  try {
    return new URL(url, baseUrl).href;
  } catch {
    return url;
  }
}

/**
 * Trim and collapse internal whitespace; empty strings become null
 */
export function normalizeText(text: string | null | undefined): string | null {
  if (!text) return null;
  const normalized = text.replace(/\s+/g, ' ').trim();
  return normalized || null;
}

/**
 * Strip marketplace decorations from a listing title
 */
export function cleanTitle(title: string | null | undefined): string {
  let cleaned = normalizeText(title) ?? '';
  for (const pattern of TITLE_NOISE) {
    cleaned = cleaned.replace(pattern, '');
  }
  return cleaned.replace(/\s+/g, ' ').trim();
}

export function isBoilerplateTitle(title: string | null | undefined): boolean {
  const normalized = normalizeText(title)?.toLowerCase();
  if (!normalized) return true;
  return BOILERPLATE_TITLES.includes(normalized) || BOILERPLATE_PHRASES.some((phrase) => normalized.includes(phrase));
}

/**
 * Accept condition text only when it reads like a condition label
 */
export function acceptCondition(text: string | null | undefined): string | null {
  const normalized = normalizeText(text);
  if (!normalized || normalized.length > MAX_CONDITION_LENGTH) return null;
  return CONDITION_KEYWORDS.test(normalized) ? normalized : null;
}

/**
 * Pick a usable image URL: drops placeholders and thumbnails, takes the first
 * srcset entry, upgrades low-resolution tokens and resolves against `baseUrl`.
 */
export function pickImageUrl(raw: string | null | undefined, baseUrl: string): string | null {
  let src = normalizeText(raw);
  if (!src || isPlaceholderUrl(src)) return null;

  // Handle srcset format (take first URL)
  if (src.includes(',') || src.includes(' ')) {
    const firstUrl = src.split(',')[0].split(' ')[0].trim();
    if (firstUrl) src = firstUrl;
  }

  const upgraded = upgradeImageUrl(src);
  if (isThumbnailUrl(upgraded)) return null;

  return resolveUrl(upgraded, baseUrl);
}
