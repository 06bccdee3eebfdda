// ============================================================================
// MARKETPLACE SELECTORS
// ============================================================================
// Declarative locator tables, ordered most-specific first. The markup shifts
// between layout generations and device profiles, so every field has several.

/**
 * One results-page extraction strategy. Plain data: it is sent into the page.
 */
export interface ListingStrategy {
  name: string;
  /** Anchors pointing at detail pages */
  anchorSelector: string;
  /** Enclosing listing container; empty means the anchor's parent */
  containerSelectors: string[];
  titleSelectors: string[];
  priceSelectors: string[];
  shippingSelectors: string[];
  conditionSelectors: string[];
  imageSelectors: string[];
  /** Image attributes in preference order (lazy-load attributes after src) */
  imageAttributes: string[];
}

const DETAIL_ANCHOR = 'a[href*="/itm/"]';
const IMAGE_ATTRIBUTES = ['src', 'data-src', 'data-lazy-src', 'data-original', 'srcset'];

export const LISTING_STRATEGIES: ListingStrategy[] = [
  {
    name: 'result-cards',
    anchorSelector: DETAIL_ANCHOR,
    containerSelectors: ['li.s-card', 'li.s-item'],
    titleSelectors: ['.s-card__title', '.s-item__title', '[role="heading"]'],
    priceSelectors: ['.s-card__price', '.s-item__price'],
    shippingSelectors: ['.s-card__shipping', '.s-item__shipping', '.s-item__logisticsCost'],
    conditionSelectors: ['.s-card__subtitle', '.SECONDARY_INFO'],
    imageSelectors: ['.s-card__image img', '.s-item__image-wrapper img', 'img'],
    imageAttributes: IMAGE_ATTRIBUTES,
  },
  {
    name: 'legacy-grid',
    anchorSelector: DETAIL_ANCHOR,
    containerSelectors: ['.s-item__wrapper', '[data-view*="iid"]'],
    titleSelectors: ['.s-item__title', 'h3', '.lvtitle'],
    priceSelectors: ['.s-item__price', '.lvprice', '.bold'],
    shippingSelectors: ['.s-item__shipping', '.lvshipping', '.ship'],
    conditionSelectors: ['.SECONDARY_INFO', '.lvsubtitle'],
    imageSelectors: ['.s-item__image img', 'img'],
    imageAttributes: IMAGE_ATTRIBUTES,
  },
  {
    name: 'bare-anchors',
    anchorSelector: DETAIL_ANCHOR,
    containerSelectors: [],
    titleSelectors: ['h3', 'span[role="heading"]'],
    priceSelectors: ['.price', '[class*="price"]'],
    shippingSelectors: ['[class*="shipping"]', '[class*="postage"]'],
    conditionSelectors: ['[class*="condition"]', '.SECONDARY_INFO'],
    imageSelectors: ['img'],
    imageAttributes: IMAGE_ATTRIBUTES,
  },
];

// ============================================================================
// DETAIL PAGE
// ============================================================================

export const MODERN_PRICE_SELECTORS = [
  '.x-price-primary span',
  '[data-testid="x-price-primary"] span',
  '.x-bin-price__content .ux-textspans',
  'span[itemprop="price"]',
];

export const LEGACY_PRICE_SELECTORS = [
  '#prcIsum',
  '#mm-saleDscPrc',
  '.vi-price .notranslate',
  '.mainPrice',
  '.display-price',
  '.ux-labels-values__values .ux-textspans',
  '.vi-price',
  '.notranslate',
];

export const CONDITION_SELECTORS = [
  '.x-item-condition-text .ux-textspans',
  '[data-testid="x-item-condition"] .ux-textspans',
  '.x-item-condition-value',
  '#vi-itm-cond',
  '[itemprop="itemCondition"]',
];

export const SHIPPING_SELECTORS = [
  '[data-testid="ux-labels-values--shipping"] .ux-textspans--BOLD',
  '.ux-labels-values--shipping .ux-labels-values__values .ux-textspans',
  '#fshippingCost',
  '#shSummary',
];

export const SOLD_INFO_SELECTORS = [
  '[data-testid="x-ended-message"]',
  '.x-item-ended-message',
  '.vi-bboxrev-posabs',
  '#vi-cdown_timeLeft',
  '.vi-qtyS-hot-red',
];

export const ITEM_IMAGE_SELECTORS = [
  '.ux-image-carousel-item.active img',
  '.ux-image-carousel-item img',
  '#icImg',
  'img[itemprop="image"]',
  'meta[property="og:image"]',
];

export const ITEM_IMAGE_ATTRIBUTES = ['src', 'data-zoom-src', 'data-src', 'content'];
