// ============================================================================
// SEARCH URL BUILDER
// ============================================================================
// Builds the sold/completed listings search URL for one results page

import { ConfigurationError } from '../types/errors.js';
import type { ItemConditionFilter } from '../../../shared/types.js';

export const SEARCH_PATH = '/sch/i.html';
export const DEFAULT_PAGE_SIZE = 50;

/**
 * Marketplace item-condition codes
 */
export const CONDITION_CODES: Record<ItemConditionFilter, string> = {
  new: '1000',
  used: '3000',
  refurbished: '2500',
  for_parts: '7000',
};

export interface SearchFilters {
  /** Results per listing page (`_ipg`) */
  pageSize?: number;
  condition?: ItemConditionFilter;
}

function parseBaseUrl(baseUrl: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(baseUrl);
  } catch {
    throw new ConfigurationError(`Invalid marketplace base URL: ${baseUrl}`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigurationError(`Marketplace base URL must be http(s): ${baseUrl}`);
  }
  return parsed;
}

/**
 * Build the listing-page URL for `query` at 1-based `pageIndex`.
 * Free text is form-encoded (spaces become `+`).
 */
export function buildSearchUrl(
  query: string,
  pageIndex: number,
  filters: SearchFilters,
  baseUrl: string
): string {
  const base = parseBaseUrl(baseUrl);

  if (!Number.isInteger(pageIndex) || pageIndex < 1) {
    throw new ConfigurationError(`Page index must be a positive integer, got ${pageIndex}`);
  }

  const pageSize = filters.pageSize ?? DEFAULT_PAGE_SIZE;
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new ConfigurationError(`Page size must be a positive integer, got ${pageSize}`);
  }

  const params = new URLSearchParams({
    _nkw: query,
    LH_Sold: '1',
    LH_Complete: '1',
    _sop: '13',
    _ipg: String(pageSize),
    _pgn: String(pageIndex),
  });
  if (filters.condition) {
    params.set('LH_ItemCondition', CONDITION_CODES[filters.condition]);
  }

  return `${base.origin}${SEARCH_PATH}?${params.toString()}`;
}
