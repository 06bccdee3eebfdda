// ============================================================================
// SCRAPE QUERY HANDLING
// ============================================================================
// Maps /scrape query-string parameters onto a ScrapeRequest

import type { ItemConditionFilter, RunResult, ScrapeRequest } from '../../shared/types.js';
import type { ScraperSettings } from '../config/settings.js';
import { normalizeScrapeRequest } from '../scraper/SoldListingsScraper.js';
import { CONDITION_CODES } from '../scraper/utils/SearchUrlBuilder.js';

const TRUE_VALUES = ['true', '1', 'yes', 'on'];
const FALSE_VALUES = ['false', '0', 'no', 'off'];

export type ScrapeFn = (request: ScrapeRequest & { smoke?: false }) => Promise<RunResult>;

export interface DummyResponse {
  success: true;
  items: [];
  note: string;
  params: {
    query: string;
    pages: number;
    perPage: number;
    headless: boolean;
    exchangeRate: number;
    mobile: boolean;
    condition: ItemConditionFilter | null;
  };
}

export interface ErrorResponse {
  success: false;
  error: string;
}

export interface HttpReply {
  status: number;
  body: RunResult | DummyResponse | ErrorResponse;
}

export type ParsedScrapeQuery =
  | { ok: true; request: ScrapeRequest & { smoke?: false }; dummy: boolean }
  | { ok: false; error: string };

/**
 * First string value of a query parameter (repeated params keep the first)
 */
function firstString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) return firstString(value[0]);
  return undefined;
}

export function parseBool(value: unknown, fallback: boolean): boolean {
  const raw = firstString(value)?.trim().toLowerCase();
  if (raw === undefined || raw === '') return fallback;
  if (TRUE_VALUES.includes(raw)) return true;
  if (FALSE_VALUES.includes(raw)) return false;
  return fallback;
}

function parseIntParam(value: unknown): number | undefined {
  const parsed = parseInt(firstString(value) ?? '', 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function parseFloatParam(value: unknown): number | undefined {
  const parsed = parseFloat(firstString(value) ?? '');
  return Number.isFinite(parsed) ? parsed : undefined;
}

function isConditionFilter(value: string): value is ItemConditionFilter {
  return Object.prototype.hasOwnProperty.call(CONDITION_CODES, value);
}

/**
 * Parse `query`, `pages`, `per_page`, `headless`, `usd_rate`, `mobile`,
 * `condition`, `proxy` and `dummy`. Numbers are clamped later, by the scraper.
 */
export function parseScrapeQuery(params: Record<string, unknown>): ParsedScrapeQuery {
  const query = firstString(params.query)?.trim();
  if (!query) {
    return { ok: false, error: 'query parameter is required' };
  }

  const conditionRaw = firstString(params.condition)?.trim().toLowerCase();
  let condition: ItemConditionFilter | undefined;
  if (conditionRaw) {
    if (!isConditionFilter(conditionRaw)) {
      return {
        ok: false,
        error: `condition must be one of: ${Object.keys(CONDITION_CODES).join(', ')}`,
      };
    }
    condition = conditionRaw;
  }

  const request: ScrapeRequest & { smoke?: false } = {
    query,
    pages: parseIntParam(params.pages),
    perPage: parseIntParam(params.per_page),
    headless: parseBool(params.headless, true),
    exchangeRate: parseFloatParam(params.usd_rate),
    mobile: parseBool(params.mobile, false),
    condition,
    proxy: firstString(params.proxy)?.trim() || undefined,
  };

  return { ok: true, request, dummy: parseBool(params.dummy, false) };
}

/**
 * Handle GET /scrape. Scrape failures are reported in a 200 body; only a
 * malformed request is a 400.
 */
export async function handleScrapeQuery(
  params: Record<string, unknown>,
  options: { settings: ScraperSettings; scrapeFn: ScrapeFn; signal?: AbortSignal }
): Promise<HttpReply> {
  const parsed = parseScrapeQuery(params);
  if (!parsed.ok) {
    return { status: 400, body: { success: false, error: parsed.error } };
  }

  if (parsed.dummy) {
    const normalized = normalizeScrapeRequest(parsed.request, options.settings);
    return {
      status: 200,
      body: {
        success: true,
        items: [],
        note: 'Dummy mode: no browser was launched',
        params: {
          query: normalized.query,
          pages: normalized.pages,
          perPage: normalized.perPage,
          headless: normalized.headless,
          exchangeRate: normalized.exchangeRate,
          mobile: normalized.mobile,
          condition: normalized.condition ?? null,
        },
      },
    };
  }

  const result = await options.scrapeFn({ ...parsed.request, signal: options.signal });
  return { status: 200, body: result };
}
