// ============================================================================
// SCRAPER SETTINGS
// ============================================================================
// Environment-driven settings, validated once at startup

import { ConfigurationError } from '../scraper/types/errors.js';

export interface PacingSettings {
  minDelayMs: number;
  maxDelayMs: number;
}

export interface ScraperSettings {
  port: number;
  environment: string;
  baseUrl: string;
  /** USD → GBP approximation used when normalizing prices */
  usdToGbpRate: number;
  /** Default GBP → secondary display rate */
  defaultExchangeRate: number;
  maxAttempts: number;
  backoffUnitMs: number;
  maxDetailVisitsPerPage: number;
  pageSize: number;
  /** Scroll passes after a listing page loads */
  listingScrolls: number;
  listingTimeoutMs: number;
  detailTimeoutMs: number;
  pacing: PacingSettings;
  proxy?: string;
  smokeUrl: string;
  corsOrigins: string[];
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = parseInt(raw, 10);
  if (!Number.isFinite(value) || value < min) {
    throw new ConfigurationError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readPositiveFloat(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = parseFloat(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive number, got "${raw}"`);
  }
  return value;
}

function readHttpUrl(env: Env, name: string, fallback: string): string {
  const raw = env[name]?.trim() || fallback;
  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch {
    throw new ConfigurationError(`${name} is not a valid URL: "${raw}"`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigurationError(`${name} must be an http(s) URL: "${raw}"`);
  }
  return raw;
}

/**
 * Load settings from the environment (defaults applied, values validated)
 */
export function loadScraperSettings(env: Env = process.env): ScraperSettings {
  const minDelayMs = readInt(env, 'SCRAPER_MIN_DELAY_MS', 1000, 0);
  const maxDelayMs = readInt(env, 'SCRAPER_MAX_DELAY_MS', 3000, 0);
  if (maxDelayMs < minDelayMs) {
    throw new ConfigurationError(
      `SCRAPER_MAX_DELAY_MS (${maxDelayMs}) must not be below SCRAPER_MIN_DELAY_MS (${minDelayMs})`
    );
  }

  const corsOrigins = (env.CORS_ORIGINS || 'http://localhost:3000,http://127.0.0.1:3000')
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);

  return {
    port: readInt(env, 'PORT', 8080, 1),
    environment: env.NODE_ENV || 'development',
    baseUrl: readHttpUrl(env, 'MARKETPLACE_BASE_URL', 'https://www.ebay.co.uk'),
    usdToGbpRate: readPositiveFloat(env, 'SCRAPER_USD_TO_GBP_RATE', 0.78),
    defaultExchangeRate: readPositiveFloat(env, 'SCRAPER_DEFAULT_EXCHANGE_RATE', 1.28),
    maxAttempts: readInt(env, 'SCRAPER_MAX_ATTEMPTS', 2, 1),
    backoffUnitMs: readInt(env, 'SCRAPER_BACKOFF_UNIT_MS', 1000, 0),
    maxDetailVisitsPerPage: readInt(env, 'SCRAPER_MAX_DETAIL_VISITS', 10, 1),
    pageSize: readInt(env, 'SCRAPER_PAGE_SIZE', 50, 1),
    listingScrolls: 3,
    listingTimeoutMs: readInt(env, 'SCRAPER_LISTING_TIMEOUT_MS', 45_000, 1),
    detailTimeoutMs: readInt(env, 'SCRAPER_DETAIL_TIMEOUT_MS', 30_000, 1),
    pacing: { minDelayMs, maxDelayMs },
    proxy: env.SCRAPER_PROXY?.trim() || undefined,
    smokeUrl: readHttpUrl(env, 'SCRAPER_SMOKE_URL', 'https://example.com'),
    corsOrigins,
  };
}
