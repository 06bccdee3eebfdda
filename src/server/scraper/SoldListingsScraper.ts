// ============================================================================
// SOLD LISTINGS SCRAPER
// ============================================================================
// One attempt walks the requested results pages, visits candidate detail
// pages and collects items. `scrape()` wraps attempts in the retry policy.

import type {
  CandidateListing,
  ExtractedItem,
  NormalizedScrapeRequest,
  RunResult,
  ScrapeRequest,
  SmokeResult,
} from '../../shared/types.js';
import type { BrowserLauncher, BrowserPage, BrowserSession } from '../browser/types.js';
import { loadScraperSettings, type ScraperSettings } from '../config/settings.js';
import { ListingPageExtractor } from './adapters/ListingPageExtractor.js';
import { ItemPageExtractor, type ItemPageFields } from './adapters/ItemPageExtractor.js';
import { RetryOrchestrator, defaultSleep, type Sleep, type RetryFailure } from './RetryOrchestrator.js';
import { RunContext, elapsedSecondsSince } from './RunContext.js';
import { buildSearchUrl } from './utils/SearchUrlBuilder.js';
import { parsePrice, convert, formatPrice } from './utils/PriceParser.js';
import { acceptCondition, cleanTitle, upgradeImageUrl } from './utils/ValueExtractor.js';
import {
  ConfigurationError,
  ScrapeErrorType,
  classifyError,
  isRecoverableNavigation,
  wrapError,
} from './types/errors.js';

export const PAGES_RANGE = { min: 1, max: 50 } as const;
export const PER_PAGE_RANGE = { min: 1, max: 200 } as const;
export const DEFAULT_PAGES = 1;
export const DEFAULT_PER_PAGE = 30;

const SCROLL_STEP_PX = 1200;
const SCROLL_PAUSE_MS = 500;
const SMOKE_TIMEOUT_MS = 30_000;

/**
 * Replaceable collaborators. Tests inject a fake launcher, instant sleep
 * and fixed randomness.
 */
export interface ScraperDeps {
  launcher?: BrowserLauncher;
  settings?: ScraperSettings;
  sleep?: Sleep;
  random?: () => number;
  now?: () => number;
}

// ============================================================================
// REQUEST NORMALIZATION
// ============================================================================

export function clampInt(value: number | undefined, min: number, max: number, fallback: number): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  return Math.min(max, Math.max(min, Math.trunc(value)));
}

/**
 * Clamp numeric inputs into range and fill defaults.
 * Throws ConfigurationError for a blank query.
 */
export function normalizeScrapeRequest(request: ScrapeRequest, settings: ScraperSettings): NormalizedScrapeRequest {
  const query = (request.query ?? '').trim();
  if (!query) {
    throw new ConfigurationError('query is required');
  }

  const exchangeRate =
    request.exchangeRate !== undefined && Number.isFinite(request.exchangeRate) && request.exchangeRate > 0
      ? request.exchangeRate
      : settings.defaultExchangeRate;

  return {
    query,
    pages: clampInt(request.pages, PAGES_RANGE.min, PAGES_RANGE.max, DEFAULT_PAGES),
    perPage: clampInt(request.perPage, PER_PAGE_RANGE.min, PER_PAGE_RANGE.max, DEFAULT_PER_PAGE),
    headless: request.headless ?? true,
    exchangeRate,
    mobile: request.mobile ?? false,
    condition: request.condition,
    proxy: request.proxy?.trim() || settings.proxy,
    signal: request.signal,
  };
}

// ============================================================================
// ITEM ASSEMBLY
// ============================================================================

/**
 * Merge detail-page fields with the listing-page fallback data
 */
export function mergeItem(
  candidate: CandidateListing,
  fields: ItemPageFields,
  canonicalUrl: string,
  rates: { exchangeRate: number; usdToGbpRate: number }
): ExtractedItem {
  const amount = fields.price?.amount ?? parsePrice(candidate.priceTextRaw, rates.usdToGbpRate) ?? null;

  return {
    title: cleanTitle(candidate.title),
    priceText: amount !== null ? formatPrice(amount) : candidate.priceTextRaw ?? 'N/A',
    priceAmountPrimary: amount,
    priceAmountSecondary: convert(amount, rates.exchangeRate) ?? null,
    shippingText: fields.shipping ?? candidate.shippingTextRaw ?? null,
    condition: fields.condition ?? acceptCondition(candidate.conditionTextRaw),
    soldInfo: fields.soldInfo,
    canonicalUrl,
    imageUrl: fields.imageUrl ?? (candidate.thumbnailImage ? upgradeImageUrl(candidate.thumbnailImage) : null),
  };
}

// ============================================================================
// SCRAPER
// ============================================================================

export class SoldListingsScraper {
  private sleep: Sleep;
  private random: () => number;
  private now: () => number;

  constructor(
    private readonly settings: ScraperSettings,
    private readonly request: NormalizedScrapeRequest,
    private readonly launcher: BrowserLauncher,
    deps: ScraperDeps = {}
  ) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
    this.now = deps.now ?? Date.now;
  }

  /**
   * One full attempt. Faults escaping the page and item scopes end the
   * attempt; the session is released on every path.
   */
  async runAttempt(attempt: number, startedAt: number): Promise<RunResult> {
    const context = new RunContext(this.request, this.settings.baseUrl, startedAt, this.now);
    console.log(`[SoldListingsScraper] Run ${context.runId} attempt ${attempt}: "${this.request.query}"`);

    let session: BrowserSession | null = null;
    try {
      session = await this.launcher.launch({
        headless: this.request.headless,
        mobile: this.request.mobile,
        proxy: this.request.proxy,
      });
      const page = await session.newPage();
      await page.blockResources(['image', 'media', 'font']);

      for (let pageIndex = 1; pageIndex <= this.request.pages; pageIndex++) {
        if (context.results.isFull()) {
          console.log(`[SoldListingsScraper] Reached ${this.request.perPage} items, stopping`);
          break;
        }
        if (this.isCancelled(context)) break;
        await this.scrapeListingPage(page, pageIndex, context);
      }

      return context.finalize(attempt);
    } catch (error) {
      const fault = wrapError(error);
      console.error(`[SoldListingsScraper] Attempt ${attempt} aborted (${fault.type}):`, fault.message);
      return context.finalize(attempt, fault);
    } finally {
      if (session) {
        await this.release(session);
      }
    }
  }

  private async release(session: BrowserSession): Promise<void> {
    try {
      await session.close();
    } catch (error) {
      console.error('[SoldListingsScraper] Failed to close browser session:', error);
    }
  }

  private isCancelled(context: RunContext): boolean {
    if (!this.request.signal?.aborted) return false;
    if (!context.stoppedEarly) {
      context.stoppedEarly = true;
      context.warn('Run cancelled');
      console.log('[SoldListingsScraper] Cancelled, finishing with collected items');
    }
    return true;
  }

  /**
   * Randomized delay before every navigation
   */
  private async pace(): Promise<void> {
    const { minDelayMs, maxDelayMs } = this.settings.pacing;
    const delay = Math.round(minDelayMs + this.random() * (maxDelayMs - minDelayMs));
    await this.sleep(delay);
  }

  private async scrapeListingPage(page: BrowserPage, pageIndex: number, context: RunContext): Promise<void> {
    const url = buildSearchUrl(
      this.request.query,
      pageIndex,
      { pageSize: this.settings.pageSize, condition: this.request.condition },
      this.settings.baseUrl
    );

    await this.pace();
    if (this.isCancelled(context)) return;
    console.log(`[SoldListingsScraper] Page ${pageIndex}/${this.request.pages}: ${url}`);

    const loaded = await page.navigate(url, {
      waitUntil: 'domcontentloaded',
      timeoutMs: this.settings.listingTimeoutMs,
      settle: true,
    });
    if (!loaded) {
      context.warn(`Listing page ${pageIndex} failed to load`);
      return;
    }

    for (let i = 0; i < this.settings.listingScrolls; i++) {
      await page.scroll(SCROLL_STEP_PX);
      await this.sleep(SCROLL_PAUSE_MS);
    }

    const candidates = await new ListingPageExtractor({ page, baseUrl: this.settings.baseUrl }).extract();
    let visits = 0;

    for (const candidate of candidates) {
      if (context.results.isFull()) break;
      if (visits >= this.settings.maxDetailVisitsPerPage) {
        console.log(`[SoldListingsScraper] Page ${pageIndex}: visit cap of ${visits} reached`);
        break;
      }
      if (context.dedup.hasSeen(candidate.detailUrl)) continue;

      await this.pace();
      if (this.isCancelled(context)) return;

      const canonicalUrl = context.dedup.record(candidate.detailUrl);
      visits++;
      await this.visitCandidate(page, candidate, canonicalUrl, context);
    }
  }

  private async visitCandidate(
    page: BrowserPage,
    candidate: CandidateListing,
    canonicalUrl: string,
    context: RunContext
  ): Promise<void> {
    const loaded = await page.navigate(canonicalUrl, {
      waitUntil: 'domcontentloaded',
      timeoutMs: this.settings.detailTimeoutMs,
      settle: true,
    });

    if (!loaded) {
      context.warn(`Skipped ${canonicalUrl}: detail page failed to load`);
      return;
    }

    let fields: ItemPageFields;
    try {
      fields = await new ItemPageExtractor(
        { page, baseUrl: this.settings.baseUrl },
        { usdToGbpRate: this.settings.usdToGbpRate }
      ).extract();
    } catch (error) {
      const type = classifyError(error);
      if (!isRecoverableNavigation(type) && type !== ScrapeErrorType.SELECTOR && type !== ScrapeErrorType.EXTRACTION) {
        throw error;
      }
      context.warn(`Skipped ${canonicalUrl}: ${type} error while extracting`);
      return;
    }

    const item = mergeItem(candidate, fields, canonicalUrl, {
      exchangeRate: this.request.exchangeRate,
      usdToGbpRate: this.settings.usdToGbpRate,
    });
    if (context.results.add(item)) {
      console.log(
        `[SoldListingsScraper] Collected ${context.results.count}/${this.request.perPage}: ${item.title} (${item.priceText})`
      );
    }
  }
}

// ============================================================================
// ENTRY POINTS
// ============================================================================

async function resolveLauncher(deps: ScraperDeps): Promise<BrowserLauncher> {
  if (deps.launcher) return deps.launcher;
  const { BrowserManager } = await import('../browser/BrowserManager.js');
  return new BrowserManager();
}

function failureResult(request: ScrapeRequest, failure: RetryFailure, elapsedSeconds: number): RunResult {
  return {
    success: false,
    query: (request.query ?? '').trim(),
    pagesRequested: clampInt(request.pages, PAGES_RANGE.min, PAGES_RANGE.max, DEFAULT_PAGES),
    perPageRequested: clampInt(request.perPage, PER_PAGE_RANGE.min, PER_PAGE_RANGE.max, DEFAULT_PER_PAGE),
    count: 0,
    items: [],
    elapsedSeconds,
    error: failure.error,
    errorType: failure.errorType,
    attempts: failure.attempts,
  };
}

/**
 * Liveness check: load a known-stable page and report its title
 */
export async function smoke(deps: ScraperDeps = {}): Promise<SmokeResult> {
  let session: BrowserSession | null = null;
  try {
    const settings = deps.settings ?? loadScraperSettings();
    const launcher = await resolveLauncher(deps);
    session = await launcher.launch({ headless: true, mobile: false, proxy: settings.proxy });
    const page = await session.newPage();
    const loaded = await page.navigate(settings.smokeUrl, {
      waitUntil: 'domcontentloaded',
      timeoutMs: SMOKE_TIMEOUT_MS,
    });
    if (!loaded) {
      return { ok: false, error: `Failed to load ${settings.smokeUrl}` };
    }
    return { ok: true, title: await page.title() };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error('[SoldListingsScraper] Smoke check failed:', message);
    return { ok: false, error: message };
  } finally {
    if (session) {
      try {
        await session.close();
      } catch (error) {
        console.error('[SoldListingsScraper] Failed to close smoke session:', error);
      }
    }
  }
}

/**
 * Scrape sold listings for `request.query`. Never throws: failures come back
 * as `success: false` results. With `smoke: true` it runs the smoke check.
 */
export function scrape(request: ScrapeRequest & { smoke: true }, deps?: ScraperDeps): Promise<SmokeResult>;
export function scrape(request: ScrapeRequest & { smoke?: false }, deps?: ScraperDeps): Promise<RunResult>;
export function scrape(request: ScrapeRequest, deps?: ScraperDeps): Promise<RunResult | SmokeResult>;
export async function scrape(request: ScrapeRequest, deps: ScraperDeps = {}): Promise<RunResult | SmokeResult> {
  if (request.smoke) {
    return smoke(deps);
  }

  const now = deps.now ?? Date.now;
  const startedAt = now();

  let settings: ScraperSettings;
  let normalized: NormalizedScrapeRequest;
  try {
    settings = deps.settings ?? loadScraperSettings();
    normalized = normalizeScrapeRequest(request, settings);
    // Surface a bad base URL before any browser work
    buildSearchUrl(
      normalized.query,
      1,
      { pageSize: settings.pageSize, condition: normalized.condition },
      settings.baseUrl
    );
  } catch (error) {
    const scrapeError = wrapError(error);
    console.error(`[SoldListingsScraper] Invalid configuration: ${scrapeError.message}`);
    return failureResult(
      request,
      { error: scrapeError.message, errorType: scrapeError.type, attempts: 0 },
      elapsedSecondsSince(startedAt, now())
    );
  }

  let launcher: BrowserLauncher;
  try {
    launcher = await resolveLauncher(deps);
  } catch (error) {
    const scrapeError = wrapError(error);
    console.error(`[SoldListingsScraper] Browser launcher unavailable: ${scrapeError.message}`);
    return failureResult(
      request,
      { error: scrapeError.message, errorType: scrapeError.type, attempts: 0 },
      elapsedSecondsSince(startedAt, now())
    );
  }

  const scraper = new SoldListingsScraper(settings, normalized, launcher, deps);
  const orchestrator = new RetryOrchestrator({
    maxAttempts: settings.maxAttempts,
    backoffUnitMs: settings.backoffUnitMs,
    sleep: deps.sleep,
    fallback: (failure) => failureResult(request, failure, elapsedSecondsSince(startedAt, now())),
  });

  const result = await orchestrator.attemptWithRetries((attempt) => scraper.runAttempt(attempt, startedAt));
  console.log(
    `[SoldListingsScraper] Finished "${normalized.query}": success=${result.success}, ${result.count} items in ${result.elapsedSeconds}s`
  );
  return result;
}
