// ============================================================================
// BROWSER MANAGER - Playwright + Stealth
// ============================================================================

import { chromium } from 'playwright-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import type { Browser, BrowserContext, Page, Locator } from 'playwright';
import {
  CHROMIUM_ARGS,
  IGNORED_DEFAULT_ARGS,
  DESKTOP_USER_AGENT,
  DESKTOP_VIEWPORT,
  MOBILE_PROFILE,
  DEFAULT_LOCALE,
  DEFAULT_TIMEZONE,
  DEFAULT_NAVIGATION_TIMEOUT_MS,
  DEFAULT_ACTION_TIMEOUT_MS,
} from '../config/chrome-flags.js';
import { classifyError, isRecoverableNavigation, ScrapeErrorType } from '../scraper/types/errors.js';
import type {
  BlockableResource,
  BrowserLauncher,
  BrowserPage,
  BrowserSession,
  DocumentScript,
  LaunchOptions,
  NavigateOptions,
  PageElement,
  PageLocator,
} from './types.js';

// Apply stealth plugin to avoid bot detection
chromium.use(StealthPlugin());

// Missing elements resolve null after this long instead of the action timeout
const ELEMENT_READ_TIMEOUT_MS = 2000;
// Upper bound for the best-effort network-idle wait after navigation
const SETTLE_TIMEOUT_MS = 10_000;

interface PlaywrightProxy {
  server: string;
  username?: string;
  password?: string;
}

/**
 * Split credentials out of a proxy URL, as Playwright takes them separately
 */
export function toPlaywrightProxy(proxy: string): PlaywrightProxy {
  try {
    const parsed = new URL(proxy);
    if (!parsed.username) return { server: proxy };
    return {
      server: `${parsed.protocol}//${parsed.host}`,
      username: decodeURIComponent(parsed.username),
      password: decodeURIComponent(parsed.password),
    };
  } catch {
    // host:port without a scheme
    return { server: proxy };
  }
}

class PlaywrightElement implements PageElement {
  constructor(private readonly locator: Locator) {}

  async text(): Promise<string | null> {
    try {
      return await this.locator.textContent({ timeout: ELEMENT_READ_TIMEOUT_MS });
    } catch (error) {
      if (classifyError(error) === ScrapeErrorType.TIMEOUT) return null;
      throw error;
    }
  }

  async attribute(name: string): Promise<string | null> {
    try {
      return await this.locator.getAttribute(name, { timeout: ELEMENT_READ_TIMEOUT_MS });
    } catch (error) {
      if (classifyError(error) === ScrapeErrorType.TIMEOUT) return null;
      throw error;
    }
  }
}

class PlaywrightLocator implements PageLocator {
  constructor(private readonly locator: Locator) {}

  count(): Promise<number> {
    return this.locator.count();
  }

  nth(index: number): PageElement {
    return new PlaywrightElement(this.locator.nth(index));
  }

  first(): PageElement {
    return new PlaywrightElement(this.locator.first());
  }
}

class PlaywrightPage implements BrowserPage {
  constructor(private readonly page: Page) {
    // Auto-dismiss dialogs (alerts, confirms, prompts)
    page.on('dialog', (dialog) => {
      dialog.dismiss().catch((error: unknown) => {
        console.warn('[BrowserManager] Failed to dismiss dialog:', error);
      });
    });
  }

  async navigate(url: string, options: NavigateOptions): Promise<boolean> {
    try {
      const response = await this.page.goto(url, {
        waitUntil: options.waitUntil,
        timeout: options.timeoutMs,
      });
      if (response && response.status() >= 400) {
        console.warn(`[BrowserManager] ${url} responded with HTTP ${response.status()}`);
      }
    } catch (error) {
      const type = classifyError(error);
      if (isRecoverableNavigation(type) && !this.page.isClosed()) {
        console.warn(`[BrowserManager] Navigation to ${url} failed (${type}):`, error instanceof Error ? error.message : error);
        return false;
      }
      throw error;
    }

    if (options.settle) {
      try {
        await this.page.waitForLoadState('networkidle', {
          timeout: Math.min(options.timeoutMs, SETTLE_TIMEOUT_MS),
        });
      } catch (error) {
        // Pages with long-polling never go idle
        console.log(`[BrowserManager] Network did not settle for ${url}:`, error instanceof Error ? error.message : error);
      }
    }
    return true;
  }

  content(): Promise<string> {
    return this.page.content();
  }

  title(): Promise<string> {
    return this.page.title();
  }

  url(): string {
    return this.page.url();
  }

  locate(selector: string): PageLocator {
    return new PlaywrightLocator(this.page.locator(selector));
  }

  evaluate<A, R>(script: DocumentScript<A, R>, arg: A): Promise<R> {
    const expression = `(${script.toString()})(document, ${JSON.stringify(arg)})`;
    return this.page.evaluate<R>(expression);
  }

  async blockResources(types: readonly BlockableResource[]): Promise<void> {
    const blocked = new Set<string>(types);
    await this.page.route('**/*', async (route) => {
      if (blocked.has(route.request().resourceType())) {
        await route.abort();
      } else {
        await route.continue();
      }
    });
  }

  async scroll(deltaY: number): Promise<void> {
    await this.page.mouse.wheel(0, deltaY);
  }

  async close(): Promise<void> {
    if (!this.page.isClosed()) {
      await this.page.close();
    }
  }
}

class PlaywrightSession implements BrowserSession {
  constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext
  ) {}

  async newPage(): Promise<BrowserPage> {
    const page = await this.context.newPage();
    return new PlaywrightPage(page);
  }

  async close(): Promise<void> {
    console.log('[BrowserManager] Closing browser session');
    try {
      await this.context.close();
    } catch (error) {
      console.error('[BrowserManager] Error closing context:', error);
    }
    await this.browser.close();
  }
}

export class BrowserManager implements BrowserLauncher {
  async launch(options: LaunchOptions): Promise<BrowserSession> {
    console.log(
      `[BrowserManager] Launching Chromium (headless=${options.headless}, mobile=${options.mobile}, proxy=${options.proxy ? 'yes' : 'no'})`
    );

    const browser = await chromium.launch({
      headless: options.headless,
      args: CHROMIUM_ARGS,
      ignoreDefaultArgs: IGNORED_DEFAULT_ARGS,
      proxy: options.proxy ? toPlaywrightProxy(options.proxy) : undefined,
    });

    try {
      const device = options.mobile
        ? MOBILE_PROFILE
        : {
            userAgent: DESKTOP_USER_AGENT,
            viewport: DESKTOP_VIEWPORT,
            deviceScaleFactor: 1,
            isMobile: false,
            hasTouch: false,
          };

      const context = await browser.newContext({
        ...device,
        locale: options.locale ?? DEFAULT_LOCALE,
        timezoneId: options.timezoneId ?? DEFAULT_TIMEZONE,
        ignoreHTTPSErrors: true,
        javaScriptEnabled: true,
      });
      context.setDefaultNavigationTimeout(DEFAULT_NAVIGATION_TIMEOUT_MS);
      context.setDefaultTimeout(DEFAULT_ACTION_TIMEOUT_MS);

      console.log('[BrowserManager] Session created successfully');
      return new PlaywrightSession(browser, context);
    } catch (error) {
      await browser.close();
      throw error;
    }
  }
}
