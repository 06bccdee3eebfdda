import { JSDOM } from 'jsdom';
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
} from '../../../browser/types.js';

/**
 * What a navigation to a URL does: render HTML, time out, or throw
 */
export type FakeRoute = { html: string } | { timeout: true } | { error: Error };

export type RouteResolver = (url: string) => FakeRoute | undefined;

export function routeTable(routes: Record<string, FakeRoute>): RouteResolver {
  return (url) => routes[url];
}

class FakeElement implements PageElement {
  constructor(private readonly element: Element | undefined) {}

  async text(): Promise<string | null> {
    return this.element?.textContent ?? null;
  }

  async attribute(name: string): Promise<string | null> {
    return this.element?.getAttribute(name) ?? null;
  }
}

class FakeLocator implements PageLocator {
  constructor(
    private readonly doc: Document,
    private readonly selector: string
  ) {}

  private elements(): Element[] {
    return Array.from(this.doc.querySelectorAll(this.selector));
  }

  async count(): Promise<number> {
    return this.elements().length;
  }

  nth(index: number): PageElement {
    return new FakeElement(this.elements()[index]);
  }

  first(): PageElement {
    return this.nth(0);
  }
}

export class FakePage implements BrowserPage {
  private dom = new JSDOM('<html><head></head><body></body></html>');
  blocked: BlockableResource[] = [];
  scrolls = 0;
  closed = false;

  constructor(private readonly browser: FakeBrowser) {}

  /**
   * Render `html` as if navigated to `url`
   */
  load(html: string, url: string): void {
    this.dom = new JSDOM(html, { url });
  }

  async navigate(url: string, options: NavigateOptions): Promise<boolean> {
    this.browser.navigations.push({ url, timeoutMs: options.timeoutMs });
    const route = this.browser.resolve(url);
    if (!route || 'timeout' in route) {
      return false;
    }
    if ('error' in route) {
      throw route.error;
    }
    this.load(route.html, url);
    return true;
  }

  async content(): Promise<string> {
    return this.dom.serialize();
  }

  async title(): Promise<string> {
    return this.dom.window.document.title;
  }

  url(): string {
    return this.dom.window.location.href;
  }

  locate(selector: string): PageLocator {
    return new FakeLocator(this.dom.window.document, selector);
  }

  async evaluate<A, R>(script: DocumentScript<A, R>, arg: A): Promise<R> {
    return script(this.dom.window.document, arg);
  }

  async blockResources(types: readonly BlockableResource[]): Promise<void> {
    this.blocked.push(...types);
  }

  async scroll(_deltaY: number): Promise<void> {
    this.scrolls++;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

class FakeSession implements BrowserSession {
  constructor(private readonly browser: FakeBrowser) {}

  async newPage(): Promise<BrowserPage> {
    const page = new FakePage(this.browser);
    this.browser.pages.push(page);
    return page;
  }

  async close(): Promise<void> {
    this.browser.closedSessions++;
  }
}

/**
 * In-process BrowserLauncher whose pages are jsdom documents
 */
export class FakeBrowser implements BrowserLauncher {
  launches: LaunchOptions[] = [];
  closedSessions = 0;
  navigations: { url: string; timeoutMs: number }[] = [];
  pages: FakePage[] = [];

  constructor(readonly resolve: RouteResolver = () => undefined) {}

  async launch(options: LaunchOptions): Promise<BrowserSession> {
    this.launches.push(options);
    return new FakeSession(this);
  }

  visited(): string[] {
    return this.navigations.map((n) => n.url);
  }
}

/**
 * A page already showing `html` at `url`, for extractor tests
 */
export function pageWith(html: string, url: string): FakePage {
  const page = new FakePage(new FakeBrowser());
  page.load(html, url);
  return page;
}

// ============================================================================
// MARKUP BUILDERS
// ============================================================================

export interface ListingCard {
  href: string;
  title: string;
  price?: string;
  shipping?: string;
  condition?: string;
  image?: string;
}

export function listingPageHtml(cards: ListingCard[]): string {
  const items = cards
    .map(
      (card) => `
      <li class="s-item">
        <div class="s-item__image-wrapper">${card.image ? `<img src="${card.image}">` : ''}</div>
        <a class="s-item__link" href="${card.href}"><div class="s-item__title"><span>${card.title}</span></div></a>
        ${card.price ? `<span class="s-item__price">${card.price}</span>` : ''}
        ${card.shipping ? `<span class="s-item__shipping">${card.shipping}</span>` : ''}
        ${card.condition ? `<span class="SECONDARY_INFO">${card.condition}</span>` : ''}
      </li>`
    )
    .join('');
  return `<html><head><title>Results</title></head><body><ul class="srp-results">${items}</ul></body></html>`;
}

export interface DetailPage {
  price?: string;
  condition?: string;
  soldInfo?: string;
}

export function detailPageHtml(detail: DetailPage): string {
  return `<html><head><title>Item</title></head><body>
    ${detail.price ? `<div class="x-price-primary"><span class="ux-textspans">${detail.price}</span></div>` : ''}
    ${detail.condition ? `<div class="x-item-condition-text"><span class="ux-textspans">${detail.condition}</span></div>` : ''}
    ${detail.soldInfo ? `<div data-testid="x-ended-message">${detail.soldInfo}</div>` : ''}
  </body></html>`;
}
