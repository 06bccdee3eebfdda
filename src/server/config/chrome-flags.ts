// ============================================================================
// CONTAINER-FRIENDLY CHROMIUM LAUNCH FLAGS
// ============================================================================
// Headless Chromium inside a small container: no sandbox, no /dev/shm,
// no GPU, and as little background work as possible

export const CHROMIUM_ARGS = [
  // =========================================================================
  // CONTAINER RUNTIME
  // =========================================================================
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--no-zygote',

  // =========================================================================
  // GPU (none available)
  // =========================================================================
  '--disable-gpu',
  '--disable-software-rasterizer',

  // =========================================================================
  // PERFORMANCE OPTIMIZATIONS
  // =========================================================================
  '--disable-background-timer-throttling',
  '--disable-backgrounding-occluded-windows',
  '--disable-renderer-backgrounding',
  '--disable-background-networking',
  '--disable-extensions',
  '--js-flags=--max-old-space-size=512',

  // =========================================================================
  // ANTI-DETECTION (for scraping)
  // =========================================================================
  '--disable-blink-features=AutomationControlled',

  // =========================================================================
  // AUDIO & WINDOW
  // =========================================================================
  '--mute-audio',
  '--no-first-run',
  '--no-default-browser-check',
  '--password-store=basic',
  '--use-mock-keychain',
];

// Flags to ignore from Playwright's defaults
export const IGNORED_DEFAULT_ARGS = ['--enable-automation'];

export const DESKTOP_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

export const DESKTOP_VIEWPORT = { width: 1280, height: 720 };

// Mobile emulation profile (modern Android phone)
export const MOBILE_PROFILE = {
  userAgent:
    'Mozilla/5.0 (Linux; Android 13; Pixel 7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Mobile Safari/537.36',
  viewport: { width: 412, height: 915 },
  deviceScaleFactor: 2.625,
  isMobile: true,
  hasTouch: true,
};

// Context defaults
export const DEFAULT_LOCALE = 'en-GB';
export const DEFAULT_TIMEZONE = 'Europe/London';
export const DEFAULT_NAVIGATION_TIMEOUT_MS = 60_000;
export const DEFAULT_ACTION_TIMEOUT_MS = 45_000;
