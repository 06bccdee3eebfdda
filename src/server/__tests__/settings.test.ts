import { describe, test, expect } from 'vitest';
import { loadScraperSettings } from '../config/settings.js';
import { ConfigurationError } from '../scraper/types/errors.js';

describe('loadScraperSettings', () => {
  test('applies defaults for an empty environment', () => {
    expect(loadScraperSettings({})).toEqual({
      port: 8080,
      environment: 'development',
      baseUrl: 'https://www.ebay.co.uk',
      usdToGbpRate: 0.78,
      defaultExchangeRate: 1.28,
      maxAttempts: 2,
      backoffUnitMs: 1000,
      maxDetailVisitsPerPage: 10,
      pageSize: 50,
      listingScrolls: 3,
      listingTimeoutMs: 45000,
      detailTimeoutMs: 30000,
      pacing: { minDelayMs: 1000, maxDelayMs: 3000 },
      proxy: undefined,
      smokeUrl: 'https://example.com',
      corsOrigins: ['http://localhost:3000', 'http://127.0.0.1:3000'],
    });
  });

  test('reads overrides', () => {
    const settings = loadScraperSettings({
      PORT: '9090',
      NODE_ENV: 'production',
      MARKETPLACE_BASE_URL: 'https://market.example.com',
      SCRAPER_USD_TO_GBP_RATE: '0.8',
      SCRAPER_MAX_ATTEMPTS: '4',
      SCRAPER_PROXY: ' http://proxy.example.com:3128 ',
      CORS_ORIGINS: 'https://a.example.com, https://b.example.com',
    });

    expect(settings.port).toBe(9090);
    expect(settings.environment).toBe('production');
    expect(settings.baseUrl).toBe('https://market.example.com');
    expect(settings.usdToGbpRate).toBe(0.8);
    expect(settings.maxAttempts).toBe(4);
    expect(settings.proxy).toBe('http://proxy.example.com:3128');
    expect(settings.corsOrigins).toEqual(['https://a.example.com', 'https://b.example.com']);
  });

  test('rejects invalid values', () => {
    expect(() => loadScraperSettings({ SCRAPER_MAX_ATTEMPTS: '0' })).toThrow(ConfigurationError);
    expect(() => loadScraperSettings({ SCRAPER_USD_TO_GBP_RATE: '-1' })).toThrow(ConfigurationError);
    expect(() => loadScraperSettings({ PORT: 'abc' })).toThrow(ConfigurationError);
    expect(() => loadScraperSettings({ MARKETPLACE_BASE_URL: 'ftp://market.example.com' })).toThrow(
      ConfigurationError
    );
  });

  test('rejects an inverted pacing range', () => {
    expect(() => loadScraperSettings({ SCRAPER_MIN_DELAY_MS: '500', SCRAPER_MAX_DELAY_MS: '100' })).toThrow(
      'SCRAPER_MAX_DELAY_MS (100) must not be below SCRAPER_MIN_DELAY_MS (500)'
    );
  });
});
