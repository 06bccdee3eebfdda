import { describe, test, expect, vi } from 'vitest';
import { scrape } from '../SoldListingsScraper.js';
import { loadScraperSettings } from '../../config/settings.js';

// The default launcher module fails to load, as when the browser stack is missing
vi.mock('../../browser/BrowserManager.js', () => {
  throw new Error('Cannot find package playwright-extra');
});

const settings = loadScraperSettings({ MARKETPLACE_BASE_URL: 'https://market.example.com' });

describe('SoldListingsScraper without a browser stack', () => {
  test('returns a failed result instead of rejecting', async () => {
    const result = await scrape({ query: 'widget' }, { settings, now: () => 1_000 });

    expect(result.success).toBe(false);
    expect(result.query).toBe('widget');
    expect(result.attempts).toBe(0);
    expect(result.count).toBe(0);
    expect(result.items).toEqual([]);
    expect(result.elapsedSeconds).toBe(0);
    expect(result.error).toEqual(expect.any(String));
  });
});
