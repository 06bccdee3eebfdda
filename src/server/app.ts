// ============================================================================
// EXPRESS APP
// ============================================================================

import express, { type Express } from 'express';
import cors from 'cors';

import type { SmokeResult } from '../shared/types.js';
import type { ScraperSettings } from './config/settings.js';
import { handleScrapeQuery, type ScrapeFn } from './api/scrapeQuery.js';
import { scrape, smoke } from './scraper/SoldListingsScraper.js';

export interface AppOptions {
  settings: ScraperSettings;
  scrapeFn?: ScrapeFn;
  smokeFn?: () => Promise<SmokeResult>;
}

/**
 * Run the smoke check; a rejected check becomes { ok: false }
 */
export async function runSmoke(smokeFn: () => Promise<SmokeResult>): Promise<SmokeResult> {
  try {
    return await smokeFn();
  } catch (error) {
    console.error('[Server] /smoke failed:', error);
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

export function createApp(options: AppOptions): Express {
  const { settings } = options;
  const scrapeFn: ScrapeFn = options.scrapeFn ?? ((request) => scrape(request, { settings }));
  const smokeFn = options.smokeFn ?? (() => smoke({ settings }));

  const app = express();
  app.use(cors({ origin: settings.corsOrigins }));
  app.use(express.json());

  // Service descriptor
  app.get('/', (_, res) => {
    res.json({
      service: 'sold-listings-scraper',
      endpoints: {
        '/health': 'Liveness',
        '/smoke': 'Browser smoke check',
        '/scrape': 'GET ?query=&pages=&per_page=&headless=&usd_rate=&mobile=&condition=&proxy=&dummy=',
      },
    });
  });

  // Health check
  app.get('/health', (_, res) => {
    res.json({ status: 'ok', environment: settings.environment });
  });

  app.get('/smoke', async (_, res) => {
    res.json(await runSmoke(smokeFn));
  });

  app.get('/scrape', async (req, res) => {
    // Abort the run when the client goes away
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) controller.abort();
    });

    try {
      const reply = await handleScrapeQuery(req.query, { settings, scrapeFn, signal: controller.signal });
      console.log(`[Server] /scrape ${JSON.stringify(req.query)} -> ${reply.status}`);
      res.status(reply.status).json(reply.body);
    } catch (error) {
      console.error('[Server] /scrape failed:', error);
      res.status(200).json({ success: false, error: error instanceof Error ? error.message : String(error) });
    }
  });

  return app;
}
