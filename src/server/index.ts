// ============================================================================
// MAIN SERVER - Express HTTP API
// ============================================================================

import 'dotenv/config';
import { createServer } from 'http';

import { createApp } from './app.js';
import { loadScraperSettings } from './config/settings.js';

const settings = loadScraperSettings();
const app = createApp({ settings });
const httpServer = createServer(app);

// ============================================================================
// STARTUP
// ============================================================================

httpServer.listen(settings.port, () => {
  console.log(`[Server] Sold listings scraper listening on http://localhost:${settings.port} (${settings.environment})`);
  console.log(`[Server] Marketplace: ${settings.baseUrl}`);
});

// Graceful shutdown
function shutdown(signal: string): void {
  console.log(`\n[Server] ${signal} received, shutting down...`);
  httpServer.close((error) => {
    if (error) {
      console.error('[Server] Error during shutdown:', error);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
