/**
 * Diagnostics service entry point.
 *
 * Opens the rolling log, attaches the console tap and starts the HTTP server.
 */

import { getPort, loadConfig } from './config.js';
import { startDiagnostics } from './diagnostics.js';
import { closeDb } from './storage.js';
import { startServer } from './server.js';

const config = loadConfig();
const diagnostics = startDiagnostics(config);
diagnostics.logger.event('Service started', `${config.appName} ${config.appVersion}`);

const server = startServer(getPort(), diagnostics);

function shutdown(signal: string): void {
  console.log(`[server] ${signal} received, shutting down`);
  server.close();
  diagnostics
    .shutdown()
    .catch((err) => console.error('[diagnostics] Shutdown flush failed:', err))
    .finally(() => {
      closeDb();
      process.exit(0);
    });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
