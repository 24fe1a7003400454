#!/usr/bin/env node

/**
 * Restaurant POS Host
 *
 * On-premise server for waiter, kitchen and cashier terminals on the local
 * network. Orders, stock, payments, shifts and the audit trail live in one
 * SQLite file under the data directory.
 *
 * Usage:
 *   node dist/index.js [--config config.json] [--port 3001] [--data-dir ./data]
 *                      [--tax-rate 0.1925] [--printer 192.168.1.50:9100]
 */

import path from 'path';
import { loadConfig } from './config.js';
import { PosHost } from './host.js';
import { getLogger, initializeLogger } from './utils/logger.js';
import { toError } from './utils/errors.js';

async function main() {
  const config = loadConfig();
  initializeLogger({ ...config.logging, logDir: path.join(config.dataDir, 'logs') });
  const logger = getLogger('Main');

  const host = new PosHost(config);
  await host.start();

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info('Received shutdown signal', { signal });
    host.stop().then(
      () => process.exit(0),
      (e) => {
        logger.fatal('Shutdown failed', toError(e));
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((e) => {
  getLogger('Main').fatal('Failed to start POS host', toError(e));
  process.exit(1);
});
