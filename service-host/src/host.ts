/**
 * POS Host
 *
 * Owns the process-level pieces around the core: the database file, the
 * HTTP server, the stock alert sweep and housekeeping timers.
 */

import fs from 'fs';
import http from 'http';
import path from 'path';
import { Database } from './db/database.js';
import { getLogger } from './utils/logger.js';
import { toError } from './utils/errors.js';
import type { HostConfig } from './config.js';
import { createPosCore, PosCore, PosCoreOptions } from './core.js';
import { createApp, HOST_VERSION } from './app.js';

const logger = getLogger('PosHost');

const HOUSEKEEPING_INTERVAL_MS = 60000;

export class PosHost {
  private config: HostConfig;
  private db: Database;
  private core: PosCore;
  private server: http.Server;
  private housekeeping: NodeJS.Timeout | null = null;
  private unsubscribers: (() => void)[] = [];

  constructor(config: HostConfig, options: PosCoreOptions & { dbPath?: string } = {}) {
    this.config = config;

    const dbPath = options.dbPath ?? path.join(config.dataDir, 'pos-host.db');
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);
    this.core = createPosCore(this.db, config, options);
    this.server = http.createServer(createApp(this.core));
  }

  get services(): PosCore {
    return this.core;
  }

  async start(): Promise<number> {
    logger.info('Starting POS host', { version: HOST_VERSION, dataDir: this.config.dataDir });

    this.db.initialize();
    logger.info('Database initialized', { path: this.db.path });

    if (this.config.bootstrapAdmin) {
      const admin = this.core.catalog.ensureBootstrapAdmin(
        this.config.bootstrapAdmin.username,
        this.config.bootstrapAdmin.pin
      );
      if (admin) {
        logger.info('Created bootstrap admin', { username: admin.username });
      }
    }

    this.subscribeNotifications();
    this.core.alerts.start();
    this.housekeeping = setInterval(() => this.runHousekeeping(), HOUSEKEEPING_INTERVAL_MS);
    this.housekeeping.unref();

    await new Promise<void>((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.config.port, '0.0.0.0', () => {
        this.server.off('error', reject);
        resolve();
      });
    });

    const port = this.port;
    logger.info('POS host listening', { url: `http://0.0.0.0:${port}` });
    return port;
  }

  get port(): number {
    const address = this.server.address();
    return typeof address === 'object' && address !== null ? address.port : this.config.port;
  }

  async stop(): Promise<void> {
    logger.info('Shutting down POS host');
    this.core.alerts.stop();
    if (this.housekeeping) {
      clearInterval(this.housekeeping);
      this.housekeeping = null;
    }
    for (const unsubscribe of this.unsubscribers.splice(0)) {
      unsubscribe();
    }

    if (this.server.listening) {
      await new Promise<void>((resolve, reject) => {
        this.server.close(err => (err ? reject(err) : resolve()));
      });
    }
    this.db.close();
    logger.info('POS host stopped');
  }

  private subscribeNotifications(): void {
    const { notifications } = this.core;
    this.unsubscribers.push(
      notifications.on('low_stock', alert => logger.warn('Notification: low stock', { ...alert })),
      notifications.on('out_of_stock', alert => logger.warn('Notification: out of stock', { ...alert })),
      notifications.on('price_change', notice => logger.info('Notification: price change', { ...notice })),
      notifications.on('cash_variance', notice => logger.warn('Notification: cash variance', { ...notice }))
    );
  }

  private runHousekeeping(): void {
    try {
      const signals = this.core.signals.sweep();
      const sessions = this.core.sessions.purgeExpired();
      if (signals > 0 || sessions > 0) {
        logger.debug('Housekeeping', { expiredSignals: signals, expiredSessions: sessions });
      }
    } catch (e) {
      logger.error('Housekeeping failed', toError(e));
    }
  }
}
