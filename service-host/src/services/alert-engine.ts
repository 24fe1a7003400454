/**
 * Stock Alert Engine
 *
 * Periodically sweeps active products and re-raises low and out-of-stock
 * alerts. Movements raise their own alerts as they commit; the sweep covers
 * levels changed out of band (minimum level edits, restarts) and repeats an
 * alert once its de-duplication window has passed.
 */

import { Database } from '../db/database.js';
import { getLogger } from '../utils/logger.js';
import { toError } from '../utils/errors.js';
import { classifyStockLevel, LedgerEngine } from './ledger.js';

const logger = getLogger('AlertEngine');

interface AlertEngineConfig {
  checkIntervalMs: number;
}

const DEFAULT_CONFIG: AlertEngineConfig = {
  checkIntervalMs: 60000,
};

export class AlertEngine {
  private db: Database;
  private ledger: LedgerEngine;
  private config: AlertEngineConfig;
  private intervalId: NodeJS.Timeout | null = null;

  constructor(db: Database, ledger: LedgerEngine, config: Partial<AlertEngineConfig> = {}) {
    this.db = db;
    this.ledger = ledger;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  start(): void {
    if (this.intervalId) {
      return;
    }

    logger.info('Starting alert engine', { intervalMs: this.config.checkIntervalMs });
    this.check();
    this.intervalId = setInterval(() => this.check(), this.config.checkIntervalMs);
    this.intervalId.unref();
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
      logger.info('Alert engine stopped');
    }
  }

  get running(): boolean {
    return this.intervalId !== null;
  }

  /** One sweep; returns the number of alerts emitted. */
  runOnce(): number {
    const rows = this.db.all<ProductLevelRow>(
      `SELECT id, name, stock_quantity, min_stock_level, unit_of_measure
       FROM products
       WHERE is_active = 1 AND stock_quantity <= min_stock_level
       ORDER BY name`
    );

    let raised = 0;
    for (const row of rows) {
      const level = classifyStockLevel(row.stock_quantity, row.min_stock_level);
      if (level === 'ok') continue;
      const emitted = this.ledger.raiseStockAlert(level, {
        productId: row.id,
        productName: row.name,
        stockQuantity: row.stock_quantity,
        minStockLevel: row.min_stock_level,
        unitOfMeasure: row.unit_of_measure,
      });
      if (emitted) raised++;
    }
    return raised;
  }

  private check(): void {
    try {
      const raised = this.runOnce();
      if (raised > 0) {
        logger.debug('Stock sweep raised alerts', { raised });
      }
    } catch (e) {
      logger.error('Stock sweep failed', toError(e));
    }
  }
}

interface ProductLevelRow {
  id: string;
  name: string;
  stock_quantity: number;
  min_stock_level: number;
  unit_of_measure: string;
}

export type { AlertEngineConfig };
