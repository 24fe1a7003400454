/**
 * Ledger Engine
 *
 * Append-only journal of inventory changes. Every change to
 * products.stock_quantity goes through recordMovement(), which writes the
 * product balance and the movement in one transaction. Sales are never
 * blocked by stock levels; crossing the minimum or reaching zero raises a
 * low_stock / out_of_stock notification once the transaction commits.
 */

import { randomUUID } from 'crypto';
import { Database } from '../db/database.js';
import { getLogger } from '../utils/logger.js';
import { NotFound, ValidationError } from '../utils/errors.js';
import { ActorContext, requires } from './access.js';
import { AuditAction, AuditTrail } from './audit.js';
import { NotificationBus, StockAlert } from './notifications.js';
import { SignalBoard, SignalKey } from './signal-board.js';

const logger = getLogger('Ledger');

export const MovementType = {
  PURCHASE: 'purchase',
  SALE: 'sale',
  ADJUSTMENT: 'adjustment',
  WASTAGE: 'wastage',
  RETURN: 'return',
} as const;

export type MovementType = (typeof MovementType)[keyof typeof MovementType];

export const MOVEMENT_TYPES: readonly MovementType[] = Object.values(MovementType);

export function isMovementType(value: string): value is MovementType {
  return MOVEMENT_TYPES.some(type => type === value);
}

export type StockLevel = 'ok' | 'low_stock' | 'out_of_stock';

export function classifyStockLevel(stockQuantity: number, minStockLevel: number): StockLevel {
  if (stockQuantity <= 0) return 'out_of_stock';
  if (stockQuantity <= minStockLevel) return 'low_stock';
  return 'ok';
}

export interface LedgerOptions {
  now?: () => Date;
  /** How long an alert for the same product and level stays suppressed. */
  alertDedupeSeconds?: number;
}

export class LedgerEngine {
  private db: Database;
  private audit: AuditTrail;
  private notifications: NotificationBus;
  private signals: SignalBoard;
  private now: () => Date;
  private alertDedupeSeconds: number;

  constructor(
    db: Database,
    audit: AuditTrail,
    notifications: NotificationBus,
    signals: SignalBoard,
    options: LedgerOptions = {}
  ) {
    this.db = db;
    this.audit = audit;
    this.notifications = notifications;
    this.signals = signals;
    this.now = options.now ?? (() => new Date());
    this.alertDedupeSeconds = options.alertDedupeSeconds ?? 3600;
  }

  /**
   * Records one movement. `quantity` is the signed delta, except for
   * `adjustment` where it is the counted absolute quantity.
   *
   * Callers inside a larger transaction (order items, cancellations) get a
   * savepoint; the write lock is already theirs.
   */
  recordMovement(ctx: ActorContext, params: RecordMovementParams): StockMovement {
    const delta = this.validate(params);

    return this.db.transaction(() => {
      const product = this.db.get<ProductStockRow>(
        'SELECT id, name, stock_quantity, min_stock_level, unit_of_measure FROM products WHERE id = ?',
        [params.productId]
      );
      if (!product) {
        throw new NotFound('Product', params.productId);
      }

      const previousQuantity = product.stock_quantity;
      const movementDelta = params.type === MovementType.ADJUSTMENT ? delta - previousQuantity : delta;
      const newQuantity = previousQuantity + movementDelta;
      const createdAt = this.now().toISOString();
      const id = randomUUID();

      this.db.run(
        'UPDATE products SET stock_quantity = ?, updated_at = ? WHERE id = ?',
        [newQuantity, createdAt, product.id]
      );

      this.db.run(
        `INSERT INTO stock_movements (id, product_id, movement_type, quantity, previous_quantity, new_quantity, reference, notes, created_by, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          id,
          product.id,
          params.type,
          movementDelta,
          previousQuantity,
          newQuantity,
          params.reference ?? '',
          params.notes ?? '',
          ctx.user.id,
          createdAt,
        ]
      );

      this.audit.recordFor(ctx, AuditAction.STOCK_ADJUST, `${params.type} ${movementDelta} ${product.unit_of_measure} of ${product.name}`, {
        tableName: 'stock_movements',
        recordId: id,
        metadata: {
          productId: product.id,
          movementType: params.type,
          quantity: movementDelta,
          previousQuantity,
          newQuantity,
          reference: params.reference ?? '',
        },
      });

      const level = classifyStockLevel(newQuantity, product.min_stock_level);
      if (level !== 'ok') {
        const alert: StockAlert = {
          productId: product.id,
          productName: product.name,
          stockQuantity: newQuantity,
          minStockLevel: product.min_stock_level,
          unitOfMeasure: product.unit_of_measure,
        };
        this.db.afterCommit(() => this.raiseStockAlert(level, alert));
      }

      return Object.freeze<StockMovement>({
        id,
        productId: product.id,
        movementType: params.type,
        quantity: movementDelta,
        previousQuantity,
        newQuantity,
        reference: params.reference ?? '',
        notes: params.notes ?? '',
        createdBy: ctx.user.id,
        createdAt,
      });
    });
  }

  /** Manual stock work from the back office: purchases, counts, wastage. */
  adjustStock(ctx: ActorContext, params: RecordMovementParams): StockMovement {
    requires(ctx.user, 'INVENTORY');
    if (params.type === MovementType.SALE) {
      throw new ValidationError('Sales are recorded through orders, not manual adjustments', { type: params.type });
    }
    return this.recordMovement(ctx, params);
  }

  /**
   * Emits the alert unless one for the same product and level went out
   * within the de-duplication window.
   */
  raiseStockAlert(level: Exclude<StockLevel, 'ok'>, alert: StockAlert): boolean {
    if (!this.signals.claim(SignalKey.stockAlert(alert.productId, level), true, this.alertDedupeSeconds)) {
      return false;
    }
    logger.warn(level === 'out_of_stock' ? 'Product out of stock' : 'Product below minimum stock', {
      productId: alert.productId,
      stockQuantity: alert.stockQuantity,
      minStockLevel: alert.minStockLevel,
    });
    this.notifications.emit(level, alert);
    return true;
  }

  getMovements(filters: MovementFilters = {}): StockMovement[] {
    const conditions: string[] = [];
    const params: (string | number)[] = [];

    if (filters.productId) {
      conditions.push('product_id = ?');
      params.push(filters.productId);
    }
    if (filters.type) {
      conditions.push('movement_type = ?');
      params.push(filters.type);
    }
    if (filters.reference) {
      conditions.push('reference = ?');
      params.push(filters.reference);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    params.push(filters.limit ?? 100);

    const rows = this.db.all<StockMovementRow>(
      `SELECT * FROM stock_movements ${where} ORDER BY rowid DESC LIMIT ?`,
      params
    );
    return rows.map(mapMovementRow);
  }

  /**
   * Reconstructs the balance from the journal and compares it with the
   * product row. A mismatch means stock was written outside the ledger.
   */
  getBalance(productId: string): StockBalance {
    const product = this.db.get<{ stock_quantity: number }>(
      'SELECT stock_quantity FROM products WHERE id = ?',
      [productId]
    );
    if (!product) {
      throw new NotFound('Product', productId);
    }

    const journal = this.db.get<{ total: number | null; movements: number }>(
      'SELECT SUM(quantity) AS total, COUNT(*) AS movements FROM stock_movements WHERE product_id = ?',
      [productId]
    );
    const journalQuantity = journal?.total ?? 0;

    return {
      productId,
      stockQuantity: product.stock_quantity,
      journalQuantity,
      movements: journal?.movements ?? 0,
      consistent: Math.abs(journalQuantity - product.stock_quantity) < 1e-9,
    };
  }

  private validate(params: RecordMovementParams): number {
    const { type, quantity } = params;

    if (!isMovementType(type)) {
      throw new ValidationError(`Unknown movement type: ${type}`, { type });
    }
    if (!Number.isFinite(quantity)) {
      throw new ValidationError('Movement quantity must be a finite number', { quantity });
    }

    switch (type) {
      case MovementType.SALE:
      case MovementType.WASTAGE:
        if (quantity >= 0) {
          throw new ValidationError(`A ${type} movement must decrease stock`, { type, quantity });
        }
        break;
      case MovementType.PURCHASE:
      case MovementType.RETURN:
        if (quantity <= 0) {
          throw new ValidationError(`A ${type} movement must increase stock`, { type, quantity });
        }
        break;
      case MovementType.ADJUSTMENT:
        if (quantity < 0) {
          throw new ValidationError('An adjustment sets the counted quantity, which cannot be negative', { quantity });
        }
        break;
    }

    return quantity;
  }
}

function mapMovementRow(row: StockMovementRow): StockMovement {
  return Object.freeze<StockMovement>({
    id: row.id,
    productId: row.product_id,
    movementType: isMovementType(row.movement_type) ? row.movement_type : MovementType.ADJUSTMENT,
    quantity: row.quantity,
    previousQuantity: row.previous_quantity,
    newQuantity: row.new_quantity,
    reference: row.reference,
    notes: row.notes,
    createdBy: row.created_by,
    createdAt: row.created_at,
  });
}

interface RecordMovementParams {
  productId: string;
  type: MovementType;
  quantity: number;
  reference?: string;
  notes?: string;
}

interface MovementFilters {
  productId?: string;
  type?: MovementType;
  reference?: string;
  limit?: number;
}

interface StockMovement {
  readonly id: string;
  readonly productId: string;
  readonly movementType: MovementType;
  readonly quantity: number;
  readonly previousQuantity: number;
  readonly newQuantity: number;
  readonly reference: string;
  readonly notes: string;
  readonly createdBy: string | null;
  readonly createdAt: string;
}

interface StockBalance {
  productId: string;
  stockQuantity: number;
  journalQuantity: number;
  movements: number;
  consistent: boolean;
}

interface ProductStockRow {
  id: string;
  name: string;
  stock_quantity: number;
  min_stock_level: number;
  unit_of_measure: string;
}

interface StockMovementRow {
  id: string;
  product_id: string;
  movement_type: string;
  quantity: number;
  previous_quantity: number;
  new_quantity: number;
  reference: string;
  notes: string;
  created_by: string | null;
  created_at: string;
}

export type { RecordMovementParams, MovementFilters, StockMovement, StockBalance };
