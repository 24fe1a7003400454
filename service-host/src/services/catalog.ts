/**
 * Back-office catalog: staff accounts, tables, categories and products.
 *
 * Price changes are logged and announced but not restricted; open orders
 * keep the price their items were locked at. Stock never changes here
 * except through the ledger.
 */

import { randomUUID } from 'crypto';
import { Database } from '../db/database.js';
import { getLogger } from '../utils/logger.js';
import { NotFound, StateConflict, ValidationError } from '../utils/errors.js';
import { Actor, ActorContext, Role, isRole, requires } from './access.js';
import { AuditAction, AuditTrail } from './audit.js';
import { LedgerEngine, MovementType } from './ledger.js';
import { NotificationBus } from './notifications.js';
import { hashPin, isValidPin } from './sessions.js';

const logger = getLogger('Catalog');

function assertPrice(price: number): void {
  if (!Number.isInteger(price) || price < 0) {
    throw new ValidationError('Price must be a non-negative whole number of minor units', { price });
  }
}

export class CatalogService {
  private db: Database;
  private ledger: LedgerEngine;
  private audit: AuditTrail;
  private notifications: NotificationBus;
  private now: () => Date;

  constructor(
    db: Database,
    ledger: LedgerEngine,
    audit: AuditTrail,
    notifications: NotificationBus,
    options: { now?: () => Date } = {}
  ) {
    this.db = db;
    this.ledger = ledger;
    this.audit = audit;
    this.notifications = notifications;
    this.now = options.now ?? (() => new Date());
  }

  // ==========================================================================
  // Staff
  // ==========================================================================

  createUser(ctx: ActorContext, params: CreateUserParams): Actor {
    requires(ctx.user, 'CATALOG');
    return this.db.transaction(() => {
      const user = this.insertUser(params);
      this.audit.recordFor(ctx, AuditAction.USER_ACTION, `Created ${user.role} account ${user.username}`, {
        tableName: 'users',
        recordId: user.id,
        metadata: { role: user.role },
      });
      return user;
    });
  }

  /** First-run admin account; does nothing once any user exists. */
  ensureBootstrapAdmin(username: string, pin: string): Actor | null {
    return this.db.transaction(() => {
      const existing = this.db.get<{ count: number }>('SELECT COUNT(*) AS count FROM users');
      if (existing && existing.count > 0) {
        return null;
      }
      const admin = this.insertUser({ username, displayName: 'Administrator', role: Role.ADMIN, pin });
      this.audit.record({
        userId: admin.id,
        actionType: AuditAction.USER_ACTION,
        description: 'Created bootstrap administrator',
        tableName: 'users',
        recordId: admin.id,
      });
      logger.info('Bootstrap administrator created', { username });
      return admin;
    });
  }

  deactivateUser(ctx: ActorContext, userId: string): void {
    requires(ctx.user, 'CATALOG');
    this.db.transaction(() => {
      const result = this.db.run('UPDATE users SET is_active = 0 WHERE id = ?', [userId]);
      if (result.changes === 0) {
        throw new NotFound('User', userId);
      }
      this.db.run('DELETE FROM sessions WHERE user_id = ?', [userId]);
      this.audit.recordFor(ctx, AuditAction.USER_ACTION, 'Deactivated user', { tableName: 'users', recordId: userId });
    });
  }

  /** Administrative override: clears the binding so the next sign-in binds afresh. */
  resetDeviceBinding(ctx: ActorContext, userId: string): void {
    requires(ctx.user, 'CATALOG');
    this.db.transaction(() => {
      const row = this.db.get<{ device_id: string | null }>('SELECT device_id FROM users WHERE id = ?', [userId]);
      if (!row) {
        throw new NotFound('User', userId);
      }
      this.db.run('UPDATE users SET device_id = NULL WHERE id = ?', [userId]);
      this.db.run('DELETE FROM sessions WHERE user_id = ?', [userId]);
      this.audit.recordFor(ctx, AuditAction.USER_ACTION, 'Reset device binding', {
        tableName: 'users',
        recordId: userId,
        metadata: { previousDeviceId: row.device_id },
      });
      logger.info('Device binding reset', { userId, previousDeviceId: row.device_id });
    });
  }

  // ==========================================================================
  // Floor
  // ==========================================================================

  createTable(ctx: ActorContext, params: { number: string; capacity?: number }): DiningTable {
    requires(ctx.user, 'CATALOG');
    const capacity = params.capacity ?? 4;
    if (!params.number.trim() || !Number.isInteger(capacity) || capacity < 1) {
      throw new ValidationError('A table needs a number and a capacity of at least 1', { ...params });
    }

    return this.db.transaction(() => {
      const id = randomUUID();
      this.db.run(
        'INSERT INTO dining_tables (id, number, capacity, created_at) VALUES (?, ?, ?, ?)',
        [id, params.number.trim(), capacity, this.now().toISOString()]
      );
      this.audit.recordFor(ctx, AuditAction.USER_ACTION, `Created table ${params.number}`, {
        tableName: 'dining_tables',
        recordId: id,
      });
      return this.requireTable(id);
    });
  }

  getTable(id: string): DiningTable | null {
    const row = this.db.get<TableRow>('SELECT * FROM dining_tables WHERE id = ?', [id]);
    return row ? mapTableRow(row) : null;
  }

  listTables(): DiningTable[] {
    return this.db
      .all<TableRow>('SELECT * FROM dining_tables WHERE is_active = 1 ORDER BY number')
      .map(mapTableRow);
  }

  // ==========================================================================
  // Products
  // ==========================================================================

  createCategory(ctx: ActorContext, name: string): { id: string; name: string } {
    requires(ctx.user, 'CATALOG');
    if (!name.trim()) {
      throw new ValidationError('Category name is required');
    }
    return this.db.transaction(() => {
      const id = randomUUID();
      this.db.run('INSERT INTO categories (id, name, created_at) VALUES (?, ?, ?)', [id, name.trim(), this.now().toISOString()]);
      this.audit.recordFor(ctx, AuditAction.USER_ACTION, `Created category ${name}`, { tableName: 'categories', recordId: id });
      return { id, name: name.trim() };
    });
  }

  /** Opening stock is booked as a purchase so the journal explains the balance. */
  createProduct(ctx: ActorContext, params: CreateProductParams): Product {
    requires(ctx.user, 'CATALOG');
    assertPrice(params.price);
    if (!params.name.trim()) {
      throw new ValidationError('Product name is required');
    }
    const initialStock = params.initialStock ?? 0;
    const minStockLevel = params.minStockLevel ?? 0;
    if (!Number.isFinite(initialStock) || initialStock < 0 || !Number.isFinite(minStockLevel) || minStockLevel < 0) {
      throw new ValidationError('Stock quantities cannot be negative', { initialStock, minStockLevel });
    }

    return this.db.transaction(() => {
      const id = randomUUID();
      const now = this.now().toISOString();
      this.db.run(
        `INSERT INTO products (id, name, sku, category_id, current_price, stock_quantity, min_stock_level,
           unit_of_measure, requires_kitchen, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, 0, ?, ?, ?, ?, ?)`,
        [
          id,
          params.name.trim(),
          params.sku ?? null,
          params.categoryId ?? null,
          params.price,
          minStockLevel,
          params.unitOfMeasure ?? 'unit',
          params.requiresKitchen === false ? 0 : 1,
          now,
          now,
        ]
      );

      this.audit.recordFor(ctx, AuditAction.USER_ACTION, `Created product ${params.name}`, {
        tableName: 'products',
        recordId: id,
        metadata: { price: params.price, initialStock },
      });

      if (initialStock > 0) {
        this.ledger.recordMovement(ctx, {
          productId: id,
          type: MovementType.PURCHASE,
          quantity: initialStock,
          reference: 'opening-stock',
        });
      }

      return this.requireProduct(id);
    });
  }

  changePrice(ctx: ActorContext, productId: string, newPrice: number): Product {
    requires(ctx.user, 'CATALOG');
    assertPrice(newPrice);

    return this.db.transaction(() => {
      const product = this.requireProduct(productId);
      if (product.currentPrice === newPrice) {
        return product;
      }

      this.db.run(
        'UPDATE products SET current_price = ?, updated_at = ? WHERE id = ?',
        [newPrice, this.now().toISOString(), productId]
      );
      this.audit.recordFor(ctx, AuditAction.PRICE_CHANGE, `${product.name}: ${product.currentPrice} -> ${newPrice}`, {
        tableName: 'products',
        recordId: productId,
        metadata: { oldPrice: product.currentPrice, newPrice },
      });
      this.db.afterCommit(() => this.notifications.emit('price_change', {
        productId,
        productName: product.name,
        oldPrice: product.currentPrice,
        newPrice,
        changedBy: ctx.user.username,
      }));

      logger.info('Price changed', { productId, oldPrice: product.currentPrice, newPrice });
      return this.requireProduct(productId);
    });
  }

  setAvailability(ctx: ActorContext, productId: string, available: boolean): Product {
    requires(ctx.user, 'CATALOG');
    return this.db.transaction(() => {
      this.requireProduct(productId);
      this.db.run(
        'UPDATE products SET is_available = ?, updated_at = ? WHERE id = ?',
        [available ? 1 : 0, this.now().toISOString(), productId]
      );
      this.audit.recordFor(ctx, AuditAction.USER_ACTION, `Marked product ${available ? 'available' : 'unavailable'}`, {
        tableName: 'products',
        recordId: productId,
      });
      return this.requireProduct(productId);
    });
  }

  /** Soft delete: history (order items, movements) keeps pointing at it. */
  deactivateProduct(ctx: ActorContext, productId: string): Product {
    requires(ctx.user, 'CATALOG');
    return this.db.transaction(() => {
      const product = this.requireProduct(productId);
      if (!product.isActive) {
        throw new StateConflict(`Product ${product.name} is already inactive`, { productId });
      }
      this.db.run('UPDATE products SET is_active = 0, updated_at = ? WHERE id = ?', [this.now().toISOString(), productId]);
      this.audit.recordFor(ctx, AuditAction.USER_ACTION, `Deactivated product ${product.name}`, {
        tableName: 'products',
        recordId: productId,
      });
      return this.requireProduct(productId);
    });
  }

  getProduct(id: string): Product | null {
    const row = this.db.get<ProductRow>('SELECT * FROM products WHERE id = ?', [id]);
    return row ? mapProductRow(row) : null;
  }

  listProducts(options: { includeInactive?: boolean } = {}): Product[] {
    const where = options.includeInactive ? '' : 'WHERE is_active = 1';
    return this.db.all<ProductRow>(`SELECT * FROM products ${where} ORDER BY name`).map(mapProductRow);
  }

  private insertUser(params: CreateUserParams): Actor {
    const username = params.username.trim();
    if (!username || !params.displayName.trim()) {
      throw new ValidationError('Username and display name are required');
    }
    if (!isRole(params.role)) {
      throw new ValidationError(`Unknown role: ${params.role}`, { role: params.role });
    }
    const role = params.role;
    if (params.pin !== undefined && !isValidPin(params.pin)) {
      throw new ValidationError('PIN must be 4 to 8 digits');
    }
    const taken = this.db.get<{ id: string }>('SELECT id FROM users WHERE username = ?', [username]);
    if (taken) {
      throw new StateConflict(`Username ${username} is taken`, { username }, 'USERNAME_TAKEN');
    }

    const id = randomUUID();
    this.db.run(
      `INSERT INTO users (id, username, display_name, role, pin_hash, created_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [
        id,
        username,
        params.displayName.trim(),
        role,
        params.pin !== undefined ? hashPin(params.pin) : null,
        this.now().toISOString(),
      ]
    );
    return { id, username, role };
  }

  private requireTable(id: string): DiningTable {
    const table = this.getTable(id);
    if (!table) {
      throw new NotFound('Table', id);
    }
    return table;
  }

  private requireProduct(id: string): Product {
    const product = this.getProduct(id);
    if (!product) {
      throw new NotFound('Product', id);
    }
    return product;
  }
}

function mapTableRow(row: TableRow): DiningTable {
  return {
    id: row.id,
    number: row.number,
    capacity: row.capacity,
    isOccupied: row.is_occupied === 1,
    isActive: row.is_active === 1,
  };
}

function mapProductRow(row: ProductRow): Product {
  return {
    id: row.id,
    name: row.name,
    sku: row.sku,
    categoryId: row.category_id,
    currentPrice: row.current_price,
    stockQuantity: row.stock_quantity,
    minStockLevel: row.min_stock_level,
    unitOfMeasure: row.unit_of_measure,
    requiresKitchen: row.requires_kitchen === 1,
    isActive: row.is_active === 1,
    isAvailable: row.is_available === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

interface CreateUserParams {
  username: string;
  displayName: string;
  role: string;
  pin?: string;
}

interface CreateProductParams {
  name: string;
  price: number;
  sku?: string;
  categoryId?: string;
  initialStock?: number;
  minStockLevel?: number;
  unitOfMeasure?: string;
  requiresKitchen?: boolean;
}

interface DiningTable {
  id: string;
  number: string;
  capacity: number;
  isOccupied: boolean;
  isActive: boolean;
}

interface Product {
  id: string;
  name: string;
  sku: string | null;
  categoryId: string | null;
  currentPrice: number;
  stockQuantity: number;
  minStockLevel: number;
  unitOfMeasure: string;
  requiresKitchen: boolean;
  isActive: boolean;
  isAvailable: boolean;
  createdAt: string;
  updatedAt: string;
}

interface TableRow {
  id: string;
  number: string;
  capacity: number;
  is_occupied: number;
  is_active: number;
  created_at: string;
}

interface ProductRow {
  id: string;
  name: string;
  sku: string | null;
  category_id: string | null;
  current_price: number;
  stock_quantity: number;
  min_stock_level: number;
  unit_of_measure: string;
  requires_kitchen: number;
  is_active: number;
  is_available: number;
  created_at: string;
  updated_at: string;
}

export type { CreateUserParams, CreateProductParams, DiningTable, Product };
