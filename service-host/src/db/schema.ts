/**
 * SQLite Schema for the POS host
 *
 * Immutability of payments, stock movements, confirmed order items and audit
 * entries is enforced here by triggers, so no code path (including ad-hoc
 * SQL) can bypass it. Trigger messages start with `immutable:`; the Database
 * wrapper maps them to ImmutabilityViolation.
 */

export const SCHEMA_VERSION = 1;

export const IMMUTABLE_MESSAGE_PREFIX = 'immutable:';

export const CREATE_SCHEMA_SQL = `
-- Schema version tracking
CREATE TABLE IF NOT EXISTS schema_version (
  version INTEGER PRIMARY KEY,
  applied_at TEXT DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
);

-- ============================================================================
-- STAFF & FLOOR
-- ============================================================================

CREATE TABLE IF NOT EXISTS users (
  id TEXT PRIMARY KEY,
  username TEXT NOT NULL UNIQUE,
  display_name TEXT NOT NULL,
  role TEXT NOT NULL CHECK (role IN ('admin', 'cashier', 'waiter', 'kitchen')),
  device_id TEXT,
  pin_hash TEXT,
  is_active INTEGER NOT NULL DEFAULT 1,
  is_active_shift INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL
);

-- A bound device can only be cleared (administrative rebind), never swapped in place
CREATE TRIGGER IF NOT EXISTS trg_users_device_write_once
BEFORE UPDATE OF device_id ON users
WHEN OLD.device_id IS NOT NULL AND NEW.device_id IS NOT NULL AND NEW.device_id IS NOT OLD.device_id
BEGIN
  SELECT RAISE(ABORT, 'immutable: device binding can only be reset, not replaced');
END;

CREATE TABLE IF NOT EXISTS dining_tables (
  id TEXT PRIMARY KEY,
  number TEXT NOT NULL UNIQUE,
  capacity INTEGER NOT NULL DEFAULT 4,
  is_occupied INTEGER NOT NULL DEFAULT 0,
  is_active INTEGER NOT NULL DEFAULT 1,
  created_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS sessions (
  token TEXT PRIMARY KEY,
  user_id TEXT NOT NULL REFERENCES users(id),
  device_id TEXT NOT NULL,
  ip_address TEXT NOT NULL DEFAULT '',
  created_at TEXT NOT NULL,
  expires_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_sessions_user ON sessions(user_id);

-- ============================================================================
-- CATALOG & INVENTORY
-- ============================================================================

CREATE TABLE IF NOT EXISTS categories (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL UNIQUE,
  is_active INTEGER NOT NULL DEFAULT 1,
  created_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS products (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  sku TEXT UNIQUE,
  category_id TEXT REFERENCES categories(id),
  current_price INTEGER NOT NULL CHECK (current_price >= 0),
  stock_quantity REAL NOT NULL DEFAULT 0,
  min_stock_level REAL NOT NULL DEFAULT 0,
  unit_of_measure TEXT NOT NULL DEFAULT 'unit',
  requires_kitchen INTEGER NOT NULL DEFAULT 1,
  is_active INTEGER NOT NULL DEFAULT 1,
  is_available INTEGER NOT NULL DEFAULT 1,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS stock_movements (
  id TEXT PRIMARY KEY,
  product_id TEXT NOT NULL REFERENCES products(id),
  movement_type TEXT NOT NULL CHECK (movement_type IN ('purchase', 'sale', 'adjustment', 'wastage', 'return')),
  quantity REAL NOT NULL,
  previous_quantity REAL NOT NULL,
  new_quantity REAL NOT NULL,
  reference TEXT NOT NULL DEFAULT '',
  notes TEXT NOT NULL DEFAULT '',
  created_by TEXT REFERENCES users(id),
  created_at TEXT NOT NULL,
  CHECK (new_quantity = previous_quantity + quantity)
);

CREATE INDEX IF NOT EXISTS idx_stock_movements_product ON stock_movements(product_id, created_at);

CREATE TRIGGER IF NOT EXISTS trg_stock_movements_no_update
BEFORE UPDATE ON stock_movements
BEGIN
  SELECT RAISE(ABORT, 'immutable: stock movements cannot be modified');
END;

CREATE TRIGGER IF NOT EXISTS trg_stock_movements_no_delete
BEFORE DELETE ON stock_movements
BEGIN
  SELECT RAISE(ABORT, 'immutable: stock movements cannot be deleted');
END;

-- ============================================================================
-- ORDERS
-- ============================================================================

CREATE TABLE IF NOT EXISTS orders (
  id TEXT PRIMARY KEY,
  order_number TEXT NOT NULL UNIQUE,
  business_date TEXT NOT NULL,
  table_id TEXT REFERENCES dining_tables(id),
  waiter_id TEXT NOT NULL REFERENCES users(id),
  status TEXT NOT NULL DEFAULT 'pending'
    CHECK (status IN ('pending', 'preparing', 'ready', 'served', 'completed', 'cancelled')),
  subtotal INTEGER NOT NULL DEFAULT 0,
  tax_amount INTEGER NOT NULL DEFAULT 0,
  total_amount INTEGER NOT NULL DEFAULT 0,
  device_id TEXT NOT NULL DEFAULT '',
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  completed_at TEXT,
  cancelled_at TEXT
);

CREATE INDEX IF NOT EXISTS idx_orders_status ON orders(status);
CREATE INDEX IF NOT EXISTS idx_orders_business_date ON orders(business_date);

-- At most one non-terminal order per table
CREATE UNIQUE INDEX IF NOT EXISTS idx_orders_open_table ON orders(table_id)
  WHERE table_id IS NOT NULL AND status IN ('pending', 'preparing', 'ready', 'served');

CREATE TRIGGER IF NOT EXISTS trg_orders_no_delete
BEFORE DELETE ON orders
BEGIN
  SELECT RAISE(ABORT, 'immutable: orders cannot be deleted');
END;

CREATE TABLE IF NOT EXISTS order_items (
  id TEXT PRIMARY KEY,
  order_id TEXT NOT NULL REFERENCES orders(id),
  product_id TEXT NOT NULL REFERENCES products(id),
  product_name TEXT NOT NULL,
  quantity REAL NOT NULL CHECK (quantity > 0),
  unit_price INTEGER NOT NULL,
  subtotal INTEGER NOT NULL,
  special_instructions TEXT NOT NULL DEFAULT '',
  requires_kitchen INTEGER NOT NULL DEFAULT 1,
  is_confirmed INTEGER NOT NULL DEFAULT 0,
  confirmed_at TEXT,
  confirmed_by TEXT REFERENCES users(id),
  created_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_order_items_order ON order_items(order_id);

-- Price locking: the product and price captured at creation never change
CREATE TRIGGER IF NOT EXISTS trg_order_items_price_locked
BEFORE UPDATE ON order_items
WHEN NEW.product_id IS NOT OLD.product_id
  OR NEW.unit_price IS NOT OLD.unit_price
  OR NEW.order_id IS NOT OLD.order_id
BEGIN
  SELECT RAISE(ABORT, 'immutable: order item product and price are locked');
END;

CREATE TRIGGER IF NOT EXISTS trg_order_items_confirmed_locked
BEFORE UPDATE ON order_items
WHEN OLD.is_confirmed = 1 AND (
  NEW.quantity IS NOT OLD.quantity
  OR NEW.subtotal IS NOT OLD.subtotal
  OR NEW.product_name IS NOT OLD.product_name
  OR NEW.special_instructions IS NOT OLD.special_instructions
  OR NEW.is_confirmed IS NOT 1
)
BEGIN
  SELECT RAISE(ABORT, 'immutable: confirmed order items cannot be changed');
END;

CREATE TRIGGER IF NOT EXISTS trg_order_items_confirmed_no_delete
BEFORE DELETE ON order_items
WHEN OLD.is_confirmed = 1
BEGIN
  SELECT RAISE(ABORT, 'immutable: confirmed order items cannot be removed');
END;

-- ============================================================================
-- PAYMENTS
-- ============================================================================

CREATE TABLE IF NOT EXISTS payments (
  id TEXT PRIMARY KEY,
  payment_number TEXT NOT NULL UNIQUE,
  business_date TEXT NOT NULL,
  order_id TEXT NOT NULL REFERENCES orders(id),
  amount INTEGER NOT NULL CHECK (amount > 0),
  method TEXT NOT NULL CHECK (method IN ('cash', 'mobile_money', 'orange_money')),
  transaction_reference TEXT NOT NULL DEFAULT '',
  processed_by TEXT NOT NULL REFERENCES users(id),
  device_id TEXT NOT NULL DEFAULT '',
  processed_at TEXT NOT NULL,
  receipt_printed INTEGER NOT NULL DEFAULT 0,
  receipt_printed_at TEXT
);

CREATE INDEX IF NOT EXISTS idx_payments_order ON payments(order_id);
CREATE INDEX IF NOT EXISTS idx_payments_business_date ON payments(business_date);
CREATE INDEX IF NOT EXISTS idx_payments_cashier ON payments(processed_by, processed_at);

-- The only permitted update is the one-way receipt_printed flip
CREATE TRIGGER IF NOT EXISTS trg_payments_no_update
BEFORE UPDATE ON payments
WHEN NOT (
  NEW.id IS OLD.id
  AND NEW.payment_number IS OLD.payment_number
  AND NEW.business_date IS OLD.business_date
  AND NEW.order_id IS OLD.order_id
  AND NEW.amount IS OLD.amount
  AND NEW.method IS OLD.method
  AND NEW.transaction_reference IS OLD.transaction_reference
  AND NEW.processed_by IS OLD.processed_by
  AND NEW.device_id IS OLD.device_id
  AND NEW.processed_at IS OLD.processed_at
  AND OLD.receipt_printed = 0
  AND NEW.receipt_printed = 1
)
BEGIN
  SELECT RAISE(ABORT, 'immutable: payments cannot be modified');
END;

CREATE TRIGGER IF NOT EXISTS trg_payments_no_delete
BEFORE DELETE ON payments
BEGIN
  SELECT RAISE(ABORT, 'immutable: payments cannot be deleted');
END;

-- ============================================================================
-- SHIFTS
-- ============================================================================

CREATE TABLE IF NOT EXISTS shifts (
  id TEXT PRIMARY KEY,
  user_id TEXT NOT NULL REFERENCES users(id),
  device_id TEXT NOT NULL DEFAULT '',
  opening_cash INTEGER NOT NULL CHECK (opening_cash >= 0),
  closing_cash INTEGER,
  expected_cash INTEGER,
  variance INTEGER,
  started_at TEXT NOT NULL,
  ended_at TEXT
);

CREATE UNIQUE INDEX IF NOT EXISTS idx_shifts_open_user ON shifts(user_id) WHERE ended_at IS NULL;

-- ============================================================================
-- AUDIT
-- ============================================================================

CREATE TABLE IF NOT EXISTS audit_logs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id TEXT,
  action_type TEXT NOT NULL CHECK (action_type IN (
    'login', 'logout', 'order_create', 'order_modify', 'order_cancel',
    'payment_process', 'stock_adjust', 'price_change', 'user_action'
  )),
  table_name TEXT NOT NULL DEFAULT '',
  record_id TEXT NOT NULL DEFAULT '',
  description TEXT NOT NULL,
  device_id TEXT NOT NULL DEFAULT '',
  ip_address TEXT NOT NULL DEFAULT '',
  metadata TEXT NOT NULL DEFAULT '{}',
  created_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_audit_logs_created ON audit_logs(created_at);
CREATE INDEX IF NOT EXISTS idx_audit_logs_user ON audit_logs(user_id, created_at);

-- Open only for the duration of an administrative retention purge
CREATE TABLE IF NOT EXISTS audit_purge_window (
  cutoff TEXT NOT NULL
);

CREATE TRIGGER IF NOT EXISTS trg_audit_logs_no_update
BEFORE UPDATE ON audit_logs
BEGIN
  SELECT RAISE(ABORT, 'immutable: audit log entries cannot be modified');
END;

CREATE TRIGGER IF NOT EXISTS trg_audit_logs_purge_only
BEFORE DELETE ON audit_logs
WHEN NOT EXISTS (SELECT 1 FROM audit_purge_window WHERE OLD.created_at < cutoff)
BEGIN
  SELECT RAISE(ABORT, 'immutable: audit log entries can only be removed by a retention purge');
END;

-- ============================================================================
-- SEQUENCES (order and payment numbers, per business day)
-- ============================================================================

CREATE TABLE IF NOT EXISTS sequences (
  name TEXT NOT NULL,
  day TEXT NOT NULL,
  value INTEGER NOT NULL,
  PRIMARY KEY (name, day)
);
`;
