/**
 * Wires the services around one database, one signal board and one
 * notification bus. The HTTP layer and the tests both start from here.
 */

import { Database } from './db/database.js';
import type { HostConfig } from './config.js';
import { AuditTrail } from './services/audit.js';
import { AlertEngine } from './services/alert-engine.js';
import { CatalogService } from './services/catalog.js';
import { DeviceBinding } from './services/device-binding.js';
import { EscPosNetworkPrinter } from './services/escpos-printer.js';
import { KitchenBoard } from './services/kitchen.js';
import { LedgerEngine } from './services/ledger.js';
import { NotificationBus } from './services/notifications.js';
import { OrderService } from './services/orders.js';
import { PaymentProcessor } from './services/payments.js';
import { ReceiptPrinter, ReceiptService, UnconfiguredPrinter } from './services/receipts.js';
import { ReportService } from './services/reports.js';
import { SessionService } from './services/sessions.js';
import { ShiftService } from './services/shifts.js';
import { SignalBoard } from './services/signal-board.js';

export interface PosCore {
  config: HostConfig;
  db: Database;
  signals: SignalBoard;
  notifications: NotificationBus;
  audit: AuditTrail;
  ledger: LedgerEngine;
  kitchen: KitchenBoard;
  orders: OrderService;
  payments: PaymentProcessor;
  shifts: ShiftService;
  binding: DeviceBinding;
  sessions: SessionService;
  catalog: CatalogService;
  receipts: ReceiptService;
  reports: ReportService;
  alerts: AlertEngine;
}

export interface PosCoreOptions {
  now?: () => Date;
  printer?: ReceiptPrinter;
}

export function createPosCore(db: Database, config: HostConfig, options: PosCoreOptions = {}): PosCore {
  const now = options.now ?? (() => new Date());
  const signals = new SignalBoard(() => now().getTime());
  const notifications = new NotificationBus();
  const audit = new AuditTrail(db, { now });

  const ledger = new LedgerEngine(db, audit, notifications, signals, {
    now,
    alertDedupeSeconds: config.signals.lowStockTtlSeconds,
  });
  const kitchen = new KitchenBoard(db, signals, { now, ttlSeconds: config.signals.kitchenTtlSeconds });
  const orders = new OrderService(db, ledger, audit, kitchen, {
    taxRate: config.taxRate,
    now,
    businessDate: config.businessDate,
  });
  const payments = new PaymentProcessor(db, audit, signals, {
    now,
    businessDate: config.businessDate,
    requireShift: config.shifts.requireShiftForPayments,
    drawerSignalTtlSeconds: config.signals.drawerTtlSeconds,
  });
  const shifts = new ShiftService(db, audit, notifications, {
    now,
    varianceThreshold: config.shifts.varianceThreshold,
  });
  const binding = new DeviceBinding(db, audit);
  const sessions = new SessionService(db, binding, audit, { now, ttlHours: config.sessions.ttlHours });
  const catalog = new CatalogService(db, ledger, audit, notifications, { now });

  const printer = options.printer
    ?? (config.printer ? new EscPosNetworkPrinter(config.printer) : new UnconfiguredPrinter());
  const receipts = new ReceiptService(db, audit, printer, {
    business: config.business,
    currency: config.currency,
    now,
  });
  const reports = new ReportService(db, { now, businessDate: config.businessDate });
  const alerts = new AlertEngine(db, ledger, { checkIntervalMs: config.alerts.lowStockIntervalMs });

  return {
    config,
    db,
    signals,
    notifications,
    audit,
    ledger,
    kitchen,
    orders,
    payments,
    shifts,
    binding,
    sessions,
    catalog,
    receipts,
    reports,
    alerts,
  };
}
