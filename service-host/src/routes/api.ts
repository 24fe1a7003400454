/**
 * API Routes
 *
 * Thin REST surface for terminals: waiters, kitchen, cashiers and the back
 * office. Every handler runs as the authenticated actor; role checks live
 * in the services.
 */

import { Router, Response, NextFunction } from 'express';
import { NotFound } from '../utils/errors.js';
import { requires } from '../services/access.js';
import type { PosCore } from '../core.js';
import { actorOf, AuthenticatedRequest } from '../middleware/auth.js';
import { schemas, validateRequest } from '../middleware/validation.js';

type Handler = (req: AuthenticatedRequest, res: Response) => unknown;

/** Forwards both thrown errors and rejected promises to the error middleware. */
function handle(fn: Handler) {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const result = fn(req, res);
      if (result instanceof Promise) {
        result.catch(next);
      }
    } catch (e) {
      next(e);
    }
  };
}

export function createApiRoutes(core: PosCore): Router {
  const router = Router();
  const { orders, kitchen, payments, receipts, shifts, ledger, catalog, reports, audit, sessions } = core;

  // ============================================================================
  // Session
  // ============================================================================

  router.delete('/session', handle((req, res) => {
    sessions.logout(actorOf(req), req.sessionToken ?? '');
    res.status(204).end();
  }));

  router.get('/session', handle((req, res) => {
    res.json(actorOf(req));
  }));

  // ============================================================================
  // Orders
  // ============================================================================

  router.post('/orders', handle((req, res) => {
    const body = validateRequest(schemas.createOrder, req.body);
    const result = orders.createOrder(actorOf(req), body);
    res.status(result.created ? 201 : 200).json(result);
  }));

  router.get('/orders', handle((req, res) => {
    requires(actorOf(req).user, 'ORDER_READ');
    const query = validateRequest(schemas.listOrders, req.query);
    res.json(orders.listOpenOrders(query));
  }));

  router.get('/orders/:id', handle((req, res) => {
    requires(actorOf(req).user, 'ORDER_READ');
    const order = orders.getOrder(req.params.id);
    if (!order) {
      throw new NotFound('Order', req.params.id);
    }
    res.json({ ...order, payments: payments.listPayments(order.id) });
  }));

  router.post('/orders/:id/items', handle((req, res) => {
    const body = validateRequest(schemas.addItem, req.body);
    const item = orders.addItem(actorOf(req), req.params.id, body);
    res.status(201).json(item);
  }));

  router.delete('/orders/:id/items/:itemId', handle((req, res) => {
    res.json(orders.removeItem(actorOf(req), req.params.id, req.params.itemId));
  }));

  router.post('/orders/:id/serve', handle((req, res) => {
    res.json(orders.markServed(actorOf(req), req.params.id));
  }));

  router.post('/orders/:id/cancel', handle((req, res) => {
    const body = validateRequest(schemas.cancelOrder, req.body);
    res.json(orders.cancelOrder(actorOf(req), req.params.id, body.reason));
  }));

  // ============================================================================
  // Kitchen
  // ============================================================================

  router.get('/kitchen/queue', handle((req, res) => {
    res.json(kitchen.getQueue(actorOf(req)));
  }));

  router.post('/kitchen/acknowledge', handle((req, res) => {
    kitchen.acknowledgeNewOrders(actorOf(req));
    res.json(kitchen.getWatermark());
  }));

  router.post('/kitchen/items/:itemId/confirm', handle((req, res) => {
    res.json(orders.confirmItem(actorOf(req), req.params.itemId));
  }));

  // ============================================================================
  // Cashier
  // ============================================================================

  router.get('/cashier/orders', handle((req, res) => {
    res.json(payments.listPayableOrders(actorOf(req)));
  }));

  router.post('/orders/:id/payments', handle((req, res) => {
    const body = validateRequest(schemas.payment, req.body);
    res.status(201).json(payments.processPayment(actorOf(req), req.params.id, body));
  }));

  router.post('/payments/:id/receipt', handle(async (req, res) => {
    const outcome = await receipts.printReceipt(actorOf(req), req.params.id);
    res.status(outcome.printed ? 200 : 502).json(outcome);
  }));

  router.get('/drawer', handle((req, res) => {
    const ctx = actorOf(req);
    requires(ctx.user, 'PAYMENT');
    const signal = payments.takeDrawerSignal(ctx.deviceId);
    res.json({ open: signal !== null, signal });
  }));

  // ============================================================================
  // Shifts
  // ============================================================================

  router.post('/shifts/start', handle((req, res) => {
    const body = validateRequest(schemas.startShift, req.body);
    res.status(201).json(shifts.startShift(actorOf(req), body.openingCash));
  }));

  router.post('/shifts/end', handle((req, res) => {
    const body = validateRequest(schemas.endShift, req.body);
    res.json(shifts.endShift(actorOf(req), body.closingCash));
  }));

  router.get('/shifts/current', handle((req, res) => {
    res.json(shifts.getShiftSummary(actorOf(req)));
  }));

  // ============================================================================
  // Inventory & catalog
  // ============================================================================

  router.get('/products', handle((req, res) => {
    requires(actorOf(req).user, 'ORDER_READ');
    res.json(catalog.listProducts({ includeInactive: req.query.includeInactive === 'true' }));
  }));

  router.post('/products', handle((req, res) => {
    const body = validateRequest(schemas.createProduct, req.body);
    res.status(201).json(catalog.createProduct(actorOf(req), body));
  }));

  router.patch('/products/:id/price', handle((req, res) => {
    const body = validateRequest(schemas.price, req.body);
    res.json(catalog.changePrice(actorOf(req), req.params.id, body.price));
  }));

  router.patch('/products/:id/availability', handle((req, res) => {
    const body = validateRequest(schemas.availability, req.body);
    res.json(catalog.setAvailability(actorOf(req), req.params.id, body.available));
  }));

  router.delete('/products/:id', handle((req, res) => {
    res.json(catalog.deactivateProduct(actorOf(req), req.params.id));
  }));

  router.post('/products/:id/movements', handle((req, res) => {
    const body = validateRequest(schemas.movement, req.body);
    res.status(201).json(ledger.adjustStock(actorOf(req), { ...body, productId: req.params.id }));
  }));

  router.get('/products/:id/movements', handle((req, res) => {
    requires(actorOf(req).user, 'INVENTORY');
    const query = validateRequest(schemas.movementQuery, req.query);
    res.json({
      balance: ledger.getBalance(req.params.id),
      movements: ledger.getMovements({ ...query, productId: req.params.id }),
    });
  }));

  router.post('/categories', handle((req, res) => {
    const body = validateRequest(schemas.createCategory, req.body);
    res.status(201).json(catalog.createCategory(actorOf(req), body.name));
  }));

  router.get('/tables', handle((req, res) => {
    requires(actorOf(req).user, 'ORDER_READ');
    res.json(catalog.listTables());
  }));

  router.post('/tables', handle((req, res) => {
    const body = validateRequest(schemas.createTable, req.body);
    res.status(201).json(catalog.createTable(actorOf(req), body));
  }));

  // ============================================================================
  // Staff
  // ============================================================================

  router.post('/users', handle((req, res) => {
    const body = validateRequest(schemas.createUser, req.body);
    res.status(201).json(catalog.createUser(actorOf(req), body));
  }));

  router.post('/users/:id/deactivate', handle((req, res) => {
    catalog.deactivateUser(actorOf(req), req.params.id);
    res.status(204).end();
  }));

  router.post('/users/:id/reset-device', handle((req, res) => {
    catalog.resetDeviceBinding(actorOf(req), req.params.id);
    res.status(204).end();
  }));

  // ============================================================================
  // Reports & audit
  // ============================================================================

  router.get('/reports/daily', handle((req, res) => {
    const query = validateRequest(schemas.dailyReport, req.query);
    res.json(reports.dailySales(actorOf(req), query.date));
  }));

  router.get('/reports/low-stock', handle((req, res) => {
    res.json(reports.lowStock(actorOf(req)));
  }));

  router.get('/reports/inventory', handle((req, res) => {
    res.json(reports.inventoryValuation(actorOf(req)));
  }));

  router.get('/audit', handle((req, res) => {
    const query = validateRequest(schemas.auditQuery, req.query);
    res.json(audit.list(actorOf(req), query));
  }));

  router.post('/audit/purge', handle((req, res) => {
    const body = validateRequest(schemas.auditPurge, req.body);
    const removed = audit.purgeOlderThan(actorOf(req), body.days ?? core.config.audit.retentionDays);
    res.json({ removed });
  }));

  return router;
}
