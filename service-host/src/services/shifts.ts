/**
 * Shift Reconciliation
 *
 * One open shift per user (also enforced by a partial unique index). Closing
 * a shift compares the counted drawer against opening cash plus the cash
 * payments the user took since the shift started.
 */

import { randomUUID } from 'crypto';
import { Database } from '../db/database.js';
import { getLogger } from '../utils/logger.js';
import { NotFound, StateConflict, ValidationError } from '../utils/errors.js';
import { ActorContext, requires } from './access.js';
import { AuditAction, AuditTrail } from './audit.js';
import { NotificationBus } from './notifications.js';
import { PaymentMethod } from './payments.js';

const logger = getLogger('Shifts');

export interface ShiftServiceOptions {
  now?: () => Date;
  /** Absolute variance, in minor units, above which the close is flagged. */
  varianceThreshold?: number;
}

export class ShiftService {
  private db: Database;
  private audit: AuditTrail;
  private notifications: NotificationBus;
  private now: () => Date;
  private varianceThreshold: number;

  constructor(db: Database, audit: AuditTrail, notifications: NotificationBus, options: ShiftServiceOptions = {}) {
    this.db = db;
    this.audit = audit;
    this.notifications = notifications;
    this.now = options.now ?? (() => new Date());
    this.varianceThreshold = options.varianceThreshold ?? 10;
  }

  startShift(ctx: ActorContext, openingCash: number): Shift {
    requires(ctx.user, 'SHIFT');
    assertCashAmount(openingCash, 'Opening cash');

    return this.db.transaction(() => {
      const open = this.findOpenShift(ctx.user.id);
      if (open) {
        throw new StateConflict('A shift is already open for this user', { shiftId: open.id }, 'SHIFT_ALREADY_OPEN');
      }

      const id = randomUUID();
      const startedAt = this.now().toISOString();
      this.db.run(
        `INSERT INTO shifts (id, user_id, device_id, opening_cash, started_at)
         VALUES (?, ?, ?, ?, ?)`,
        [id, ctx.user.id, ctx.deviceId, openingCash, startedAt]
      );
      this.db.run('UPDATE users SET is_active_shift = 1 WHERE id = ?', [ctx.user.id]);

      this.audit.recordFor(ctx, AuditAction.USER_ACTION, `Started shift with ${openingCash} opening cash`, {
        tableName: 'shifts',
        recordId: id,
        metadata: { openingCash },
      });

      logger.info('Shift started', { userId: ctx.user.id, deviceId: ctx.deviceId, openingCash });
      return this.requireShift(id);
    });
  }

  endShift(ctx: ActorContext, closingCash: number): ShiftClose {
    requires(ctx.user, 'SHIFT');
    assertCashAmount(closingCash, 'Closing cash');

    const result = this.db.transaction((): ShiftClose => {
      const open = this.findOpenShift(ctx.user.id);
      if (!open) {
        throw new StateConflict('No open shift for this user', { userId: ctx.user.id }, 'NO_OPEN_SHIFT');
      }

      const cashTaken = this.cashTakenSince(ctx.user.id, open.started_at);
      const expectedCash = open.opening_cash + cashTaken;
      const variance = closingCash - expectedCash;
      const varianceExceeded = Math.abs(variance) > this.varianceThreshold;
      const endedAt = this.now().toISOString();

      this.db.run(
        `UPDATE shifts SET closing_cash = ?, expected_cash = ?, variance = ?, ended_at = ?
         WHERE id = ?`,
        [closingCash, expectedCash, variance, endedAt, open.id]
      );
      this.db.run('UPDATE users SET is_active_shift = 0 WHERE id = ?', [ctx.user.id]);

      this.audit.recordFor(ctx, AuditAction.USER_ACTION, `Ended shift: expected ${expectedCash}, counted ${closingCash}`, {
        tableName: 'shifts',
        recordId: open.id,
        metadata: { openingCash: open.opening_cash, cashTaken, expectedCash, closingCash, variance, varianceExceeded },
      });

      if (varianceExceeded) {
        this.db.afterCommit(() => this.notifications.emit('cash_variance', {
          shiftId: open.id,
          userId: ctx.user.id,
          expectedCash,
          closingCash,
          variance,
          threshold: this.varianceThreshold,
        }));
      }

      return {
        shift: this.requireShift(open.id),
        cashTaken,
        expectedCash,
        variance,
        varianceExceeded,
      };
    });

    if (result.varianceExceeded) {
      logger.warn('Cash variance above threshold', {
        userId: ctx.user.id,
        variance: result.variance,
        threshold: this.varianceThreshold,
      });
    } else {
      logger.info('Shift ended', { userId: ctx.user.id, variance: result.variance });
    }
    return result;
  }

  getActiveShift(userId: string): Shift | null {
    const row = this.findOpenShift(userId);
    return row ? mapShiftRow(row) : null;
  }

  /** Running totals for the user's open shift, for the cashier screen. */
  getShiftSummary(ctx: ActorContext): ShiftSummary | null {
    requires(ctx.user, 'SHIFT');
    const open = this.findOpenShift(ctx.user.id);
    if (!open) return null;

    const totals = this.db.all<{ method: string; count: number; amount: number }>(
      `SELECT method, COUNT(*) AS count, SUM(amount) AS amount FROM payments
       WHERE processed_by = ? AND processed_at >= ?
       GROUP BY method ORDER BY method`,
      [ctx.user.id, open.started_at]
    );
    const cashTaken = totals.find(t => t.method === PaymentMethod.CASH)?.amount ?? 0;

    return {
      shift: mapShiftRow(open),
      payments: totals,
      expectedCash: open.opening_cash + cashTaken,
    };
  }

  private cashTakenSince(userId: string, startedAt: string): number {
    const row = this.db.get<{ total: number | null }>(
      `SELECT SUM(amount) AS total FROM payments
       WHERE processed_by = ? AND method = ? AND processed_at >= ?`,
      [userId, PaymentMethod.CASH, startedAt]
    );
    return row?.total ?? 0;
  }

  private findOpenShift(userId: string): ShiftRow | undefined {
    return this.db.get<ShiftRow>('SELECT * FROM shifts WHERE user_id = ? AND ended_at IS NULL', [userId]);
  }

  private requireShift(id: string): Shift {
    const row = this.db.get<ShiftRow>('SELECT * FROM shifts WHERE id = ?', [id]);
    if (!row) {
      throw new NotFound('Shift', id);
    }
    return mapShiftRow(row);
  }
}

function assertCashAmount(amount: number, label: string): void {
  if (!Number.isInteger(amount) || amount < 0) {
    throw new ValidationError(`${label} must be a non-negative whole number of minor units`, { amount });
  }
}

function mapShiftRow(row: ShiftRow): Shift {
  return {
    id: row.id,
    userId: row.user_id,
    deviceId: row.device_id,
    openingCash: row.opening_cash,
    closingCash: row.closing_cash,
    expectedCash: row.expected_cash,
    variance: row.variance,
    startedAt: row.started_at,
    endedAt: row.ended_at,
  };
}

interface Shift {
  id: string;
  userId: string;
  deviceId: string;
  openingCash: number;
  closingCash: number | null;
  expectedCash: number | null;
  variance: number | null;
  startedAt: string;
  endedAt: string | null;
}

interface ShiftClose {
  shift: Shift;
  cashTaken: number;
  expectedCash: number;
  variance: number;
  varianceExceeded: boolean;
}

interface ShiftSummary {
  shift: Shift;
  payments: { method: string; count: number; amount: number }[];
  expectedCash: number;
}

interface ShiftRow {
  id: string;
  user_id: string;
  device_id: string;
  opening_cash: number;
  closing_cash: number | null;
  expected_cash: number | null;
  variance: number | null;
  started_at: string;
  ended_at: string | null;
}

export type { Shift, ShiftClose, ShiftSummary };
