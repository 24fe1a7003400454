/**
 * Audit Trail
 *
 * Write-once log of every state-changing action, keyed by actor and device.
 * Entries are written inside the caller's transaction through a savepoint:
 * if the audit insert fails, only the savepoint rolls back, the failure is
 * logged, and the business operation carries on. The only removal path is
 * the administrative retention purge.
 */

import { Database } from '../db/database.js';
import { getLogger } from '../utils/logger.js';
import { toError, ValidationError } from '../utils/errors.js';
import { ActorContext, requires } from './access.js';

const logger = getLogger('Audit');

export const AuditAction = {
  LOGIN: 'login',
  LOGOUT: 'logout',
  ORDER_CREATE: 'order_create',
  ORDER_MODIFY: 'order_modify',
  ORDER_CANCEL: 'order_cancel',
  PAYMENT_PROCESS: 'payment_process',
  STOCK_ADJUST: 'stock_adjust',
  PRICE_CHANGE: 'price_change',
  USER_ACTION: 'user_action',
} as const;

export type AuditAction = (typeof AuditAction)[keyof typeof AuditAction];

export const AUDIT_ACTIONS: readonly AuditAction[] = Object.values(AuditAction);

export function isAuditAction(value: string): value is AuditAction {
  return AUDIT_ACTIONS.some(action => action === value);
}

export class AuditTrail {
  private db: Database;
  private now: () => Date;

  constructor(db: Database, options: { now?: () => Date } = {}) {
    this.db = db;
    this.now = options.now ?? (() => new Date());
  }

  /** Returns whether the entry was written. Never throws. */
  record(entry: AuditEntryInput): boolean {
    try {
      this.db.transaction(() => {
        this.db.run(
          `INSERT INTO audit_logs (user_id, action_type, table_name, record_id, description, device_id, ip_address, metadata, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
          [
            entry.userId,
            entry.actionType,
            entry.tableName ?? '',
            entry.recordId ?? '',
            entry.description,
            entry.deviceId ?? '',
            entry.ip ?? '',
            JSON.stringify(entry.metadata ?? {}),
            this.now().toISOString(),
          ]
        );
      });
      return true;
    } catch (error) {
      logger.error('Audit write failed', toError(error), {
        actionType: entry.actionType,
        recordId: entry.recordId,
      });
      return false;
    }
  }

  /** Convenience for the common case of an actor acting on a record. */
  recordFor(ctx: ActorContext, actionType: AuditAction, description: string, target: AuditTarget = {}): boolean {
    return this.record({
      userId: ctx.user.id,
      actionType,
      description,
      tableName: target.tableName,
      recordId: target.recordId,
      deviceId: ctx.deviceId,
      ip: ctx.ip,
      metadata: target.metadata,
    });
  }

  list(ctx: ActorContext, filters: AuditFilters = {}): AuditLogEntry[] {
    requires(ctx.user, 'AUDIT');

    const conditions: string[] = [];
    const params: (string | number)[] = [];

    if (filters.userId) {
      conditions.push('user_id = ?');
      params.push(filters.userId);
    }
    if (filters.actionType) {
      conditions.push('action_type = ?');
      params.push(filters.actionType);
    }
    if (filters.from) {
      conditions.push('created_at >= ?');
      params.push(filters.from);
    }
    if (filters.to) {
      conditions.push('created_at < ?');
      params.push(filters.to);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    params.push(filters.limit ?? 100);

    const rows = this.db.all<AuditLogRow>(
      `SELECT * FROM audit_logs ${where} ORDER BY id DESC LIMIT ?`,
      params
    );
    return rows.map(mapAuditRow);
  }

  /**
   * Administrative retention purge: removes entries older than `days`.
   * The purge itself is audited after the window closes.
   */
  purgeOlderThan(ctx: ActorContext, days: number): number {
    requires(ctx.user, 'AUDIT');
    if (!Number.isInteger(days) || days < 1) {
      throw new ValidationError('Retention must be a whole number of days, at least 1', { days });
    }

    const cutoff = new Date(this.now().getTime() - days * 24 * 60 * 60 * 1000).toISOString();

    const removed = this.db.transaction(() => {
      this.db.run('INSERT INTO audit_purge_window (cutoff) VALUES (?)', [cutoff]);
      const result = this.db.run('DELETE FROM audit_logs WHERE created_at < ?', [cutoff]);
      this.db.run('DELETE FROM audit_purge_window');
      return result.changes;
    });

    logger.info('Audit retention purge', { cutoff, removed });
    this.recordFor(ctx, AuditAction.USER_ACTION, `Purged ${removed} audit entries older than ${days} days`, {
      tableName: 'audit_logs',
      metadata: { cutoff, removed, days },
    });
    return removed;
  }
}

function mapAuditRow(row: AuditLogRow): AuditLogEntry {
  return {
    id: row.id,
    userId: row.user_id,
    actionType: isAuditAction(row.action_type) ? row.action_type : AuditAction.USER_ACTION,
    tableName: row.table_name,
    recordId: row.record_id,
    description: row.description,
    deviceId: row.device_id,
    ipAddress: row.ip_address,
    metadata: parseMetadata(row.metadata),
    createdAt: row.created_at,
  };
}

function parseMetadata(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      return { ...parsed };
    }
  } catch (error) {
    logger.warn('Unreadable audit metadata', { error: toError(error).message });
  }
  return {};
}

interface AuditEntryInput {
  userId: string | null;
  actionType: AuditAction;
  description: string;
  tableName?: string;
  recordId?: string;
  deviceId?: string;
  ip?: string;
  metadata?: Record<string, unknown>;
}

interface AuditTarget {
  tableName?: string;
  recordId?: string;
  metadata?: Record<string, unknown>;
}

interface AuditFilters {
  userId?: string;
  actionType?: AuditAction;
  from?: string;
  to?: string;
  limit?: number;
}

interface AuditLogEntry {
  id: number;
  userId: string | null;
  actionType: AuditAction;
  tableName: string;
  recordId: string;
  description: string;
  deviceId: string;
  ipAddress: string;
  metadata: Record<string, unknown>;
  createdAt: string;
}

interface AuditLogRow {
  id: number;
  user_id: string | null;
  action_type: string;
  table_name: string;
  record_id: string;
  description: string;
  device_id: string;
  ip_address: string;
  metadata: string;
  created_at: string;
}

export type { AuditEntryInput, AuditTarget, AuditFilters, AuditLogEntry };
