/**
 * PIN sign-in and bearer sessions for terminals.
 *
 * Every resolved request re-runs the device binding check, so a session
 * token copied to another terminal is refused there.
 */

import { createHash, randomBytes, timingSafeEqual } from 'crypto';
import { Database } from '../db/database.js';
import { getLogger } from '../utils/logger.js';
import { AccessDenied, ValidationError } from '../utils/errors.js';
import { Actor, ActorContext, isRole } from './access.js';
import { AuditAction, AuditTrail } from './audit.js';
import { BindingStatus, DeviceBinding } from './device-binding.js';

const logger = getLogger('Sessions');

export function hashPin(pin: string): string {
  return createHash('sha256').update(pin).digest('hex');
}

export function isValidPin(pin: string): boolean {
  return /^\d{4,8}$/.test(pin);
}

function pinMatches(pin: string, storedHash: string): boolean {
  const presented = Buffer.from(hashPin(pin), 'hex');
  const stored = Buffer.from(storedHash, 'hex');
  return presented.length === stored.length && timingSafeEqual(presented, stored);
}

export class SessionService {
  private db: Database;
  private binding: DeviceBinding;
  private audit: AuditTrail;
  private now: () => Date;
  private ttlMs: number;

  constructor(
    db: Database,
    binding: DeviceBinding,
    audit: AuditTrail,
    options: { now?: () => Date; ttlHours?: number } = {}
  ) {
    this.db = db;
    this.binding = binding;
    this.audit = audit;
    this.now = options.now ?? (() => new Date());
    this.ttlMs = (options.ttlHours ?? 12) * 60 * 60 * 1000;
  }

  login(username: string, pin: string, deviceId: string, ip: string = ''): LoginResult {
    if (!username || !pin) {
      throw new ValidationError('Username and PIN are required');
    }

    const row = this.db.get<UserAuthRow>(
      'SELECT id, username, role, pin_hash, is_active FROM users WHERE username = ?',
      [username]
    );
    if (!row || row.is_active !== 1 || !row.pin_hash || !pinMatches(pin, row.pin_hash) || !isRole(row.role)) {
      logger.warn('Failed sign-in', { username, deviceId });
      throw new AccessDenied('Invalid username or PIN', 'INVALID_CREDENTIALS');
    }

    const user: Actor = { id: row.id, username: row.username, role: row.role };
    const binding = this.binding.bindOrVerify(user, deviceId, ip);

    const token = randomBytes(32).toString('hex');
    const now = this.now();
    const expiresAt = new Date(now.getTime() + this.ttlMs).toISOString();

    this.db.transaction(() => {
      this.db.run(
        `INSERT INTO sessions (token, user_id, device_id, ip_address, created_at, expires_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
        [token, user.id, deviceId, ip, now.toISOString(), expiresAt]
      );
      this.audit.recordFor({ user, deviceId, ip }, AuditAction.LOGIN, `${user.username} signed in`, {
        tableName: 'sessions',
        recordId: user.id,
        metadata: { binding },
      });
    });

    logger.info('Signed in', { userId: user.id, role: user.role, deviceId });
    return { token, user, expiresAt, binding };
  }

  logout(ctx: ActorContext, token: string): void {
    this.db.transaction(() => {
      this.db.run('DELETE FROM sessions WHERE token = ?', [token]);
      this.audit.recordFor(ctx, AuditAction.LOGOUT, `${ctx.user.username} signed out`, {
        tableName: 'sessions',
        recordId: ctx.user.id,
      });
    });
  }

  /** Turns a bearer token presented from a device into the acting context. */
  resolve(token: string, deviceId: string, ip: string = ''): ActorContext {
    const row = this.db.get<SessionRow>(
      `SELECT s.token, s.expires_at, u.id, u.username, u.role, u.is_active
       FROM sessions s JOIN users u ON u.id = s.user_id
       WHERE s.token = ?`,
      [token]
    );
    if (!row) {
      throw new AccessDenied('Session not found', 'SESSION_INVALID');
    }
    if (row.expires_at <= this.now().toISOString()) {
      this.db.run('DELETE FROM sessions WHERE token = ?', [token]);
      throw new AccessDenied('Session expired', 'SESSION_EXPIRED');
    }
    if (row.is_active !== 1 || !isRole(row.role)) {
      throw new AccessDenied('Account disabled', 'ACCOUNT_DISABLED');
    }

    const user: Actor = { id: row.id, username: row.username, role: row.role };
    this.binding.bindOrVerify(user, deviceId, ip);
    return { user, deviceId, ip };
  }

  purgeExpired(): number {
    return this.db.run('DELETE FROM sessions WHERE expires_at <= ?', [this.now().toISOString()]).changes;
  }
}

interface LoginResult {
  token: string;
  user: Actor;
  expiresAt: string;
  binding: BindingStatus;
}

interface UserAuthRow {
  id: string;
  username: string;
  role: string;
  pin_hash: string | null;
  is_active: number;
}

interface SessionRow {
  token: string;
  expires_at: string;
  id: string;
  username: string;
  role: string;
  is_active: number;
}

export type { LoginResult };
