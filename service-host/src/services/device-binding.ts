/**
 * Device binding: ties each non-admin user to the one terminal they first
 * signed in from. Rebinding is an administrative reset (CatalogService).
 */

import { Database } from '../db/database.js';
import { getLogger } from '../utils/logger.js';
import { AccessDenied, NotFound } from '../utils/errors.js';
import { Actor, Role } from './access.js';
import { AuditAction, AuditTrail } from './audit.js';

const logger = getLogger('DeviceBinding');

export type BindingStatus = 'exempt' | 'bound' | 'verified';

export class DeviceBinding {
  private db: Database;
  private audit: AuditTrail;

  constructor(db: Database, audit: AuditTrail) {
    this.db = db;
    this.audit = audit;
  }

  /**
   * Admins are exempt. A user with no stored device is bound to the presented
   * one; afterwards the presented device must match exactly.
   */
  bindOrVerify(user: Pick<Actor, 'id' | 'role'>, deviceId: string, ip: string = ''): BindingStatus {
    if (user.role === Role.ADMIN) {
      return 'exempt';
    }
    if (!deviceId) {
      throw new AccessDenied('A device identifier is required', 'DEVICE_REQUIRED');
    }

    return this.db.transaction((): BindingStatus => {
      const row = this.db.get<{ device_id: string | null }>('SELECT device_id FROM users WHERE id = ?', [user.id]);
      if (!row) {
        throw new NotFound('User', user.id);
      }

      if (row.device_id === null) {
        this.db.run('UPDATE users SET device_id = ? WHERE id = ? AND device_id IS NULL', [deviceId, user.id]);
        this.audit.record({
          userId: user.id,
          actionType: AuditAction.USER_ACTION,
          description: 'Bound user to device',
          tableName: 'users',
          recordId: user.id,
          deviceId,
          ip,
        });
        logger.info('User bound to device', { userId: user.id, deviceId });
        return 'bound';
      }

      if (row.device_id !== deviceId) {
        logger.warn('Device mismatch', { userId: user.id, presented: deviceId });
        throw new AccessDenied('This account is bound to another device', 'DEVICE_MISMATCH', { userId: user.id });
      }
      return 'verified';
    });
  }
}
