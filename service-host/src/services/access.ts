/**
 * Roles, actor context and the capability check every service runs once at
 * its boundary.
 */

import { AccessDenied } from '../utils/errors.js';

export const Role = {
  ADMIN: 'admin',
  CASHIER: 'cashier',
  WAITER: 'waiter',
  KITCHEN: 'kitchen',
} as const;

export type Role = (typeof Role)[keyof typeof Role];

export const ROLES: readonly Role[] = Object.values(Role);

export function isRole(value: string): value is Role {
  return ROLES.some(role => role === value);
}

export const Capability = {
  ORDER_READ: [Role.ADMIN, Role.WAITER, Role.CASHIER, Role.KITCHEN],
  ORDER_WRITE: [Role.ADMIN, Role.WAITER],
  KITCHEN: [Role.ADMIN, Role.KITCHEN],
  PAYMENT: [Role.ADMIN, Role.CASHIER],
  SHIFT: [Role.ADMIN, Role.CASHIER],
  INVENTORY: [Role.ADMIN],
  CATALOG: [Role.ADMIN],
  REPORTS: [Role.ADMIN],
  AUDIT: [Role.ADMIN],
} as const satisfies Record<string, readonly Role[]>;

export type Capability = keyof typeof Capability;

export interface Actor {
  id: string;
  username: string;
  role: Role;
}

/** Who is acting, from which terminal. Supplied by the session layer. */
export interface ActorContext {
  user: Actor;
  deviceId: string;
  ip?: string;
}

export function requires(actor: Actor, capability: Capability): void {
  const allowed: readonly Role[] = Capability[capability];
  if (!allowed.includes(actor.role)) {
    throw new AccessDenied(
      `Role ${actor.role} lacks ${capability.toLowerCase()} capability`,
      'ROLE_DENIED',
      { role: actor.role, capability }
    );
  }
}

export function isAdmin(actor: Actor): boolean {
  return actor.role === Role.ADMIN;
}
