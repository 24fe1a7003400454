/**
 * Authentication Middleware
 *
 * Resolves the bearer session token and the terminal's device identifier
 * into the acting user. Device binding is re-checked on every request.
 */

import { Request, Response, NextFunction } from 'express';
import { AccessDenied } from '../utils/errors.js';
import type { ActorContext } from '../services/access.js';
import type { SessionService } from '../services/sessions.js';

export const DEVICE_HEADER = 'x-device-id';

export interface AuthenticatedRequest extends Request {
  actor?: ActorContext;
  sessionToken?: string;
}

export function bearerToken(req: Request): string | undefined {
  const authHeader = req.headers.authorization;
  if (authHeader?.startsWith('Bearer ')) {
    return authHeader.substring(7).trim() || undefined;
  }
  return undefined;
}

export function deviceIdOf(req: Request): string {
  const header = req.headers[DEVICE_HEADER];
  return typeof header === 'string' ? header.trim() : '';
}

export function createAuthMiddleware(sessions: SessionService) {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    const token = bearerToken(req);
    if (!token) {
      next(new AccessDenied('Authentication required', 'AUTH_REQUIRED'));
      return;
    }

    try {
      req.actor = sessions.resolve(token, deviceIdOf(req), req.ip ?? '');
      req.sessionToken = token;
      next();
    } catch (e) {
      next(e);
    }
  };
}

/** The acting context of a request that passed the auth middleware. */
export function actorOf(req: AuthenticatedRequest): ActorContext {
  if (!req.actor) {
    throw new AccessDenied('Authentication required', 'AUTH_REQUIRED');
  }
  return req.actor;
}
