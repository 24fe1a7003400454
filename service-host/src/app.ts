/**
 * Express application: health check, sign-in, then the authenticated API.
 */

import express from 'express';
import type { PosCore } from './core.js';
import { createAuthMiddleware, deviceIdOf } from './middleware/auth.js';
import { errorHandler, notFoundHandler } from './middleware/error-handler.js';
import { schemas, validateRequest } from './middleware/validation.js';
import { createApiRoutes } from './routes/api.js';

export const HOST_VERSION = '1.0.0';

export function createApp(core: PosCore): express.Application {
  const app = express();
  app.use(express.json({ limit: '100kb' }));

  // CORS for local terminals
  app.use((req, res, next) => {
    res.header('Access-Control-Allow-Origin', '*');
    res.header('Access-Control-Allow-Methods', 'GET, POST, PATCH, DELETE, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type, Authorization, X-Device-Id');
    if (req.method === 'OPTIONS') {
      res.sendStatus(200);
      return;
    }
    next();
  });

  // Health check (unauthenticated)
  app.get('/health', (req, res) => {
    res.json({
      status: 'ok',
      version: HOST_VERSION,
      uptime: process.uptime(),
      kitchen: core.kitchen.getWatermark(),
    });
  });

  // Sign-in is the one unauthenticated API call
  app.post('/api/session', (req, res, next) => {
    try {
      const body = validateRequest(schemas.login, req.body);
      const deviceId = deviceIdOf(req) || body.deviceId || '';
      const result = core.sessions.login(body.username, body.pin, deviceId, req.ip ?? '');
      res.status(201).json(result);
    } catch (e) {
      next(e);
    }
  });

  app.use('/api', createAuthMiddleware(core.sessions), createApiRoutes(core));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
