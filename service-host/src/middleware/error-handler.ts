/**
 * Maps errors raised by services onto JSON responses:
 * `{ error: { code, message, details? } }`.
 */

import { Request, Response, NextFunction } from 'express';
import { getLogger } from '../utils/logger.js';
import { PosError, toError } from '../utils/errors.js';

const logger = getLogger('Http');

/** body-parser reports malformed JSON as an error carrying `type` and `status`. */
function isBodyParseError(err: unknown): boolean {
  return typeof err === 'object'
    && err !== null
    && 'type' in err
    && err.type === 'entity.parse.failed';
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof PosError) {
    if (err.status >= 500) {
      logger.error('Request failed', err, { method: req.method, path: req.path, code: err.code });
    }
    res.status(err.status).json({
      error: { code: err.code, message: err.message, details: err.details },
    });
    return;
  }

  if (isBodyParseError(err)) {
    res.status(400).json({ error: { code: 'VALIDATION_ERROR', message: 'Malformed JSON body' } });
    return;
  }

  logger.error('Unhandled error', toError(err), { method: req.method, path: req.path });
  res.status(500).json({ error: { code: 'INTERNAL_ERROR', message: 'Internal server error' } });
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({ error: { code: 'NOT_FOUND', message: `No route for ${req.method} ${req.path}` } });
}
