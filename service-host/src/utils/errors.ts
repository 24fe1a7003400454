/**
 * Error taxonomy for the POS host.
 *
 * Services throw these; the HTTP error middleware maps `status` and `code`
 * onto the response. Anything else reaching the middleware is a 500.
 */

export type ErrorDetails = Record<string, unknown>;

export abstract class PosError extends Error {
  abstract readonly status: number;
  readonly code: string;
  readonly details?: ErrorDetails;

  constructor(message: string, code: string, details?: ErrorDetails) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/** Bad input: non-positive amount or quantity, missing reference, malformed body. */
export class ValidationError extends PosError {
  readonly status = 400;

  constructor(message: string, details?: ErrorDetails, code: string = 'VALIDATION_ERROR') {
    super(message, code, details);
  }
}

/** The entity is in the wrong state for the attempted transition. */
export class StateConflict extends PosError {
  readonly status = 409;

  constructor(message: string, details?: ErrorDetails, code: string = 'STATE_CONFLICT') {
    super(message, code, details);
  }
}

export class NotFound extends PosError {
  readonly status = 404;

  constructor(entity: string, id: string) {
    super(`${entity} not found: ${id}`, 'NOT_FOUND', { entity, id });
  }
}

/** Codes that mean "who are you?" rather than "you may not". */
const UNAUTHENTICATED_CODES: ReadonlySet<string> = new Set([
  'AUTH_REQUIRED',
  'INVALID_CREDENTIALS',
  'SESSION_INVALID',
  'SESSION_EXPIRED',
]);

/** Role, ownership, credential or device mismatch. */
export class AccessDenied extends PosError {
  readonly status: number;

  constructor(message: string, code: string = 'ACCESS_DENIED', details?: ErrorDetails) {
    super(message, code, details);
    this.status = UNAUTHENTICATED_CODES.has(code) ? 401 : 403;
  }
}

/** Attempt to alter a payment, stock movement, confirmed order item or audit entry. */
export class ImmutabilityViolation extends PosError {
  readonly status = 409;

  constructor(message: string, details?: ErrorDetails) {
    super(message, 'IMMUTABLE', details);
  }
}

export class PersistenceFailure extends PosError {
  readonly status = 500;

  constructor(message: string, details?: ErrorDetails) {
    super(message, 'PERSISTENCE_FAILURE', details);
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
