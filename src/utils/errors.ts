/**
 * Base class for failures raised by the dispatch core.
 * `status` is the HTTP status the transport answers with.
 */
export class DispatchError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly status: number = 500,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'DispatchError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Unknown rider, driver or ride id (404)
 */
export class NotFoundError extends DispatchError {
  constructor(resource: string, id: string) {
    super(`${resource} not found: ${id}`, 'NOT_FOUND', 404, { resource, id });
    this.name = 'NotFoundError';
  }
}

/**
 * Malformed request or illegal operation on current state (400)
 */
export class InvalidInputError extends DispatchError {
  constructor(message: string, details?: unknown) {
    super(message, 'INVALID_INPUT', 400, details);
    this.name = 'InvalidInputError';
  }
}

/**
 * Pricing or service parameters out of bounds, rejected at construction (400)
 */
export class InvalidConfigError extends DispatchError {
  constructor(message: string, details?: unknown) {
    super(message, 'INVALID_CONFIG', 400, details);
    this.name = 'InvalidConfigError';
  }
}
