/**
 * Error types rendered by @middy/http-error-handler (statusCode + expose).
 */

export class HttpError extends Error {
  readonly expose = true;

  constructor(readonly statusCode: number, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Reference does not map to any registration. */
export class ReferenceResolutionError extends HttpError {
  constructor(readonly reference: string) {
    super(404, `No registration found for reference: ${reference}`);
  }
}

export class RegistrationNotFoundError extends HttpError {
  constructor(readonly registrationId: string) {
    super(404, 'Registration not found');
  }
}

/** Network failure, non-2xx, or a reported unsuccessful transaction. Safe to retry. */
export class GatewayError extends HttpError {
  constructor(message: string, readonly gatewayStatus?: number) {
    super(502, message);
  }
}

export class ValidationError extends HttpError {
  constructor(message: string, readonly details?: unknown) {
    super(400, message);
  }
}

export class ConflictError extends HttpError {
  constructor(message: string) {
    super(409, message);
  }
}

export class UnauthorizedError extends HttpError {
  constructor(message = 'Unauthorized') {
    super(401, message);
  }
}

export class ServiceUnavailableError extends HttpError {
  constructor(message: string) {
    super(503, message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
