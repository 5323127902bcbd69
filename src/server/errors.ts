/**
 * Errors that reach the HTTP caller. Sink failures never become one of these.
 */
export class GatewayError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(status: number, code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
  }
}

export class ModelUnavailableError extends GatewayError {
  constructor(message = 'Model not available') {
    super(503, 'model_unavailable', message);
  }
}

export class InvalidInputError extends GatewayError {
  constructor(message: string) {
    super(400, 'invalid_input', message);
  }
}

export class InferenceFailedError extends GatewayError {
  readonly detail: string;

  constructor(detail: string) {
    super(500, 'inference_failed', `Prediction failed: ${detail}`);
    this.detail = detail;
  }
}

export class NotFoundError extends GatewayError {
  constructor(message = 'Feedback record not found') {
    super(404, 'not_found', message);
  }
}

export class ConsentDeniedError extends GatewayError {
  constructor(message = 'RGPD consent not given. Feedback cannot be stored.') {
    super(403, 'consent_denied', message);
  }
}

export class StoreFailureError extends GatewayError {
  constructor(action: string, cause: unknown) {
    super(500, 'store_failure', `${action}: ${errorMessage(cause)}`);
  }
}

export class UnauthorizedError extends GatewayError {
  constructor(message = 'Missing or invalid API token') {
    super(401, 'unauthorized', message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs a metrics or alert update. A failure is logged and dropped so it never
 * reaches the request that triggered it.
 */
export function isolateSinkFailure(sink: 'Metrics' | 'Alerts', action: string, update: () => void): void {
  try {
    update();
  } catch (error) {
    console.error(`[${sink}] ${action} failed: ${errorMessage(error)}`);
  }
}
