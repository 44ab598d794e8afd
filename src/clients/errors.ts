/**
 * Failures raised by AssistantClient
 *
 * Every failure extends AssistantError so the router can tell backend
 * failures apart from its own validation errors.
 */

export abstract class AssistantError extends Error {
  abstract readonly code: 'transport' | 'not_found' | 'api' | 'decode';

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Connection, TLS, DNS or deadline failure, or a body that could not be read
 */
export class TransportError extends AssistantError {
  override readonly code = 'transport';

  constructor(cause: unknown) {
    super(`HTTP request error: ${describeCause(cause)}`, { cause });
  }
}

/**
 * HTTP 404 for the named resource
 */
export class NotFoundError extends AssistantError {
  override readonly code = 'not_found';

  constructor(readonly resource: string) {
    super(`API error: ${resource} not found`);
  }
}

/**
 * Any other non-2xx status. `body` is the raw response text.
 */
export class ApiError extends AssistantError {
  override readonly code = 'api';

  constructor(
    readonly status: number,
    readonly body: string
  ) {
    super(`API error: ${status} - ${body}`);
  }
}

/**
 * 2xx response whose body is not JSON or not shaped like a context response
 */
export class DecodeError extends AssistantError {
  override readonly code = 'decode';

  constructor(detail: string, options?: ErrorOptions) {
    super(`JSON deserialization error: ${detail}`, options);
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    // fetch wraps the socket error; surface the underlying reason when present
    if (cause.cause instanceof Error && cause.cause.message) {
      return `${cause.message} (${cause.cause.message})`;
    }
    return cause.message;
  }
  return String(cause);
}
