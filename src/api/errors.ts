/**
 * Error classes raised by the LXD client and the reconciler
 *
 * A not-found answer on an instance lookup is not an error: the client
 * returns null and the reconciler treats the instance as absent.
 */

/**
 * Error codes for programmatic handling
 */
export type ControlPlaneErrorCode =
  | 'TRANSPORT_ERROR'
  | 'API_ERROR'
  | 'ADDRESS_TIMEOUT';

/**
 * Base class for every failure that aborts a reconciliation run
 */
export class ControlPlaneError extends Error {
  constructor(
    message: string,
    public readonly code: ControlPlaneErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ControlPlaneError';
  }
}

/**
 * Connectivity, TLS or socket failure before the server produced an answer
 */
export class TransportError extends ControlPlaneError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'TRANSPORT_ERROR', options);
    this.name = 'TransportError';
  }
}

/**
 * The server rejected a request or an operation failed
 */
export class ApiError extends ControlPlaneError {
  public readonly status: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    status: number,
    options?: { details?: Record<string, unknown>; cause?: unknown }
  ) {
    super(message, 'API_ERROR', options);
    this.name = 'ApiError';
    this.status = status;
    this.details = options?.details;
  }

  isNotFound(): boolean {
    return this.status === 404;
  }

  isServerError(): boolean {
    return this.status >= 500;
  }
}

/**
 * Instance network interfaces did not all report an IPv4 address in time
 */
export class AddressTimeoutError extends ControlPlaneError {
  constructor(
    public readonly timeoutSeconds: number,
    options?: { cause?: unknown }
  ) {
    super('timeout waiting for addresses', 'ADDRESS_TIMEOUT', options);
    this.name = 'AddressTimeoutError';
  }
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
