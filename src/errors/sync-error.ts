/**
 * mediasync typed error hierarchy
 *
 * Structured error classes with machine-readable codes and optional context.
 */

export class MediaSyncError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'MediaSyncError';
    // Maintain proper prototype chain for instanceof checks in transpiled JS
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Network, DNS, timeout or 5xx failure. Transient: retried on the next poll. */
export class TransportUnavailableError extends MediaSyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'TRANSPORT_UNAVAILABLE', context);
    this.name = 'TransportUnavailableError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Credentials rejected. Fatal until reconfigured. */
export class AuthenticationRejectedError extends MediaSyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'AUTH_REJECTED', context);
    this.name = 'AuthenticationRejectedError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Payload did not match the expected shape. */
export class MalformedResponseError extends MediaSyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'MALFORMED_RESPONSE', context);
    this.name = 'MalformedResponseError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotConnectedError extends MediaSyncError {
  constructor(message = 'Push connection is not connected', context?: Record<string, unknown>) {
    super(message, 'NOT_CONNECTED', context);
    this.name = 'NotConnectedError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class QueueOverflowError extends MediaSyncError {
  constructor(
    message: string,
    public readonly dropped: number,
    context?: Record<string, unknown>
  ) {
    super(message, 'QUEUE_OVERFLOW', context);
    this.name = 'QueueOverflowError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigurationError extends MediaSyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotFoundError extends MediaSyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'NOT_FOUND', context);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
