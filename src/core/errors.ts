/**
 * Error hierarchy. Provider failures are split by how the forwarder treats them:
 * throttles and transient errors are retried, permanent ones are not.
 */

export class SwitchboardError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "SwitchboardError";
  }
}

export class ConfigError extends SwitchboardError {
  constructor(message: string, context?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, "CONFIG_ERROR", context, options);
    this.name = "ConfigError";
  }
}

/** Provider asked the caller to wait before trying again. */
export class ThrottleError extends SwitchboardError {
  constructor(
    public readonly retryAfterSec: number,
    context?: Record<string, unknown>,
    options?: ErrorOptions
  ) {
    super(`Provider throttled, retry after ${retryAfterSec}s`, "THROTTLED", { retryAfterSec, ...context }, options);
    this.name = "ThrottleError";
  }
}

export class TransientError extends SwitchboardError {
  constructor(message: string, context?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, "TRANSIENT", context, options);
    this.name = "TransientError";
  }
}

/** Destination cannot receive the message (unknown chat, bot blocked, ...). */
export class PermanentError extends SwitchboardError {
  constructor(message: string, context?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, "PERMANENT", context, options);
    this.name = "PermanentError";
  }
}

export class DeliveryFailedError extends SwitchboardError {
  constructor(
    public readonly destination: number,
    public readonly attempts: number,
    options?: ErrorOptions
  ) {
    super(
      `Delivery to ${destination} failed after ${attempts} attempt(s)`,
      "DELIVERY_FAILED",
      { destination, attempts },
      options
    );
    this.name = "DeliveryFailedError";
  }
}

export class PersistenceError extends SwitchboardError {
  constructor(
    public readonly operation: string,
    public readonly userId: number,
    options?: ErrorOptions
  ) {
    super(`Persistence failed during ${operation} for user ${userId}`, "PERSISTENCE_FAILED", { operation, userId }, options);
    this.name = "PersistenceError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
