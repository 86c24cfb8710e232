/**
 * Typed error catalog for handler composition and listener lifecycle failures.
 *
 * Every failure that aborts `serve` before or while binding is one of these.
 * Errors produced by a serve option or by the serving activity itself are
 * propagated as-is and never wrapped.
 */

export class GatehouseError extends Error {
  constructor(
    public readonly code: number,
    public readonly errorCode: string,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        code: this.code,
        errorCode: this.errorCode,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

// Composition

export class CompositionError extends GatehouseError {
  constructor(details?: Record<string, unknown>) {
    super(
      500,
      "COMPOSITION_FAILED",
      "Serve option did not return a mux",
      details,
    );
  }
}

// Address resolution and binding

export class AddressError extends GatehouseError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(400, "INVALID_ADDRESS", message, details);
  }
}

export class BindError extends GatehouseError {
  constructor(
    address: string,
    cause: unknown,
    details: Record<string, unknown> = {},
  ) {
    super(
      500,
      "BIND_FAILED",
      `Failed to listen on ${address}: ${describeCause(cause)}`,
      { address, ...details },
      { cause },
    );
  }
}

// Config store

export class PersistenceError extends GatehouseError {
  constructor(key: string, address: string, cause: unknown) {
    super(
      500,
      "PERSIST_FAILED",
      `Failed to record bound address ${address} under ${key}: ${describeCause(cause)}`,
      { key, address },
      { cause },
    );
  }
}

export class ConfigKeyError extends GatehouseError {
  constructor(key: string, reason: string) {
    super(400, "INVALID_CONFIG_KEY", `Config key ${key}: ${reason}`, { key });
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
