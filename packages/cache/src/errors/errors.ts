import type { CacheKey } from "../ports/cache-key"
import { CacheError } from "./cache-error"

/**
 * A composite cache key that cannot be turned into canonical text.
 */
export class InvalidKeyError extends CacheError<"invalid_key"> {
  constructor(reason: string, cause?: unknown) {
    super(`Invalid cache key: ${reason}`, {
      code: "invalid_key",
      context: { reason },
      ...(cause !== undefined && { cause }),
    })
  }
}

/**
 * Facade or environment configuration that cannot be accepted.
 */
export class InvalidConfigurationError extends CacheError<"invalid_configuration"> {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, {
      code: "invalid_configuration",
      ...(context !== undefined && { context }),
    })
  }
}

/**
 * `getOrSet` computed a value but the backend refused to store it.
 *
 * @remarks
 * The computed value is kept on the error, so a caller may still use it.
 */
export class SetFailedError<T = unknown, TCache = unknown> extends CacheError<"set_failed"> {
  constructor(
    readonly key: CacheKey,
    readonly value: T,
    readonly cache: TCache,
  ) {
    super("Failed to store the computed value in cache", {
      code: "set_failed",
      context: { key },
    })
  }
}
