export { ErrorCode, type ErrorCodeValue } from "./error-codes.js";
import type { ErrorCodeValue } from "./error-codes.js";

/**
 * Thrown for configuration and usage errors, and used as the structured shape
 * of delivery diagnostics.
 *
 * `status` mirrors HTTP semantics: 400 for anything the caller got wrong, the
 * intake's own response status when a batch was rejected.
 *
 * @example
 * throw new TeleflushError(ErrorCode.CONFIG.NO_SERVICE, "A service name must be set", 400, {
 *   variable: "DD_SERVICE",
 * });
 */
export class TeleflushError extends Error {
  constructor(
    public readonly code: ErrorCodeValue,
    message: string,
    public readonly status: number,
    public readonly metadata?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "TeleflushError";
  }

  /** Plain-object form; `metadata` is left out when there is none. */
  toJSON() {
    return {
      code: this.code,
      message: this.message,
      status: this.status,
      ...(this.metadata ? { metadata: this.metadata } : {}),
    };
  }
}

export function isTeleflushError(err: unknown): err is TeleflushError {
  return err instanceof TeleflushError;
}
