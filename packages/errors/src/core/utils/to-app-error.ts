import type { AppError, ErrorCode, ErrorContext } from "../../ports/error"
import { BaseError } from "../base-error"

export type ToAppErrorOptions = Readonly<{
  /** Extra context merged into wrapped errors. Ignored for BaseError inputs. */
  context?: ErrorContext
  isRetryable?: boolean
}>

/**
 * Convert any caught value into an AppError.
 *
 * BaseError instances pass through unchanged. Anything else is wrapped under
 * `fallbackCode`, keeping the original as `cause`.
 */
export function toAppError(
  err: unknown,
  fallbackCode: ErrorCode = "unknown",
  options: ToAppErrorOptions = {},
): AppError {
  if (err instanceof BaseError) {
    return err
  }

  if (err instanceof Error) {
    return new BaseError(err.message, {
      code: fallbackCode,
      cause: err,
      context: { ...options.context },
      isRetryable: options.isRetryable ?? false,
      isOperational: false,
    })
  }

  return new BaseError(typeof err === "string" ? err : "Unknown error", {
    code: fallbackCode,
    context: {
      ...options.context,
      ...(typeof err !== "string" && { value: err }),
    },
    isRetryable: options.isRetryable ?? false,
    isOperational: false,
  })
}
