import { ConfigError, type ErrorContext } from "@confkit/errors"

export type ParseOptionsErrorCode = "invalid_argument" | "invalid_settings"

/**
 * A call site broke a precondition. Fix the caller, do not retry.
 */
export class InvalidArgumentError extends ConfigError<"invalid_argument"> {
  constructor(message: string, context?: ErrorContext) {
    super(message, { code: "invalid_argument", context, isOperational: false })
  }
}
