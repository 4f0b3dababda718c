import type { ErrorCode } from "../../ports/error"
import { ConfigError, type ConfigErrorOptions } from "../config-error"

/**
 * @example
 * ```ts
 * throw createError("invalid_settings", "SYNTAX must be one of json, conf, properties", {
 *   context: { source: "env" },
 * })
 * ```
 */
export function createError<C extends ErrorCode>(
  code: C,
  message: string,
  options?: Omit<ConfigErrorOptions<C>, "code">,
): ConfigError<C> {
  return new ConfigError(message, { code, ...options })
}
