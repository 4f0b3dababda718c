export {
  ConfigError,
  type ConfigErrorOptions,
  type SerializeOptions,
  serializeError,
} from "./core/config-error"
export { createError } from "./core/utils/create-error"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
