export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error (option names, source names, etc.).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode
  readonly context: ErrorContext

  /**
   * `false` for programmer errors such as a broken precondition at a call site,
   * `true` for failures caused by input the caller does not control.
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date
  readonly cause?: unknown
}

/**
 * JSON-safe error shape for logs and diagnostics.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
