export type ErrorCode = Lowercase<string>

/**
 * Structured data attached to an error instead of being formatted into the
 * message.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isRetryable?: boolean
  isOperational?: boolean
}>

/**
 * JSON-safe shape of an error, for logs and transport.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  isRetryable: boolean
  isOperational: boolean
  timestamp: string
  cause?: SerializedError
  stack?: string
}>

export class BaseError<C extends ErrorCode = ErrorCode> extends Error {
  readonly code: C
  readonly context: ErrorContext

  /** `true` when the same call may succeed if made again. */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (bad input, unreachable endpoint),
   * `false` for broken invariants.
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  constructor(message: string, options: BaseErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = new.target.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isRetryable = options.isRetryable ?? false
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    Error.captureStackTrace?.(this, new.target)
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

export type SerializeOptions = Readonly<{
  /** Include stack traces. Default: false */
  includeStack?: boolean
}>

/**
 * Serialize any thrown value, following `cause` links.
 *
 * Errors that are not a BaseError get code "unknown" and are marked
 * non-operational.
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  const includeStack = options?.includeStack ?? false

  if (err instanceof BaseError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      isRetryable: err.isRetryable,
      isOperational: err.isOperational,
      timestamp: err.timestamp.toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack !== undefined && { stack: err.stack }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: errnoContext(err),
      isRetryable: false,
      isOperational: false,
      timestamp: new Date().toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack !== undefined && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: typeof err === "string" ? {} : { value: err },
    isRetryable: false,
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}

// Socket failures carry their reason in `code` (ECONNREFUSED, ENOTFOUND...).
function errnoContext(err: Error): Record<string, unknown> {
  return "code" in err && typeof err.code === "string" ? { code: err.code } : {}
}
