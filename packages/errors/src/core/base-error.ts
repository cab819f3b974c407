import type { AppError, ErrorCode, ErrorContext, SerializedError } from "../ports/error"
import { DEFAULT_MAX_CHAIN_DEPTH, errorChain } from "./utils/error-chain"

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isRetryable?: boolean
  isOperational?: boolean
}>

export class BaseError<C extends ErrorCode = ErrorCode> extends Error implements AppError {
  readonly code: C
  readonly context: ErrorContext
  readonly isRetryable: boolean
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: BaseErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isRetryable = options.isRetryable ?? false
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean

  /** Maximum number of causes to follow. Default: 50 */
  maxDepth?: number
}>

/**
 * Serialize any error (or thrown value) to a consistent shape.
 *
 * The cause chain is followed through {@link errorChain}, so a cyclic chain
 * ends at the first repeated value instead of recursing forever.
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  const includeStack = options?.includeStack ?? false
  const chain = errorChain(err, options?.maxDepth ?? DEFAULT_MAX_CHAIN_DEPTH)

  let serialized: SerializedError | undefined

  for (let i = chain.length - 1; i >= 0; i--) {
    serialized = serializeOne(chain[i], serialized, includeStack)
  }

  return serialized ?? serializeOne(err, undefined, includeStack)
}

function serializeOne(
  err: unknown,
  cause: SerializedError | undefined,
  includeStack: boolean,
): SerializedError {
  if (err instanceof BaseError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      isOperational: err.isOperational,
      timestamp: err.timestamp.toISOString(),
      ...(cause !== undefined && { cause }),
      ...(includeStack && err.stack !== undefined && { stack: err.stack }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      isOperational: false,
      timestamp: new Date().toISOString(),
      ...(cause !== undefined && { cause }),
      ...(includeStack && err.stack !== undefined && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: { value: err },
    isOperational: false,
    timestamp: new Date().toISOString(),
    ...(cause !== undefined && { cause }),
  }
}
