import type { AppError, SerializedError } from "../ports/error"

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

function isAppErrorLike(err: Error): err is AppError {
  const candidate: Partial<Record<keyof AppError, unknown>> = err

  return (
    typeof candidate.code === "string" &&
    typeof candidate.context === "object" &&
    candidate.context !== null &&
    typeof candidate.isRetryable === "boolean" &&
    typeof candidate.isOperational === "boolean" &&
    candidate.timestamp instanceof Date
  )
}

/**
 * Serialize any thrown value to a consistent shape.
 *
 * - AppErrors keep their code, context and flags
 * - plain Errors get code `"unknown"` and are treated as non-operational
 * - anything else is reported as `NonErrorThrown` with the value in context
 */
export function serializeError(
  err: unknown,
  options?: SerializeOptions,
): SerializedError {
  const includeStack = options?.includeStack ?? false

  if (err instanceof Error) {
    const app = isAppErrorLike(err) ? err : undefined

    return {
      name: err.name,
      code: app?.code ?? "unknown",
      message: err.message,
      context: { ...app?.context },
      isRetryable: app?.isRetryable ?? false,
      isOperational: app?.isOperational ?? false,
      timestamp: (app?.timestamp ?? new Date()).toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
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
