export type ClientErrorCode =
  | "invalid_argument"
  | "invalid_type"
  | "not_found"
  | "already_exists"
  | "request_failed"
  | "invalid_response"
  | "transport_error"

/**
 * Contextual metadata attached to errors.
 * Carries structured data (keys, statuses, bodies) without string munging.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export type ClientErrorOptions<C extends ClientErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isRetryable?: boolean
}>

/**
 * JSON.stringify-safe shape of a {@link ClientError}.
 */
export type SerializedClientError = Readonly<{
  name: string
  code: ClientErrorCode
  message: string
  context: Record<string, unknown>
  isRetryable: boolean
  timestamp: string
}>

export class ClientError<C extends ClientErrorCode = ClientErrorCode> extends Error {
  /** Error code for programmatic handling */
  readonly code: C
  readonly context: ErrorContext
  /** `true` if repeating the same call might succeed */
  readonly isRetryable: boolean
  readonly timestamp: Date

  constructor(message: string, options: ClientErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isRetryable = options.isRetryable ?? false
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedClientError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: { ...this.context },
      isRetryable: this.isRetryable,
      timestamp: this.timestamp.toISOString(),
    }
  }
}

export function isClientError(err: unknown): err is ClientError {
  return err instanceof ClientError
}
