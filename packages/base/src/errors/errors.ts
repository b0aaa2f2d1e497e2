import { ClientError } from "./client-error"

export type ValidationIssue = { path: string; message: string }

export class InvalidArgumentError extends ClientError<"invalid_argument" | "invalid_type"> {
  static emptyKey(parameter: string = "key"): InvalidArgumentError {
    return new InvalidArgumentError(`parameter '${parameter}' must be a non-empty string`, {
      code: "invalid_argument",
      context: { parameter },
    })
  }

  static malformedKey(parameter: string = "key"): InvalidArgumentError {
    return new InvalidArgumentError(
      `parameter '${parameter}' must be well-formed Unicode (no lone surrogates)`,
      { code: "invalid_argument", context: { parameter } },
    )
  }

  static conflictingExpiry(): InvalidArgumentError {
    return new InvalidArgumentError(
      "'expireIn' and 'expireAt' are mutually exclusive parameters",
      { code: "invalid_argument", context: { parameters: ["expireIn", "expireAt"] } },
    )
  }

  static invalidExpireAt(received: string): InvalidArgumentError {
    return new InvalidArgumentError("'expireAt' must be a finite number or a valid Date", {
      code: "invalid_type",
      context: { parameter: "expireAt", received },
    })
  }

  static invalidExpireIn(received: string): InvalidArgumentError {
    return new InvalidArgumentError("'expireIn' must be a finite number of seconds", {
      code: "invalid_type",
      context: { parameter: "expireIn", received },
    })
  }

  static batchTooLarge(size: number, max: number): InvalidArgumentError {
    return new InvalidArgumentError(`cannot put more than ${max} items at a time`, {
      code: "invalid_argument",
      context: { size, max },
    })
  }

  static duplicateKey(key: string): InvalidArgumentError {
    return new InvalidArgumentError(`key '${key}' appears more than once in the batch`, {
      code: "invalid_argument",
      context: { key },
    })
  }

  static invalidLimit(limit: number): InvalidArgumentError {
    return new InvalidArgumentError("parameter 'limit' must be a positive integer", {
      code: "invalid_argument",
      context: { limit },
    })
  }

  static fromIssues(subject: string, issues: ValidationIssue[]): InvalidArgumentError {
    const first = issues[0]
    const detail = first ? `${first.path || "(root)"}: ${first.message}` : "invalid input"

    return new InvalidArgumentError(`invalid ${subject}: ${detail}`, {
      code: "invalid_argument",
      context: { issues },
    })
  }
}

export class NotFoundError extends ClientError<"not_found"> {
  readonly key: string

  constructor(key: string) {
    super(`key '${key}' not found`, { code: "not_found", context: { key } })
    this.key = key
  }
}

export class AlreadyExistsError extends ClientError<"already_exists"> {
  readonly key: string

  constructor(key: string) {
    super(`item with key '${key}' already exists`, {
      code: "already_exists",
      context: { key },
    })
    this.key = key
  }
}

export class RequestFailedError extends ClientError<"request_failed" | "invalid_response"> {
  readonly status: number
  readonly body: unknown

  private constructor(
    message: string,
    code: "request_failed" | "invalid_response",
    status: number,
    body: unknown,
    context: Record<string, unknown>,
  ) {
    super(message, {
      code,
      context: { ...context, status, body },
      isRetryable: code === "request_failed" && (status === 429 || status >= 500),
    })
    this.status = status
    this.body = body
  }

  /** Non-success status the operation does not special-case. */
  static fromStatus(
    operation: string,
    status: number,
    body: unknown,
    context: Record<string, unknown> = {},
  ): RequestFailedError {
    return new RequestFailedError(
      `${operation} failed with status ${status}`,
      "request_failed",
      status,
      body,
      { ...context, operation },
    )
  }

  /** Success status whose body does not match the wire contract. */
  static invalidResponse(
    operation: string,
    status: number,
    body: unknown,
    issues: ValidationIssue[],
  ): RequestFailedError {
    return new RequestFailedError(
      `${operation} returned an unexpected response body`,
      "invalid_response",
      status,
      body,
      { operation, issues },
    )
  }
}

export class TransportError extends ClientError<"transport_error"> {
  static requestFailed(method: string, path: string, cause: unknown): TransportError {
    const reason = cause instanceof Error ? cause.message : String(cause)

    return new TransportError(`${method} ${path} could not be completed: ${reason}`, {
      code: "transport_error",
      context: { method, path },
      cause,
      isRetryable: true,
    })
  }
}
