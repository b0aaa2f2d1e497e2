export {
  ClientError,
  type ClientErrorCode,
  type ErrorContext,
  isClientError,
  type SerializedClientError,
} from "./client-error"
export {
  AlreadyExistsError,
  InvalidArgumentError,
  NotFoundError,
  RequestFailedError,
  TransportError,
  type ValidationIssue,
} from "./errors"
