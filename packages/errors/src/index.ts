export { AppError } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  ValidationError,
  NotFoundError,
  TransientError,
  ExternalServiceError,
  AuthExpiredError,
  PermanentError,
  InternalError,
} from "./errors.js";

export {
  classifyError,
  classifyHttpStatus,
  errorForStatus,
  errorFromResponse,
  errorMessage,
  toAppError,
} from "./classify.js";

export { createCircuitBreaker } from "./circuit-breaker.js";
export type { CircuitBreakerOptions } from "./circuit-breaker.js";

export { withRetry, calculateDelay, sleep, DEFAULT_RETRY_POLICY } from "./retry.js";
export type { RetryOptions } from "./retry.js";
