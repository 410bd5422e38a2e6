import type { ErrorClass } from "@docrelay/types";
import { AppError } from "./app-error.js";
import { AuthExpiredError, InternalError, PermanentError, TransientError } from "./errors.js";

const TRANSIENT_ERROR_NAMES = new Set(["AbortError", "TimeoutError"]);

const TRANSIENT_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "EPIPE",
  "EAI_AGAIN",
  "ENOTFOUND",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_SOCKET",
  // opossum
  "EOPENBREAKER",
]);

function errorCode(error: object): string | undefined {
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Map any thrown value onto the error taxonomy.
 *
 * AppErrors carry their own class. Timeouts, aborted requests, socket-level failures
 * and an open circuit are transient. Everything else is internal.
 */
export function classifyError(error: unknown): ErrorClass {
  if (AppError.isAppError(error)) {
    return error.errorClass;
  }

  if (typeof error !== "object" || error === null) {
    return "internal";
  }

  if ("name" in error && typeof error.name === "string" && TRANSIENT_ERROR_NAMES.has(error.name)) {
    return "transient";
  }

  const code = errorCode(error);
  if (code !== undefined && TRANSIENT_ERROR_CODES.has(code)) {
    return "transient";
  }

  // undici wraps socket failures as `TypeError: fetch failed` with the real error in `cause`
  if (error instanceof TypeError && error.message === "fetch failed") {
    return "transient";
  }

  if (error instanceof Error && error.cause !== undefined && error.cause !== error) {
    const inner = classifyError(error.cause);
    if (inner === "transient") return inner;
  }

  return "internal";
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Classify an HTTP status returned by an external service.
 *
 * 401/403 mean the credential was rejected. 408, 425, 429 and 5xx (except 507) are
 * transient. 507 and every other 4xx are permanent.
 */
export function classifyHttpStatus(status: number): ErrorClass {
  if (status === 401 || status === 403) return "auth_expired";
  if (status === 408 || status === 425 || status === 429) return "transient";
  if (status === 507) return "permanent";
  if (status >= 500) return "transient";
  return "permanent";
}

/**
 * Build a classified AppError from a non-2xx fetch Response. Reads at most a short
 * excerpt of the body for the message.
 */
export async function errorFromResponse(response: Response, service: string): Promise<AppError> {
  let excerpt = "";
  try {
    excerpt = (await response.text()).slice(0, 300);
  } catch {
    excerpt = "";
  }

  const message =
    `${service} responded ${String(response.status)} ${response.statusText}` +
    (excerpt ? `: ${excerpt}` : "");
  return errorForStatus(response.status, message, { service, status: response.status });
}

/** Build the AppError matching an HTTP status reported by an SDK or protocol client. */
export function errorForStatus(
  status: number,
  message: string,
  details?: Record<string, unknown>,
  cause?: unknown,
): AppError {
  switch (classifyHttpStatus(status)) {
    case "auth_expired":
      return new AuthExpiredError(message, { details, cause });
    case "transient":
      return new TransientError(message, { details, cause });
    default:
      return new PermanentError(message, { details, cause });
  }
}

/** Wrap an unknown failure into an AppError, keeping AppErrors as they are. */
export function toAppError(error: unknown, context: string): AppError {
  if (AppError.isAppError(error)) return error;

  const message = `${context}: ${errorMessage(error)}`;
  if (classifyError(error) === "transient") {
    return new TransientError(message, { cause: error });
  }
  return new InternalError(message, { cause: error });
}
