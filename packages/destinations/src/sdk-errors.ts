import { AppError, errorForStatus, errorMessage, toAppError } from "@docrelay/errors";

function property(value: unknown, key: string): unknown {
  if (typeof value === "object" && value !== null && key in value) {
    return Reflect.get(value, key);
  }
  return undefined;
}

export function numberProperty(value: unknown, key: string): number | undefined {
  const found = property(value, key);
  return typeof found === "number" ? found : undefined;
}

export function stringProperty(value: unknown, key: string): string | undefined {
  const found = property(value, key);
  return typeof found === "string" ? found : undefined;
}

/** HTTP status carried by a gaxios, AWS SDK or similar client error, if any. */
export function sdkErrorStatus(error: unknown): number | undefined {
  return (
    numberProperty(property(error, "response"), "status") ??
    numberProperty(property(error, "$metadata"), "httpStatusCode") ??
    numberProperty(error, "status")
  );
}

/** Classify an SDK failure by its HTTP status, falling back to the generic rules. */
export function fromSdkError(error: unknown, service: string): AppError {
  if (AppError.isAppError(error)) {
    return error;
  }
  const status = sdkErrorStatus(error);
  if (status !== undefined) {
    return errorForStatus(
      status,
      `${service} responded ${String(status)}: ${errorMessage(error)}`,
      { service, status },
      error,
    );
  }
  return toAppError(error, service);
}
