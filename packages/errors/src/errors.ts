import { AppError } from "./app-error.js";

interface ErrorExtras {
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string> = {}, options?: ErrorExtras) {
    super({
      message,
      statusCode: 400,
      code: "VALIDATION_ERROR",
      errorClass: "validation",
      details: options?.details,
      cause: options?.cause,
    });
    this.fields = fields;
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", options?: ErrorExtras) {
    super({
      message,
      statusCode: 404,
      code: "NOT_FOUND",
      errorClass: "validation",
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class TransientError extends AppError {
  constructor(message = "Temporary failure", options?: ErrorExtras) {
    super({
      message,
      statusCode: 503,
      code: "TRANSIENT",
      errorClass: "transient",
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(message = "External service error", service: string, options?: ErrorExtras) {
    super({
      message,
      statusCode: 502,
      code: "EXTERNAL_SERVICE_ERROR",
      errorClass: "transient",
      details: options?.details,
      cause: options?.cause,
    });
    this.service = service;
  }
}

export class AuthExpiredError extends AppError {
  constructor(message = "Credential rejected", options?: ErrorExtras) {
    super({
      message,
      statusCode: 401,
      code: "AUTH_EXPIRED",
      errorClass: "auth_expired",
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class PermanentError extends AppError {
  constructor(message = "Permanent failure", options?: ErrorExtras) {
    super({
      message,
      statusCode: 422,
      code: "PERMANENT",
      errorClass: "permanent",
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class InternalError extends AppError {
  constructor(message = "Internal error", options?: ErrorExtras) {
    super({
      message,
      statusCode: 500,
      code: "INTERNAL",
      errorClass: "internal",
      isOperational: false,
      details: options?.details,
      cause: options?.cause,
    });
  }
}
