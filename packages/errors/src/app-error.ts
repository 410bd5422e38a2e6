import type { ErrorClass } from "@docrelay/types";

export interface AppErrorOptions {
  message: string;
  statusCode: number;
  code: string;
  errorClass: ErrorClass;
  isOperational?: boolean;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly errorClass: ErrorClass;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor({
    message,
    statusCode,
    code,
    errorClass,
    isOperational = true,
    details,
    cause,
  }: AppErrorOptions) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.code = code;
    this.errorClass = errorClass;
    this.isOperational = isOperational;
    this.details = details;

    // Restore prototype chain (necessary when extending built-ins in TS)
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace(this, this.constructor);
  }

  static isAppError(err: unknown): err is AppError {
    return err instanceof AppError;
  }
}
