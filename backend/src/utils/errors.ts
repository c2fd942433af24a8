import { ZodError } from "zod";

export const HTTP_STATUS = {
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  UNPROCESSABLE_ENTITY: 422,
  INTERNAL_SERVER_ERROR: 500,
  BAD_GATEWAY: 502,
  SERVICE_UNAVAILABLE: 503,
} as const;

export type ErrorCode =
  | "AUTH_ERROR"
  | "VALIDATION_ERROR"
  | "INVALID_TOKEN"
  | "NOT_FOUND"
  | "FORBIDDEN"
  | "SERVICE_UNAVAILABLE"
  | "TRANSIENT_STORE_ERROR"
  | "TRANSPORT_ERROR"
  | "INTERNAL_SERVER_ERROR";

interface AppErrorOptions {
  statusCode?: number;
  code?: ErrorCode;
  details?: unknown;
  cause?: unknown;
}

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode;
  public readonly details?: unknown;

  constructor(message: string, options?: AppErrorOptions) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = this.constructor.name;
    this.statusCode = options?.statusCode ?? HTTP_STATUS.INTERNAL_SERVER_ERROR;
    this.code = options?.code ?? "INTERNAL_SERVER_ERROR";
    this.details = options?.details;
  }
}

export class AuthError extends AppError {
  constructor(message = "Authentication required", details?: unknown) {
    super(message, { statusCode: HTTP_STATUS.UNAUTHORIZED, code: "AUTH_ERROR", details });
  }
}

export class ValidationError extends AppError {
  constructor(message = "Validation error", details?: unknown) {
    super(message, { statusCode: HTTP_STATUS.UNPROCESSABLE_ENTITY, code: "VALIDATION_ERROR", details });
  }
}

export class InvalidTokenError extends AppError {
  constructor(message = "Invalid or expired token", details?: unknown) {
    super(message, { statusCode: HTTP_STATUS.BAD_REQUEST, code: "INVALID_TOKEN", details });
  }
}

export class ForbiddenError extends AppError {
  constructor(message = "Forbidden", details?: unknown) {
    super(message, { statusCode: HTTP_STATUS.FORBIDDEN, code: "FORBIDDEN", details });
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", details?: unknown) {
    super(message, { statusCode: HTTP_STATUS.NOT_FOUND, code: "NOT_FOUND", details });
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(message = "Service unavailable", details?: unknown) {
    super(message, { statusCode: HTTP_STATUS.SERVICE_UNAVAILABLE, code: "SERVICE_UNAVAILABLE", details });
  }
}

/**
 * The job or preference store could not be reached. Callers retry the whole
 * operation later; the worker backs off and runs the cycle again.
 */
export class TransientStoreError extends AppError {
  constructor(message = "Notification store unavailable", cause?: unknown) {
    super(message, { statusCode: HTTP_STATUS.SERVICE_UNAVAILABLE, code: "TRANSIENT_STORE_ERROR", cause });
  }
}

/**
 * A delivery channel's transport refused or failed to accept a message.
 * Retryable up to the job's attempt ceiling.
 */
export class TransportError extends AppError {
  public readonly retryable: boolean;

  constructor(message: string, options?: { retryable?: boolean; cause?: unknown; details?: unknown }) {
    super(message, {
      statusCode: HTTP_STATUS.BAD_GATEWAY,
      code: "TRANSPORT_ERROR",
      cause: options?.cause,
      details: options?.details,
    });
    this.retryable = options?.retryable ?? true;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }

  return String(error);
}

export interface ApiErrorResponse {
  error: {
    message: string;
    code: ErrorCode;
    statusCode: number;
    details?: unknown;
    requestId?: string;
  };
}

export function formatError(error: unknown, requestId?: string): ApiErrorResponse {
  if (error instanceof AppError) {
    return {
      error: {
        message: error.message,
        code: error.code,
        statusCode: error.statusCode,
        details: error.details,
        requestId,
      },
    };
  }

  if (error instanceof ZodError) {
    return {
      error: {
        message: "Validation error",
        code: "VALIDATION_ERROR",
        statusCode: HTTP_STATUS.UNPROCESSABLE_ENTITY,
        details: error.flatten(),
        requestId,
      },
    };
  }

  if (hasStatusCode(error) && error.statusCode >= 400 && error.statusCode < 500) {
    return {
      error: {
        message: error.message,
        code: error.statusCode === HTTP_STATUS.UNAUTHORIZED ? "AUTH_ERROR" : "VALIDATION_ERROR",
        statusCode: error.statusCode,
        requestId,
      },
    };
  }

  const fallbackMessage = error instanceof Error ? error.message : "Internal Server Error";

  return {
    error: {
      message: fallbackMessage || "Internal Server Error",
      code: "INTERNAL_SERVER_ERROR",
      statusCode: HTTP_STATUS.INTERNAL_SERVER_ERROR,
      requestId,
    },
  };
}

function hasStatusCode(error: unknown): error is Error & { statusCode: number } {
  return error instanceof Error && "statusCode" in error && typeof error.statusCode === "number";
}
