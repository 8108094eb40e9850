// Error taxonomy shared by the catalog, assembler, trend cache and HTTP layer.

export const ErrorCodes = {
  VALIDATION: "validation_error",
  NOT_FOUND: "not_found",
  TRENDS_UNAVAILABLE: "trends_unavailable",
  CATALOG_LOAD: "catalog_load_failed",
  INTERNAL: "internal_error",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    statusCode = 500,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "AppError";
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

export class ValidationError extends AppError {
  public readonly field: string;

  constructor(
    field: string,
    message: string,
    details?: Record<string, unknown>,
    code: ErrorCode = ErrorCodes.VALIDATION,
    statusCode = 400,
  ) {
    super(message, code, statusCode, { field, ...details });
    this.name = "ValidationError";
    this.field = field;
  }
}

/** Unknown niche, hook style or length identifier. */
export class NotFoundError extends ValidationError {
  public readonly id: string;

  constructor(field: string, id: string) {
    super(field, `Unknown ${field}: "${id}"`, { id }, ErrorCodes.NOT_FOUND, 404);
    this.name = "NotFoundError";
    this.id = id;
  }
}

export class TrendUnavailableError extends AppError {
  constructor(reason: string) {
    super(`Trends unavailable: ${reason}`, ErrorCodes.TRENDS_UNAVAILABLE, 503, {
      reason,
    });
    this.name = "TrendUnavailableError";
  }
}

export class CatalogLoadError extends AppError {
  public readonly file: string;

  constructor(file: string, message: string) {
    super(`${file}: ${message}`, ErrorCodes.CATALOG_LOAD, 500, { file });
    this.name = "CatalogLoadError";
    this.file = file;
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}

export type ErrorBody = {
  success: false;
  error: string;
  code: ErrorCode;
  field?: string;
};

export function toErrorBody(err: unknown): ErrorBody {
  if (err instanceof ValidationError) {
    return { success: false, error: err.message, code: err.code, field: err.field };
  }
  if (isAppError(err)) {
    return { success: false, error: err.message, code: err.code };
  }
  return { success: false, error: "Internal error", code: ErrorCodes.INTERNAL };
}
