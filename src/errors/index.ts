// src/errors/index.ts

export interface ErrorDetail {
  path: string;
  message: string;
}

/**
 * Base class for every error the API maps to an HTTP response.
 * `status` is the response code, `code` a stable machine-readable tag.
 */
export class AppError extends Error {
  readonly status: number;
  readonly code: string;
  readonly details?: unknown;

  constructor(message: string, status: number, code: string, details?: unknown) {
    super(message);
    this.name = "AppError";
    this.status = status;
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string, id?: string) {
    super(id ? `${entity} ${id} not found` : `${entity} not found`, 404, "NOT_FOUND", id ? { entity, id } : { entity });
    this.name = "NotFoundError";
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: ErrorDetail[]) {
    super(message, 422, "VALIDATION_ERROR", details);
    this.name = "ValidationError";
  }
}

export class InsufficientStockError extends AppError {
  readonly productId: string;
  readonly requested: number;

  constructor(productId: string, requested: number, available?: number) {
    super(`Insufficient stock for product ${productId}`, 409, "INSUFFICIENT_STOCK", {
      productId,
      requested,
      available,
    });
    this.name = "InsufficientStockError";
    this.productId = productId;
    this.requested = requested;
  }
}

export class InvalidTransitionError extends AppError {
  readonly from: string;
  readonly to: string;

  constructor(from: string, to: string) {
    super(`Cannot move order from ${from} to ${to}`, 409, "INVALID_TRANSITION", { from, to });
    this.name = "InvalidTransitionError";
    this.from = from;
    this.to = to;
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = "Authentication required") {
    super(message, 401, "UNAUTHORIZED");
    this.name = "UnauthorizedError";
  }
}

export class ForbiddenError extends AppError {
  constructor(message = "Insufficient permissions") {
    super(message, 403, "FORBIDDEN");
    this.name = "ForbiddenError";
  }
}

export class RateLimitedError extends AppError {
  constructor(message: string, retryAfterSeconds?: number) {
    super(message, 429, "RATE_LIMITED", retryAfterSeconds === undefined ? undefined : { retryAfterSeconds });
    this.name = "RateLimitedError";
  }
}

/**
 * A payment, shipping or AI provider failed. `unavailable` means it could
 * not be reached or refused to serve (503); otherwise it answered badly (502).
 */
export class UpstreamServiceError extends AppError {
  readonly service: string;

  constructor(service: string, message: string, options?: { unavailable?: boolean; cause?: unknown }) {
    super(
      message,
      options?.unavailable ? 503 : 502,
      options?.unavailable ? "UPSTREAM_UNAVAILABLE" : "UPSTREAM_ERROR",
      { service }
    );
    this.name = "UpstreamServiceError";
    this.service = service;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}
