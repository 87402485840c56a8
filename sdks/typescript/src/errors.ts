export interface ApiErrorOptions {
  code: string;
  httpStatus: number;
  message: string;
  details?: Record<string, unknown>;
}

export class ApiError extends Error {
  public readonly code: string;
  public readonly httpStatus: number;
  public readonly details?: Record<string, unknown>;

  constructor(options: ApiErrorOptions) {
    super(options.message);
    this.name = "ApiError";
    this.code = options.code;
    this.httpStatus = options.httpStatus;
    this.details = options.details;
  }
}

export class InvalidBodyError extends ApiError {
  constructor(options: ApiErrorOptions) {
    super(options);
    this.name = "InvalidBodyError";
  }
}

export class UnauthorizedError extends ApiError {
  constructor(options: ApiErrorOptions) {
    super(options);
    this.name = "UnauthorizedError";
  }
}

export class NotFoundError extends ApiError {
  constructor(options: ApiErrorOptions) {
    super(options);
    this.name = "NotFoundError";
  }
}

export class RateLimitedError extends ApiError {
  public readonly retryAfterMs?: number;

  constructor(options: ApiErrorOptions & { retryAfterMs?: number }) {
    super(options);
    this.name = "RateLimitedError";
    this.retryAfterMs = options.retryAfterMs;
  }
}

/** Login was rejected, could not reach FUGA, or a call was made without a session. */
export class AuthenticationError extends Error {
  public readonly httpStatus?: number;

  constructor(message: string, options: { httpStatus?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "AuthenticationError";
    this.httpStatus = options.httpStatus;
  }
}

/** The request never produced an HTTP response (DNS, connection reset, timeout). */
export class TransportError extends Error {
  public readonly method: string;
  public readonly url: string;

  constructor(method: string, url: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Request failed: ${method} ${url}: ${reason}`, { cause });
    this.name = "TransportError";
    this.method = method;
    this.url = url;
  }
}

export class ConfigError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}

export function isRateLimited(error: unknown): error is RateLimitedError {
  return error instanceof RateLimitedError;
}

export function isInvalidBody(error: unknown): error is InvalidBodyError {
  return error instanceof InvalidBodyError;
}

export function isUnauthorized(error: unknown): error is UnauthorizedError {
  return error instanceof UnauthorizedError;
}

export function isNotFound(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}
