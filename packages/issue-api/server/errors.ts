export type ApiErrorCode =
  | "AI_RATE_LIMITED"
  | "AI_TIMEOUT"
  | "AI_UNAVAILABLE"
  | "AI_INVALID_RESPONSE"
  | "RATE_LIMITED"
  | "RESOURCE_NOT_FOUND"
  | "UNAUTHORIZED"
  | "INTERNAL_ERROR";

export type ApiErrorBody = {
  ok: false;
  error: ApiErrorCode;
  message: string;
  retryAfterMs?: number;
};

export function apiError(
  code: ApiErrorCode,
  message: string,
  opts?: {
    retryAfterMs?: number;
    status?: number;
  }
): { status: number; body: ApiErrorBody } {
  return {
    status: opts?.status ?? 500,
    body: {
      ok: false,
      error: code,
      message,
      ...(opts?.retryAfterMs ? { retryAfterMs: opts.retryAfterMs } : {})
    }
  };
}

/**
 * An error that already knows how it should be rendered to the client.
 */
export class HttpError extends Error {
  readonly code: ApiErrorCode;
  readonly status: number;
  readonly retryAfterMs?: number;

  constructor(
    code: ApiErrorCode,
    message: string,
    status: number,
    retryAfterMs?: number
  ) {
    super(message);
    this.name = "HttpError";
    this.code = code;
    this.status = status;
    this.retryAfterMs = retryAfterMs;
  }

  toResponse() {
    return apiError(this.code, this.message, {
      status: this.status,
      retryAfterMs: this.retryAfterMs
    });
  }
}

export class ResourceDoesNotExist extends HttpError {
  constructor(message = "The requested resource does not exist") {
    super("RESOURCE_NOT_FOUND", message, 404);
    this.name = "ResourceDoesNotExist";
  }
}

export type AiErrorCode =
  | "AI_RATE_LIMITED"
  | "AI_TIMEOUT"
  | "AI_UNAVAILABLE"
  | "AI_INVALID_RESPONSE";

/** Raised by the completion client once retries are exhausted. */
export class AiSuggestionError extends HttpError {
  constructor(
    code: AiErrorCode,
    message: string,
    status: number,
    retryAfterMs?: number
  ) {
    super(code, message, status, retryAfterMs);
    this.name = "AiSuggestionError";
  }
}
