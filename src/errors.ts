export interface RequestErrorDetails {
  status: number;
  method: string;
  url: string;
  userMessage?: string;
  developerMessage?: string;
  data?: unknown;
}

/** Network-level failure or timeout; the request may succeed if repeated. */
export class TransportError extends Error {
  readonly retryable = true;
  readonly isTimeout: boolean;

  constructor(message: string, options: { cause?: unknown; isTimeout?: boolean } = {}) {
    super(message, { cause: options.cause });
    this.name = "TransportError";
    this.isTimeout = options.isTimeout ?? false;
  }
}

/**
 * The API rejected the request (HTTP 4xx). Repeating it unchanged fails again,
 * except for rate limiting (429).
 */
export class RequestError extends Error {
  readonly status: number;
  readonly method: string;
  readonly url: string;
  readonly userMessage?: string;
  readonly developerMessage?: string;
  readonly data?: unknown;

  constructor(message: string, details: RequestErrorDetails) {
    super(message);
    this.name = "RequestError";
    this.status = details.status;
    this.method = details.method;
    this.url = details.url;
    this.userMessage = details.userMessage;
    this.developerMessage = details.developerMessage;
    this.data = details.data;
  }

  get retryable(): boolean {
    return this.status === 429;
  }

  get isAuthFailure(): boolean {
    return this.status === 401 || this.status === 403;
  }
}

/** HTTP 5xx, or a 2xx body that could not be understood. */
export class ServerError extends Error {
  readonly status: number;
  readonly retryable: boolean;

  constructor(message: string, options: { status: number; retryable?: boolean; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = "ServerError";
    this.status = options.status;
    this.retryable = options.retryable ?? true;
  }
}

/** Invalid local input, raised before any network call. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof TransportError) {
    return true;
  }
  if (error instanceof RequestError || error instanceof ServerError) {
    return error.retryable;
  }
  return false;
}

export function isAuthFailure(error: unknown): boolean {
  return error instanceof RequestError && error.isAuthFailure;
}

export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof RequestError) {
    return {
      name: error.name,
      message: error.message,
      status: error.status,
      user_message: error.userMessage ?? null,
      developer_message: error.developerMessage ?? null,
      data: error.data ?? null,
    };
  }

  if (error instanceof ServerError) {
    return {
      name: error.name,
      message: error.message,
      status: error.status,
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      code: "code" in error && typeof error.code === "string" ? error.code : null,
    };
  }

  return {
    message: String(error),
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
