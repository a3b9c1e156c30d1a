export type HttpClientErrorKind = "network" | "invalid-response" | "http";

export abstract class HttpClientError extends Error {
  abstract readonly kind: HttpClientErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Connection, timeout, write or read failure. The underlying socket error (if
 * any) is kept as `cause`.
 */
export class NetworkError extends HttpClientError {
  readonly kind = "network";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NetworkError";
  }
}

/** The received text has no status line or no numeric status code */
export class InvalidResponseError extends HttpClientError {
  readonly kind = "invalid-response";

  constructor(message: string) {
    super(message);
    this.name = "InvalidResponseError";
  }
}

export class HttpStatusError extends HttpClientError {
  readonly kind = "http";
  /** numeric http status code (always >= 400) */
  readonly code: number;
  /** verbatim status line */
  readonly statusLine: string;
  /** raw header lines of the error response */
  readonly headers: readonly string[];
  /** error response body */
  readonly body: string;

  constructor(init: {
    code: number;
    statusLine: string;
    headers: readonly string[];
    body: string;
  }) {
    super(`Server returned error: ${init.statusLine}`);
    this.name = "HttpStatusError";
    this.code = init.code;
    this.statusLine = init.statusLine;
    this.headers = init.headers;
    this.body = init.body;
  }
}

export function isHttpClientError(value: unknown): value is HttpClientError {
  return value instanceof HttpClientError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
