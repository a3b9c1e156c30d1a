export type HttpMethod =
  | "GET"
  | "POST"
  | "PUT"
  | "PATCH"
  | "DELETE"
  | "HEAD"
  | "OPTIONS";

/**
 * Caller-supplied headers.
 *
 * A record serializes in `Object.entries` order: insertion order, except that
 * integer-like names ("123") come first in ascending order. Pass tuples when
 * the order must be explicit.
 */
export type HttpHeadersInit =
  | Record<string, string>
  | ReadonlyArray<readonly [string, string]>;

export type HttpRequestBody = string | Uint8Array;

export type HttpRequestOptions = {
  /** request method (sent as-is) */
  method: HttpMethod | (string & {});
  /** destination host, also sent as the Host header */
  host: string;
  /** request target (sent as-is) */
  path: string;
  /** request body */
  body?: HttpRequestBody | null;
  /** extra headers appended after the generated ones */
  headers?: HttpHeadersInit | null;
};

export const DEFAULT_CONTENT_TYPE = "application/json";

const CRLF = "\r\n";

export function headerEntries(
  headers: HttpHeadersInit | null | undefined,
): Array<[string, string]> {
  if (!headers) return [];
  if (isHeaderTupleList(headers)) {
    return headers.map(([name, value]) => [name, value]);
  }
  return Object.entries(headers);
}

function isHeaderTupleList(
  headers: HttpHeadersInit,
): headers is ReadonlyArray<readonly [string, string]> {
  return Array.isArray(headers);
}

export function bodyByteLength(body: HttpRequestBody): number {
  return typeof body === "string" ? Buffer.byteLength(body, "utf8") : body.byteLength;
}

/**
 * Request line and header block, up to and including the blank line.
 */
export function buildRequestHead(options: HttpRequestOptions): string {
  let head = `${options.method} ${options.path} HTTP/1.1${CRLF}Host: ${options.host}${CRLF}`;

  const body = options.body ?? null;
  if (body !== null) {
    head += `Content-Length: ${bodyByteLength(body)}${CRLF}`;
    head += `Content-Type: ${DEFAULT_CONTENT_TYPE}${CRLF}`;
  }

  for (const [name, value] of headerEntries(options.headers)) {
    head += `${name}: ${value}${CRLF}`;
  }

  head += `Connection: close${CRLF}${CRLF}`;
  return head;
}

export function buildRequest(options: HttpRequestOptions): string {
  const head = buildRequestHead(options);
  const body = options.body ?? null;
  if (body === null) return head;
  return head + (typeof body === "string" ? body : Buffer.from(body).toString("utf8"));
}

/** Wire bytes for a request; binary bodies are copied unchanged */
export function encodeRequest(options: HttpRequestOptions): Buffer {
  const head = Buffer.from(buildRequestHead(options), "utf8");
  const body = options.body ?? null;
  if (body === null) return head;
  const bodyBytes = typeof body === "string" ? Buffer.from(body, "utf8") : Buffer.from(body);
  return Buffer.concat([head, bodyBytes]);
}
