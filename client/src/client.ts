import {
  DebugLogger,
  defaultDebugLog,
  redactRequestHead,
  resolveDebugFlags,
  type DebugConfig,
  type DebugLogFn,
} from "./debug";
import { describeError } from "./errors";
import {
  buildRequestHead,
  encodeRequest,
  type HttpHeadersInit,
  type HttpRequestBody,
  type HttpRequestOptions,
} from "./request";
import { parseResponse, type HttpResponse } from "./response";
import { exchange } from "./transport";
import {
  MAX_RESPONSE_BYTES_ENV_VAR,
  TIMEOUT_ENV_VAR,
  resolveEnvNumber,
} from "./utils/env";

export const DEFAULT_HTTP_PORT = 80;
export const DEFAULT_TIMEOUT_MS = 10 * 1000;
export const DEFAULT_MAX_RESPONSE_BYTES = 64 * 1024 * 1024;

export type HttpClientOptions = {
  /** tcp port to connect to (default: 80) */
  port?: number;
  /** socket idle timeout in `ms` (default: 10000, or ONESHOT_HTTP_TIMEOUT_MS) */
  timeoutMs?: number;
  /** max buffered response size in `bytes` (null for unlimited) */
  maxResponseBytes?: number | null;
  /** debug flags, merged with ONESHOT_HTTP_DEBUG */
  debug?: DebugConfig;
  /** debug log callback (default: stderr) */
  debugLog?: DebugLogFn | null;
};

type ResolvedHttpClientOptions = {
  port: number;
  timeoutMs: number;
  maxResponseBytes: number | null;
};

function resolveOptions(options: HttpClientOptions): ResolvedHttpClientOptions {
  const port = options.port ?? DEFAULT_HTTP_PORT;
  if (!Number.isInteger(port) || port <= 0 || port > 0xffff) {
    throw new RangeError(`port must be an integer in 1..65535 (got ${port})`);
  }

  const timeoutMs =
    options.timeoutMs ?? resolveEnvNumber(TIMEOUT_ENV_VAR, DEFAULT_TIMEOUT_MS);
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new RangeError(`timeoutMs must be > 0 (got ${timeoutMs})`);
  }

  const maxResponseBytes =
    options.maxResponseBytes === undefined
      ? resolveEnvNumber(MAX_RESPONSE_BYTES_ENV_VAR, DEFAULT_MAX_RESPONSE_BYTES)
      : options.maxResponseBytes;
  if (maxResponseBytes !== null && !(maxResponseBytes > 0)) {
    throw new RangeError(`maxResponseBytes must be > 0 (got ${maxResponseBytes})`);
  }

  return { port, timeoutMs, maxResponseBytes };
}

/**
 * One-shot HTTP/1.1 client over plaintext TCP.
 *
 * Every request opens its own connection, sends `Connection: close` and reads
 * until the server hangs up. Responses with a status >= 400 reject with
 * HttpStatusError.
 */
export class HttpClient {
  private readonly options: ResolvedHttpClientOptions;
  private readonly debug: DebugLogger;

  constructor(options: HttpClientOptions = {}) {
    this.options = resolveOptions(options);
    this.debug = new DebugLogger(
      resolveDebugFlags(options.debug),
      options.debugLog ?? defaultDebugLog,
    );
  }

  get port() {
    return this.options.port;
  }

  get timeoutMs() {
    return this.options.timeoutMs;
  }

  async request(request: HttpRequestOptions): Promise<HttpResponse> {
    if (this.debug.enabled("request")) {
      this.debug.emit("request", redactRequestHead(buildRequestHead(request)).trimEnd());
    }

    const raw = await exchange(
      { host: request.host, port: this.options.port },
      encodeRequest(request),
      {
        timeoutMs: this.options.timeoutMs,
        maxResponseBytes: this.options.maxResponseBytes,
        debug: this.debug,
      },
    );

    let response: HttpResponse;
    try {
      response = parseResponse(raw);
    } catch (err) {
      this.debug.emit(
        "response",
        `${request.method} ${request.path} failed: ${describeError(err)}`,
      );
      throw err;
    }

    this.debug.emit(
      "response",
      `${response.statusLine} (${response.headers.length} headers, ${response.body.length} chars)`,
    );
    return response;
  }

  get(host: string, path: string, headers?: HttpHeadersInit | null): Promise<HttpResponse> {
    return this.request({ method: "GET", host, path, headers });
  }

  post(
    host: string,
    path: string,
    body: HttpRequestBody,
    headers?: HttpHeadersInit | null,
  ): Promise<HttpResponse> {
    return this.request({ method: "POST", host, path, body, headers });
  }
}

export async function sendRequest(
  request: HttpRequestOptions,
  options?: HttpClientOptions,
): Promise<HttpResponse> {
  return new HttpClient(options).request(request);
}

export async function get(
  host: string,
  path: string,
  headers?: HttpHeadersInit | null,
  options?: HttpClientOptions,
): Promise<HttpResponse> {
  return new HttpClient(options).get(host, path, headers);
}

export async function post(
  host: string,
  path: string,
  body: HttpRequestBody,
  headers?: HttpHeadersInit | null,
  options?: HttpClientOptions,
): Promise<HttpResponse> {
  return new HttpClient(options).post(host, path, body, headers);
}
