/**
 * oneshot-http
 *
 * Single-shot HTTP/1.1 client over a raw TCP socket: one connection per
 * request, `Connection: close`, whole response read into memory.
 */

export {
  HttpClient,
  sendRequest,
  get,
  post,
  DEFAULT_HTTP_PORT,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_MAX_RESPONSE_BYTES,
  type HttpClientOptions,
} from "./client";

export {
  buildRequest,
  buildRequestHead,
  encodeRequest,
  DEFAULT_CONTENT_TYPE,
  type HttpMethod,
  type HttpHeadersInit,
  type HttpRequestBody,
  type HttpRequestOptions,
} from "./request";

export {
  parseResponse,
  parseStatusCode,
  parseHeaderLine,
  getHeader,
  type HttpResponse,
  type ParsedHeader,
} from "./response";

export {
  HttpClientError,
  NetworkError,
  InvalidResponseError,
  HttpStatusError,
  isHttpClientError,
  type HttpClientErrorKind,
} from "./errors";

export { toWebResponse } from "./web-response";

export {
  parseDebugEnv,
  DEBUG_ENV_VAR,
  type DebugConfig,
  type DebugFlag,
  type DebugComponent,
  type DebugLogFn,
} from "./debug";
