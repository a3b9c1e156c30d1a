import { HttpStatusError, InvalidResponseError } from "./errors";

export type HttpResponse = {
  /** verbatim first line of the response */
  readonly statusLine: string;
  /** numeric status code from the status line */
  readonly statusCode: number;
  /** raw header lines, in received order */
  readonly headers: readonly string[];
  /** text after the header/body separator */
  readonly body: string;
};

export type ParsedHeader = {
  name: string;
  value: string;
};

const MAX_STATUS_CODE = 0xffff;

/**
 * Split on "\n", dropping one trailing "\r" per line. A trailing newline does
 * not produce an extra empty line.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];

  const lines = text.split("\n");
  if (lines[lines.length - 1] === "") lines.pop();

  return lines.map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
}

export function parseStatusCode(statusLine: string): number | null {
  const token = statusLine.trim().split(/\s+/)[1];
  if (!token || !/^\+?\d+$/.test(token)) return null;

  const code = Number(token);
  if (code > MAX_STATUS_CODE) return null;
  return code;
}

/**
 * Parse a complete response.
 *
 * Throws InvalidResponseError when there is no status line or no numeric
 * code, and HttpStatusError for codes >= 400.
 */
export function parseResponse(raw: string): HttpResponse {
  const lines = splitLines(raw);

  const statusLine = lines[0];
  if (statusLine === undefined) {
    throw new InvalidResponseError("Empty response");
  }

  const statusCode = parseStatusCode(statusLine);
  if (statusCode === null) {
    throw new InvalidResponseError("Invalid status line");
  }

  const headers: string[] = [];
  let index = 1;
  for (; index < lines.length; index += 1) {
    const line = lines[index]!;
    if (line === "") {
      index += 1;
      break;
    }
    headers.push(line);
  }

  const body = lines.slice(index).join("\n");

  if (statusCode >= 400) {
    throw new HttpStatusError({
      code: statusCode,
      statusLine,
      headers: Object.freeze(headers),
      body,
    });
  }

  return Object.freeze({
    statusLine,
    statusCode,
    headers: Object.freeze(headers),
    body,
  });
}

export function parseHeaderLine(line: string): ParsedHeader | null {
  const idx = line.indexOf(":");
  if (idx <= 0) return null;

  const name = line.slice(0, idx).trim();
  if (!name) return null;

  return { name, value: line.slice(idx + 1).trim() };
}

/**
 * Case-insensitive lookup over raw header lines. Repeated headers are joined
 * with ", ".
 */
export function getHeader(
  response: Pick<HttpResponse, "headers">,
  name: string,
): string | null {
  const wanted = name.toLowerCase();
  const values: string[] = [];

  for (const line of response.headers) {
    const parsed = parseHeaderLine(line);
    if (parsed && parsed.name.toLowerCase() === wanted) {
      values.push(parsed.value);
    }
  }

  return values.length > 0 ? values.join(", ") : null;
}
