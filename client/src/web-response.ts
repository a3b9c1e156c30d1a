import { Response } from "undici";

import type { HttpStatusError } from "./errors";
import { parseHeaderLine, type HttpResponse } from "./response";

type ParsedResponseLike =
  | Pick<HttpResponse, "statusLine" | "statusCode" | "headers" | "body">
  | Pick<HttpStatusError, "statusLine" | "code" | "headers" | "body">;

function isNullBodyStatus(status: number): boolean {
  return status === 204 || status === 205 || status === 304;
}

export function statusTextFromLine(statusLine: string): string {
  const match = /^\s*\S+\s+\S+\s*(.*)$/.exec(statusLine);
  return match?.[1]?.trim() ?? "";
}

export function headerLinesToHeadersInit(
  lines: readonly string[],
): Array<[string, string]> {
  const out: Array<[string, string]> = [];
  for (const line of lines) {
    const parsed = parseHeaderLine(line);
    if (!parsed) continue;
    // Headers rejects names outside the token grammar
    if (!/^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/.test(parsed.name)) continue;
    out.push([parsed.name, parsed.value]);
  }
  return out;
}

/**
 * Converts a parsed response (or the payload of an HttpStatusError) into an
 * undici Response for code that speaks the fetch API.
 */
export function toWebResponse(value: ParsedResponseLike): Response {
  const status = "statusCode" in value ? value.statusCode : value.code;
  if (status < 200 || status > 599) {
    throw new RangeError(`status ${status} cannot be represented as a fetch Response`);
  }

  return new Response(isNullBodyStatus(status) ? null : value.body, {
    status,
    statusText: statusTextFromLine(value.statusLine),
    headers: headerLinesToHeadersInit(value.headers),
  });
}
