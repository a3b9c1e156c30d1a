import assert from "node:assert/strict";
import test from "node:test";

import {
  HttpStatusError,
  InvalidResponseError,
  isHttpClientError,
} from "../src/errors";
import {
  getHeader,
  parseHeaderLine,
  parseResponse,
  parseStatusCode,
  splitLines,
} from "../src/response";

test("parses status, headers and body", () => {
  const response = parseResponse("HTTP/1.1 200 OK\r\nHeader: val\r\n\r\nhello");

  assert.equal(response.statusLine, "HTTP/1.1 200 OK");
  assert.equal(response.statusCode, 200);
  assert.deepEqual(response.headers, ["Header: val"]);
  assert.equal(response.body, "hello");
  assert.ok(Object.isFrozen(response));
  assert.ok(Object.isFrozen(response.headers));
});

test("body lines are re-joined with line feeds", () => {
  const response = parseResponse(
    "HTTP/1.1 201 Created\r\nA: 1\r\nB: 2\r\n\r\nline one\r\nline two\r\n\r\nline four\r\n",
  );

  assert.deepEqual(response.headers, ["A: 1", "B: 2"]);
  assert.equal(response.body, "line one\nline two\n\nline four");
});

test("missing separator makes every remaining line a header", () => {
  const response = parseResponse("HTTP/1.1 204 No Content\r\nX-One: 1\r\nX-Two: 2");

  assert.equal(response.statusCode, 204);
  assert.deepEqual(response.headers, ["X-One: 1", "X-Two: 2"]);
  assert.equal(response.body, "");
});

test("bare line feeds are accepted", () => {
  const response = parseResponse("HTTP/1.0 200 OK\nServer: test\n\n{\"ok\":true}");
  assert.deepEqual(response.headers, ["Server: test"]);
  assert.equal(response.body, '{"ok":true}');
});

test("status line only", () => {
  const response = parseResponse("HTTP/1.1 302 Found\r\n");
  assert.equal(response.statusCode, 302);
  assert.deepEqual(response.headers, []);
  assert.equal(response.body, "");
});

test("404 becomes an http status error", () => {
  assert.throws(
    () => parseResponse("HTTP/1.1 404 Not Found\r\n\r\n"),
    (err: unknown) => {
      assert.ok(err instanceof HttpStatusError);
      assert.equal(err.kind, "http");
      assert.equal(err.code, 404);
      assert.equal(err.statusLine, "HTTP/1.1 404 Not Found");
      assert.equal(err.message, "Server returned error: HTTP/1.1 404 Not Found");
      return true;
    },
  );
});

test("http status error keeps the error response headers and body", () => {
  assert.throws(
    () =>
      parseResponse(
        "HTTP/1.1 503 Service Unavailable\r\nRetry-After: 5\r\n\r\ntry later",
      ),
    (err: unknown) => {
      assert.ok(err instanceof HttpStatusError);
      assert.equal(err.code, 503);
      assert.deepEqual(err.headers, ["Retry-After: 5"]);
      assert.equal(err.body, "try later");
      return true;
    },
  );
});

test("400 is the first error code and 399 still succeeds", () => {
  assert.equal(parseResponse("HTTP/1.1 399 Odd\r\n\r\n").statusCode, 399);
  assert.throws(() => parseResponse("HTTP/1.1 400 Bad Request\r\n\r\n"), HttpStatusError);
});

test("empty input is an invalid response", () => {
  assert.throws(
    () => parseResponse(""),
    (err: unknown) => {
      assert.ok(err instanceof InvalidResponseError);
      assert.equal(err.kind, "invalid-response");
      assert.equal(err.message, "Empty response");
      assert.ok(isHttpClientError(err));
      return true;
    },
  );
});

test("status line without a numeric code is an invalid response", () => {
  for (const raw of [
    "GARBAGE\r\n\r\n",
    "HTTP/1.1 OK\r\n\r\n",
    "HTTP/1.1 2OO OK\r\n\r\n",
    "HTTP/1.1 -200 OK\r\n\r\n",
    "HTTP/1.1 70000 Huge\r\n\r\n",
    "\r\n",
  ]) {
    assert.throws(
      () => parseResponse(raw),
      (err: unknown) =>
        err instanceof InvalidResponseError && err.message === "Invalid status line",
      raw,
    );
  }
});

test("parseStatusCode reads the second whitespace token", () => {
  assert.equal(parseStatusCode("HTTP/1.1 200 OK"), 200);
  assert.equal(parseStatusCode("  HTTP/1.1\t418   I'm a teapot"), 418);
  assert.equal(parseStatusCode("HTTP/1.1 200"), 200);
  assert.equal(parseStatusCode("HTTP/1.1"), null);
  assert.equal(parseStatusCode(""), null);
  assert.equal(parseStatusCode("HTTP/1.1 65535 Max"), 65535);
  assert.equal(parseStatusCode("HTTP/1.1 +200 OK"), 200);
  assert.equal(parseStatusCode("HTTP/1.1 ++200 OK"), null);
  assert.equal(parseStatusCode("HTTP/1.1 + OK"), null);
});

test("explicit plus sign on the status code is accepted", () => {
  const response = parseResponse("HTTP/1.1 +200 OK\r\n\r\n");
  assert.equal(response.statusCode, 200);
  assert.equal(response.statusLine, "HTTP/1.1 +200 OK");
});

test("splitLines drops a trailing newline and carriage returns", () => {
  assert.deepEqual(splitLines(""), []);
  assert.deepEqual(splitLines("a"), ["a"]);
  assert.deepEqual(splitLines("a\r\n"), ["a"]);
  assert.deepEqual(splitLines("a\r\n\r\n"), ["a", ""]);
  assert.deepEqual(splitLines("a\nb\r\nc"), ["a", "b", "c"]);
});

test("parseHeaderLine splits on the first colon", () => {
  assert.deepEqual(parseHeaderLine("Content-Type: text/html; charset=utf-8"), {
    name: "Content-Type",
    value: "text/html; charset=utf-8",
  });
  assert.deepEqual(parseHeaderLine("Location: http://x/y"), {
    name: "Location",
    value: "http://x/y",
  });
  assert.equal(parseHeaderLine("no colon here"), null);
  assert.equal(parseHeaderLine(": empty name"), null);
});

test("getHeader is case-insensitive and joins repeats", () => {
  const response = parseResponse(
    "HTTP/1.1 200 OK\r\nVary: Accept\r\ncontent-type: text/plain\r\nvary: Origin\r\n\r\n",
  );

  assert.equal(getHeader(response, "Content-Type"), "text/plain");
  assert.equal(getHeader(response, "VARY"), "Accept, Origin");
  assert.equal(getHeader(response, "x-missing"), null);
});
