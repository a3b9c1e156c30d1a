import assert from "node:assert/strict";
import test from "node:test";

import {
  DebugLogger,
  parseDebugEnv,
  redactRequestHead,
  resolveDebugFlags,
  type DebugComponent,
  type DebugFlag,
} from "../src/debug";
import { resolveEnvNumber } from "../src/utils/env";

test("parseDebugEnv reads known flags and ignores the rest", () => {
  assert.deepEqual([...parseDebugEnv(undefined)], []);
  assert.deepEqual([...parseDebugEnv("")], []);
  assert.deepEqual([...parseDebugEnv(" net , Response,bogus,,")], ["net", "response"]);
  assert.deepEqual([...parseDebugEnv("all")], ["net", "request", "response"]);
});

test("resolveDebugFlags merges option flags with env flags", () => {
  const env = new Set(parseDebugEnv("net"));

  assert.deepEqual([...resolveDebugFlags(undefined, env)], ["net"]);
  assert.deepEqual([...resolveDebugFlags(false, env)], ["net"]);
  assert.deepEqual([...resolveDebugFlags(["request"], env)], ["net", "request"]);
  assert.deepEqual([...resolveDebugFlags(true, new Set<DebugFlag>())], ["net", "request", "response"]);
});

test("redactRequestHead masks credential headers only", () => {
  const head =
    "GET / HTTP/1.1\r\nHost: h\r\nauthorization: Basic dGVzdDp0ZXN0\r\nCookie: sid=1\r\nProxy-Authorization: x\r\nAccept: */*\r\n";

  assert.equal(
    redactRequestHead(head),
    "GET / HTTP/1.1\r\nHost: h\r\nauthorization: [redacted]\r\nCookie: [redacted]\r\nProxy-Authorization: [redacted]\r\nAccept: */*\r\n",
  );
});

test("DebugLogger only forwards enabled components", () => {
  const seen: Array<[DebugComponent, string]> = [];
  const logger = new DebugLogger(new Set<DebugFlag>(["net"]), (component, message) => {
    seen.push([component, message]);
  });

  logger.emit("request", "dropped");
  logger.emit("net", "kept\n");

  assert.equal(logger.enabled("net"), true);
  assert.equal(logger.enabled("response"), false);
  assert.deepEqual(seen, [["net", "kept"]]);
});

test("resolveEnvNumber falls back on missing or invalid values", () => {
  const env = { GOOD: "250", ZERO: "0", NEG: "-5", WORD: "soon", EMPTY: "" };

  assert.equal(resolveEnvNumber("GOOD", 10, env), 250);
  assert.equal(resolveEnvNumber("ZERO", 10, env), 10);
  assert.equal(resolveEnvNumber("NEG", 10, env), 10);
  assert.equal(resolveEnvNumber("WORD", 10, env), 10);
  assert.equal(resolveEnvNumber("EMPTY", 10, env), 10);
  assert.equal(resolveEnvNumber("MISSING", 10, env), 10);
});
