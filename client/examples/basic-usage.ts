/**
 * Basic usage examples for the oneshot-http client.
 *
 * Run with: npx tsx examples/basic-usage.ts
 */

import { HttpStatusError, get, isHttpClientError, post } from "../src";

function describeFailure(error: unknown): string {
  if (error instanceof HttpStatusError) return `HTTP ${error.code} error: ${error.message}`;
  if (isHttpClientError(error)) return `${error.kind} error: ${error.message}`;
  return String(error);
}

async function main() {
  console.log("=== Successful GET ===");
  try {
    const response = await get("httpbin.org", "/get");
    console.log(`status: ${response.statusLine} (code: ${response.statusCode})`);
  } catch (error) {
    console.log(`error: ${describeFailure(error)}`);
  }

  console.log("\n=== 404 error ===");
  try {
    const response = await get("httpbin.org", "/nonexistent");
    console.log(`status: ${response.statusLine}`);
  } catch (error) {
    console.log(`expected error: ${describeFailure(error)}`);
  }

  console.log("\n=== Network error ===");
  try {
    await get("nonexistent-host.invalid", "/", null, { timeoutMs: 2000 });
  } catch (error) {
    console.log(`expected error: ${describeFailure(error)}`);
  }

  console.log("\n=== POST with JSON body ===");
  try {
    const response = await post(
      "httpbin.org",
      "/post",
      JSON.stringify({ message: "hello" }),
      [["Accept", "application/json"]],
    );
    console.log(`status: ${response.statusCode}`);
    console.log(response.body);
  } catch (error) {
    console.log(`error: ${describeFailure(error)}`);
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
