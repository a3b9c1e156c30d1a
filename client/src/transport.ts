import net from "net";

import type { DebugLogger } from "./debug";
import { NetworkError, describeError } from "./errors";
import { ReceiveBuffer } from "./receive-buffer";

export type ExchangeTarget = {
  /** connect host */
  host: string;
  /** connect port */
  port: number;
};

export type ExchangeOptions = {
  /** socket idle timeout in `ms` */
  timeoutMs: number;
  /** max buffered response size in `bytes` (null for unlimited) */
  maxResponseBytes: number | null;
  debug: DebugLogger;
};

type Phase = "connect" | "send" | "read";

function phaseError(
  phase: Phase,
  host: string,
  detail: string,
  cause?: unknown,
): NetworkError {
  switch (phase) {
    case "connect":
      return new NetworkError(`Failed to connect to ${host}: ${detail}`, { cause });
    case "send":
      return new NetworkError(`Failed to send request: ${detail}`, { cause });
    case "read":
      return new NetworkError(`Failed to read response: ${detail}`, { cause });
  }
}

/**
 * Opens a fresh connection, writes `payload` in one call and collects
 * everything the peer sends until it closes the connection.
 *
 * The idle timeout covers connect and every read.
 */
export function exchange(
  target: ExchangeTarget,
  payload: Buffer,
  options: ExchangeOptions,
): Promise<string> {
  const { debug } = options;

  return new Promise<string>((resolve, reject) => {
    const socket = new net.Socket();
    const received = new ReceiveBuffer(options.maxResponseBytes);
    let phase: Phase = "connect";
    let settled = false;

    const fail = (error: NetworkError) => {
      if (settled) return;
      settled = true;
      debug.emit("net", `${target.host}:${target.port} failed: ${error.message}`);
      socket.destroy();
      reject(error);
    };

    socket.setTimeout(options.timeoutMs);

    socket.on("timeout", () => {
      fail(phaseError(phase, target.host, `timed out after ${options.timeoutMs}ms`));
    });

    socket.on("error", (err) => {
      fail(phaseError(phase, target.host, describeError(err), err));
    });

    socket.on("data", (chunk: Buffer) => {
      if (settled) return;
      if (!received.append(chunk)) {
        fail(
          phaseError(
            "read",
            target.host,
            `response exceeds ${options.maxResponseBytes} bytes`,
          ),
        );
      }
    });

    socket.on("close", () => {
      if (settled) return;
      settled = true;
      debug.emit(
        "net",
        `${target.host}:${target.port} closed after ${received.length} bytes`,
      );

      let text: string;
      try {
        text = received.toText();
      } catch (err) {
        reject(phaseError("read", target.host, "stream did not contain valid UTF-8", err));
        return;
      }
      resolve(text);
    });

    socket.connect({ host: target.host, port: target.port }, () => {
      phase = "send";
      debug.emit("net", `connected to ${target.host}:${target.port}`);

      socket.write(payload, (err) => {
        if (err) {
          fail(phaseError("send", target.host, describeError(err), err));
          return;
        }
        phase = "read";
        debug.emit("net", `sent ${payload.length} bytes`);
      });
    });
  });
}
