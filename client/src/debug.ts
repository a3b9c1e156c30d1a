export type DebugFlag = "net" | "request" | "response";
export type DebugComponent = DebugFlag;

export type DebugConfig = boolean | DebugFlag[];
export type DebugLogFn = (component: DebugComponent, message: string) => void;

export const DEBUG_ENV_VAR = "ONESHOT_HTTP_DEBUG";

const ALL_DEBUG_FLAGS: readonly DebugFlag[] = ["net", "request", "response"];

function isDebugFlag(value: string): value is DebugFlag {
  return (ALL_DEBUG_FLAGS as readonly string[]).includes(value);
}

export function parseDebugEnv(value: string | undefined = process.env[DEBUG_ENV_VAR]) {
  const flags = new Set<DebugFlag>();
  if (!value) return flags;
  for (const entry of value.split(",")) {
    const flag = entry.trim().toLowerCase();
    if (!flag) continue;
    if (flag === "all" || flag === "1" || flag === "true") {
      for (const known of ALL_DEBUG_FLAGS) flags.add(known);
      continue;
    }
    if (isDebugFlag(flag)) flags.add(flag);
  }
  return flags;
}

/** Option flags are added on top of the environment flags */
export function resolveDebugFlags(
  option: DebugConfig | undefined,
  envFlags: Set<DebugFlag> = parseDebugEnv(),
): Set<DebugFlag> {
  const flags = new Set(envFlags);
  if (option === true) {
    for (const flag of ALL_DEBUG_FLAGS) flags.add(flag);
  } else if (Array.isArray(option)) {
    for (const flag of option) flags.add(flag);
  }
  return flags;
}

export function defaultDebugLog(component: DebugComponent, message: string) {
  process.stderr.write(`[${component}] ${message}\n`);
}

const REDACTED_HEADERS = new Set(["authorization", "proxy-authorization", "cookie"]);

/**
 * Masks credential-bearing header values in a request head before it is
 * logged.
 */
export function redactRequestHead(head: string): string {
  return head
    .split("\r\n")
    .map((line) => {
      const idx = line.indexOf(":");
      if (idx <= 0) return line;
      const name = line.slice(0, idx).trim().toLowerCase();
      return REDACTED_HEADERS.has(name) ? `${line.slice(0, idx)}: [redacted]` : line;
    })
    .join("\r\n");
}

export class DebugLogger {
  constructor(
    private readonly flags: Set<DebugFlag>,
    private readonly log: DebugLogFn,
  ) {}

  enabled(flag: DebugFlag) {
    return this.flags.has(flag);
  }

  emit(component: DebugComponent, message: string) {
    if (!this.flags.has(component)) return;
    this.log(component, message.endsWith("\n") ? message.slice(0, -1) : message);
  }
}
