export const TIMEOUT_ENV_VAR = "ONESHOT_HTTP_TIMEOUT_MS";
export const MAX_RESPONSE_BYTES_ENV_VAR = "ONESHOT_HTTP_MAX_RESPONSE_BYTES";

export function resolveEnvNumber(
  name: string,
  fallback: number,
  env: NodeJS.ProcessEnv = process.env,
) {
  const raw = env[name];
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) return fallback;
  return parsed;
}
