/** Environment variables read by the CLI. Flags take precedence. */
export const PATCHTAP_ENV = {
  LISTEN: "PATCHTAP_LISTEN",
  UPSTREAM: "PATCHTAP_UPSTREAM",
  TEXT_LOG: "PATCHTAP_TEXT_LOG",
  BINARY_LOG: "PATCHTAP_BINARY_LOG",
  IDLE_TIMEOUT_MS: "PATCHTAP_IDLE_TIMEOUT_MS",
  LOG_LEVEL: "PATCHTAP_LOG_LEVEL",
} as const;

export function getEnv(key: keyof typeof PATCHTAP_ENV): string | undefined {
  const value = process.env[PATCHTAP_ENV[key]];
  return value === "" ? undefined : value;
}
