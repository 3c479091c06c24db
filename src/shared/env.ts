/** Environment variable names read by the CLI. */
export const TUNNEL_PUMP_ENV = {
  TICK_MS: "TUNNEL_PUMP_TICK_MS",
  TIMEOUT_MS: "TUNNEL_PUMP_TIMEOUT_MS",
  ECHO: "TUNNEL_PUMP_ECHO",
  LOG_LEVEL: "TUNNEL_PUMP_LOG_LEVEL",
  LISTEN: "TUNNEL_PUMP_LISTEN",
  TOKEN: "TUNNEL_PUMP_TOKEN",
  DATA_DIR: "TUNNEL_PUMP_DATA_DIR",
} as const;

export type EnvKey = keyof typeof TUNNEL_PUMP_ENV;

export function getEnv(
  key: EnvKey,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  const value = env[TUNNEL_PUMP_ENV[key]];
  return value === "" ? undefined : value;
}
