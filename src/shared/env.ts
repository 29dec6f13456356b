/** Environment variable names read by the CLI. */
export const MATCHLINK_ENV = {
  HUB: "MATCHLINK_HUB",
  HUB_LISTEN: "MATCHLINK_HUB_LISTEN",
  PLAYER: "MATCHLINK_PLAYER",
  TOKEN: "MATCHLINK_TOKEN",
  LOG_LEVEL: "MATCHLINK_LOG_LEVEL",
} as const;

export function getEnv(key: keyof typeof MATCHLINK_ENV): string | undefined {
  return process.env[MATCHLINK_ENV[key]];
}
