import { readFile, writeFile, mkdir } from "node:fs/promises";
import path from "node:path";
import { homedir } from "node:os";
import { z } from "zod";
import {
  DEFAULT_HUB_LISTEN,
  DEFAULT_LOBBY_PATH,
  DEFAULT_MATCH_TAG,
  DEFAULT_MAX_PUBLIC_SLOTS,
  DEFAULT_PLAYER_ADDRESS,
} from "./shared/constants.js";
import { getEnv } from "./shared/env.js";
import { genId } from "./shared/ids.js";
import { componentLogger, type LogLevel } from "./shared/logging.js";
import type { SessionBackendKind } from "./backends/index.js";

const CONFIG_FILENAME = "matchlink.json";

export function getDataDir(custom?: string): string {
  if (custom) return path.resolve(custom.replace(/^~/, homedir()));
  return path.join(homedir(), ".matchlink");
}

export function getConfigPath(dataDir: string): string {
  return path.join(dataDir, CONFIG_FILENAME);
}

export const ConfigFileSchema = z
  .object({
    backend: z.enum(["lan", "hosted"]),
    "hub.url": z.string().url(),
    "hub.token": z.string().min(1),
    "player.id": z.string().min(1),
    "player.address": z.string().min(1),
    "match.tag": z.string().min(1),
    "lobby.path": z.string().startsWith("/"),
    "session.slots": z.string().regex(/^\d+$/, "must be a non-negative integer"),
    "log.level": z.enum(["error", "warn", "info", "debug", "silent"]),
  })
  .partial();

export type FullConfig = z.infer<typeof ConfigFileSchema>;
export type ConfigKey = keyof FullConfig;

export const CONFIG_KEYS: readonly ConfigKey[] = ConfigFileSchema.keyof().options;

export function isConfigKey(s: string): s is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(s);
}

export async function readFullConfig(dataDir: string): Promise<FullConfig> {
  const configPath = getConfigPath(dataDir);
  let raw: string;
  try {
    raw = await readFile(configPath, "utf8");
  } catch {
    return {};
  }
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    componentLogger("config").warn({ configPath }, "config file is not valid JSON; ignoring it");
    return {};
  }
  const parsed = ConfigFileSchema.safeParse(data);
  if (!parsed.success) {
    componentLogger("config").warn({ configPath, issues: parsed.error.issues }, "config file has invalid values; ignoring it");
    return {};
  }
  return parsed.data;
}

export async function writeFullConfig(dataDir: string, cfg: FullConfig): Promise<void> {
  await mkdir(dataDir, { recursive: true });
  await writeFile(getConfigPath(dataDir), JSON.stringify(cfg, null, 2) + "\n", "utf8");
}

export async function configGet(dataDir: string, key: ConfigKey): Promise<string | undefined> {
  const cfg = await readFullConfig(dataDir);
  return cfg[key];
}

/** Validate and store one key. Returns the validation message on rejection. */
export async function configSet(
  dataDir: string,
  key: ConfigKey,
  value: string
): Promise<{ ok: true } | { ok: false; message: string }> {
  const candidate = ConfigFileSchema.safeParse({ [key]: value });
  if (!candidate.success) {
    return { ok: false, message: candidate.error.issues.map((i) => i.message).join("; ") };
  }
  const cfg = await readFullConfig(dataDir);
  await writeFullConfig(dataDir, { ...cfg, ...candidate.data });
  return { ok: true };
}

/** Effective settings after flags, environment, config file and defaults. */
export interface MatchlinkSettings {
  backend: SessionBackendKind;
  hubUrl: string;
  hubToken?: string;
  playerId: string;
  playerAddress: string;
  matchTag: string;
  lobbyPath: string;
  maxPublicSlots: number;
  logLevel: LogLevel;
}

export type SettingsOverrides = Partial<Omit<MatchlinkSettings, "maxPublicSlots">> & {
  maxPublicSlots?: number | string;
};

export async function resolveSettings(
  dataDir: string,
  overrides: SettingsOverrides = {}
): Promise<MatchlinkSettings> {
  const cfg = await readFullConfig(dataDir);
  const slots = Number(overrides.maxPublicSlots ?? cfg["session.slots"] ?? DEFAULT_MAX_PUBLIC_SLOTS);
  const envLevel = ConfigFileSchema.shape["log.level"].safeParse(getEnv("LOG_LEVEL"));
  return {
    backend: overrides.backend ?? cfg.backend ?? "hosted",
    hubUrl: overrides.hubUrl ?? getEnv("HUB") ?? cfg["hub.url"] ?? `http://${DEFAULT_HUB_LISTEN}`,
    hubToken: overrides.hubToken ?? getEnv("TOKEN") ?? cfg["hub.token"],
    playerId: overrides.playerId ?? getEnv("PLAYER") ?? cfg["player.id"] ?? genId("player"),
    playerAddress: overrides.playerAddress ?? cfg["player.address"] ?? DEFAULT_PLAYER_ADDRESS,
    matchTag: overrides.matchTag ?? cfg["match.tag"] ?? DEFAULT_MATCH_TAG,
    lobbyPath: overrides.lobbyPath ?? cfg["lobby.path"] ?? DEFAULT_LOBBY_PATH,
    maxPublicSlots: Number.isInteger(slots) && slots >= 0 ? slots : DEFAULT_MAX_PUBLIC_SLOTS,
    logLevel: overrides.logLevel ?? (envLevel.success ? envLevel.data : undefined) ?? cfg["log.level"] ?? "info",
  };
}
