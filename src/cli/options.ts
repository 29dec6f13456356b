import { isSessionBackendKind } from "../backends/index.js";
import { getDataDir, resolveSettings, type MatchlinkSettings, type SettingsOverrides } from "../config.js";
import { EXIT, exit } from "../shared/errors.js";
import { parseIntOption } from "./utils.js";

export type CommandOptions = Record<string, string | boolean | undefined>;

function str(value: string | boolean | undefined): string | undefined {
  return typeof value === "string" && value ? value : undefined;
}

/** Map shared session flags onto settings overrides. Exits with INVALID_ARGS on bad input. */
export function toOverrides(opts: CommandOptions): SettingsOverrides {
  const overrides: SettingsOverrides = {};
  const backend = str(opts.backend);
  if (backend !== undefined) {
    if (!isSessionBackendKind(backend)) {
      exit(EXIT.INVALID_ARGS, `Unknown backend "${backend}". Use lan or hosted.`);
    }
    overrides.backend = backend;
  }
  try {
    const slots = parseIntOption(opts.slots, "slots");
    if (slots !== undefined) overrides.maxPublicSlots = slots;
  } catch (err) {
    exit(EXIT.INVALID_ARGS, err instanceof Error ? err.message : String(err));
  }
  const hubUrl = str(opts.hub);
  if (hubUrl) overrides.hubUrl = hubUrl;
  const token = str(opts.token);
  if (token) overrides.hubToken = token;
  const playerId = str(opts.player);
  if (playerId) overrides.playerId = playerId;
  const playerAddress = str(opts.address);
  if (playerAddress) overrides.playerAddress = playerAddress;
  const matchTag = str(opts.match);
  if (matchTag) overrides.matchTag = matchTag;
  const lobbyPath = str(opts.lobby);
  if (lobbyPath) overrides.lobbyPath = lobbyPath;
  return overrides;
}

export async function settingsFromOptions(opts: CommandOptions): Promise<MatchlinkSettings> {
  return resolveSettings(getDataDir(str(opts.dataDir)), toOverrides(opts));
}

export function dataDirFromOptions(opts: CommandOptions): string {
  return getDataDir(str(opts.dataDir));
}

/** --verbose, then --log-level, then MATCHLINK_LOG_LEVEL and `log.level` from the config file. */
export async function logLevelFromOptions(opts: CommandOptions): Promise<string> {
  if (opts.verbose) return "debug";
  const flag = str(opts.logLevel);
  if (flag) return flag;
  return (await settingsFromOptions(opts)).logLevel;
}
