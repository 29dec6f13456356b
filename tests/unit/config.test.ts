import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import {
  CONFIG_KEYS,
  configGet,
  configSet,
  getConfigPath,
  getDataDir,
  isConfigKey,
  readFullConfig,
  resolveSettings,
} from "../../src/config.js";

const ENV_KEYS = ["MATCHLINK_HUB", "MATCHLINK_PLAYER", "MATCHLINK_TOKEN", "MATCHLINK_LOG_LEVEL"];

describe("config file", () => {
  let dataDir: string;
  const saved = new Map<string, string | undefined>();

  beforeEach(async () => {
    dataDir = await mkdtemp(path.join(tmpdir(), "matchlink-config-"));
    for (const key of ENV_KEYS) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
  });

  afterEach(async () => {
    for (const [key, value] of saved) {
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    await rm(dataDir, { recursive: true, force: true });
  });

  it("reads an empty config when no file exists", async () => {
    expect(await readFullConfig(dataDir)).toEqual({});
  });

  it("stores and reads back a value", async () => {
    expect(await configSet(dataDir, "match.tag", "Deathmatch")).toEqual({ ok: true });
    expect(await configSet(dataDir, "session.slots", "8")).toEqual({ ok: true });
    expect(await configGet(dataDir, "match.tag")).toBe("Deathmatch");
    expect(await readFullConfig(dataDir)).toEqual({ "match.tag": "Deathmatch", "session.slots": "8" });
  });

  it("rejects invalid values without writing them", async () => {
    const result = await configSet(dataDir, "session.slots", "many");
    expect(result).toEqual({ ok: false, message: "must be a non-negative integer" });
    expect((await configSet(dataDir, "backend", "steam")).ok).toBe(false);
    expect(await readFullConfig(dataDir)).toEqual({});
  });

  it("ignores a file that is not valid JSON", async () => {
    await writeFile(getConfigPath(dataDir), "{ not json", "utf8");
    expect(await readFullConfig(dataDir)).toEqual({});
  });

  it("knows its keys", () => {
    expect(CONFIG_KEYS).toContain("hub.url");
    expect(isConfigKey("lobby.path")).toBe(true);
    expect(isConfigKey("default.agent")).toBe(false);
  });

  it("resolves defaults when nothing is configured", async () => {
    const settings = await resolveSettings(dataDir);
    expect(settings).toEqual({
      backend: "hosted",
      hubUrl: "http://127.0.0.1:7350",
      hubToken: undefined,
      playerId: expect.stringMatching(/^player-/),
      playerAddress: "127.0.0.1:7777",
      matchTag: "FreeForAll",
      lobbyPath: "/Game/Maps/Lobby",
      maxPublicSlots: 4,
      logLevel: "info",
    });
  });

  it("prefers overrides, then environment, then the config file", async () => {
    await configSet(dataDir, "hub.url", "http://config-hub:7350");
    await configSet(dataDir, "player.id", "config-player");
    await configSet(dataDir, "session.slots", "6");
    process.env.MATCHLINK_HUB = "http://env-hub:7350";

    const fromEnv = await resolveSettings(dataDir);
    expect(fromEnv.hubUrl).toBe("http://env-hub:7350");
    expect(fromEnv.playerId).toBe("config-player");
    expect(fromEnv.maxPublicSlots).toBe(6);

    const overridden = await resolveSettings(dataDir, { hubUrl: "http://flag-hub:7350", maxPublicSlots: 2 });
    expect(overridden.hubUrl).toBe("http://flag-hub:7350");
    expect(overridden.maxPublicSlots).toBe(2);
  });

  it("reads the log level from the environment when valid", async () => {
    process.env.MATCHLINK_LOG_LEVEL = "debug";
    expect((await resolveSettings(dataDir)).logLevel).toBe("debug");
    process.env.MATCHLINK_LOG_LEVEL = "loud";
    expect((await resolveSettings(dataDir)).logLevel).toBe("info");
  });

  it("expands ~ in a custom data dir", () => {
    expect(getDataDir("/tmp/matchlink-test")).toBe(path.resolve("/tmp/matchlink-test"));
    expect(getDataDir()).toMatch(/\.matchlink$/);
  });
});
