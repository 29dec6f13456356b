import { Command } from "commander";
import { DEFAULT_HUB_LISTEN } from "../shared/constants.js";
import { initLogger, isLogFormat } from "../shared/logging.js";
import { runBrowse } from "./commands/browse.js";
import { runConfigGet, runConfigSet, runConfigShow } from "./commands/config.js";
import { runDemo } from "./commands/demo.js";
import { runHost } from "./commands/host.js";
import { runHub } from "./commands/hub.js";
import { runJoin } from "./commands/join.js";
import { runStatus } from "./commands/status.js";
import { logLevelFromOptions, type CommandOptions } from "./options.js";
import { getPackageJsonVersion } from "./utils.js";

function withSessionOptions(command: Command): Command {
  return command
    .option("--backend <kind>", "Session backend: lan or hosted")
    .option("--hub <url>", "Hub URL for the hosted backend")
    .option("--token <token>", "Hub bearer token")
    .option("--player <id>", "Local player id")
    .option("--address <host:port>", "Address advertised to joining players")
    .option("--match <tag>", "Match type tag")
    .option("--data-dir <path>", "Config/data directory", "~/.matchlink");
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("matchlink")
    .description("Matchlink — host, find and join ad-hoc multiplayer sessions")
    .version(getPackageJsonVersion())
    .option("-v, --verbose", "Verbose logging")
    .option("--log-level <level>", "Log level: error, warn, info, debug, silent")
    .option("--log-format <format>", "Log format: text, json or plain", "text")
    .hook("preAction", async (_self, action) => {
      const opts: CommandOptions = action.optsWithGlobals();
      const format = String(opts.logFormat ?? "text");
      initLogger(await logLevelFromOptions(opts), isLogFormat(format) ? format : "text");
    });

  program
    .command("hub")
    .description("Run the matchmaking hub")
    .option("--listen <host:port>", "Listen address", DEFAULT_HUB_LISTEN)
    .option("--token <token>", "Require this bearer token on /api routes")
    .action((opts: CommandOptions) => runHub(opts));

  withSessionOptions(program.command("host"))
    .description("Create a session and travel to the lobby")
    .option("--slots <n>", "Public connection slots")
    .option("--lobby <path>", "Lobby destination path")
    .option("--start", "Start the match right after hosting")
    .action((opts: CommandOptions) => runHost(opts));

  withSessionOptions(program.command("browse"))
    .description("List joinable sessions")
    .option("--limit <n>", "Maximum number of results")
    .option("--json", "Print results as JSON")
    .action((opts: CommandOptions) => runBrowse(opts));

  withSessionOptions(program.command("join"))
    .description("Find a session with the match tag and join it")
    .option("--no-wait", "Exit right after printing the connect address")
    .action((opts: CommandOptions) => runJoin(opts));

  withSessionOptions(program.command("demo"))
    .description("Host and join over an in-process LAN")
    .action((opts: CommandOptions) => runDemo(opts));

  withSessionOptions(program.command("status"))
    .description("Show effective settings")
    .action((opts: CommandOptions) => runStatus(opts));

  const configCmd = program
    .command("config")
    .description(`Manage config (backend, hub.url, hub.token, player.id, match.tag, ...)`);

  configCmd
    .command("get <key>")
    .description("Get config value")
    .option("--data-dir <path>", "Config/data directory", "~/.matchlink")
    .action((key: string, opts: CommandOptions) => runConfigGet(key, opts));

  configCmd
    .command("set <key> <value>")
    .description("Set config value")
    .option("--data-dir <path>", "Config/data directory", "~/.matchlink")
    .action((key: string, value: string, opts: CommandOptions) => runConfigSet(key, value, opts));

  configCmd
    .command("show")
    .description("Show full config object as JSON")
    .option("--data-dir <path>", "Config/data directory", "~/.matchlink")
    .action((opts: CommandOptions) => runConfigShow(opts));

  return program;
}
