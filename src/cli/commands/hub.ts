import chalk from "chalk";
import { startHub } from "../../hub/server.js";
import { EXIT, exit } from "../../shared/errors.js";
import { getEnv } from "../../shared/env.js";
import { DEFAULT_HUB_LISTEN } from "../../shared/constants.js";
import type { CommandOptions } from "../options.js";
import { getPackageJsonVersion, parseListenWithDefault, waitForShutdown } from "../utils.js";

export async function runHub(opts: CommandOptions): Promise<void> {
  const listen = typeof opts.listen === "string" ? opts.listen : getEnv("HUB_LISTEN");
  const { host, port } = parseListenWithDefault(listen, DEFAULT_HUB_LISTEN);
  const token = (typeof opts.token === "string" && opts.token) || getEnv("TOKEN");

  try {
    const handle = await startHub({ host, port, token });
    const url = `http://${handle.host}:${handle.port}`;
    process.stderr.write("\n");
    process.stderr.write(chalk.bold("Matchlink hub") + "\n");
    process.stderr.write("───────────────────────────────────────────────────────────────\n");
    process.stderr.write(`Version:     v${getPackageJsonVersion()}\n`);
    process.stderr.write(`Hub URL:     ${url}\n`);
    process.stderr.write(`Auth:        ${token ? "bearer token" : "none"}\n`);
    process.stderr.write("───────────────────────────────────────────────────────────────\n");
    process.stderr.write("Press Ctrl+C to stop.\n\n");
    await waitForShutdown(() => handle.close());
  } catch (err) {
    process.stderr.write(String(err) + "\n");
    exit(EXIT.SERVER_FAILURE);
  }
}
