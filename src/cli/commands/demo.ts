import chalk from "chalk";
import { createInMemoryListingStore } from "../../shared/listings/index.js";
import { EXIT, exit } from "../../shared/errors.js";
import { settingsFromOptions, type CommandOptions } from "../options.js";
import { createRuntime } from "../runtime.js";

/**
 * Two players on one in-process LAN: the first hosts, the second searches,
 * joins and connects; then the host starts the match and both tear down.
 */
export async function runDemo(opts: CommandOptions): Promise<void> {
  const base = await settingsFromOptions(opts);
  const directory = createInMemoryListingStore();
  const host = createRuntime(
    { ...base, backend: "lan", playerId: "demo-host", playerAddress: "127.0.0.1:7777" },
    directory
  );
  const client = createRuntime(
    { ...base, backend: "lan", playerId: "demo-client", playerAddress: "127.0.0.1:7778" },
    directory
  );

  const step = (label: string, ok: boolean) =>
    process.stderr.write(`${ok ? chalk.green("✓") : chalk.red("✗")} ${label}\n`);

  await host.menu.hostClicked();
  const hosted = host.orchestrator.getNamedSession() !== undefined;
  step(`host created ${base.matchTag} session`, hosted);
  for (const r of host.travel.requests) step(`host travels to ${r.target}`, true);

  await client.menu.joinClicked();
  const connect = client.travel.requests.find((r) => r.type === "connect");
  step(connect ? `client connects to ${connect.target}` : "client could not join", connect !== undefined);

  const started = await host.orchestrator.startSession();
  step("host started the match", started.success);

  const left = await client.orchestrator.destroySession();
  step("client left the session", left.success);
  const ended = await host.orchestrator.destroySession();
  step("host ended the session", ended.success);

  host.menu.teardown();
  client.menu.teardown();
  if (!hosted || !connect || !started.success) {
    exit(EXIT.SESSION_FAILURE);
  }
}
