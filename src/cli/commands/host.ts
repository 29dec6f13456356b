import chalk from "chalk";
import { EXIT, exit } from "../../shared/errors.js";
import { settingsFromOptions, type CommandOptions } from "../options.js";
import { createRuntime } from "../runtime.js";
import { waitForShutdown } from "../utils.js";

export async function runHost(opts: CommandOptions): Promise<void> {
  const settings = await settingsFromOptions(opts);
  const { orchestrator, menu, travel } = createRuntime(settings);

  await menu.hostClicked();
  const session = orchestrator.getNamedSession();
  if (!session) {
    exit(EXIT.SESSION_FAILURE, "Could not create a session.");
  }

  process.stderr.write(`${chalk.green("✓")} Hosting ${chalk.bold(settings.matchTag)} as ${settings.playerId}\n`);
  process.stderr.write(`  Session:     ${session.handle}\n`);
  process.stderr.write(`  Backend:     ${settings.backend}\n`);
  process.stderr.write(`  Address:     ${orchestrator.getResolvedConnectAddress() ?? "unknown"}\n`);
  for (const request of travel.requests) {
    process.stderr.write(`  Travel:      ${request.target}\n`);
  }

  if (opts.start === true) {
    const started = await orchestrator.startSession();
    process.stderr.write(started.success ? "  Match started.\n" : chalk.yellow("  Match could not be started.\n"));
  }

  process.stderr.write("Press Ctrl+C to end the session.\n");
  await waitForShutdown(async () => {
    await orchestrator.destroySession();
    menu.teardown();
  });
}
