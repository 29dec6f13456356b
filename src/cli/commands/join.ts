import chalk from "chalk";
import { EXIT, exit } from "../../shared/errors.js";
import { settingsFromOptions, type CommandOptions } from "../options.js";
import { createRuntime } from "../runtime.js";
import { waitForShutdown } from "../utils.js";

export async function runJoin(opts: CommandOptions): Promise<void> {
  const settings = await settingsFromOptions(opts);
  const { orchestrator, menu, travel } = createRuntime(settings);

  await menu.joinClicked();
  const connect = travel.requests.find((r) => r.type === "connect");
  if (!connect) {
    exit(EXIT.SESSION_FAILURE, `Could not join a ${settings.matchTag} session.`);
  }

  process.stderr.write(`${chalk.green("✓")} Joined ${chalk.bold(settings.matchTag)} as ${settings.playerId}\n`);
  process.stdout.write(connect.target + "\n");

  if (opts.wait === false) return;
  process.stderr.write("Press Ctrl+C to leave the session.\n");
  await waitForShutdown(async () => {
    await orchestrator.destroySession();
    menu.teardown();
  });
}
