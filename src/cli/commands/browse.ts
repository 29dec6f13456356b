import chalk from "chalk";
import { EXIT, exit } from "../../shared/errors.js";
import { DEFAULT_MAX_SEARCH_RESULTS } from "../../shared/constants.js";
import { settingsFromOptions, type CommandOptions } from "../options.js";
import { createRuntime } from "../runtime.js";
import { parseIntOption } from "../utils.js";

export async function runBrowse(opts: CommandOptions): Promise<void> {
  const settings = await settingsFromOptions(opts);
  let limit: number;
  try {
    limit = parseIntOption(opts.limit, "limit") ?? DEFAULT_MAX_SEARCH_RESULTS;
  } catch (err) {
    exit(EXIT.INVALID_ARGS, err instanceof Error ? err.message : String(err));
  }
  const { orchestrator, menu } = createRuntime(settings);
  menu.teardown();

  const event = await orchestrator.findSessions(limit);
  if (opts.json === true) {
    process.stdout.write(JSON.stringify(event.results, null, 2) + "\n");
  } else {
    for (const result of event.results) {
      const tag = result.attributes.matchTag;
      const highlight = tag === settings.matchTag ? chalk.green(tag) : tag;
      process.stdout.write(`${result.handle}  ${highlight}  owner=${result.ownerId}  open=${result.openSlots}\n`);
    }
  }
  if (!event.success) {
    exit(EXIT.SESSION_FAILURE, "No sessions found.");
  }
}
