import { getConfigPath } from "../../config.js";
import { dataDirFromOptions, settingsFromOptions, type CommandOptions } from "../options.js";
import { getPackageJsonVersion } from "../utils.js";

export async function runStatus(opts: CommandOptions): Promise<void> {
  const settings = await settingsFromOptions(opts);
  const status = {
    version: getPackageJsonVersion(),
    configPath: getConfigPath(dataDirFromOptions(opts)),
    ...settings,
    ...(settings.hubToken ? { hubToken: "***" } : {}),
  };
  process.stdout.write(JSON.stringify(status, null, 2) + "\n");
}
