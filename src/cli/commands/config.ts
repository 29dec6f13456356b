import { CONFIG_KEYS, configGet, configSet, isConfigKey, readFullConfig } from "../../config.js";
import { EXIT, exit } from "../../shared/errors.js";
import { maskSensitiveObject } from "../../shared/logging.js";
import { dataDirFromOptions, type CommandOptions } from "../options.js";

function requireKey(key: string) {
  if (!isConfigKey(key)) {
    exit(EXIT.INVALID_ARGS, `Unknown key. Known keys: ${CONFIG_KEYS.join(", ")}`);
  }
  return key;
}

export async function runConfigGet(key: string, opts: CommandOptions): Promise<void> {
  const value = await configGet(dataDirFromOptions(opts), requireKey(key));
  if (value !== undefined) process.stdout.write(value + "\n");
}

export async function runConfigSet(key: string, value: string, opts: CommandOptions): Promise<void> {
  const result = await configSet(dataDirFromOptions(opts), requireKey(key), value);
  if (!result.ok) {
    exit(EXIT.INVALID_ARGS, `Invalid value for ${key}: ${result.message}`);
  }
  process.stdout.write(`Set ${key}\n`);
}

export async function runConfigShow(opts: CommandOptions): Promise<void> {
  const full = await readFullConfig(dataDirFromOptions(opts));
  process.stdout.write(JSON.stringify(maskSensitiveObject(full), null, 2) + "\n");
}
