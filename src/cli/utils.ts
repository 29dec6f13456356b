import { readFileSync, existsSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { parseListen } from "../shared/net.js";
import { VERSION } from "../shared/constants.js";
import { EXIT } from "../shared/errors.js";

export function parseListenWithDefault(listen: string | undefined, fallback: string) {
  return parseListen(typeof listen === "string" && listen ? listen : fallback);
}

export function getPackageJsonVersion(): string {
  try {
    const here = dirname(fileURLToPath(import.meta.url));
    const candidates = [join(here, "..", "..", "package.json"), join(here, "..", "..", "..", "package.json")];
    for (const p of candidates) {
      if (existsSync(p)) {
        const pkg: unknown = JSON.parse(readFileSync(p, "utf8"));
        if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
          return pkg.version;
        }
      }
    }
  } catch {
    return VERSION;
  }
  return VERSION;
}

/** Resolve once SIGINT/SIGTERM arrives and `cleanup` has finished, then exit. */
export function waitForShutdown(cleanup: () => Promise<void>): Promise<never> {
  return new Promise<never>((_, reject) => {
    const closeAll = () =>
      cleanup()
        .then(() => process.exit(EXIT.SUCCESS))
        .catch(reject);
    process.once("SIGINT", closeAll);
    process.once("SIGTERM", closeAll);
  });
}

export function parseIntOption(raw: unknown, name: string): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`Invalid --${name}: expected a non-negative integer, got ${String(raw)}`);
  }
  return n;
}
