import { Writable } from "node:stream";
import { pino, type Logger } from "pino";
import { PinoPretty } from "pino-pretty";

export type LogLevel = "error" | "warn" | "info" | "debug" | "silent";
export type LogFormat = "text" | "json" | "plain";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug", "silent"];
export const LOG_FORMATS: readonly LogFormat[] = ["text", "json", "plain"];

export function redactSecrets(input: string): string {
  return input
    .replace(/\bBearer\s+[A-Za-z0-9._~+/-]+=*/g, "Bearer [REDACTED]")
    .replace(/\b(MATCHLINK_TOKEN)\s*=\s*([^\s]+)/gi, (_match, name: string) => `${name}=[REDACTED]`)
    .replace(
      /\b(MATCHLINK_TOKEN|token)\b(["']?)\s*:\s*["']([^"']+)["']/gi,
      (_match, name: string, quote: string) => `${name}${quote}:"[REDACTED]"`
    );
}

export function maskSensitiveObject<T>(value: T): T {
  try {
    const serialized = JSON.stringify(value);
    if (!serialized) return value;
    return JSON.parse(redactSecrets(serialized)) as T;
  } catch {
    return value;
  }
}

export function isLogLevel(s: string): s is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(s);
}

export function isLogFormat(s: string): s is LogFormat {
  return (LOG_FORMATS as readonly string[]).includes(s);
}

function redactingStderr(): Writable {
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      const s = typeof chunk === "string" ? chunk : chunk.toString("utf8");
      process.stderr.write(redactSecrets(s));
      cb();
    },
  });
}

/** Writable that parses pino JSON lines and writes only the message (no time/level). */
function plainMessageStderr(): Writable {
  let buffer = "";
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      buffer += typeof chunk === "string" ? chunk : chunk.toString("utf8");
      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";
      for (const line of lines) {
        if (!line.trim()) continue;
        try {
          const o: unknown = JSON.parse(line);
          if (o && typeof o === "object" && "msg" in o && typeof o.msg === "string") {
            process.stderr.write(redactSecrets(o.msg) + "\n");
          }
        } catch {
          process.stderr.write(redactSecrets(line) + "\n");
        }
      }
      cb();
    },
  });
}

let rootLogger: Logger | null = null;

export function initLogger(level = "info", format: LogFormat = "text"): void {
  const logLevel = isLogLevel(level) ? level : "info";
  if (format === "plain") {
    rootLogger = pino({ level: logLevel, name: "matchlink" }, plainMessageStderr());
  } else {
    const dest = redactingStderr();
    if (format === "text") {
      const prettyStream = PinoPretty({ colorize: true, destination: dest });
      rootLogger = pino({ level: logLevel, name: "matchlink" }, prettyStream);
    } else {
      rootLogger = pino({ level: logLevel, name: "matchlink" }, dest);
    }
  }
}

function ensureLogger(): Logger {
  if (!rootLogger) {
    initLogger(process.env.MATCHLINK_LOG_LEVEL ?? "info", "plain");
  }
  if (!rootLogger) {
    rootLogger = pino({ level: "info", name: "matchlink" }, redactingStderr());
  }
  return rootLogger;
}

export function getLogger(): Logger {
  return ensureLogger();
}

/** Child logger tagged with the emitting component. */
export function componentLogger(component: string): Logger {
  return ensureLogger().child({ component });
}
