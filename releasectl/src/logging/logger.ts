/**
 * Logging
 *
 * One root winston logger per process, with per-component children.
 * Everything goes to stderr so stdout carries only command output.
 *
 *   human:  INFO  [publisher] Transferring client-0.0.1.zip
 *   jsonl:  {"component":"publisher","level":"info","message":"...","timestamp":"..."}
 */

import winston from "winston";

export type LogFormat = "human" | "jsonl";
export type Logger = winston.Logger;

export type LoggerOptions = {
  format?: LogFormat;
  level?: string;
  silent?: boolean;
};

const ALL_LEVELS = ["error", "warn", "info", "http", "verbose", "debug", "silly"];

function buildFormat(format: LogFormat): winston.Logform.Format {
  if (format === "jsonl") {
    return winston.format.combine(winston.format.timestamp(), winston.format.json());
  }
  return winston.format.printf((info) => {
    const level = info.level.toUpperCase().padEnd(5);
    const component = typeof info["component"] === "string" ? ` [${info["component"]}]` : "";
    return `${level}${component} ${String(info.message)}`;
  });
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  return winston.createLogger({
    level: opts.level ?? process.env.RELEASECTL_LOG_LEVEL ?? "info",
    silent: opts.silent ?? false,
    transports: [
      new winston.transports.Console({
        format: buildFormat(opts.format ?? "human"),
        stderrLevels: ALL_LEVELS,
      }),
    ],
  });
}

let root: Logger | null = null;

/** Replace the root logger. Called once by the CLI after flags are parsed. */
export function initLogging(opts: LoggerOptions = {}): Logger {
  root = createLogger(opts);
  return root;
}

/** Child logger tagged with `component`; lazily initializes a default root. */
export function getLogger(component: string): Logger {
  const base = root ?? initLogging();
  return base.child({ component });
}
