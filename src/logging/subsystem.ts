/**
 * Subsystem Loggers
 *
 * Every module logs through a named child of one shared tslog root, so lines
 * carry the subsystem they came from (e.g. "launcher/supervisor"). Output goes
 * to stderr; stdout belongs to the launcher's own output (--dry-run, --help).
 */

import { formatWithOptions } from "node:util";
import { Logger, type ILogObj } from "tslog";

export type LogLevel = "silly" | "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export type LogFormat = "pretty" | "json";

export type SubsystemLogger = {
  subsystem: string;
  trace: (message: string, meta?: Record<string, unknown>) => void;
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
  fatal: (message: string, meta?: Record<string, unknown>) => void;
};

/** tslog numeric levels */
const LEVEL_IDS: Record<LogLevel, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

const DEFAULT_LOG_LEVEL: LogLevel = "info";

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_IDS, value);
}

export function resolveLogLevel(raw?: string): LogLevel {
  const normalized = raw?.trim().toLowerCase() ?? "";
  return isLogLevel(normalized) ? normalized : DEFAULT_LOG_LEVEL;
}

export function resolveLogFormat(raw?: string): LogFormat {
  return raw?.trim().toLowerCase() === "json" ? "json" : "pretty";
}

let rootLogger: Logger<ILogObj> | null = null;

function getRootLogger(): Logger<ILogObj> {
  if (!rootLogger) {
    // Unnamed, so sub-logger names print without a parent prefix
    const styled = process.stderr.isTTY === true;
    rootLogger = new Logger<ILogObj>({
      type: resolveLogFormat(process.env.LAUNCHER_LOG_FORMAT),
      minLevel: LEVEL_IDS[resolveLogLevel(process.env.LAUNCHER_LOG_LEVEL)],
      prettyLogTemplate: "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ",
      stylePrettyLogs: styled,
      overwrite: {
        transportFormatted: (logMetaMarkup, logArgs, logErrors) => {
          const errors = logErrors.length > 0 ? `\n${logErrors.join("\n")}` : "";
          process.stderr.write(
            `${logMetaMarkup}${formatWithOptions({ colors: styled }, ...logArgs)}${errors}\n`,
          );
        },
        transportJSON: (json) => {
          process.stderr.write(`${JSON.stringify(json)}\n`);
        },
      },
    });
  }
  return rootLogger;
}

function wrap(subsystem: string, logger: Logger<ILogObj>): SubsystemLogger {
  const emit =
    (method: "trace" | "debug" | "info" | "warn" | "error" | "fatal") =>
    (message: string, meta?: Record<string, unknown>) => {
      if (meta) {
        logger[method](message, meta);
      } else {
        logger[method](message);
      }
    };

  return {
    subsystem,
    trace: emit("trace"),
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
    fatal: emit("fatal"),
  };
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  return wrap(subsystem, getRootLogger().getSubLogger({ name: subsystem }));
}
