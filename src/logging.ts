import chalk from "chalk";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type LogContext = Record<string, unknown>;

export type SubsystemLogger = {
  readonly subsystem: string;
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
  child: (name: string) => SubsystemLogger;
};

export type LogSink = (line: string) => void;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LEVEL_TAG: Record<Exclude<LogLevel, "silent">, string> = {
  debug: chalk.gray("DEBUG"),
  info: chalk.cyan("INFO"),
  warn: chalk.yellow("WARN"),
  error: chalk.red("ERROR"),
};

// stdout carries the stdio transport, so every log line goes to stderr.
const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

export type LoggerOptions = {
  /** Lowest level written. Defaults to info. */
  level?: LogLevel;
  sink?: LogSink;
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function formatContext(context?: LogContext): string {
  if (!context || Object.keys(context).length === 0) return "";
  try {
    return ` ${JSON.stringify(context)}`;
  } catch {
    return " [unserializable context]";
  }
}

export function createSubsystemLogger(
  subsystem: string,
  options: LoggerOptions = {},
): SubsystemLogger {
  const threshold = LEVEL_RANK[options.level ?? "info"];
  const sink = options.sink ?? stderrSink;
  const emit = (
    level: Exclude<LogLevel, "silent">,
    message: string,
    context?: LogContext,
  ) => {
    if (LEVEL_RANK[level] < threshold) return;
    const timestamp = new Date().toISOString();
    sink(
      `${chalk.gray(timestamp)} ${LEVEL_TAG[level]} ${chalk.magenta(`[${subsystem}]`)} ${message}${formatContext(context)}`,
    );
  };

  return {
    subsystem,
    debug: (message, context) => emit("debug", message, context),
    info: (message, context) => emit("info", message, context),
    warn: (message, context) => emit("warn", message, context),
    error: (message, context) => emit("error", message, context),
    child: (name) => createSubsystemLogger(`${subsystem}/${name}`, options),
  };
}
