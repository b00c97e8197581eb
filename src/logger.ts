import pc from "picocolors";

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

type LogType = Exclude<LogLevel, "silent">;

export interface LogOptions {
  error?: Error;
}

export interface PillbarLogger {
  debug(msg: string, options?: LogOptions): void;
  info(msg: string, options?: LogOptions): void;
  warn(msg: string, options?: LogOptions): void;
  warnOnce(msg: string, options?: LogOptions): void;
  error(msg: string, options?: LogOptions): void;
  hasErrorLogged(error: Error): boolean;
}

type TagColor = (text: string) => string;

const TAG_COLORS: Record<string, TagColor> = {
  toolbar: pc.cyan,
  navbar: pc.magenta,
  tabbar: pc.blue,
  bridge: pc.yellow,
  pillbar: pc.green,
};

const LOG_LEVELS: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

function formatTag(tag: string): string {
  const colorize = TAG_COLORS[tag] ?? pc.gray;
  const padded = `[${tag}]`.padEnd(10);
  return colorize(padded);
}

// Also runs inside a web view, where there is no `process`.
export function createPillbarLogger(tag: string, level: LogLevel = "warn"): PillbarLogger {
  const threshold = LOG_LEVELS[level];
  const loggedErrors = new WeakSet<Error>();
  const warnedMessages = new Set<string>();
  const prefix = formatTag(tag);

  function output(logType: LogType, msg: string, options?: LogOptions): void {
    if (options?.error && (logType === "warn" || logType === "error")) {
      loggedErrors.add(options.error);
    }
    if (LOG_LEVELS[logType] > threshold) return;
    console[logType](`${prefix} ${msg}`);
  }

  return {
    debug(msg, options) {
      output("debug", pc.dim(msg), options);
    },

    info(msg, options) {
      output("info", msg, options);
    },

    warn(msg, options) {
      output("warn", pc.yellow(msg), options);
    },

    warnOnce(msg, options) {
      if (warnedMessages.has(msg)) return;
      warnedMessages.add(msg);
      output("warn", pc.yellow(msg), options);
    },

    error(msg, options) {
      output("error", pc.red(msg), options);
    },

    hasErrorLogged(error) {
      return loggedErrors.has(error);
    },
  };
}

/** Renders a value for a log line without throwing on cycles. */
export function formatValue(value: unknown): string {
  if (value instanceof Error) return value.message;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
