/** Severity levels in ascending order. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

/** Structured context attached to a log entry. */
export type LogContext = Record<string, unknown>;

/**
 * Scoped logger. Entries below the configured level are dropped.
 */
export type Logger = {
  /** Derive a logger whose scope is appended to this one (e.g. "reflow:shaping"). */
  child(scope: string): Logger;
  trace(msg: string, ctx?: LogContext): void;
  debug(msg: string, ctx?: LogContext): void;
  info(msg: string, ctx?: LogContext): void;
  warn(msg: string, ctx?: LogContext): void;
  error(msg: string, ctx?: LogContext): void;
  /**
   * Emit a warning only the first time `key` is seen by this logger family.
   * Used for conditions that would otherwise repeat once per run or paragraph.
   */
  warnOnce(key: string, msg: string, ctx?: LogContext): void;
};

/** Options for {@link createLogger}. */
export type LoggerOptions = {
  /** Minimum level to emit; defaults to LOG_LEVEL or "info". */
  level?: LogLevel;
  /** Sink for formatted lines; defaults to console.warn/console.log by severity. */
  write?: (level: LogLevel, line: string) => void;
};

const LEVELS: LogLevel[] = ["trace", "debug", "info", "warn", "error"];

function levelIndex(level: LogLevel): number {
  return LEVELS.indexOf(level);
}

/** Parse a LOG_LEVEL style value, returning null for anything unrecognized. */
export function parseLogLevel(value: string | undefined): LogLevel | null {
  if (!value) return null;
  const normalized = value.trim().toLowerCase();
  for (const level of LEVELS) {
    if (level === normalized) return level;
  }
  return null;
}

function defaultWrite(level: LogLevel, line: string): void {
  if (levelIndex(level) >= levelIndex("warn")) {
    console.warn(line);
  } else {
    console.log(line);
  }
}

function formatLine(level: LogLevel, scope: string, msg: string, ctx?: LogContext): string {
  const head = `[${scope}] ${level.toUpperCase()}`;
  const ctxStr = ctx && Object.keys(ctx).length ? ` ${JSON.stringify(ctx)}` : "";
  return `${head} ${msg}${ctxStr}`;
}

/**
 * Create a console logger for `scope`. Children share the minimum level,
 * the sink, and the warn-once registry of their root.
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? parseLogLevel(process.env.LOG_LEVEL) ?? "info";
  const write = options.write ?? defaultWrite;
  const seen = new Set<string>();

  const build = (currentScope: string): Logger => {
    const emit = (entryLevel: LogLevel, msg: string, ctx?: LogContext) => {
      if (levelIndex(entryLevel) < levelIndex(level)) return;
      write(entryLevel, formatLine(entryLevel, currentScope, msg, ctx));
    };
    return {
      child: (childScope) => build(`${currentScope}:${childScope}`),
      trace: (msg, ctx) => emit("trace", msg, ctx),
      debug: (msg, ctx) => emit("debug", msg, ctx),
      info: (msg, ctx) => emit("info", msg, ctx),
      warn: (msg, ctx) => emit("warn", msg, ctx),
      error: (msg, ctx) => emit("error", msg, ctx),
      warnOnce(key, msg, ctx) {
        if (seen.has(key)) return;
        seen.add(key);
        emit("warn", msg, ctx);
      },
    };
  };

  return build(scope);
}

/** Logger that discards everything. */
export function createSilentLogger(): Logger {
  return createLogger("silent", { level: "error", write: () => {} });
}
