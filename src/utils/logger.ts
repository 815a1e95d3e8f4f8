export type LogLevel = "info" | "warn" | "error" | "debug";

export type LogFormat = "human" | "json";

export interface LogContext {
  [key: string]: string | number | boolean | null | undefined;
}

export interface Logger {
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
  debug: (message: string, context?: LogContext) => void;
}

/** Receives one formatted line, without the trailing newline. */
export type LogSink = (line: string) => void;

export interface LoggerOptions {
  /** Defaults to `PBR_LOG_FORMAT`, then human. */
  format?: LogFormat;
  /** Defaults to auto-detection on stderr, off when `NO_COLOR` is set. */
  color?: boolean;
  sink?: LogSink;
}

interface LogEntry {
  level: LogLevel;
  timestamp: string;
  elapsedMs: number;
  message: string;
  context?: LogContext;
}

const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const GRAY = "\x1b[90m";
const CYAN = "\x1b[36m";

const LEVEL_STYLES: Record<LogLevel, { label: string; color: string }> = {
  info: { label: "INFO", color: "\x1b[32m" },
  warn: { label: "WARN", color: "\x1b[33m" },
  error: { label: "ERR!", color: "\x1b[31m" },
  debug: { label: "DEBG", color: GRAY }
};

// stdout stays free for the interactive picker.
const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

function detectColor(): boolean {
  if (process.env.NO_COLOR !== undefined) {
    return false;
  }
  return Boolean(process.stderr.isTTY);
}

function detectFormat(): LogFormat {
  return process.env.PBR_LOG_FORMAT === "json" ? "json" : "human";
}

function formatElapsed(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  return `${(ms / 60_000).toFixed(1)}m`;
}

/** `key=value` pairs; values with whitespace are quoted and undefined values dropped. */
export function formatContext(context: LogContext): string {
  return Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => {
      const text = String(value);
      return /\s/.test(text) ? `${key}="${text}"` : `${key}=${text}`;
    })
    .join(" ");
}

function formatHuman(entry: LogEntry, color: boolean): string {
  const head = `[${entry.timestamp}] +${formatElapsed(entry.elapsedMs)}`;
  const style = LEVEL_STYLES[entry.level];
  const context = entry.context ? formatContext(entry.context) : "";

  if (!color) {
    return [head, style.label, entry.message, context].filter(Boolean).join(" ");
  }
  return [
    `${GRAY}${head}${RESET}`,
    `${style.color}${BOLD}${style.label}${RESET}`,
    `${style.color}${entry.message}${RESET}`,
    context ? `${CYAN}${context}${RESET}` : ""
  ]
    .filter(Boolean)
    .join(" ");
}

/**
 * Creates the run logger. Lines go to stderr and carry a timestamp, the time
 * elapsed since the logger was created and optional key=value context.
 * `PBR_LOG_FORMAT=json` switches to newline-delimited JSON.
 */
export function createLogger(verbose: boolean, options: LoggerOptions = {}): Logger {
  const format = options.format ?? detectFormat();
  const color = options.color ?? detectColor();
  const sink = options.sink ?? stderrSink;
  const startTime = Date.now(); // Date.now so vi.useFakeTimers works

  function emit(level: LogLevel, message: string, context?: LogContext): void {
    const entry: LogEntry = {
      level,
      timestamp: new Date().toISOString(),
      elapsedMs: Date.now() - startTime,
      message,
      ...(context && Object.keys(context).length > 0 ? { context } : {})
    };
    sink(format === "json" ? JSON.stringify(entry) : formatHuman(entry, color));
  }

  return {
    info: (message, context?) => emit("info", message, context),
    warn: (message, context?) => emit("warn", message, context),
    error: (message, context?) => emit("error", message, context),
    debug: (message, context?) => {
      if (verbose) {
        emit("debug", message, context);
      }
    }
  };
}

/** Wraps a logger so that `base` is merged into the context of every line. */
export function withContext(logger: Logger, base: LogContext): Logger {
  const merge = (context?: LogContext): LogContext => ({ ...base, ...(context ?? {}) });
  return {
    info: (message, context?) => logger.info(message, merge(context)),
    warn: (message, context?) => logger.warn(message, merge(context)),
    error: (message, context?) => logger.error(message, merge(context)),
    debug: (message, context?) => logger.debug(message, merge(context))
  };
}

/** Logger that drops everything; for library callers that pass none. */
export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined
};
