/**
 * Structured Logging
 * Leveled logger with pluggable handlers and child contexts.
 *
 * All output goes to stderr so that the CLI can keep stdout for the
 * answer payload (`mobility ask ... --json | jq`).
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  correlationId?: string;
  component?: string;
  kind?: string;
  period?: string;
  step?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export type LogHandler = (entry: LogEntry) => void;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = "info";

const handlers: LogHandler[] = [];

const COLORS: Record<LogLevel, string> = {
  debug: "\x1b[90m", // gray
  info: "\x1b[36m", // cyan
  warn: "\x1b[33m", // yellow
  error: "\x1b[31m", // red
};
const RESET = "\x1b[0m";

/**
 * Console handler, colored when stderr is a TTY
 */
const consoleHandler: LogHandler = (entry) => {
  const useColor = process.stderr.isTTY === true;
  const tag = `[${entry.timestamp}] [${entry.level.toUpperCase()}]`;
  const prefix = useColor ? `${COLORS[entry.level]}${tag}${RESET}` : tag;
  const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : "";

  console.error(`${prefix} ${entry.message}${contextStr}`);
  if (entry.error) {
    console.error(`  Error: ${entry.error.name}: ${entry.error.message}`);
    if (entry.error.stack) {
      console.error(`  Stack: ${entry.error.stack.split("\n").slice(1, 4).join("\n")}`);
    }
  }
};

handlers.push(consoleHandler);

function createEntry(
  level: LogLevel,
  message: string,
  context?: LogContext,
  error?: Error
): LogEntry {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
  };

  if (context && Object.keys(context).length > 0) {
    entry.context = context;
  }

  if (error) {
    entry.error = {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return entry;
}

function emit(entry: LogEntry): void {
  if (LEVEL_PRIORITY[entry.level] < LEVEL_PRIORITY[currentLevel]) {
    return;
  }

  for (const handler of handlers) {
    try {
      handler(entry);
    } catch (e) {
      console.error("Logger handler error:", e);
    }
  }
}

export const logger = {
  setLevel(level: LogLevel): void {
    currentLevel = level;
  },

  getLevel(): LogLevel {
    return currentLevel;
  },

  /**
   * Add a handler next to the console one
   */
  addHandler(handler: LogHandler): void {
    handlers.push(handler);
  },

  /**
   * Replace every handler; an empty list silences output entirely
   */
  setHandlers(next: LogHandler[]): void {
    handlers.length = 0;
    handlers.push(...next);
  },

  /**
   * Back to the single console handler
   */
  resetHandlers(): void {
    handlers.length = 0;
    handlers.push(consoleHandler);
  },

  debug(message: string, context?: LogContext): void {
    emit(createEntry("debug", message, context));
  },

  info(message: string, context?: LogContext): void {
    emit(createEntry("info", message, context));
  },

  warn(message: string, context?: LogContext): void {
    emit(createEntry("warn", message, context));
  },

  error(message: string, error?: unknown, context?: LogContext): void {
    const err = error instanceof Error ? error : undefined;
    emit(createEntry("error", message, context, err));
  },

  child(baseContext: LogContext): ChildLogger {
    return new ChildLogger(baseContext);
  },

  /**
   * Log a numeric measurement (durations, row counts)
   */
  metric(name: string, value: number, context?: LogContext): void {
    emit(
      createEntry("info", `METRIC: ${name}=${value}`, {
        ...context,
        metric: name,
        value,
      })
    );
  },
};

/**
 * Child logger with preset context
 */
class ChildLogger {
  constructor(private baseContext: LogContext) {}

  debug(message: string, context?: LogContext): void {
    logger.debug(message, { ...this.baseContext, ...context });
  }

  info(message: string, context?: LogContext): void {
    logger.info(message, { ...this.baseContext, ...context });
  }

  warn(message: string, context?: LogContext): void {
    logger.warn(message, { ...this.baseContext, ...context });
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    logger.error(message, error, { ...this.baseContext, ...context });
  }

  metric(name: string, value: number, context?: LogContext): void {
    logger.metric(name, value, { ...this.baseContext, ...context });
  }

  child(additionalContext: LogContext): ChildLogger {
    return new ChildLogger({ ...this.baseContext, ...additionalContext });
  }
}

export type { ChildLogger };
