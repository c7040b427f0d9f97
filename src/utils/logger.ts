export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let minimumLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

// stdout belongs to the stdio MCP transport, so everything goes to stderr.
function emit(scope: string, level: LogLevel, message: string, context?: LogContext): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel]) {
    return;
  }
  const line = `${new Date().toISOString()} ${level.toUpperCase()} [${scope}] ${message}`;
  const write = level === "warn" ? console.warn : console.error;
  if (context && Object.keys(context).length > 0) {
    write(line, context);
    return;
  }
  write(line);
}

export function createLogger(scope: string): Logger {
  return {
    debug: (message, context) => emit(scope, "debug", message, context),
    info: (message, context) => emit(scope, "info", message, context),
    warn: (message, context) => emit(scope, "warn", message, context),
    error: (message, context) => emit(scope, "error", message, context),
  };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : "unknown error";
}
