export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: "\x1b[90m", // gray
  info: "\x1b[36m", // cyan
  warn: "\x1b[33m", // yellow
  error: "\x1b[31m", // red
};

const RESET = "\x1b[0m";

export function parseLogLevel(value: string | undefined): LogLevel | null {
  const normalized = value?.trim().toLowerCase();
  if (
    normalized === "debug" ||
    normalized === "info" ||
    normalized === "warn" ||
    normalized === "error"
  ) {
    return normalized;
  }
  return null;
}

let currentLevel: LogLevel = parseLogLevel(process.env.BORGMATE_LOG_LEVEL) ?? "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

export function formatMessage(
  level: LogLevel,
  message: string,
  data?: unknown,
  scope?: string,
): string {
  const timestamp = new Date().toISOString();
  const color = LEVEL_COLORS[level];
  const levelStr = level.toUpperCase().padEnd(5);
  const scopeStr = scope ? ` [${scope}]` : "";

  let formatted = `${color}[${timestamp}] ${levelStr}${RESET}${scopeStr} ${message}`;

  if (data !== undefined) {
    if (data instanceof Error) {
      formatted += ` ${data.name}: ${data.message}`;
    } else if (typeof data === "object") {
      formatted += ` ${JSON.stringify(data, null, 2)}`;
    } else {
      formatted += ` ${String(data)}`;
    }
  }

  return formatted;
}

function write(level: LogLevel, message: string, data?: unknown, scope?: string): void {
  if (!shouldLog(level)) return;
  const line = formatMessage(level, message, data, scope);
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function debug(message: string, data?: unknown): void {
  write("debug", message, data);
}

export function info(message: string, data?: unknown): void {
  write("info", message, data);
}

export function warn(message: string, data?: unknown): void {
  write("warn", message, data);
}

export function error(message: string, data?: unknown): void {
  write("error", message, data);
}

export interface ScopedLogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

/**
 * Logger whose lines carry a component tag, e.g. `[engine]`
 */
export function scoped(scope: string): ScopedLogger {
  return {
    debug: (message, data) => write("debug", message, data, scope),
    info: (message, data) => write("info", message, data, scope),
    warn: (message, data) => write("warn", message, data, scope),
    error: (message, data) => write("error", message, data, scope),
  };
}

export const logger = {
  debug,
  info,
  warn,
  error,
  scoped,
  setLevel: setLogLevel,
  getLevel: getLogLevel,
};
