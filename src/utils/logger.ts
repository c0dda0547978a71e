export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let activeLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

// stdout belongs to the stdio MCP transport, so every record goes to stderr.
export function createLogger(scope: string, level?: LogLevel): Logger {
  const enabled = (wanted: LogLevel) =>
    LEVEL_ORDER[wanted] >= LEVEL_ORDER[level ?? activeLevel];

  const write = (wanted: Exclude<LogLevel, "silent">, message: string, fields?: LogFields) => {
    if (!enabled(wanted)) {
      return;
    }
    const suffix = fields && Object.keys(fields).length > 0 ? ` ${formatFields(fields)}` : "";
    console.error(
      `${new Date().toISOString()} ${wanted.toUpperCase().padEnd(5)} [${scope}] ${message}${suffix}`,
    );
  };

  return {
    debug: (message, fields) => write("debug", message, fields),
    info: (message, fields) => write("info", message, fields),
    warn: (message, fields) => write("warn", message, fields),
    error: (message, fields) => write("error", message, fields),
    child: (childScope) => createLogger(`${scope}:${childScope}`, level),
  };
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === "string" ? error : "unknown error";
}

function formatFields(fields: LogFields): string {
  return JSON.stringify(fields, (_key, value: unknown) => {
    if (value instanceof Error) {
      return value.message;
    }
    return value;
  });
}
