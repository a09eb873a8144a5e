export interface Logger {
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

type LogLevel = "info" | "warn" | "error";

export function createNoopLogger(): Logger {
  return {
    info() {},
    warn() {},
    error() {}
  };
}

/**
 * One JSON line per entry. `info` goes to stdout, `warn` and `error` to stderr.
 */
export function createConsoleLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string, context?: Record<string, unknown>) => {
    const line = JSON.stringify({
      level,
      scope,
      message,
      time_utc: new Date().toISOString(),
      ...(context ?? {})
    });
    if (level === "info") {
      console.log(line);
    } else {
      console.error(line);
    }
  };

  return {
    info(message, context) {
      write("info", message, context);
    },
    warn(message, context) {
      write("warn", message, context);
    },
    error(message, context) {
      write("error", message, context);
    }
  };
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
