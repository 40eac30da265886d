export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface LogStream {
  write: (chunk: string) => unknown;
}

export interface LoggerOptions {
  stream?: LogStream;
  level?: LogLevel;
  component?: string;
}

export interface Logger {
  readonly level: LogLevel;
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  child(component: string): Logger;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const stream = options.stream ?? process.stderr;
  const level = options.level ?? "warn";
  const component = options.component;

  const log = (entryLevel: Exclude<LogLevel, "silent">, message: string, data?: unknown): void => {
    if (LEVEL_RANK[entryLevel] < LEVEL_RANK[level]) {
      return;
    }
    stream.write(formatLogLine(entryLevel, component, message, data));
  };

  return {
    level,
    debug: (message, data) => log("debug", message, data),
    info: (message, data) => log("info", message, data),
    warn: (message, data) => log("warn", message, data),
    error: (message, data) => log("error", message, data),
    child: (childComponent) =>
      createLogger({
        stream,
        level,
        component: component === undefined ? childComponent : `${component}:${childComponent}`,
      }),
  };
}

function formatLogLine(
  level: string,
  component: string | undefined,
  message: string,
  data: unknown,
): string {
  const prefix = component === undefined ? `[${level}]` : `[${level}] [${component}]`;
  const suffix = data === undefined ? "" : ` ${JSON.stringify(data)}`;
  return `${prefix} ${message}${suffix}\n`;
}
