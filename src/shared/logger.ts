export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  debug?: boolean;
  sink?: (line: string) => void;
}

// stdout belongs to the protocol stream, so log lines go to stderr.
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? ((line: string) => console.error(line));
  const write = (level: LogLevel, message: string) => {
    const tag = level === "info" ? "" : ` ${level.toUpperCase()}`;
    sink(`[${scope}]${tag} ${message}`);
  };

  return {
    debug: (message) => {
      if (options.debug) {
        write("debug", message);
      }
    },
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
