import type { AppConfig } from "../infrastructure/config/schema";

export type LogLevel = AppConfig["logLevel"];

export type Logger = {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

const order: LogLevel[] = ["silent", "error", "warn", "info", "debug"];

export function createLogger(
  config: Pick<AppConfig, "logLevel">,
  write: (line: string) => void = (line) => console.error(line),
): Logger {
  const level = config.logLevel;
  const enabled = (target: LogLevel) =>
    level !== "silent" && order.indexOf(level) >= order.indexOf(target);

  return {
    debug: (m) => enabled("debug") && write(m),
    info: (m) => enabled("info") && write(m),
    warn: (m) => enabled("warn") && write(m),
    error: (m) => enabled("error") && write(m),
  };
}
