import type { LogLevel } from "../core/config";
import { LOG_LEVELS } from "../core/config";

export type LogSink = Readonly<Record<LogLevel, (...data: unknown[]) => void>>;

export type Logger = Readonly<Record<LogLevel, (message: string, ...details: unknown[]) => void>>;

const rank = (level: LogLevel): number => LOG_LEVELS.indexOf(level);

/** Writes `[SCOPE] message` lines; anything below `level` is dropped. */
export const createLogger = (scope: string, level: LogLevel, sink: LogSink = console): Logger => {
  const prefix = `[${scope.toUpperCase()}]`;
  const emit =
    (target: LogLevel) =>
    (message: string, ...details: unknown[]): void => {
      if (rank(target) < rank(level)) return;
      sink[target](`${prefix} ${message}`, ...details);
    };
  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
};
