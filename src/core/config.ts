import type { Result } from "./result";
import { err, ok } from "./result";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: ReadonlyArray<LogLevel> = ["debug", "info", "warn", "error"];

export type Config = Readonly<{
  logLevel: LogLevel;
  /** JSON move script; `null` runs the built-in demo moves. */
  scriptPath: string | null;
  /** FEN placement for the start position; `null` uses the standard setup. */
  startPlacement: string | null;
}>;

export type ConfigError = { tag: "INVALID_CONFIG"; variable: string; value: string };

export type Env = Readonly<Record<string, string | undefined>>;

export const defaultConfig: Config = {
  logLevel: "info",
  scriptPath: null,
  startPlacement: null,
};

const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

const nonBlank = (value: string | undefined): string | null =>
  value !== undefined && value.trim().length > 0 ? value.trim() : null;

export const loadConfig = (env: Env): Result<Config, ConfigError> => {
  const rawLevel = nonBlank(env.CHESS_SIM_LOG_LEVEL);
  const level = rawLevel?.toLowerCase() ?? defaultConfig.logLevel;
  if (!isLogLevel(level)) {
    return err({ tag: "INVALID_CONFIG", variable: "CHESS_SIM_LOG_LEVEL", value: rawLevel ?? "" });
  }
  return ok({
    logLevel: level,
    scriptPath: nonBlank(env.CHESS_SIM_SCRIPT),
    startPlacement: nonBlank(env.CHESS_SIM_START_FEN),
  });
};
