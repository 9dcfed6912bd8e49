import type { Config } from "./core/config";
import { loadConfig } from "./core/config";
import { initialModel } from "./core/model";
import type { Result } from "./core/result";
import { mapError, ok } from "./core/result";
import { createRuntime } from "./core/runtime";
import type { Board } from "./domain/chess/board";
import { emptyBoard } from "./domain/chess/board";
import { parsePlacement } from "./domain/chess/fen";
import { standardBoard } from "./domain/chess/setup";
import { createLogger } from "./ports/logger";
import { DEMO_SCRIPT, decodeScript, describeScriptError, loadScript } from "./ports/script";

const startBoard = (config: Config): Result<Board, string> =>
  config.startPlacement === null
    ? ok(standardBoard())
    : mapError(parsePlacement(config.startPlacement), (error) =>
        error.tag === "EMPTY" ? "Start position is empty" : `Bad start position (${error.tag}): ${error.detail}`,
      );

const main = async (): Promise<number> => {
  const config = loadConfig(process.env);
  if (!config.ok) {
    console.error(`[CONFIG] Invalid ${config.error.variable}: "${config.error.value}"`);
    return 1;
  }
  const logger = createLogger("sim", config.value.logLevel);

  const board = startBoard(config.value);
  if (!board.ok) {
    logger.error(board.error);
    return 1;
  }

  const { scriptPath } = config.value;
  const script = scriptPath === null ? decodeScript(DEMO_SCRIPT) : await loadScript(scriptPath);
  if (!script.ok) {
    logger.error(describeScriptError(script.error));
    return 1;
  }
  logger.debug(`Running ${script.value.length} moves from ${scriptPath ?? "the demo script"}`);

  const { dispatch } = createRuntime(initialModel(emptyBoard()), {
    logger,
    print: (text) => console.log(text),
  });
  dispatch({ tag: "BoardLoaded", board: board.value });
  script.value.forEach((move) => dispatch({ tag: "MoveProposed", move }));
  return 0;
};

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("[SIM] Fatal:", error);
    process.exitCode = 1;
  },
);
