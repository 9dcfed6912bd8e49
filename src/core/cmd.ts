import type { LogLevel } from "./config";
import type { Board } from "../domain/chess/board";

export type Cmd =
  | { tag: "PRINT_BOARD"; board: Board }
  | { tag: "LOG"; level: LogLevel; message: string };
