import type { Board } from "../domain/chess/board";
import type { Move } from "../domain/chess/geometry";
import type { Colour } from "../domain/chess/pieces";

export type Msg =
  | { tag: "BoardLoaded"; board: Board }
  | { tag: "MoveProposed"; move: Move }
  | { tag: "CheckRequested"; colour: Colour };
