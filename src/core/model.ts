import type { Board } from "../domain/chess/board";
import type { Move } from "../domain/chess/geometry";

export type Brand<T, B extends string> = T & { readonly __brand: B };

export type MoveOutcome = Readonly<{
  move: Move;
  valid: boolean;
}>;

export type Model = Readonly<{
  board: Board;
  /** Every proposed move that had a piece on its source square, oldest first. */
  outcomes: ReadonlyArray<MoveOutcome>;
  status: string;
}>;

export const initialModel = (board: Board): Model => ({
  board,
  outcomes: [],
  status: "Ready",
});
