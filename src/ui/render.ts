import type { Board, Square } from "../domain/chess/board";
import { squareAt } from "../domain/chess/board";
import { BOARD_SIZE, location } from "../domain/chess/geometry";
import { pieceCode } from "../domain/chess/pieces";

const cell = (square: Square): string => (square.tag === "OCCUPIED" ? pieceCode(square.piece) : "-");

// One line per y, starting at y = 0 (white's back rank).
export const renderBoard = (board: Board): string => {
  const lines: string[] = [];
  for (let y = 0; y < BOARD_SIZE; y += 1) {
    const row: string[] = [];
    for (let x = 0; x < BOARD_SIZE; x += 1) {
      row.push(cell(squareAt(board, location(x, y))));
    }
    lines.push(row.join(","));
  }
  return lines.join("\n");
};
