import type { Brand } from "../../core/model";
import type { Result } from "../../core/result";
import { err, ok } from "../../core/result";
import type { Board } from "./board";
import { addPiece, emptyBoard, pieceAt } from "./board";
import { BOARD_SIZE, location } from "./geometry";
import type { Piece } from "./pieces";
import { kindCode, kindFromCode, piece } from "./pieces";

export type FenPlacement = Brand<string, "FenPlacement">;

export type FenError =
  | { tag: "EMPTY" }
  | { tag: "INVALID_RANKS"; detail: string }
  | { tag: "INVALID_ROW"; detail: string };

export const STANDARD_PLACEMENT = "rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR" as FenPlacement;

const fenChar = (p: Piece): string =>
  p.colour === "white" ? kindCode(p.kind).toUpperCase() : kindCode(p.kind);

const fenPiece = (char: string): Piece | null => {
  const kind = kindFromCode(char);
  if (!kind) return null;
  return piece(char === char.toUpperCase() ? "white" : "black", kind);
};

/** Rank 8 (y = 7) first, files a to h within each rank. */
export const toPlacement = (board: Board): FenPlacement => {
  const rows: string[] = [];
  for (let y = BOARD_SIZE - 1; y >= 0; y -= 1) {
    let row = "";
    let gap = 0;
    for (let x = 0; x < BOARD_SIZE; x += 1) {
      const p = pieceAt(board, location(x, y));
      if (!p) {
        gap += 1;
        continue;
      }
      if (gap > 0) {
        row += String(gap);
        gap = 0;
      }
      row += fenChar(p);
    }
    rows.push(gap > 0 ? `${row}${gap}` : row);
  }
  return rows.join("/") as FenPlacement;
};

/** Reads the placement field; anything after the first space is ignored. */
export const parsePlacement = (raw: string): Result<Board, FenError> => {
  if (!raw || raw.trim().length === 0) {
    return err({ tag: "EMPTY" });
  }
  const placement = raw.trim().split(" ")[0] ?? "";
  const rows = placement.split("/");
  if (rows.length !== BOARD_SIZE) {
    return err({ tag: "INVALID_RANKS", detail: placement });
  }
  let board = emptyBoard();
  for (let r = 0; r < BOARD_SIZE; r += 1) {
    const row = rows[r];
    const y = BOARD_SIZE - 1 - r;
    let x = 0;
    for (const char of row) {
      if (char >= "1" && char <= "8") {
        x += Number(char);
        continue;
      }
      const p = fenPiece(char);
      if (!p || x >= BOARD_SIZE) {
        return err({ tag: "INVALID_ROW", detail: row });
      }
      board = addPiece(board, p, location(x, y));
      x += 1;
    }
    if (x !== BOARD_SIZE) {
      return err({ tag: "INVALID_ROW", detail: row });
    }
  }
  return ok(board);
};
