import { describe, expect, it } from "vitest";
import { occupiedSquares, pieceAt } from "./board";
import { location } from "./geometry";
import { piece } from "./pieces";
import { standardBoard } from "./setup";

describe("standardBoard", () => {
  it("places sixteen pieces a side", () => {
    const board = standardBoard();
    expect(occupiedSquares(board, "white")).toHaveLength(16);
    expect(occupiedSquares(board, "black")).toHaveLength(16);
  });

  it("puts kings on x = 4 and queens on x = 3", () => {
    const board = standardBoard();
    expect(pieceAt(board, location(4, 0))).toEqual(piece("white", "king"));
    expect(pieceAt(board, location(3, 0))).toEqual(piece("white", "queen"));
    expect(pieceAt(board, location(4, 7))).toEqual(piece("black", "king"));
    expect(pieceAt(board, location(3, 7))).toEqual(piece("black", "queen"));
  });

  it("fills the pawn ranks and leaves the middle empty", () => {
    const board = standardBoard();
    for (let x = 0; x < 8; x += 1) {
      expect(pieceAt(board, location(x, 1))).toEqual(piece("white", "pawn"));
      expect(pieceAt(board, location(x, 6))).toEqual(piece("black", "pawn"));
      for (let y = 2; y < 6; y += 1) {
        expect(pieceAt(board, location(x, y))).toBeNull();
      }
    }
  });
});
