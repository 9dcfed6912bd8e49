import { describe, expect, it } from "vitest";
import { addPiece, emptyBoard } from "../domain/chess/board";
import { location } from "../domain/chess/geometry";
import { piece } from "../domain/chess/pieces";
import { standardBoard } from "../domain/chess/setup";
import { renderBoard } from "./render";

describe("renderBoard", () => {
  it("prints one comma-separated line per y, white in lower case", () => {
    expect(renderBoard(standardBoard()).split("\n")).toEqual([
      "r,n,b,q,k,b,n,r",
      "p,p,p,p,p,p,p,p",
      "-,-,-,-,-,-,-,-",
      "-,-,-,-,-,-,-,-",
      "-,-,-,-,-,-,-,-",
      "-,-,-,-,-,-,-,-",
      "P,P,P,P,P,P,P,P",
      "R,N,B,Q,K,B,N,R",
    ]);
  });

  it("indexes cells by x along the line", () => {
    const board = addPiece(emptyBoard(), piece("black", "bishop"), location(6, 2));
    expect(renderBoard(board).split("\n")[2]).toBe("-,-,-,-,-,-,B,-");
  });
});
