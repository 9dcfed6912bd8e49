import type { Board } from "./board";
import { addPiece, emptyBoard } from "./board";
import { BOARD_SIZE, location } from "./geometry";
import type { Colour, PieceKind } from "./pieces";
import { piece } from "./pieces";

const BACK_RANK: ReadonlyArray<PieceKind> = ["rook", "knight", "bishop", "queen", "king", "bishop", "knight", "rook"];

const RANKS: Readonly<Record<Colour, { back: number; pawns: number }>> = {
  white: { back: 0, pawns: 1 },
  black: { back: 7, pawns: 6 },
};

const placeSide = (board: Board, colour: Colour): Board => {
  const { back, pawns } = RANKS[colour];
  let next = board;
  for (let x = 0; x < BOARD_SIZE; x += 1) {
    next = addPiece(next, piece(colour, "pawn"), location(x, pawns));
    next = addPiece(next, piece(colour, BACK_RANK[x]), location(x, back));
  }
  return next;
};

export const standardBoard = (): Board => placeSide(placeSide(emptyBoard(), "white"), "black");
