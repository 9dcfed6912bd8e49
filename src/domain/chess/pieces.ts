import type { Move } from "./geometry";
import { assertNever } from "../../core/invariant";

export type Colour = "white" | "black";

export type PieceKind = "pawn" | "rook" | "knight" | "bishop" | "queen" | "king";

export type PieceCode = "p" | "r" | "n" | "b" | "q" | "k";

export type Piece = Readonly<{
  colour: Colour;
  kind: PieceKind;
}>;

export const PIECE_KINDS: ReadonlyArray<PieceKind> = ["pawn", "rook", "knight", "bishop", "queen", "king"];

export const piece = (colour: Colour, kind: PieceKind): Piece => ({ colour, kind });

export const oppositeColour = (colour: Colour): Colour => (colour === "white" ? "black" : "white");

const HOME_DOUBLE_STEP: Readonly<Record<Colour, { from: number; to: number }>> = {
  white: { from: 1, to: 3 },
  black: { from: 6, to: 4 },
};

// Direction is not checked: any single-rank step qualifies.
const pawnShape = (move: Move, colour: Colour): boolean => {
  const home = HOME_DOUBLE_STEP[colour];
  return move.yDiff === 1 || (move.from.y === home.from && move.to.y === home.to);
};

const rookShape = (move: Move): boolean => move.xDiff === 0 || move.yDiff === 0;

const knightShape = (move: Move): boolean =>
  (move.xDiff === 1 && move.yDiff === 2) || (move.xDiff === 2 && move.yDiff === 1);

const bishopShape = (move: Move): boolean => move.xDiff !== 0 && move.xDiff === move.yDiff;

const kingShape = (move: Move): boolean => move.xDiff <= 1 && move.yDiff <= 1;

/**
 * Whether the displacement fits the kind's movement pattern, ignoring
 * obstruction and occupancy. Only pawns look at `colour`.
 */
export const shapeIsValid = (kind: PieceKind, move: Move, colour: Colour): boolean => {
  switch (kind) {
    case "pawn":
      return pawnShape(move, colour);
    case "rook":
      return rookShape(move);
    case "knight":
      return knightShape(move);
    case "bishop":
      return bishopShape(move);
    case "queen":
      return bishopShape(move) || rookShape(move);
    case "king":
      return kingShape(move);
    default:
      return assertNever(kind);
  }
};

export const kindCode = (kind: PieceKind): PieceCode => {
  switch (kind) {
    case "pawn":
      return "p";
    case "rook":
      return "r";
    case "knight":
      return "n";
    case "bishop":
      return "b";
    case "queen":
      return "q";
    case "king":
      return "k";
    default:
      return assertNever(kind);
  }
};

export const kindFromCode = (code: string): PieceKind | null =>
  PIECE_KINDS.find((kind) => kindCode(kind) === code.toLowerCase()) ?? null;

/** Display code: lower-case for white, upper-case for black. */
export const pieceCode = (p: Piece): string =>
  p.colour === "black" ? kindCode(p.kind).toUpperCase() : kindCode(p.kind);

