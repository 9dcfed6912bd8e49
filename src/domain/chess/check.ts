import type { Result } from "../../core/result";
import { andThen, err, map, ok } from "../../core/result";
import type { Board, OccupiedSquare } from "./board";
import { isValidMove, movePiece, occupiedSquare, occupiedSquares } from "./board";
import type { Location } from "./geometry";
import { inRange } from "./geometry";
import type { Colour } from "./pieces";
import { oppositeColour } from "./pieces";

export type CheckError = { tag: "MISSING_KING"; colour: Colour };

const KING_STEPS: ReadonlyArray<readonly [number, number]> = [
  [-1, -1], [-1, 0], [-1, 1],
  [0, -1], [0, 1],
  [1, -1], [1, 0], [1, 1],
];

/** First king of `colour` in scan order. */
export const findKing = (board: Board, colour: Colour): Result<OccupiedSquare, CheckError> => {
  const [king] = occupiedSquares(board, colour, "king");
  return king ? ok(king) : err({ tag: "MISSING_KING", colour });
};

export const squaresThatCanTake = (board: Board, target: OccupiedSquare): ReadonlyArray<OccupiedSquare> =>
  occupiedSquares(board, oppositeColour(target.piece.colour)).filter((attacker) =>
    isValidMove(board, attacker, target.location),
  );

const isAttacked = (board: Board, target: OccupiedSquare): boolean =>
  squaresThatCanTake(board, target).length > 0;

export const isInCheck = (board: Board, colour: Colour): Result<boolean, CheckError> =>
  map(findKing(board, colour), (king) => isAttacked(board, king));

/**
 * Adjacent squares the king may step to (empty or holding an enemy piece)
 * without standing attacked afterwards.
 */
export const safeKingDestinations = (
  board: Board,
  colour: Colour,
): Result<ReadonlyArray<Location>, CheckError> =>
  map(findKing(board, colour), (king) =>
    KING_STEPS.map(([dx, dy]) => ({ x: king.location.x + dx, y: king.location.y + dy }))
      .filter((to) => inRange(to.x, to.y) && isValidMove(board, king, to))
      .filter((to) => !isAttacked(movePiece(board, king, to), occupiedSquare(king.piece, to))),
  );

export const kingCannotMove = (board: Board, colour: Colour): Result<boolean, CheckError> =>
  map(safeKingDestinations(board, colour), (destinations) => destinations.length === 0);

/** Check with no safe king step; blocking and capturing the checker are not searched. */
export const isInCheckMate = (board: Board, colour: Colour): Result<boolean, CheckError> =>
  andThen(isInCheck(board, colour), (inCheck) => (inCheck ? kingCannotMove(board, colour) : ok(false)));

export type KingStatus = "safe" | "check" | "checkmate";

export const kingStatus = (board: Board, colour: Colour): Result<KingStatus, CheckError> =>
  andThen(isInCheck(board, colour), (inCheck): Result<KingStatus, CheckError> =>
    inCheck
      ? map(kingCannotMove(board, colour), (stuck): KingStatus => (stuck ? "checkmate" : "check"))
      : ok<KingStatus>("safe"),
  );
