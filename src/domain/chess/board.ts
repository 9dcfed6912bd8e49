import type { Location, Move } from "./geometry";
import { BOARD_SIZE, createMove, inRange, location } from "./geometry";
import type { Colour, Piece, PieceKind } from "./pieces";
import { shapeIsValid } from "./pieces";
import { invariant } from "../../core/invariant";

export type EmptySquare = Readonly<{ tag: "EMPTY"; location: Location }>;
export type OccupiedSquare = Readonly<{ tag: "OCCUPIED"; piece: Piece; location: Location }>;
export type Square = EmptySquare | OccupiedSquare;

/** Files indexed `[x][y]`. Boards are never mutated in place. */
export type Board = Readonly<{
  grid: ReadonlyArray<ReadonlyArray<Square>>;
}>;

export const emptySquare = (at: Location): EmptySquare => ({ tag: "EMPTY", location: at });

export const occupiedSquare = (p: Piece, at: Location): OccupiedSquare => ({
  tag: "OCCUPIED",
  piece: p,
  location: at,
});

export const emptyBoard = (): Board => ({
  grid: Array.from({ length: BOARD_SIZE }, (_, x) =>
    Array.from({ length: BOARD_SIZE }, (_, y) => emptySquare(location(x, y))),
  ),
});

const checkedLocation = (at: Location): Location => {
  invariant(inRange(at.x, at.y), "OUT_OF_RANGE", `Location (${at.x},${at.y}) is off the board`);
  return at;
};

// Copies one file; the other seven are shared with the previous board.
const replaceSquare = (board: Board, square: Square): Board => {
  const { x, y } = checkedLocation(square.location);
  const file = board.grid[x].map((current, idx) => (idx === y ? square : current));
  return { grid: board.grid.map((current, idx) => (idx === x ? file : current)) };
};

export const squareAt = (board: Board, at: Location): Square => {
  const { x, y } = checkedLocation(at);
  return board.grid[x][y];
};

export const pieceAt = (board: Board, at: Location): Piece | null => {
  const square = squareAt(board, at);
  return square.tag === "OCCUPIED" ? square.piece : null;
};

export const occupiedAt = (board: Board, at: Location): OccupiedSquare | null => {
  const square = squareAt(board, at);
  return square.tag === "OCCUPIED" ? square : null;
};

const findPieces = (
  board: Board,
  predicate: (square: OccupiedSquare) => boolean,
): ReadonlyArray<OccupiedSquare> =>
  board.grid.flatMap((file) =>
    file.filter((square): square is OccupiedSquare => square.tag === "OCCUPIED" && predicate(square)),
  );

/** Scan order is file-major: (0,0), (0,1), ... (7,7). */
export const occupiedSquares = (
  board: Board,
  colour: Colour,
  kind?: PieceKind,
): ReadonlyArray<OccupiedSquare> =>
  findPieces(
    board,
    (square) => square.piece.colour === colour && (kind === undefined || square.piece.kind === kind),
  );

export const addPiece = (board: Board, p: Piece, at: Location): Board =>
  replaceSquare(board, occupiedSquare(p, at));

export const removePiece = (board: Board, square: OccupiedSquare): Board =>
  replaceSquare(board, emptySquare(square.location));

const pathBlocked = (board: Board, square: OccupiedSquare, move: Move): boolean =>
  square.piece.kind !== "knight" && move.path.some((step) => pieceAt(board, step) !== null);

/** Knights jump; every other kind is blocked by any piece strictly between. */
export const piecesInTheWay = (board: Board, square: OccupiedSquare, target: Location): boolean =>
  pathBlocked(board, square, createMove(square.location, checkedLocation(target)));

export const sameColourAtTarget = (board: Board, square: OccupiedSquare, target: Location): boolean =>
  pieceAt(board, target)?.colour === square.piece.colour;

export const isValidMove = (board: Board, square: OccupiedSquare, target: Location): boolean => {
  const move = createMove(square.location, checkedLocation(target));
  return (
    shapeIsValid(square.piece.kind, move, square.piece.colour) &&
    !pathBlocked(board, square, move) &&
    !sameColourAtTarget(board, square, target)
  );
};

/** Applies the move without checking it; pair with `isValidMove`. */
export const movePiece = (board: Board, square: OccupiedSquare, target: Location): Board =>
  addPiece(removePiece(board, square), square.piece, target);
