import type { Result } from "../../core/result";
import { andThen, err, map } from "../../core/result";
import { assertNever } from "../../core/invariant";
import type { Location, Move } from "./geometry";
import { createMove, tryLocation } from "./geometry";

export type File = "a" | "b" | "c" | "d" | "e" | "f" | "g" | "h";
export type Rank = "1" | "2" | "3" | "4" | "5" | "6" | "7" | "8";
export type SquareName = `${File}${Rank}`;

export type NotationError =
  | { tag: "INVALID_SQUARE"; detail: string }
  | { tag: "INVALID_MOVE"; detail: string };

const files: ReadonlyArray<File> = ["a", "b", "c", "d", "e", "f", "g", "h"];
const ranks: ReadonlyArray<Rank> = ["1", "2", "3", "4", "5", "6", "7", "8"];

export const squareName = (at: Location): SquareName => `${files[at.x]}${ranks[at.y]}`;

export const parseSquare = (raw: string): Result<Location, NotationError> => {
  const match = /^([a-h])([1-8])$/.exec(raw.trim().toLowerCase());
  if (!match) {
    return err({ tag: "INVALID_SQUARE", detail: raw });
  }
  const x = files.findIndex((file) => file === match[1]);
  const y = Number(match[2]) - 1;
  const at = tryLocation(x, y);
  return at.ok ? at : err({ tag: "INVALID_SQUARE", detail: raw });
};

const parseCoordinates = (raw: string): Result<Location, NotationError> => {
  const match = /^\((\d+),(\d+)\)$/.exec(raw);
  if (!match) {
    return err({ tag: "INVALID_SQUARE", detail: raw });
  }
  const at = tryLocation(Number(match[1]), Number(match[2]));
  return at.ok ? at : err({ tag: "INVALID_SQUARE", detail: raw });
};

const parseEndpoint = (raw: string): Result<Location, NotationError> =>
  raw.startsWith("(") ? parseCoordinates(raw) : parseSquare(raw);

export const formatLocation = (at: Location): string => `(${at.x},${at.y})`;

export const formatMove = (move: Move): string => `${formatLocation(move.from)}-${formatLocation(move.to)}`;

/** Accepts `e2-e4` or `(4,1)-(4,3)`. */
export const parseMove = (raw: string): Result<Move, NotationError> => {
  const parts = raw.replace(/\s+/g, "").split("-");
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    return err({ tag: "INVALID_MOVE", detail: raw });
  }
  const [from, to] = parts;
  return andThen(parseEndpoint(from), (start) =>
    map(parseEndpoint(to), (end) => createMove(start, end)),
  );
};

export const describeNotationError = (error: NotationError): string => {
  switch (error.tag) {
    case "INVALID_SQUARE":
      return `Invalid square: ${error.detail}`;
    case "INVALID_MOVE":
      return `Invalid move: ${error.detail}`;
    default:
      return assertNever(error);
  }
};
