import type { Result } from "../../core/result";
import { err, ok } from "../../core/result";
import { invariant } from "../../core/invariant";

export const BOARD_SIZE = 8;

export type Location = Readonly<{
  x: number;
  y: number;
}>;

export type Move = Readonly<{
  from: Location;
  to: Location;
  xDiff: number;
  yDiff: number;
  /** Squares strictly between `from` and `to`, nearest first. */
  path: ReadonlyArray<Location>;
}>;

export type LocationError = { tag: "OUT_OF_RANGE"; x: number; y: number };

export const inRange = (x: number, y: number): boolean =>
  Number.isInteger(x) && Number.isInteger(y) && x >= 0 && x < BOARD_SIZE && y >= 0 && y < BOARD_SIZE;

export const tryLocation = (x: number, y: number): Result<Location, LocationError> =>
  inRange(x, y) ? ok({ x, y }) : err({ tag: "OUT_OF_RANGE", x, y });

/** Throws a `RulesFault` for coordinates off the board. */
export const location = (x: number, y: number): Location => {
  invariant(inRange(x, y), "OUT_OF_RANGE", `Location (${x},${y}) is off the board`);
  return { x, y };
};

export const sameLocation = (a: Location, b: Location): boolean => a.x === b.x && a.y === b.y;

const stepToward = (start: number, target: number, steps: number): number => {
  const distance = Math.abs(target - start);
  return start + Math.sign(target - start) * Math.min(steps, distance);
};

const tracePath = (from: Location, to: Location, xDiff: number, yDiff: number): ReadonlyArray<Location> => {
  const steps = Math.max(xDiff, yDiff);
  const path: Location[] = [];
  for (let k = 1; k < steps; k += 1) {
    path.push({ x: stepToward(from.x, to.x, k), y: stepToward(from.y, to.y, k) });
  }
  return path;
};

export const createMove = (from: Location, to: Location): Move => {
  const xDiff = Math.abs(from.x - to.x);
  const yDiff = Math.abs(from.y - to.y);
  return Object.freeze({
    from,
    to,
    xDiff,
    yDiff,
    path: Object.freeze(tracePath(from, to, xDiff, yDiff)),
  });
};

export const isNullMove = (move: Move): boolean => move.xDiff === 0 && move.yDiff === 0;
