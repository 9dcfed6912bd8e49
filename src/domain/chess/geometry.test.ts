import { describe, expect, it } from "vitest";
import { RulesFault } from "../../core/invariant";
import { createMove, isNullMove, location, sameLocation, tryLocation } from "./geometry";

describe("location", () => {
  it("accepts every square on the board", () => {
    expect(location(0, 0)).toEqual({ x: 0, y: 0 });
    expect(location(7, 7)).toEqual({ x: 7, y: 7 });
  });

  it("faults off the board", () => {
    expect(() => location(8, 0)).toThrow(RulesFault);
    expect(() => location(0, -1)).toThrow("Location (0,-1) is off the board");
  });

  it("reports off-board coordinates as a result", () => {
    expect(tryLocation(3, 4)).toEqual({ ok: true, value: { x: 3, y: 4 } });
    expect(tryLocation(3, 9)).toEqual({ ok: false, error: { tag: "OUT_OF_RANGE", x: 3, y: 9 } });
    expect(tryLocation(1.5, 2).ok).toBe(false);
  });

  it("compares structurally", () => {
    expect(sameLocation(location(2, 3), { x: 2, y: 3 })).toBe(true);
    expect(sameLocation(location(2, 3), location(3, 2))).toBe(false);
  });
});

describe("createMove", () => {
  it("derives absolute deltas", () => {
    const move = createMove(location(5, 6), location(2, 4));
    expect(move.xDiff).toBe(3);
    expect(move.yDiff).toBe(2);
  });

  it("lists squares strictly between along a file", () => {
    expect(createMove(location(0, 0), location(0, 3)).path).toEqual([
      { x: 0, y: 1 },
      { x: 0, y: 2 },
    ]);
  });

  it("walks backwards along a rank", () => {
    expect(createMove(location(6, 2), location(3, 2)).path).toEqual([
      { x: 5, y: 2 },
      { x: 4, y: 2 },
    ]);
  });

  it("walks diagonals in lockstep", () => {
    expect(createMove(location(5, 0), location(2, 3)).path).toEqual([
      { x: 4, y: 1 },
      { x: 3, y: 2 },
    ]);
  });

  it("clamps an axis once it arrives", () => {
    expect(createMove(location(0, 1), location(3, 2)).path).toEqual([
      { x: 1, y: 2 },
      { x: 2, y: 2 },
    ]);
  });

  it("has an empty path for adjacent and null moves", () => {
    expect(createMove(location(4, 4), location(5, 5)).path).toEqual([]);
    const still = createMove(location(4, 4), location(4, 4));
    expect(still.path).toEqual([]);
    expect(isNullMove(still)).toBe(true);
  });

  it("computes the path once", () => {
    const move = createMove(location(0, 0), location(7, 7));
    expect(move.path).toBe(move.path);
    expect(move.path).toHaveLength(6);
    expect(Object.isFrozen(move)).toBe(true);
  });
});
