import { readFile } from "node:fs/promises";
import type { Result } from "../core/result";
import { collect, err, mapError } from "../core/result";
import { assertNever } from "../core/invariant";
import type { Move } from "../domain/chess/geometry";
import type { NotationError } from "../domain/chess/notation";
import { describeNotationError, parseMove } from "../domain/chess/notation";

export type ScriptError =
  | { tag: "READ_FAILED"; path: string; message: string }
  | { tag: "INVALID_JSON"; path: string; message: string }
  | { tag: "NOT_A_LIST" }
  | { tag: "BAD_ENTRY"; index: number; error: NotationError | { tag: "NOT_A_STRING" } };

/** The demonstration run: pawn a2-a4, pawn b2-b3, then the a1 rook up the cleared file. */
export const DEMO_SCRIPT: ReadonlyArray<string> = ["a2-a4", "b2-b3", "a1-a3"];

export const decodeScript = (data: unknown): Result<ReadonlyArray<Move>, ScriptError> => {
  if (!Array.isArray(data)) {
    return err({ tag: "NOT_A_LIST" });
  }
  return collect(data, (entry: unknown, index): Result<Move, ScriptError> =>
    typeof entry === "string"
      ? mapError(parseMove(entry), (error): ScriptError => ({ tag: "BAD_ENTRY", index, error }))
      : err({ tag: "BAD_ENTRY", index, error: { tag: "NOT_A_STRING" } }),
  );
};

export const loadScript = async (path: string): Promise<Result<ReadonlyArray<Move>, ScriptError>> => {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    return err({ tag: "READ_FAILED", path, message: String(error) });
  }
  let data: unknown;
  try {
    data = JSON.parse(text) as unknown;
  } catch (error) {
    return err({ tag: "INVALID_JSON", path, message: String(error) });
  }
  return decodeScript(data);
};

export const describeScriptError = (error: ScriptError): string => {
  switch (error.tag) {
    case "READ_FAILED":
      return `Could not read ${error.path}: ${error.message}`;
    case "INVALID_JSON":
      return `${error.path} is not valid JSON: ${error.message}`;
    case "NOT_A_LIST":
      return "Move script must be a JSON array of move strings";
    case "BAD_ENTRY":
      return error.error.tag === "NOT_A_STRING"
        ? `Entry ${error.index} is not a string`
        : `Entry ${error.index}: ${describeNotationError(error.error)}`;
    default:
      return assertNever(error);
  }
};
