import type { Cmd } from "./cmd";
import type { LogLevel } from "./config";
import type { Msg } from "./msg";
import type { Model } from "./model";
import { initialModel } from "./model";
import { assertNever } from "./invariant";
import type { Board } from "../domain/chess/board";
import { isValidMove, movePiece, occupiedAt } from "../domain/chess/board";
import { kingStatus } from "../domain/chess/check";
import type { Move } from "../domain/chess/geometry";
import { formatLocation, formatMove } from "../domain/chess/notation";
import type { Colour } from "../domain/chess/pieces";
import { oppositeColour } from "../domain/chess/pieces";

type UpdateResult = readonly [Model, ReadonlyArray<Cmd>];

type Report = Readonly<{ level: LogLevel; message: string }>;

const log = ({ level, message }: Report): Cmd => ({ tag: "LOG", level, message });

const withStatus = (model: Model, message: string): Model => ({ ...model, status: message });

const describeKing = (board: Board, colour: Colour): Report => {
  const status = kingStatus(board, colour);
  if (!status.ok) {
    return { level: "warn", message: `No ${status.error.colour} king on the board` };
  }
  switch (status.value) {
    case "safe":
      return { level: "debug", message: `${colour} king is safe` };
    case "check":
      return { level: "info", message: `${colour} is in check` };
    case "checkmate":
      return { level: "info", message: `${colour} is checkmated` };
    default:
      return assertNever(status.value);
  }
};

const proposeMove = (model: Model, move: Move): UpdateResult => {
  const text = formatMove(move);
  const square = occupiedAt(model.board, move.from);
  if (!square) {
    const report: Report = { level: "warn", message: `No piece at ${formatLocation(move.from)} for ${text}` };
    return [withStatus(model, report.message), [log(report)]];
  }
  const valid = isValidMove(model.board, square, move.to);
  const outcomes = [...model.outcomes, { move, valid }];
  const verdict: Report = { level: "info", message: `${text} is valid ${valid}` };
  if (!valid) {
    return [{ ...model, outcomes, status: verdict.message }, [log(verdict)]];
  }
  const board = movePiece(model.board, square, move.to);
  const opponent = describeKing(board, oppositeColour(square.piece.colour));
  return [
    { board, outcomes, status: opponent.level === "debug" ? verdict.message : opponent.message },
    [log(verdict), { tag: "PRINT_BOARD", board }, log(opponent)],
  ];
};

export const update = (model: Model, msg: Msg): UpdateResult => {
  switch (msg.tag) {
    case "BoardLoaded":
      return [initialModel(msg.board), [{ tag: "PRINT_BOARD", board: msg.board }]];
    case "MoveProposed":
      return proposeMove(model, msg.move);
    case "CheckRequested": {
      const report = describeKing(model.board, msg.colour);
      return [withStatus(model, report.message), [log(report)]];
    }
    default:
      return assertNever(msg);
  }
};
