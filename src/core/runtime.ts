import type { Cmd } from "./cmd";
import type { Msg } from "./msg";
import type { Model } from "./model";
import { assertNever } from "./invariant";
import { update } from "./update";
import type { Logger } from "../ports/logger";
import { renderBoard } from "../ui/render";

export type Ports = Readonly<{
  logger: Logger;
  print: (text: string) => void;
}>;

export type Runtime = Readonly<{
  dispatch: (msg: Msg) => void;
  getModel: () => Model;
}>;

export const createRuntime = (initial: Model, ports: Ports): Runtime => {
  let model = initial;

  const getModel = () => model;

  const runCmd = (cmd: Cmd): void => {
    switch (cmd.tag) {
      case "LOG":
        ports.logger[cmd.level](cmd.message);
        return;
      case "PRINT_BOARD":
        // Trailing blank line separates consecutive boards.
        ports.print(`${renderBoard(cmd.board)}\n`);
        return;
      default:
        assertNever(cmd);
    }
  };

  const dispatch = (msg: Msg): void => {
    const [next, cmds] = update(model, msg);
    model = next;
    cmds.forEach(runCmd);
  };

  return { dispatch, getModel };
};
