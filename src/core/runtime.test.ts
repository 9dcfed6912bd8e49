import { describe, expect, it } from "vitest";
import { initialModel } from "./model";
import { createRuntime } from "./runtime";
import { emptyBoard } from "../domain/chess/board";
import { standardBoard } from "../domain/chess/setup";
import type { LogSink } from "../ports/logger";
import { createLogger } from "../ports/logger";
import { DEMO_SCRIPT, decodeScript } from "../ports/script";

const harness = () => {
  const logged: string[] = [];
  const printed: string[] = [];
  const record = (...data: unknown[]): void => {
    logged.push(data.map(String).join(" "));
  };
  const sink: LogSink = { debug: record, info: record, warn: record, error: record };
  const runtime = createRuntime(initialModel(emptyBoard()), {
    logger: createLogger("sim", "info", sink),
    print: (text) => printed.push(text),
  });
  return { runtime, logged, printed };
};

describe("createRuntime", () => {
  it("replays the demo script", () => {
    const { runtime, logged, printed } = harness();
    const script = decodeScript(DEMO_SCRIPT);
    if (!script.ok) throw new Error("demo script should decode");

    runtime.dispatch({ tag: "BoardLoaded", board: standardBoard() });
    script.value.forEach((move) => runtime.dispatch({ tag: "MoveProposed", move }));

    expect(logged).toEqual([
      "[SIM] (0,1)-(0,3) is valid true",
      "[SIM] (1,1)-(1,2) is valid true",
      "[SIM] (0,0)-(0,2) is valid true",
    ]);
    expect(printed).toHaveLength(4);
    expect(printed[3]).toBe(
      [
        "-,n,b,q,k,b,n,r",
        "-,-,p,p,p,p,p,p",
        "r,p,-,-,-,-,-,-",
        "p,-,-,-,-,-,-,-",
        "-,-,-,-,-,-,-,-",
        "-,-,-,-,-,-,-,-",
        "P,P,P,P,P,P,P,P",
        "R,N,B,Q,K,B,N,R",
        "",
      ].join("\n"),
    );
    expect(runtime.getModel().outcomes).toHaveLength(3);
  });

  it("prints nothing for a rejected move", () => {
    const { runtime, logged, printed } = harness();
    runtime.dispatch({ tag: "BoardLoaded", board: standardBoard() });
    const script = decodeScript(["a1-a3"]);
    if (!script.ok) throw new Error("script should decode");
    runtime.dispatch({ tag: "MoveProposed", move: script.value[0] });
    expect(printed).toHaveLength(1);
    expect(logged).toEqual(["[SIM] (0,0)-(0,2) is valid false"]);
    expect(runtime.getModel().board).toEqual(standardBoard());
  });
});
