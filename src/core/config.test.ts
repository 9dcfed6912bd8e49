import { describe, expect, it } from "vitest";
import { defaultConfig, loadConfig } from "./config";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({ ok: true, value: defaultConfig });
    expect(loadConfig({ CHESS_SIM_SCRIPT: "  " })).toEqual({ ok: true, value: defaultConfig });
  });

  it("reads every variable", () => {
    expect(
      loadConfig({
        CHESS_SIM_LOG_LEVEL: "DEBUG",
        CHESS_SIM_SCRIPT: "scripts/scholars-mate.json",
        CHESS_SIM_START_FEN: "4k3/8/8/8/8/8/8/4K3",
      }),
    ).toEqual({
      ok: true,
      value: {
        logLevel: "debug",
        scriptPath: "scripts/scholars-mate.json",
        startPlacement: "4k3/8/8/8/8/8/8/4K3",
      },
    });
  });

  it("rejects an unknown log level", () => {
    expect(loadConfig({ CHESS_SIM_LOG_LEVEL: "loud" })).toEqual({
      ok: false,
      error: { tag: "INVALID_CONFIG", variable: "CHESS_SIM_LOG_LEVEL", value: "loud" },
    });
  });
});
