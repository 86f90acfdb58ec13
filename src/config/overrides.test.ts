import { describe, expect, it } from "vitest";

import { applyOverrides, parseOverrideString } from "./overrides.js";

describe("parseOverrideString", () => {
  it("splits at the first equals sign", () => {
    expect(parseOverrideString("CLOCK_PERIOD=25")).toEqual({
      ok: true,
      override: { key: "CLOCK_PERIOD", rawValue: "25" },
    });
    expect(parseOverrideString('VERILOG_DEFINES=["WIDTH=8"]')).toEqual({
      ok: true,
      override: { key: "VERILOG_DEFINES", rawValue: '["WIDTH=8"]' },
    });
  });

  it("rejects entries without a separator or a key", () => {
    expect(parseOverrideString("CLOCK_PERIOD")).toEqual({
      ok: false,
      error: "Invalid override 'CLOCK_PERIOD': expected KEY=VALUE.",
    });
    expect(parseOverrideString("=5")).toEqual({
      ok: false,
      error: "Invalid override '=5': the key is empty.",
    });
  });
});

describe("applyOverrides", () => {
  it("applies overrides in order without mutating the base", () => {
    const base = { CLOCK_PERIOD: 10 };

    const result = applyOverrides(base, [
      { key: "CLOCK_PERIOD", rawValue: "25" },
      { key: "SYNTH_STRATEGY", rawValue: '"DELAY 1"' },
      { key: "CLOCK_PERIOD", rawValue: "30" },
    ]);

    expect(result.errors).toEqual([]);
    expect(result.values).toEqual({ CLOCK_PERIOD: 30, SYNTH_STRATEGY: "DELAY 1" });
    expect(base).toEqual({ CLOCK_PERIOD: 10 });
  });

  it("distinguishes invalid literals from unknown variables", () => {
    const result = applyOverrides({}, [
      { key: "FOO", rawValue: "notjson" },
      { key: "BAR", rawValue: "1" },
    ]);

    expect(result.errors).toEqual([
      "Invalid value for override 'FOO': \"notjson\" is not a valid JSON literal.",
      "Unknown configuration variable 'BAR' in override.",
    ]);
    expect(result.values).toEqual({});
  });

  it("refuses to override PDK-derived variables", () => {
    const result = applyOverrides({}, [{ key: "LIB_SYNTH", rawValue: '["/tmp/x.lib"]' }]);

    expect(result.errors).toEqual(["Unknown configuration variable 'LIB_SYNTH' in override."]);
  });
});
