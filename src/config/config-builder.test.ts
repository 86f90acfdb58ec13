import fs from "node:fs";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  captureRejection,
  cleanupTempDirs,
  makeTempDir,
  writeFakePdk,
} from "../__tests__/launch.helpers.js";
import { ConfigError, InvalidConfigError } from "../core/errors.js";

import { loadDesignConfig, type ConfigLoadInput } from "./config-builder.js";

// =============================================================================
// TEST SETUP
// =============================================================================

let pdkRoot = "";
let designDir = "";
let libSynth: string[] = [];

beforeEach(() => {
  const root = makeTempDir("hdlflow-config-");
  pdkRoot = path.join(root, "pdks");
  designDir = path.join(root, "counter");
  libSynth = writeFakePdk(pdkRoot);
  fs.mkdirSync(path.join(designDir, "src"), { recursive: true });
  fs.writeFileSync(path.join(designDir, "src", "counter.v"), "module counter; endmodule\n", "utf8");
});

afterEach(() => {
  cleanupTempDirs();
});

// =============================================================================
// HELPERS
// =============================================================================

function writeConfig(content: unknown, fileName = "config.json"): string {
  const configPath = path.join(designDir, fileName);
  const text = typeof content === "string" ? content : JSON.stringify(content);
  fs.writeFileSync(configPath, text, "utf8");
  return configPath;
}

function loadInput(configFile: string, extra: Partial<ConfigLoadInput> = {}): ConfigLoadInput {
  return { configFile, pdk: "sky130A", pdkRoot, overrides: [], env: {}, ...extra };
}

async function expectInvalidConfig(promise: Promise<unknown>): Promise<InvalidConfigError> {
  const error = await captureRejection(promise);
  if (!(error instanceof InvalidConfigError)) {
    throw new Error(`Expected InvalidConfigError, got ${String(error)}`);
  }
  return error;
}

const MINIMAL_CONFIG = { DESIGN_NAME: "counter", VERILOG_FILES: "dir::src/*.v" };

// =============================================================================
// TESTS
// =============================================================================

describe("loadDesignConfig", () => {
  it("fills defaults, expands paths and adds PDK variables", async () => {
    const configFile = writeConfig(MINIMAL_CONFIG);

    const loaded = await loadDesignConfig(loadInput(configFile));

    expect(loaded.designDir).toBe(designDir);
    expect(loaded.warnings).toEqual([]);
    expect(loaded.config.meta).toEqual({ version: 2, flow: "Classic" });
    expect(loaded.config.variables).toMatchObject({
      DESIGN_NAME: "counter",
      VERILOG_FILES: [path.join(designDir, "src", "counter.v")],
      CLOCK_PERIOD: 10,
      QUIT_ON_LINTER_ERRORS: true,
      SYNTH_STRATEGY: "AREA 0",
      PDK: "sky130A",
      PDK_ROOT: pdkRoot,
      STD_CELL_LIBRARY: "sky130_fd_sc_hd",
      LIB_SYNTH: libSynth,
    });
    expect(Object.isFrozen(loaded.config.variables)).toBe(true);
  });

  it("warns about unknown keys and drops them", async () => {
    const configFile = writeConfig({ ...MINIMAL_CONFIG, FP_CORE_UTIL: 40 });

    const loaded = await loadDesignConfig(loadInput(configFile));

    expect(loaded.warnings).toEqual(["Unknown key 'FP_CORE_UTIL' provided."]);
    expect(loaded.config.variables.FP_CORE_UTIL).toBeUndefined();
  });

  it("applies command-line overrides over file values", async () => {
    const configFile = writeConfig({ ...MINIMAL_CONFIG, CLOCK_PERIOD: 10 });

    const loaded = await loadDesignConfig(
      loadInput(configFile, {
        overrides: [
          { key: "CLOCK_PERIOD", rawValue: "25" },
          { key: "SYNTH_NO_FLAT", rawValue: "true" },
        ],
      }),
    );

    expect(loaded.config.variables.CLOCK_PERIOD).toBe(25);
    expect(loaded.config.variables.SYNTH_NO_FLAT).toBe(true);
  });

  it("reports bad override values and unknown override keys separately", async () => {
    const configFile = writeConfig(MINIMAL_CONFIG);

    const error = await expectInvalidConfig(
      loadDesignConfig(
        loadInput(configFile, {
          overrides: [
            { key: "FOO", rawValue: "notjson" },
            { key: "BAR", rawValue: "1" },
          ],
        }),
      ),
    );

    expect(error.errors).toEqual([
      "Invalid value for override 'FOO': \"notjson\" is not a valid JSON literal.",
      "Unknown configuration variable 'BAR' in override.",
    ]);
  });

  it("collects every error together with the warnings", async () => {
    const configFile = writeConfig({
      VERILOG_FILES: "dir::src/*.v",
      CLOCK_PERIOD: -1,
      PDK: "gf180mcuD",
      EXTRA: true,
    });

    const error = await expectInvalidConfig(loadDesignConfig(loadInput(configFile)));

    expect(error.label).toBe("configuration");
    expect(error.warnings).toEqual(["Unknown key 'EXTRA' provided."]);
    expect(error.errors).toHaveLength(3);
    expect(error.errors[0]).toBe(
      "Variable 'PDK' is derived from the PDK and cannot be set in the configuration.",
    );
    expect(error.errors[1]).toBe("Required variable 'DESIGN_NAME' did not get a specified value.");
    expect(error.errors[2]).toMatch(/^Value provided for variable 'CLOCK_PERIOD' is invalid: /);
  });

  it("reports unmatched source patterns", async () => {
    const configFile = writeConfig({ DESIGN_NAME: "counter", VERILOG_FILES: ["dir::rtl/*.v"] });

    const error = await expectInvalidConfig(loadDesignConfig(loadInput(configFile)));

    expect(error.errors).toEqual(["No files matched 'dir::rtl/*.v' for variable 'VERILOG_FILES'."]);
  });

  it("accepts a step list in meta.flow and rejects unknown meta keys", async () => {
    const listed = await loadDesignConfig(
      loadInput(writeConfig({ ...MINIMAL_CONFIG, meta: { flow: ["Verilator.Lint"] } })),
    );
    expect(listed.config.meta.flow).toEqual(["Verilator.Lint"]);

    const error = await expectInvalidConfig(
      loadDesignConfig(loadInput(writeConfig({ ...MINIMAL_CONFIG, meta: { flow: "Lint", tag: 1 } }))),
    );
    expect(error.errors).toEqual(["meta: Unrecognized key(s) in object: 'tag'"]);
  });

  it("resolves the library from --scl before STD_CELL_LIBRARY", async () => {
    const configFile = writeConfig({ ...MINIMAL_CONFIG, STD_CELL_LIBRARY: "sky130_fd_sc_hs" });

    const error = await expectInvalidConfig(loadDesignConfig(loadInput(configFile)));
    expect(error.errors).toEqual([
      "Standard cell library 'sky130_fd_sc_hs' not found for PDK 'sky130A'.",
    ]);

    const loaded = await loadDesignConfig(loadInput(configFile, { scl: "sky130_fd_sc_hd" }));
    expect(loaded.config.variables.STD_CELL_LIBRARY).toBe("sky130_fd_sc_hd");
  });

  it("falls back to PDK_ROOT from the environment", async () => {
    const configFile = writeConfig(MINIMAL_CONFIG);

    const loaded = await loadDesignConfig(
      loadInput(configFile, { pdkRoot: undefined, env: { PDK_ROOT: pdkRoot } }),
    );

    expect(loaded.config.variables.PDK_ROOT).toBe(pdkRoot);
  });

  it("reports a PDK that is not installed", async () => {
    const configFile = writeConfig(MINIMAL_CONFIG);

    const error = await expectInvalidConfig(
      loadDesignConfig(loadInput(configFile, { pdk: "gf180mcuD" })),
    );

    expect(error.errors).toEqual([`PDK 'gf180mcuD' not found in ${pdkRoot}.`]);
  });

  it("rejects files that are not JSON objects", async () => {
    await expect(loadDesignConfig(loadInput(writeConfig("{", "config.json")))).rejects.toThrow(
      /is not valid JSON/,
    );
    await expect(loadDesignConfig(loadInput(writeConfig([1, 2])))).rejects.toThrow(
      "must contain a JSON object",
    );
    await expect(
      loadDesignConfig(loadInput(writeConfig("DESIGN_NAME: counter\n", "config.yaml"))),
    ).rejects.toThrow(ConfigError);
  });
});
