import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import type { ConfigMeta, FlowConfig } from "../config/config.js";
import type { CliLogger } from "../core/logger.js";

// =============================================================================
// TEMP DIRECTORIES
// =============================================================================

const tempDirs: string[] = [];

export function makeTempDir(prefix: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

export function cleanupTempDirs(): void {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
}

export async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error("Expected the promise to reject.");
}

// =============================================================================
// LOGGER
// =============================================================================

export type CapturedLine = {
  level: keyof CliLogger;
  message: string;
};

export type CapturingLogger = CliLogger & { lines: CapturedLine[] };

export function createCapturingLogger(): CapturingLogger {
  const lines: CapturedLine[] = [];
  const capture =
    (level: keyof CliLogger) =>
    (message: string): void => {
      lines.push({ level, message });
    };

  return {
    lines,
    info: capture("info"),
    success: capture("success"),
    warn: capture("warn"),
    error: capture("error"),
    note: capture("note"),
  };
}

// =============================================================================
// FIXTURES
// =============================================================================

export const TEST_VARIABLES: Readonly<Record<string, unknown>> = {
  DESIGN_NAME: "counter",
  VERILOG_FILES: ["/designs/counter/src/counter.v"],
  VERILOG_DEFINES: [],
  CLOCK_PORT: "clk",
  CLOCK_PERIOD: 10,
  QUIT_ON_LINTER_ERRORS: true,
  QUIT_ON_LINTER_WARNINGS: false,
  LINTER_EXTRA_ARGS: [],
  SYNTH_STRATEGY: "AREA 0",
  SYNTH_NO_FLAT: false,
  PDK: "sky130A",
  PDK_ROOT: "/pdks",
  STD_CELL_LIBRARY: "sky130_fd_sc_hd",
  LIB_SYNTH: ["/pdks/sky130A/libs.ref/sky130_fd_sc_hd/lib/sky130_fd_sc_hd__tt_025C_1v80.lib"],
};

export function makeFlowConfig(
  variables: Record<string, unknown> = {},
  meta: Partial<ConfigMeta> = {},
): FlowConfig {
  return {
    meta: { version: 2, flow: "Classic", ...meta },
    variables: { ...TEST_VARIABLES, ...variables },
  };
}

/** Lays out `<root>/<pdk>/libs.ref/<scl>/lib/<libs>` and returns the liberty paths. */
export function writeFakePdk(
  root: string,
  opts: { pdk?: string; scl?: string; libs?: string[] } = {},
): string[] {
  const pdk = opts.pdk ?? "sky130A";
  const scl = opts.scl ?? "sky130_fd_sc_hd";
  const libs = opts.libs ?? ["sky130_fd_sc_hd__tt_025C_1v80.lib"];
  const libDir = path.join(root, pdk, "libs.ref", scl, "lib");

  fs.mkdirSync(libDir, { recursive: true });
  return libs.map((name) => {
    const libPath = path.join(libDir, name);
    fs.writeFileSync(libPath, `library (${name}) {}\n`, "utf8");
    return libPath;
  });
}
