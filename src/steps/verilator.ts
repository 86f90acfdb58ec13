import path from "node:path";

import { getString, getStringList } from "../config/config.js";
import { StepError } from "../core/errors.js";

import type { StepDefinition } from "./step.js";
import { runTool } from "./tool.js";

export const LINT_ERROR_COUNT_METRIC = "design__lint_error__count";
export const LINT_WARNING_COUNT_METRIC = "design__lint_warning__count";

const LINT_LOG_FILE = "lint.log";

export type LintCounts = {
  errors: number;
  warnings: number;
};

/** Counts diagnostics in verilator output, ignoring its closing `Exiting due to` summary. */
export function countLintDiagnostics(output: string): LintCounts {
  let errors = 0;
  let warnings = 0;

  for (const line of output.split(/\r?\n/)) {
    if (line.startsWith("%Error: Exiting due to")) continue;
    if (line.startsWith("%Error")) errors += 1;
    else if (line.startsWith("%Warning")) warnings += 1;
  }

  return { errors, warnings };
}

export const verilatorLint: StepDefinition = {
  id: "Verilator.Lint",
  name: "Verilator Lint",
  inputs: [],
  outputs: [],
  run: async ({ config, stepDir }) => {
    const args = [
      "--lint-only",
      "-Wall",
      "-Wno-fatal",
      "--top-module",
      getString(config, "DESIGN_NAME"),
      ...getStringList(config, "VERILOG_DEFINES").map((define) => `-D${define}`),
      ...getStringList(config, "LINTER_EXTRA_ARGS"),
      ...getStringList(config, "VERILOG_FILES"),
    ];

    const result = await runTool("verilator", args, {
      cwd: stepDir,
      logPath: path.join(stepDir, LINT_LOG_FILE),
    });
    const counts = countLintDiagnostics(result.output);

    if (result.exitCode !== 0 && counts.errors === 0) {
      throw new StepError(
        `Verilator exited with code ${result.exitCode} without reporting lint errors; see ${LINT_LOG_FILE}.`,
      );
    }

    return {
      metrics: {
        [LINT_ERROR_COUNT_METRIC]: counts.errors,
        [LINT_WARNING_COUNT_METRIC]: counts.warnings,
      },
    };
  },
};
