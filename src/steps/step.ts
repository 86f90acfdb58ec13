/**
 * Step contract and the runner that wraps every step with state bookkeeping.
 * Purpose: give each step a directory, a typed config and an input state; collect its views and metrics.
 * Assumptions: steps throw StepError for design problems and anything else for tooling defects.
 * Usage: const stateOut = await runStep(step, { config, state, stepDir, logger }).
 */

import path from "node:path";

import type { FlowConfig } from "../config/config.js";
import { StepError, StepException } from "../core/errors.js";
import { logFlowEvent, type JsonlLogger } from "../core/logger.js";
import { STATE_IN_FILE, STATE_OUT_FILE } from "../core/paths.js";
import { writeTextFile } from "../core/utils.js";
import type { DesignFormat, State, StateMetrics, StateViews } from "../state/state.js";

// =============================================================================
// TYPES
// =============================================================================

export type StepRunInput = {
  config: FlowConfig;
  state: State;
  stepDir: string;
};

export type StepRunResult = {
  views?: StateViews;
  metrics?: StateMetrics;
};

export type StepDefinition = {
  /** Stable identifier, `Tool.Action`. */
  id: string;
  name: string;
  inputs: readonly DesignFormat[];
  outputs: readonly DesignFormat[];
  run: (input: StepRunInput) => Promise<StepRunResult>;
};

export type StepContext = {
  config: FlowConfig;
  state: State;
  stepDir: string;
  logger: JsonlLogger;
};

// =============================================================================
// RUNNER
// =============================================================================

export async function runStep(step: StepDefinition, ctx: StepContext): Promise<State> {
  const { config, state, stepDir, logger } = ctx;

  await writeTextFile(path.join(stepDir, STATE_IN_FILE), state.dumps());

  const missing = step.inputs.filter((format) => state.view(format) === undefined);
  if (missing.length > 0) {
    throw new StepException(
      `${step.id} requires the following views, which are missing from the input state: ${missing.join(", ")}.`,
    );
  }

  logFlowEvent(logger, "step.start", { step: step.id, step_dir: stepDir });

  let result: StepRunResult;
  try {
    result = await step.run({ config, state, stepDir });
  } catch (err) {
    logFlowEvent(logger, "step.failed", {
      step: step.id,
      expected: err instanceof StepError,
      message: err instanceof Error ? err.message : String(err),
    });
    throw err;
  }

  const undeclared = Object.keys(result.views ?? {}).filter(
    (format) => !step.outputs.some((output) => output === format),
  );
  if (undeclared.length > 0) {
    throw new StepException(`${step.id} produced undeclared views: ${undeclared.join(", ")}.`);
  }

  const stateOut = state.with({ views: result.views, metrics: result.metrics });
  await writeTextFile(path.join(stepDir, STATE_OUT_FILE), stateOut.dumps());

  logFlowEvent(logger, "step.complete", {
    step: step.id,
    views: Object.keys(result.views ?? {}),
    metrics: Object.keys(result.metrics ?? {}),
  });

  return stateOut;
}
