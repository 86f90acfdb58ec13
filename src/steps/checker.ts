import { getBoolean } from "../config/config.js";
import { StepError, StepException } from "../core/errors.js";
import type { State } from "../state/state.js";

import type { StepDefinition } from "./step.js";
import { LINT_ERROR_COUNT_METRIC, LINT_WARNING_COUNT_METRIC } from "./verilator.js";

type MetricCheck = {
  id: string;
  name: string;
  metric: string;
  /** Boolean variable deciding whether a positive count fails the flow. */
  quitVariable: string;
  describe: (count: number) => string;
};

function readCount(state: State, check: MetricCheck): number {
  const value = state.metric(check.metric);
  if (typeof value !== "number") {
    throw new StepException(
      `${check.id} requires the metric '${check.metric}', which was not reported by an earlier step.`,
    );
  }
  return value;
}

function createMetricChecker(check: MetricCheck): StepDefinition {
  return {
    id: check.id,
    name: check.name,
    inputs: [],
    outputs: [],
    run: async ({ config, state }) => {
      const count = readCount(state, check);
      if (count > 0 && getBoolean(config, check.quitVariable)) {
        throw new StepError(check.describe(count));
      }
      return {};
    },
  };
}

export const lintErrorsChecker = createMetricChecker({
  id: "Checker.LintErrors",
  name: "Lint Errors Checker",
  metric: LINT_ERROR_COUNT_METRIC,
  quitVariable: "QUIT_ON_LINTER_ERRORS",
  describe: (count) => `${count} lint error(s) found.`,
});

export const lintWarningsChecker = createMetricChecker({
  id: "Checker.LintWarnings",
  name: "Lint Warnings Checker",
  metric: LINT_WARNING_COUNT_METRIC,
  quitVariable: "QUIT_ON_LINTER_WARNINGS",
  describe: (count) => `${count} lint warning(s) found.`,
});
