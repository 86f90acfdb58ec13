import { lintErrorsChecker, lintWarningsChecker } from "./checker.js";
import type { StepDefinition } from "./step.js";
import { verilatorLint } from "./verilator.js";
import { yosysSynthesis } from "./yosys.js";

export type StepRegistry = {
  get: (id: string) => StepDefinition | undefined;
  list: () => string[];
};

/** Step ids are matched exactly. */
export function createStepRegistry(steps: readonly StepDefinition[]): StepRegistry {
  const byId = new Map<string, StepDefinition>();
  for (const step of steps) {
    if (byId.has(step.id)) {
      throw new Error(`Duplicate step id '${step.id}'.`);
    }
    byId.set(step.id, step);
  }

  return {
    get: (id) => byId.get(id),
    list: () => [...byId.keys()],
  };
}

export const BUILTIN_STEPS: readonly StepDefinition[] = [
  verilatorLint,
  lintErrorsChecker,
  lintWarningsChecker,
  yosysSynthesis,
];

export const builtinSteps = createStepRegistry(BUILTIN_STEPS);
