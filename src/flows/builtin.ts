import { lintErrorsChecker, lintWarningsChecker } from "../steps/checker.js";
import { verilatorLint } from "../steps/verilator.js";
import { yosysSynthesis } from "../steps/yosys.js";

import { createFlowRegistry, type FlowDefinition } from "./flow.js";
import { createSequentialFlowDefinition } from "./sequential.js";

const LINT_STEPS = [verilatorLint, lintErrorsChecker, lintWarningsChecker];

export const BUILTIN_FLOWS: readonly FlowDefinition[] = [
  createSequentialFlowDefinition("Classic", "Lint the sources, then synthesize them", [
    ...LINT_STEPS,
    yosysSynthesis,
  ]),
  createSequentialFlowDefinition("Lint", "Lint the sources only", LINT_STEPS),
  createSequentialFlowDefinition("Synthesis", "Synthesize the sources without linting", [
    yosysSynthesis,
  ]),
];

export const builtinFlows = createFlowRegistry(BUILTIN_FLOWS);
