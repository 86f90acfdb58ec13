/*
Purpose: run an ordered list of steps inside a run directory, resuming from the directory's latest state.
Assumptions: step directories are named `NN-<step-slug>`; numbering continues across resumed runs.
Usage: await new SequentialFlow({ name, steps, config, designDir }).start({ tag, frm, to }).
*/

import fs from "node:fs/promises";
import path from "node:path";

import fse from "fs-extra";

import type { FlowConfig } from "../config/config.js";
import { formatErrorMessage } from "../core/error-format.js";
import { FlowError, FlowException, StepError, UnknownStepError } from "../core/errors.js";
import { JsonlLogger, logFlowEvent } from "../core/logger.js";
import { STATE_OUT_FILE, flowLogPath, parseStepDirOrdinal, runDir, stepDirName } from "../core/paths.js";
import { defaultRunTag, slugify } from "../core/utils.js";
import { State } from "../state/state.js";
import { runStep, type StepDefinition } from "../steps/step.js";
import type { StepRegistry } from "../steps/registry.js";

import type { Flow, FlowDefinition, FlowRunResult, FlowStartOptions } from "./flow.js";

// =============================================================================
// TYPES
// =============================================================================

export type SequentialFlowInput = {
  name: string;
  steps: readonly StepDefinition[];
  config: FlowConfig;
  designDir: string;
  clock?: () => Date;
};

type StepRange = { first: number; last: number };

type ExistingStepDir = { ordinal: number; dir: string };

export const AD_HOC_FLOW_NAME = "Custom";

// =============================================================================
// FLOW
// =============================================================================

export class SequentialFlow implements Flow {
  readonly name: string;
  private readonly steps: readonly StepDefinition[];
  private readonly config: FlowConfig;
  private readonly designDir: string;
  private readonly clock: () => Date;

  constructor(input: SequentialFlowInput) {
    this.name = input.name;
    this.steps = input.steps;
    this.config = input.config;
    this.designDir = input.designDir;
    this.clock = input.clock ?? (() => new Date());
  }

  get stepIds(): string[] {
    return this.steps.map((step) => step.id);
  }

  async start(options: FlowStartOptions = {}): Promise<FlowRunResult> {
    const range = this.resolveRange(options.frm, options.to);
    const tag = options.tag ?? defaultRunTag(this.clock());
    const dir = runDir(this.designDir, tag);
    await fse.ensureDir(dir);

    const logger = new JsonlLogger(flowLogPath(dir), { runTag: tag });
    logFlowEvent(logger, "flow.start", {
      flow: this.name,
      from: options.frm ?? null,
      to: options.to ?? null,
      seeded: options.withInitialState !== undefined,
    });

    try {
      const result = await this.runSteps({ tag, dir, range, logger, options });
      logFlowEvent(logger, "flow.complete", { flow: this.name, steps: result.stepsRun });
      return result;
    } catch (err) {
      const failure = toFlowFailure(err);
      logFlowEvent(logger, "flow.failed", {
        flow: this.name,
        expected: failure instanceof FlowError,
        message: failure.message,
      });
      throw failure;
    }
  }

  private async runSteps(input: {
    tag: string;
    dir: string;
    range: StepRange;
    logger: JsonlLogger;
    options: FlowStartOptions;
  }): Promise<FlowRunResult> {
    const { tag, dir, range, logger, options } = input;
    const existing = await listStepDirs(dir);

    let state = options.withInitialState ?? (await loadLatestState(existing)) ?? State.empty();
    let ordinal = (existing[0]?.ordinal ?? 0) + 1;
    const stepsRun: string[] = [];

    for (const step of this.steps.slice(range.first, range.last + 1)) {
      if (options.signal?.aborted) {
        const reason = String(options.signal.reason ?? "abort");
        logFlowEvent(logger, "flow.interrupted", { before_step: step.id, reason });
        throw new FlowException(
          `The flow was interrupted (${reason}) before ${step.id}. Resume with --run-tag ${tag}.`,
        );
      }

      const stepDir = path.join(dir, stepDirName(ordinal, slugify(step.id)));
      ordinal += 1;

      try {
        state = await runStep(step, { config: this.config, state, stepDir, logger });
      } catch (err) {
        if (err instanceof StepError) {
          throw new FlowError(`${step.id}: ${err.message}`, err);
        }
        throw new FlowException(`${step.id}: ${formatErrorMessage(err)}`, err);
      }
      stepsRun.push(step.id);
    }

    return { tag, runDir: dir, state, stepsRun };
  }

  private resolveRange(frm: string | undefined, to: string | undefined): StepRange {
    const first = frm === undefined ? 0 : this.indexOfStep(frm, "start");
    const last = to === undefined ? this.steps.length - 1 : this.indexOfStep(to, "end");
    if (first > last) {
      throw new FlowException(`Start step '${frm}' comes after end step '${to}' in flow ${this.name}.`);
    }
    return { first, last };
  }

  private indexOfStep(id: string, role: "start" | "end"): number {
    const wanted = id.toLowerCase();
    const index = this.steps.findIndex((step) => step.id.toLowerCase() === wanted);
    if (index === -1) {
      throw new FlowException(
        `Failed to process ${role} step '${id}': no step with that id exists in flow ${this.name}.`,
      );
    }
    return index;
  }
}

// =============================================================================
// DEFINITIONS
// =============================================================================

export function createSequentialFlowDefinition(
  name: string,
  description: string,
  steps: readonly StepDefinition[],
): FlowDefinition {
  return {
    name,
    description,
    create: (config, designDir) => new SequentialFlow({ name, steps, config, designDir }),
  };
}

/** Builds an ad-hoc sequential flow running exactly `stepIds`, in order. */
export function makeSequentialFlow(
  stepIds: readonly string[],
  registry: StepRegistry,
): FlowDefinition {
  const steps = stepIds.map((id) => {
    const step = registry.get(id);
    if (!step) throw new UnknownStepError(id);
    return step;
  });

  return createSequentialFlowDefinition(
    AD_HOC_FLOW_NAME,
    `Sequential flow of ${stepIds.join(", ")}`,
    steps,
  );
}

// =============================================================================
// INTERNALS
// =============================================================================

function toFlowFailure(err: unknown): FlowError | FlowException {
  if (err instanceof FlowError || err instanceof FlowException) return err;
  return new FlowException(formatErrorMessage(err), err);
}

/** Step directories of a run, newest (highest ordinal) first. */
async function listStepDirs(dir: string): Promise<ExistingStepDir[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const stepDirs: ExistingStepDir[] = [];
  for (const entry of entries) {
    if (!entry.isDirectory()) continue;
    const ordinal = parseStepDirOrdinal(entry.name);
    if (ordinal !== null) stepDirs.push({ ordinal, dir: path.join(dir, entry.name) });
  }
  return stepDirs.sort((a, b) => b.ordinal - a.ordinal);
}

async function loadLatestState(stepDirs: readonly ExistingStepDir[]): Promise<State | null> {
  for (const { dir } of stepDirs) {
    const statePath = path.join(dir, STATE_OUT_FILE);
    if (!(await fse.pathExists(statePath))) continue;

    const text = await fse.readFile(statePath, "utf8");
    try {
      return State.loads(text);
    } catch (err) {
      throw new FlowException(`Could not resume from ${statePath}: ${formatErrorMessage(err)}`, err);
    }
  }
  return null;
}
