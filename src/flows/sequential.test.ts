import fs from "node:fs";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  captureRejection,
  cleanupTempDirs,
  makeFlowConfig,
  makeTempDir,
} from "../__tests__/launch.helpers.js";
import { FlowError, FlowException, StepError, UnknownStepError } from "../core/errors.js";
import { State } from "../state/state.js";
import { createStepRegistry } from "../steps/registry.js";
import type { StepDefinition, StepRunInput, StepRunResult } from "../steps/step.js";

import { SequentialFlow, makeSequentialFlow } from "./sequential.js";

// =============================================================================
// TEST SETUP
// =============================================================================

let designDir = "";

beforeEach(() => {
  designDir = makeTempDir("hdlflow-flow-");
});

afterEach(() => {
  cleanupTempDirs();
});

// =============================================================================
// HELPERS
// =============================================================================

function stubStep(
  id: string,
  run: (input: StepRunInput) => Promise<StepRunResult> | StepRunResult,
  outputs: StepDefinition["outputs"] = [],
): StepDefinition {
  return { id, name: id, inputs: [], outputs, run: async (input) => run(input) };
}

const countStep = stubStep("Stub.Count", () => ({ metrics: { count: 1 } }));

const doubleStep = stubStep("Stub.Double", ({ state }) => {
  const count = state.metric("count");
  return { metrics: { count: (typeof count === "number" ? count : 0) * 2 + 1 } };
});

const netlistStep = stubStep(
  "Stub.Netlist",
  ({ stepDir }) => ({ views: { nl: path.join(stepDir, "counter.nl.v") } }),
  ["nl"],
);

const FIXED_CLOCK = (): Date => new Date(Date.UTC(2024, 0, 2, 3, 4, 5));

function makeFlow(steps: StepDefinition[] = [countStep, doubleStep, netlistStep]): SequentialFlow {
  return new SequentialFlow({
    name: "Test",
    steps,
    config: makeFlowConfig(),
    designDir,
    clock: FIXED_CLOCK,
  });
}

function readEventTypes(runDirPath: string): string[] {
  return fs
    .readFileSync(path.join(runDirPath, "flow.log.jsonl"), "utf8")
    .trim()
    .split("\n")
    .map((line) => (JSON.parse(line) as { type: string }).type);
}

function listStepDirs(runDirPath: string): string[] {
  return fs
    .readdirSync(runDirPath)
    .filter((name) => /^\d+-/.test(name))
    .sort();
}

// =============================================================================
// TESTS
// =============================================================================

describe("SequentialFlow", () => {
  it("runs every step in order inside a new run directory", async () => {
    const result = await makeFlow().start();

    const expectedDir = path.join(designDir, "runs", "RUN_2024-01-02_03-04-05");
    expect(result.tag).toBe("RUN_2024-01-02_03-04-05");
    expect(result.runDir).toBe(expectedDir);
    expect(result.stepsRun).toEqual(["Stub.Count", "Stub.Double", "Stub.Netlist"]);
    expect(result.state.metric("count")).toBe(3);
    expect(result.state.view("nl")).toBe(path.join(expectedDir, "03-stub-netlist", "counter.nl.v"));
    expect(listStepDirs(expectedDir)).toEqual(["01-stub-count", "02-stub-double", "03-stub-netlist"]);

    const finalState = fs.readFileSync(
      path.join(expectedDir, "03-stub-netlist", "state_out.json"),
      "utf8",
    );
    expect(finalState).toBe(result.state.dumps());
    expect(readEventTypes(expectedDir)).toEqual([
      "flow.start",
      "step.start",
      "step.complete",
      "step.start",
      "step.complete",
      "step.start",
      "step.complete",
      "flow.complete",
    ]);
  });

  it("limits the run to the --from/--to range, matching ids case-insensitively", async () => {
    const result = await makeFlow().start({ tag: "partial", frm: "stub.double", to: "Stub.Double" });

    expect(result.stepsRun).toEqual(["Stub.Double"]);
    expect(result.state.metric("count")).toBe(1);
    expect(listStepDirs(result.runDir)).toEqual(["01-stub-double"]);
  });

  it("resumes from the latest state and continues the step numbering", async () => {
    const flow = makeFlow();
    await flow.start({ tag: "resume", to: "Stub.Count" });

    const result = await flow.start({ tag: "resume", frm: "Stub.Double" });

    expect(result.stepsRun).toEqual(["Stub.Double", "Stub.Netlist"]);
    expect(result.state.metric("count")).toBe(3);
    expect(listStepDirs(result.runDir)).toEqual([
      "01-stub-count",
      "02-stub-double",
      "03-stub-netlist",
    ]);
  });

  it("starts from the seed state instead of the run's latest state", async () => {
    const flow = makeFlow();
    await flow.start({ tag: "seeded", to: "Stub.Count" });

    const result = await flow.start({
      tag: "seeded",
      frm: "Stub.Double",
      to: "Stub.Double",
      withInitialState: new State({ metrics: { count: 10 } }),
    });

    expect(result.state.metric("count")).toBe(21);
  });

  it("rejects an unknown start step before creating the run directory", async () => {
    const error = await captureRejection(makeFlow().start({ frm: "Nope" }));

    expect(error).toBeInstanceOf(FlowException);
    expect(error).toMatchObject({
      message: "Failed to process start step 'Nope': no step with that id exists in flow Test.",
    });
    expect(fs.existsSync(path.join(designDir, "runs"))).toBe(false);
  });

  it("rejects a start step after the end step", async () => {
    await expect(makeFlow().start({ frm: "Stub.Netlist", to: "Stub.Count" })).rejects.toThrow(
      "Start step 'Stub.Netlist' comes after end step 'Stub.Count' in flow Test.",
    );
  });

  it("turns a step's StepError into a FlowError", async () => {
    const failing = stubStep("Stub.Fail", () => {
      throw new StepError("design is broken");
    });

    const error = await captureRejection(makeFlow([countStep, failing]).start({ tag: "broken" }));

    expect(error).toBeInstanceOf(FlowError);
    expect(error).toMatchObject({ message: "Stub.Fail: design is broken" });
    const runDirPath = path.join(designDir, "runs", "broken");
    expect(readEventTypes(runDirPath).slice(-2)).toEqual(["step.failed", "flow.failed"]);
    expect(fs.existsSync(path.join(runDirPath, "01-stub-count", "state_out.json"))).toBe(true);
  });

  it("turns any other step failure into a FlowException", async () => {
    const exploding = stubStep("Stub.Boom", () => {
      throw new Error("kaboom");
    });

    const error = await captureRejection(makeFlow([exploding]).start({ tag: "boom" }));

    expect(error).toBeInstanceOf(FlowException);
    expect(error).toMatchObject({ message: "Stub.Boom: kaboom" });
  });

  it("stops between steps once the signal is aborted", async () => {
    const controller = new AbortController();
    const interrupting = stubStep("Stub.Interrupt", () => {
      controller.abort("SIGTERM");
      return {};
    });

    const error = await captureRejection(
      makeFlow([interrupting, countStep]).start({ tag: "stopped", signal: controller.signal }),
    );

    expect(error).toBeInstanceOf(FlowException);
    expect(error).toMatchObject({
      message:
        "The flow was interrupted (SIGTERM) before Stub.Count. Resume with --run-tag stopped.",
    });
    const runDirPath = path.join(designDir, "runs", "stopped");
    expect(listStepDirs(runDirPath)).toEqual(["01-stub-interrupt"]);
    expect(readEventTypes(runDirPath)).toContain("flow.interrupted");
  });

  it("refuses to resume from a corrupt state file", async () => {
    const stateOut = path.join(designDir, "runs", "corrupt", "01-stub-count", "state_out.json");
    fs.mkdirSync(path.dirname(stateOut), { recursive: true });
    fs.writeFileSync(stateOut, "garbage", "utf8");

    const error = await captureRejection(makeFlow().start({ tag: "corrupt", frm: "Stub.Double" }));

    expect(error).toBeInstanceOf(FlowException);
    const message = error instanceof Error ? error.message : "";
    expect(message.startsWith(`Could not resume from ${stateOut}: invalid JSON (`)).toBe(true);
  });
});

describe("makeSequentialFlow", () => {
  const registry = createStepRegistry([countStep, doubleStep]);

  it("creates an ad-hoc flow over the listed steps", () => {
    const definition = makeSequentialFlow(["Stub.Double", "Stub.Count"], registry);
    const flow = definition.create(makeFlowConfig(), designDir);

    expect(definition.name).toBe("Custom");
    expect(flow).toBeInstanceOf(SequentialFlow);
    expect(flow instanceof SequentialFlow && flow.stepIds).toEqual(["Stub.Double", "Stub.Count"]);
  });

  it("rejects step ids that are not registered", () => {
    expect(() => makeSequentialFlow(["Stub.Count", "Stub.Missing"], registry)).toThrow(
      UnknownStepError,
    );
  });
});
