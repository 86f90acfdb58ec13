import type { FlowConfig } from "../../config/config.js";
import { FlowError } from "../../core/errors.js";
import type { FlowDefinition, FlowRunResult } from "../../flows/flow.js";
import type { State } from "../../state/state.js";

import { EXIT_CODES } from "./exit-codes.js";

export type DispatchInput = {
  definition: FlowDefinition;
  config: FlowConfig;
  designDir: string;
  runTag?: string;
  frm?: string;
  to?: string;
  seedState?: State;
  signal?: AbortSignal;
};

export type DispatchOutcome =
  | { status: "succeeded"; exitCode: typeof EXIT_CODES.success; result: FlowRunResult }
  | { status: "failed_expected"; exitCode: typeof EXIT_CODES.pipelineFailure; error: FlowError }
  | { status: "failed_unexpected"; exitCode: typeof EXIT_CODES.failure; error: unknown };

/**
 * Instantiates the flow and starts it once. Never throws: a FlowError is an expected
 * pipeline failure, anything else raised by the engine is unexpected.
 */
export async function dispatchFlow(input: DispatchInput): Promise<DispatchOutcome> {
  try {
    const flow = input.definition.create(input.config, input.designDir);
    const result = await flow.start({
      tag: input.runTag,
      frm: input.frm,
      to: input.to,
      withInitialState: input.seedState,
      signal: input.signal,
    });
    return { status: "succeeded", exitCode: EXIT_CODES.success, result };
  } catch (error) {
    if (error instanceof FlowError) {
      return { status: "failed_expected", exitCode: EXIT_CODES.pipelineFailure, error };
    }
    return { status: "failed_unexpected", exitCode: EXIT_CODES.failure, error };
  }
}
