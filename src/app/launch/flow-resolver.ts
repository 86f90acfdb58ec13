import type { FlowReference } from "../../config/config.js";
import { UnknownFlowError, type FlowNameSource } from "../../core/errors.js";
import type { FlowDefinition, FlowRegistry } from "../../flows/flow.js";
import { makeSequentialFlow } from "../../flows/sequential.js";
import type { StepRegistry } from "../../steps/registry.js";

export type FlowDescriptor =
  | { kind: "registered"; name: string; source: FlowNameSource }
  | { kind: "sequence"; stepIds: readonly string[] };

export type ResolvedFlow = {
  descriptor: FlowDescriptor;
  definition: FlowDefinition;
};

/**
 * Picks the flow to run: `--flow` wins over the configuration's `meta.flow`.
 *
 * A list of step ids always becomes an ad-hoc sequential flow over that list; a name
 * must match a registered flow case-insensitively.
 */
export function resolveFlow(
  explicitName: string | undefined,
  metaFlow: FlowReference,
  registries: { flows: FlowRegistry; steps: StepRegistry },
): ResolvedFlow {
  const source: FlowNameSource = explicitName !== undefined ? "cli" : "meta";
  const reference: FlowReference = explicitName ?? metaFlow;

  if (typeof reference !== "string") {
    const stepIds = [...reference];
    return {
      descriptor: { kind: "sequence", stepIds },
      definition: makeSequentialFlow(stepIds, registries.steps),
    };
  }

  const definition = registries.flows.get(reference);
  if (!definition) {
    throw new UnknownFlowError(reference, source);
  }

  return {
    descriptor: { kind: "registered", name: definition.name, source },
    definition,
  };
}
