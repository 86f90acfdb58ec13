import type { FlowConfig } from "../config/config.js";
import type { State } from "../state/state.js";

// =============================================================================
// TYPES
// =============================================================================

export type FlowStartOptions = {
  /** Run tag; a new `RUN_<timestamp>` tag is assigned when absent. */
  tag?: string;
  frm?: string;
  to?: string;
  /** Replaces the run directory's latest `state_out.json` as the starting state. */
  withInitialState?: State;
  /** Checked between steps; a running tool is never killed. */
  signal?: AbortSignal;
};

export type FlowRunResult = {
  tag: string;
  runDir: string;
  state: State;
  stepsRun: string[];
};

export interface Flow {
  readonly name: string;
  start(options?: FlowStartOptions): Promise<FlowRunResult>;
}

export type FlowDefinition = {
  name: string;
  description: string;
  create: (config: FlowConfig, designDir: string) => Flow;
};

// =============================================================================
// REGISTRY
// =============================================================================

export type FlowRegistry = {
  /** Case-insensitive lookup. */
  get: (name: string) => FlowDefinition | undefined;
  /** Canonical names in registration order. */
  list: () => string[];
};

export function createFlowRegistry(definitions: readonly FlowDefinition[]): FlowRegistry {
  const byName = new Map<string, FlowDefinition>();
  for (const definition of definitions) {
    const key = normalizeFlowName(definition.name);
    if (byName.has(key)) {
      throw new Error(`Duplicate flow name '${definition.name}'.`);
    }
    byName.set(key, definition);
  }

  return {
    get: (name) => byName.get(normalizeFlowName(name)),
    list: () => [...byName.values()].map((definition) => definition.name),
  };
}

function normalizeFlowName(name: string): string {
  return name.trim().toLowerCase();
}
