import type { ConfigLoadInput, LoadedConfig } from "../../config/config-builder.js";
import type { FlowRegistry } from "../../flows/flow.js";
import type { State } from "../../state/state.js";
import type { StepRegistry } from "../../steps/registry.js";

/**
 * Collaborators the launcher talks to. Each is a capability, so tests can swap in stubs.
 */
export type ConfigBuilder = {
  load: (input: ConfigLoadInput) => Promise<LoadedConfig>;
};

export type StateCodec = {
  /** Throws for text that is not a serialized state. */
  loads: (text: string) => State;
};

export type LaunchPorts = {
  configBuilder: ConfigBuilder;
  flowRegistry: FlowRegistry;
  stepRegistry: StepRegistry;
  stateCodec: StateCodec;
};
