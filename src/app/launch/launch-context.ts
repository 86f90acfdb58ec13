/**
 * LaunchContext + composition root for a single CLI invocation.
 * Purpose: centralize the injected collaborators and output channel to avoid globals.
 * Assumptions: ports are thin adapters over the config, flow and state modules and are overrideable for tests.
 * Usage: buildLaunchContext({ logger, debug }) and pass it to launchCommand.
 */

import { loadDesignConfig } from "../../config/config-builder.js";
import { createCliLogger, type CliLogger } from "../../core/logger.js";
import { builtinFlows } from "../../flows/builtin.js";
import { State } from "../../state/state.js";
import { builtinSteps } from "../../steps/registry.js";

import type { LaunchPorts } from "./ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type LaunchContext = {
  ports: LaunchPorts;
  logger: CliLogger;
  /** Include error codes, causes and stack traces in diagnostics. */
  debug: boolean;
};

export type BuildLaunchContextInput = {
  logger?: CliLogger;
  debug?: boolean;
  ports?: Partial<LaunchPorts>;
};

// =============================================================================
// DEFAULT ADAPTERS
// =============================================================================

export function createDefaultPorts(): LaunchPorts {
  return {
    configBuilder: { load: loadDesignConfig },
    flowRegistry: builtinFlows,
    stepRegistry: builtinSteps,
    stateCodec: { loads: (text) => State.loads(text) },
  };
}

// =============================================================================
// COMPOSITION ROOT
// =============================================================================

export function buildLaunchContext(input: BuildLaunchContextInput = {}): LaunchContext {
  return {
    ports: {
      ...createDefaultPorts(),
      ...input.ports,
    },
    logger: input.logger ?? createCliLogger(),
    debug: input.debug ?? false,
  };
}
