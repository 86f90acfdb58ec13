import { resolveConfig } from "../app/launch/config-resolver.js";
import { dispatchFlow, type DispatchInput } from "../app/launch/dispatcher.js";
import { EXIT_CODES, type ExitCode } from "../app/launch/exit-codes.js";
import { resolveFlow, type FlowDescriptor } from "../app/launch/flow-resolver.js";
import type { LaunchContext } from "../app/launch/launch-context.js";
import { validateLaunchOptions, type LaunchOptions } from "../app/launch/options.js";
import { resolveRunTag } from "../app/launch/run-resolver.js";
import { loadSeedState } from "../app/launch/state-loader.js";
import { OptionValidationError } from "../core/errors.js";

import { mapLaunchError, printLaunchFailure } from "./error-mapping.js";
import { createFlowStopHandler, type SignalSource } from "./signal-handlers.js";

export type LaunchCommandOptions = {
  /** Where stop signals come from; the current process by default. */
  signalSource?: SignalSource;
};

type PreparedLaunch = Omit<DispatchInput, "signal"> & {
  flowName: string;
  descriptor: FlowDescriptor;
};

type PrepareResult = { ok: true; launch: PreparedLaunch } | { ok: false; error: unknown };

// =============================================================================
// COMMAND
// =============================================================================

/**
 * Resolves options, configuration, flow, seed state and run tag, in that order, then
 * starts the flow once. The first failure ends the launch; the return value is the
 * process exit code.
 */
export async function launchCommand(
  rawOptions: unknown,
  ctx: LaunchContext,
  opts: LaunchCommandOptions = {},
): Promise<ExitCode> {
  const { logger } = ctx;

  const validated = validateLaunchOptions(rawOptions);
  if (!validated.ok) {
    return reportFailure(new OptionValidationError(validated.violations), ctx);
  }

  const prepared = await prepareLaunch(validated.options, ctx);
  if (!prepared.ok) {
    return reportFailure(prepared.error, ctx);
  }
  const { flowName, descriptor, ...dispatchInput } = prepared.launch;

  const notes = describeFlowSource(descriptor);
  if (dispatchInput.runTag) notes.push(`run ${dispatchInput.runTag}`);
  const noteLabel = notes.length > 0 ? ` (${notes.join("; ")})` : "";
  logger.info(`Starting flow ${flowName}${noteLabel}.`);

  const stopHandler = createFlowStopHandler({
    source: opts.signalSource,
    onSignal: (signal) => {
      logger.warn(`Received ${signal}. Stopping the flow once the current step finishes.`);
    },
  });

  const outcome = await dispatchFlow({ ...dispatchInput, signal: stopHandler.signal }).finally(
    () => stopHandler.dispose(),
  );

  if (outcome.status === "succeeded") {
    const { tag, stepsRun } = outcome.result;
    logger.success(`Flow ${flowName} finished run ${tag} (${stepsRun.length} step(s)).`);
    return EXIT_CODES.success;
  }

  printLaunchFailure(mapLaunchError(outcome.error), logger, { debug: ctx.debug });
  return outcome.exitCode;
}

// =============================================================================
// RESOLUTION
// =============================================================================

async function prepareLaunch(options: LaunchOptions, ctx: LaunchContext): Promise<PrepareResult> {
  const { ports, logger } = ctx;

  try {
    const loaded = await resolveConfig(options, ports.configBuilder);
    for (const warning of loaded.warnings) {
      logger.warn(warning);
    }

    const flow = resolveFlow(options.flowName, loaded.config.meta.flow, {
      flows: ports.flowRegistry,
      steps: ports.stepRegistry,
    });

    const seedState = await loadSeedState(options.initialStatePath, ports.stateCodec);
    const runTag = await resolveRunTag({
      designDir: loaded.designDir,
      runTag: options.runTag,
      lastRun: options.lastRun,
    });

    return {
      ok: true,
      launch: {
        flowName: flow.definition.name,
        descriptor: flow.descriptor,
        definition: flow.definition,
        config: loaded.config,
        designDir: loaded.designDir,
        runTag,
        frm: options.frm,
        to: options.to,
        seedState,
      },
    };
  } catch (error) {
    return { ok: false, error };
  }
}

function describeFlowSource(descriptor: FlowDescriptor): string[] {
  if (descriptor.kind === "sequence") {
    return [`steps ${descriptor.stepIds.join(", ")}`];
  }
  return descriptor.source === "cli" ? ["from --flow"] : [];
}

function reportFailure(error: unknown, ctx: LaunchContext): ExitCode {
  const failure = mapLaunchError(error);
  printLaunchFailure(failure, ctx.logger, { debug: ctx.debug });
  return failure.exitCode;
}
