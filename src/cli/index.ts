import { Command } from "commander";

import { buildLaunchContext } from "../app/launch/launch-context.js";
import { DEFAULT_PDK } from "../config/pdk.js";
import { createCliLogger } from "../core/logger.js";
import { builtinFlows } from "../flows/builtin.js";

import { launchCommand } from "./launch.js";

type LaunchFlags = {
  pdk: string;
  scl?: string;
  flow?: string;
  pdkRoot?: string;
  runTag?: string;
  lastRun: boolean;
  from?: string;
  to?: string;
  withInitialState?: string;
  overrideConfig: string[];
  debug: boolean;
  color: boolean;
};

// =============================================================================
// PROGRAM
// =============================================================================

export function buildCli(): Command {
  const program = new Command();

  program
    .name("hdlflow")
    .description("Run a hardware design flow over a design configuration file")
    .argument("<config_file>", "Design configuration file (.json)")
    .option("-p, --pdk <pdk>", "Process design kit to use", DEFAULT_PDK)
    .option("-s, --scl <scl>", "Standard cell library (default: the PDK's default)")
    .option(
      "-f, --flow <name>",
      `Flow to run, overriding the configuration's meta.flow (${builtinFlows.list().join(", ")})`,
    )
    .option("--pdk-root <dir>", "PDK root directory (default: $PDK_ROOT, then ~/.volare)")
    .option("--run-tag <tag>", "Name of the run directory to create or resume")
    .option("--last-run", "Resume the most recently modified run", false)
    .option("-F, --from <step>", "Start from this step id")
    .option("-T, --to <step>", "Stop after this step id")
    .option("-I, --with-initial-state <file>", "Use this state JSON file as the starting state")
    .option(
      "-c, --override-config <KEY=VALUE>",
      "Override a configuration variable; VALUE is a JSON literal (repeatable)",
      collect,
      [],
    )
    .option("--debug", "Show error codes, causes and stack traces", false)
    .option("--no-color", "Disable colored output")
    .action(async (configFile: string, flags: LaunchFlags) => {
      const { debug, color, ...launchFlags } = flags;
      const ctx = buildLaunchContext({
        logger: createCliLogger({ useColor: color }),
        debug,
      });
      process.exitCode = await launchCommand({ ...launchFlags, configFile }, ctx);
    });

  return program;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}
