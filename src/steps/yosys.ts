import path from "node:path";

import fse from "fs-extra";

import {
  getBoolean,
  getNumber,
  getString,
  getStringList,
  type FlowConfig,
} from "../config/config.js";
import { StepError } from "../core/errors.js";
import { writeTextFile } from "../core/utils.js";

import type { StepDefinition } from "./step.js";
import { runTool } from "./tool.js";

export const INSTANCE_COUNT_METRIC = "design__instance__count";

const SCRIPT_FILE = "synthesize.ys";
const LOG_FILE = "yosys.log";

const ABC_SCRIPTS: Record<string, string> = {
  "AREA 0": "strash; dch; map -a; topo; stime -c",
  "AREA 1": "strash; ifraig; scorr; dc2; dretime; strash; dch -f; map -a; topo",
  "AREA 2": "strash; dc2; dch -f; map -a; mfs2; topo",
  "AREA 3": "strash; dch -f; amap; topo",
  "DELAY 0": "strash; dch; map -p; buffer -p; upsize; dnsize",
  "DELAY 1": "strash; ifraig; scorr; dc2; dretime; strash; dch -f; map -p; buffer -p",
  "DELAY 2": "strash; dc2; dch -f; map -p; buffer -p; upsize; dnsize",
  "DELAY 3": "strash; &get -n; &st; &dch; &nf; &put; buffer -p; upsize; dnsize",
  "DELAY 4": "strash; dch -f; map -p -B 0.9; topo; buffer -p; upsize; dnsize",
};

export function netlistFileName(designName: string): string {
  return `${designName}.nl.v`;
}

export function buildSynthesisScript(config: FlowConfig, netlistPath: string): string {
  const designName = getString(config, "DESIGN_NAME");
  const defines = getStringList(config, "VERILOG_DEFINES").map((define) => `-D${define}`);
  const [liberty] = getStringList(config, "LIB_SYNTH");
  if (!liberty) {
    throw new StepError("No liberty file is available for synthesis (LIB_SYNTH is empty).");
  }

  const strategy = getString(config, "SYNTH_STRATEGY");
  const abcScript = ABC_SCRIPTS[strategy];
  if (!abcScript) {
    throw new StepError(`Unknown synthesis strategy '${strategy}'.`);
  }

  // ABC takes the delay target in picoseconds.
  const delayTarget = Math.round(getNumber(config, "CLOCK_PERIOD") * 1000);
  const flatten = getBoolean(config, "SYNTH_NO_FLAT") ? "" : " -flatten";
  const sources = getStringList(config, "VERILOG_FILES").map(quote).join(" ");

  return [
    `read_verilog -sv ${[...defines, sources].join(" ")}`,
    `hierarchy -check -top ${designName}`,
    `synth -top ${designName}${flatten}`,
    `dfflibmap -liberty ${quote(liberty)}`,
    `abc -D ${delayTarget} -liberty ${quote(liberty)} -script "+${toAbcArgument(abcScript)}"`,
    "opt_clean -purge",
    `stat -liberty ${quote(liberty)}`,
    `write_verilog -noattr -noexpr -nohex -nodec ${quote(netlistPath)}`,
    "",
  ].join("\n");
}

/** Last `Number of cells` reported by `stat`, or null when the log has none. */
export function parseInstanceCount(log: string): number | null {
  let count: number | null = null;
  for (const match of log.matchAll(/Number of cells:\s+(\d+)/g)) {
    if (match[1]) count = Number.parseInt(match[1], 10);
  }
  return count;
}

export const yosysSynthesis: StepDefinition = {
  id: "Yosys.Synthesis",
  name: "Synthesis",
  inputs: [],
  outputs: ["nl"],
  run: async ({ config, stepDir }) => {
    const netlistPath = path.join(stepDir, netlistFileName(getString(config, "DESIGN_NAME")));
    const scriptPath = path.join(stepDir, SCRIPT_FILE);
    await writeTextFile(scriptPath, buildSynthesisScript(config, netlistPath));

    const result = await runTool("yosys", ["-q", "-l", LOG_FILE, "-s", SCRIPT_FILE], {
      cwd: stepDir,
      logPath: path.join(stepDir, "yosys.stdout.log"),
    });
    if (result.exitCode !== 0) {
      throw new StepError(`Yosys exited with code ${result.exitCode}; see ${LOG_FILE}.`);
    }

    const logPath = path.join(stepDir, LOG_FILE);
    const log = (await fse.pathExists(logPath)) ? await fse.readFile(logPath, "utf8") : "";
    return {
      views: { nl: netlistPath },
      metrics: { [INSTANCE_COUNT_METRIC]: parseInstanceCount(log) },
    };
  },
};

// Inline ABC scripts separate commands with `;` and use `,` in place of spaces.
function toAbcArgument(script: string): string {
  return script
    .split(";")
    .map((command) => command.trim().replace(/\s+/g, ","))
    .join(";");
}

function quote(value: string): string {
  return JSON.stringify(value);
}
