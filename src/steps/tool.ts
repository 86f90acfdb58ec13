import { execa } from "execa";

import { StepException } from "../core/errors.js";
import { writeTextFile } from "../core/utils.js";

export type ToolRunOptions = {
  cwd: string;
  /** Combined stdout/stderr is written here whatever the outcome. */
  logPath: string;
  env?: Record<string, string>;
};

export type ToolRunResult = {
  exitCode: number;
  output: string;
};

/**
 * Runs an external tool to completion. A non-zero exit is returned, not thrown, so the
 * calling step decides whether it is a design failure; a tool that cannot be spawned
 * throws {@link StepException}.
 */
export async function runTool(
  command: string,
  args: string[],
  opts: ToolRunOptions,
): Promise<ToolRunResult> {
  const result = await execa(command, args, {
    cwd: opts.cwd,
    env: opts.env,
    all: true,
    reject: false,
  });

  const output = result.all ?? [result.stdout, result.stderr].filter(Boolean).join("\n");
  await writeTextFile(opts.logPath, output);

  if (typeof result.exitCode !== "number") {
    throw new StepException(`Failed to run ${command}: ${result.stderr || "process did not start"}`);
  }

  return { exitCode: result.exitCode, output };
}
