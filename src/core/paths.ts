import path from "node:path";

export const RUNS_DIR_NAME = "runs";
export const FLOW_LOG_FILE = "flow.log.jsonl";
export const STATE_IN_FILE = "state_in.json";
export const STATE_OUT_FILE = "state_out.json";

export function runsDir(designDir: string): string {
  return path.join(designDir, RUNS_DIR_NAME);
}

export function runDir(designDir: string, runTag: string): string {
  return path.join(runsDir(designDir), runTag);
}

export function flowLogPath(runDirPath: string): string {
  return path.join(runDirPath, FLOW_LOG_FILE);
}

export function stepDirName(ordinal: number, slug: string): string {
  return `${String(ordinal).padStart(2, "0")}-${slug}`;
}

const STEP_DIR_PATTERN = /^(\d+)-/;

/** Returns the ordinal prefix of a step directory name, or null for other entries. */
export function parseStepDirOrdinal(name: string): number | null {
  const match = STEP_DIR_PATTERN.exec(name);
  if (!match?.[1]) return null;
  return Number.parseInt(match[1], 10);
}
