import fs from "node:fs/promises";
import path from "node:path";

import fse from "fs-extra";

import { NoRunsFoundError } from "../../core/errors.js";
import { runsDir } from "../../core/paths.js";

export type RunSelection = {
  designDir: string;
  runTag?: string;
  lastRun: boolean;
};

/**
 * Returns the run tag to start under, or undefined to let the flow assign a new one.
 *
 * An explicit tag is returned as-is. `lastRun` picks the run directory with the newest
 * modification time; this is a snapshot of `runs/`, taken without a lock.
 */
export async function resolveRunTag(selection: RunSelection): Promise<string | undefined> {
  if (selection.runTag !== undefined) {
    return selection.runTag;
  }

  if (!selection.lastRun) {
    return undefined;
  }

  const dir = runsDir(selection.designDir);
  const latest = await findLatestRunDir(dir);
  if (!latest) {
    throw new NoRunsFoundError(dir);
  }
  return latest;
}

/** Name of the run directory (or link to one) with the greatest mtime; the first one seen wins a tie. */
export async function findLatestRunDir(dir: string): Promise<string | null> {
  if (!(await fse.pathExists(dir))) return null;

  const names = await fs.readdir(dir);
  let latestName: string | null = null;
  let latestTime = Number.NEGATIVE_INFINITY;

  for (const name of names) {
    if (name.startsWith(".")) continue;

    // stat follows symlinks, so a linked run directory counts as a run
    const stats = await fs.stat(path.join(dir, name));
    if (!stats.isDirectory()) continue;
    if (stats.mtimeMs > latestTime) {
      latestTime = stats.mtimeMs;
      latestName = name;
    }
  }

  return latestName;
}
