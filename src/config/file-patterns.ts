import fs from "node:fs/promises";
import path from "node:path";

import fse from "fs-extra";
import { minimatch } from "minimatch";

export const DESIGN_DIR_PREFIX = "dir::";

const WILDCARD_PATTERN = /[*?[]/;

export type ExpandedPaths = {
  paths: string[];
  errors: string[];
};

/**
 * Resolves path-valued configuration entries against the design directory.
 *
 * `dir::src/*.v` and `src/*.v` are equivalent; wildcards only apply to the last path
 * segment and expand to the sorted list of matching files.
 */
export async function expandPathEntries(
  variable: string,
  entries: readonly string[],
  designDir: string,
): Promise<ExpandedPaths> {
  const paths: string[] = [];
  const errors: string[] = [];

  for (const entry of entries) {
    const relative = entry.startsWith(DESIGN_DIR_PREFIX)
      ? entry.slice(DESIGN_DIR_PREFIX.length)
      : entry;
    const absolute = path.resolve(designDir, relative);

    if (!WILDCARD_PATTERN.test(path.basename(absolute))) {
      if (await fse.pathExists(absolute)) {
        paths.push(absolute);
      } else {
        errors.push(`Path '${entry}' for variable '${variable}' does not exist.`);
      }
      continue;
    }

    const matches = await matchInDirectory(path.dirname(absolute), path.basename(absolute));
    if (matches.length === 0) {
      errors.push(`No files matched '${entry}' for variable '${variable}'.`);
      continue;
    }
    paths.push(...matches);
  }

  return { paths, errors };
}

async function matchInDirectory(dir: string, pattern: string): Promise<string[]> {
  if (!(await fse.pathExists(dir))) return [];

  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && minimatch(entry.name, pattern))
    .map((entry) => entry.name)
    .sort()
    .map((name) => path.join(dir, name));
}
