import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";

import { buildCli } from "./cli/index.js";

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = buildCli();
  await program.parseAsync(argv);
}

/**
 * True when `scriptPath` (usually `process.argv[1]`) names the module at `moduleUrl`.
 * npm installs bins as symlinks, so the script path is resolved before comparing.
 */
export function isDirectExecution(moduleUrl: string, scriptPath: string | undefined): boolean {
  if (!scriptPath) return false;
  try {
    return pathToFileURL(realpathSync(scriptPath)).href === moduleUrl;
  } catch {
    return false;
  }
}
