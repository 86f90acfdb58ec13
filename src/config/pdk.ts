import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { minimatch } from "minimatch";

export const DEFAULT_PDK = "sky130A";

const DEFAULT_SCL_BY_FAMILY: ReadonlyArray<{ prefix: string; scl: string }> = [
  { prefix: "sky130", scl: "sky130_fd_sc_hd" },
  { prefix: "gf180mcu", scl: "gf180mcu_fd_sc_mcu7t5v0" },
];

const TYPICAL_LIBERTY_PATTERN = "*tt*.lib";

export type PdkSelection = {
  pdkRoot: string;
  pdk: string;
  scl?: string;
};

export type ResolvedPdk = {
  pdkRoot: string;
  pdk: string;
  scl: string;
  libSynth: string[];
};

export function resolvePdkRoot(explicit: string | undefined, env: NodeJS.ProcessEnv = process.env): string {
  if (explicit) return path.resolve(explicit);
  if (env.PDK_ROOT) return path.resolve(env.PDK_ROOT);
  return path.join(os.homedir(), ".volare");
}

export function defaultSclForPdk(pdk: string): string | undefined {
  return DEFAULT_SCL_BY_FAMILY.find((family) => pdk.startsWith(family.prefix))?.scl;
}

/**
 * Resolves the standard cell library and the synthesis liberty files.
 * Returns the list of problems instead of throwing so the config builder can report them together.
 */
export async function resolvePdk(
  selection: PdkSelection,
): Promise<{ pdk: ResolvedPdk | null; errors: string[] }> {
  const { pdkRoot, pdk } = selection;
  const pdkDir = path.join(pdkRoot, pdk);
  if (!(await isDirectory(pdkDir))) {
    return { pdk: null, errors: [`PDK '${pdk}' not found in ${pdkRoot}.`] };
  }

  const scl = selection.scl ?? defaultSclForPdk(pdk);
  if (!scl) {
    return {
      pdk: null,
      errors: [`No default standard cell library is known for PDK '${pdk}'. Pass --scl.`],
    };
  }

  const sclDir = path.join(pdkDir, "libs.ref", scl);
  if (!(await isDirectory(sclDir))) {
    return { pdk: null, errors: [`Standard cell library '${scl}' not found for PDK '${pdk}'.`] };
  }

  const libDir = path.join(sclDir, "lib");
  const libSynth = (await listFiles(libDir))
    .filter((name) => minimatch(name, TYPICAL_LIBERTY_PATTERN))
    .sort()
    .map((name) => path.join(libDir, name));

  if (libSynth.length === 0) {
    return {
      pdk: null,
      errors: [`No typical-corner liberty files (${TYPICAL_LIBERTY_PATTERN}) found in ${libDir}.`],
    };
  }

  return { pdk: { pdkRoot, pdk, scl, libSynth }, errors: [] };
}

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await fs.stat(dir)).isDirectory();
  } catch {
    return false;
  }
}

async function listFiles(dir: string): Promise<string[]> {
  if (!(await isDirectory(dir))) return [];
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries.filter((entry) => entry.isFile()).map((entry) => entry.name);
}
