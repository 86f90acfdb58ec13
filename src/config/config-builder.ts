/*
Purpose: load a JSON design configuration, apply command-line overrides and fill in PDK variables.
Assumptions: the design directory is the directory holding the configuration file.
Usage: const { config, designDir, warnings } = await loadDesignConfig({ configFile, pdk, overrides: [] }).
*/

import path from "node:path";

import fse from "fs-extra";

import { ConfigError, InvalidConfigError } from "../core/errors.js";

import { MetaSchema, type ConfigMeta, type FlowConfig } from "./config.js";
import { expandPathEntries } from "./file-patterns.js";
import { applyOverrides, type ConfigOverride } from "./overrides.js";
import { resolvePdk, resolvePdkRoot } from "./pdk.js";
import { CONFIG_VARIABLES, findVariable } from "./variables.js";

// =============================================================================
// TYPES
// =============================================================================

export type ConfigLoadInput = {
  configFile: string;
  pdk: string;
  scl?: string;
  pdkRoot?: string;
  overrides: readonly ConfigOverride[];
  env?: NodeJS.ProcessEnv;
};

export type LoadedConfig = {
  config: FlowConfig;
  designDir: string;
  warnings: string[];
};

const CONFIG_LABEL = "configuration";

// =============================================================================
// PUBLIC API
// =============================================================================

export async function loadDesignConfig(input: ConfigLoadInput): Promise<LoadedConfig> {
  const configPath = path.resolve(input.configFile);
  const designDir = path.dirname(configPath);
  const raw = await readConfigObject(configPath);

  const errors: string[] = [];
  const warnings: string[] = [];

  const { meta: rawMeta, ...rawVariables } = raw;
  const meta = parseMeta(rawMeta, errors);

  for (const key of Object.keys(rawVariables)) {
    const variable = findVariable(key);
    if (!variable) {
      warnings.push(`Unknown key '${key}' provided.`);
      delete rawVariables[key];
    } else if (variable.pdk) {
      errors.push(`Variable '${key}' is derived from the PDK and cannot be set in the configuration.`);
    }
  }

  const overridden = applyOverrides(rawVariables, input.overrides);
  errors.push(...overridden.errors);

  const variables: Record<string, unknown> = {};
  for (const variable of CONFIG_VARIABLES) {
    if (variable.pdk) continue;

    const value = overridden.values[variable.name];
    if (value === undefined) {
      if (variable.required) {
        errors.push(`Required variable '${variable.name}' did not get a specified value.`);
      } else if (variable.default !== undefined) {
        variables[variable.name] = variable.default;
      }
      continue;
    }

    const parsed = variable.schema.safeParse(value);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((issue) => issue.message).join("; ");
      errors.push(`Value provided for variable '${variable.name}' is invalid: ${detail}`);
      continue;
    }

    if (variable.paths) {
      const expanded = await expandPathEntries(variable.name, toPathEntries(parsed.data), designDir);
      errors.push(...expanded.errors);
      variables[variable.name] = expanded.paths;
      continue;
    }

    variables[variable.name] = parsed.data;
  }

  const scl = input.scl ?? readOptionalString(variables.STD_CELL_LIBRARY);
  const resolved = await resolvePdk({
    pdkRoot: resolvePdkRoot(input.pdkRoot, input.env),
    pdk: input.pdk,
    scl,
  });
  errors.push(...resolved.errors);

  if (errors.length > 0 || !meta || !resolved.pdk) {
    throw new InvalidConfigError({ label: CONFIG_LABEL, errors, warnings });
  }

  variables.PDK = resolved.pdk.pdk;
  variables.PDK_ROOT = resolved.pdk.pdkRoot;
  variables.STD_CELL_LIBRARY = resolved.pdk.scl;
  variables.LIB_SYNTH = resolved.pdk.libSynth;

  return {
    config: deepFreeze({ meta, variables }),
    designDir,
    warnings,
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

async function readConfigObject(configPath: string): Promise<Record<string, unknown>> {
  if (path.extname(configPath).toLowerCase() !== ".json") {
    throw new ConfigError(
      `Unsupported configuration file ${configPath}: only JSON configuration files are supported.`,
    );
  }

  let text: string;
  try {
    text = await fse.readFile(configPath, "utf8");
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Configuration file ${configPath} could not be read: ${detail}`, err);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Configuration file ${configPath} is not valid JSON: ${detail}`, err);
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Configuration file ${configPath} must contain a JSON object.`);
  }

  return parsed;
}

function parseMeta(rawMeta: unknown, errors: string[]): ConfigMeta | null {
  const parsed = MetaSchema.safeParse(rawMeta ?? {});
  if (parsed.success) return parsed.data;

  for (const issue of parsed.error.issues) {
    const location = ["meta", ...issue.path].join(".");
    errors.push(`${location}: ${issue.message}`);
  }
  return null;
}

function toPathEntries(value: unknown): string[] {
  if (typeof value === "string") return [value];
  if (!Array.isArray(value)) return [];
  return value.filter((entry): entry is string => typeof entry === "string");
}

function readOptionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
