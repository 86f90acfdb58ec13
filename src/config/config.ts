import { z } from "zod";

export const DEFAULT_FLOW_NAME = "Classic";

export const FlowReferenceSchema = z.union([
  z.string().min(1),
  z.array(z.string().min(1)).min(1),
]);

/** A registered flow name, or an ordered list of step ids for an ad-hoc sequential flow. */
export type FlowReference = z.infer<typeof FlowReferenceSchema>;

export const MetaSchema = z
  .object({
    version: z.number().int().positive().default(2),
    flow: FlowReferenceSchema.default(DEFAULT_FLOW_NAME),
  })
  .strict();

export type ConfigMeta = z.infer<typeof MetaSchema>;

export type FlowConfig = Readonly<{
  meta: Readonly<ConfigMeta>;
  variables: Readonly<Record<string, unknown>>;
}>;

// =============================================================================
// TYPED ACCESSORS
// =============================================================================

export class ConfigAccessError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigAccessError";
  }
}

export function getString(config: FlowConfig, name: string): string {
  const value = config.variables[name];
  if (typeof value !== "string") throw accessError(name, "a string", value);
  return value;
}

export function getNumber(config: FlowConfig, name: string): number {
  const value = config.variables[name];
  if (typeof value !== "number") throw accessError(name, "a number", value);
  return value;
}

export function getBoolean(config: FlowConfig, name: string): boolean {
  const value = config.variables[name];
  if (typeof value !== "boolean") throw accessError(name, "a boolean", value);
  return value;
}

export function getStringList(config: FlowConfig, name: string): string[] {
  const value = config.variables[name];
  if (!Array.isArray(value) || !value.every((entry) => typeof entry === "string")) {
    throw accessError(name, "a list of strings", value);
  }
  return [...value];
}

function accessError(name: string, expected: string, value: unknown): ConfigAccessError {
  return new ConfigAccessError(
    `Configuration variable '${name}' is not ${expected} (got ${JSON.stringify(value) ?? "undefined"}).`,
  );
}
