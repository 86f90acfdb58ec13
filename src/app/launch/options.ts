/*
Purpose: validate raw command-line values into a LaunchOptions record in one pass.
Assumptions: nothing is read from disk here; every violation is collected before returning.
Usage: const result = validateLaunchOptions(program.opts()); if (!result.ok) report(result.violations).
*/

import { z, type ZodIssue } from "zod";

import { parseOverrideString, type ConfigOverride } from "../../config/overrides.js";
import { DEFAULT_PDK } from "../../config/pdk.js";

// =============================================================================
// TYPES
// =============================================================================

export type LaunchOptions = Readonly<{
  pdk: string;
  scl?: string;
  flowName?: string;
  pdkRoot?: string;
  runTag?: string;
  lastRun: boolean;
  frm?: string;
  to?: string;
  initialStatePath?: string;
  configOverrides: readonly ConfigOverride[];
  configFile: string;
}>;

export const RawLaunchOptionsSchema = z.object({
  pdk: z.string().min(1).default(DEFAULT_PDK),
  scl: z.string().min(1).optional(),
  flow: z.string().min(1).optional(),
  pdkRoot: z.string().min(1).optional(),
  runTag: z.string().min(1).optional(),
  lastRun: z.boolean().default(false),
  from: z.string().min(1).optional(),
  to: z.string().min(1).optional(),
  withInitialState: z.string().min(1).optional(),
  overrideConfig: z.array(z.string()).default([]),
  configFile: z.string().min(1),
});

export type RawLaunchOptions = z.input<typeof RawLaunchOptionsSchema>;

export type OptionValidationResult =
  | { ok: true; options: LaunchOptions }
  | { ok: false; violations: string[] };

const OPTION_LABELS: Record<string, string> = {
  pdk: "--pdk",
  scl: "--scl",
  flow: "--flow",
  pdkRoot: "--pdk-root",
  runTag: "--run-tag",
  lastRun: "--last-run",
  from: "--from",
  to: "--to",
  withInitialState: "--with-initial-state",
  overrideConfig: "--override-config",
  configFile: "config_file",
};

// =============================================================================
// VALIDATION
// =============================================================================

export function validateLaunchOptions(raw: unknown): OptionValidationResult {
  const parsed = RawLaunchOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, violations: formatOptionIssues(parsed.error.issues) };
  }

  const values = parsed.data;
  const violations: string[] = [];

  if (values.runTag !== undefined && values.lastRun) {
    violations.push("--run-tag and --last-run are mutually exclusive.");
  }

  const configOverrides: ConfigOverride[] = [];
  for (const entry of values.overrideConfig) {
    const result = parseOverrideString(entry);
    if (result.ok) {
      configOverrides.push(result.override);
    } else {
      violations.push(result.error);
    }
  }

  if (violations.length > 0) {
    return { ok: false, violations };
  }

  return {
    ok: true,
    options: Object.freeze({
      pdk: values.pdk,
      scl: values.scl,
      flowName: values.flow,
      pdkRoot: values.pdkRoot,
      runTag: values.runTag,
      lastRun: values.lastRun,
      frm: values.from,
      to: values.to,
      initialStatePath: values.withInitialState,
      configOverrides: Object.freeze(configOverrides),
      configFile: values.configFile,
    }),
  };
}

function formatOptionIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const [key] = issue.path;
    const label = typeof key === "string" ? (OPTION_LABELS[key] ?? key) : "<options>";

    if (issue.code === "invalid_type" && issue.received === "undefined") {
      return `${label}: missing value`;
    }
    if (issue.code === "too_small") {
      return `${label}: must not be empty`;
    }
    return `${label}: ${issue.message}`;
  });
}
