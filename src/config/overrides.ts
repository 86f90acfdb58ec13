import { findVariable } from "./variables.js";

export type ConfigOverride = {
  key: string;
  rawValue: string;
};

export type OverrideParseResult =
  | { ok: true; override: ConfigOverride }
  | { ok: false; error: string };

/** Splits `KEY=VALUE` at the first `=`; the value is kept raw. */
export function parseOverrideString(input: string): OverrideParseResult {
  const separator = input.indexOf("=");
  if (separator === -1) {
    return { ok: false, error: `Invalid override '${input}': expected KEY=VALUE.` };
  }

  const key = input.slice(0, separator).trim();
  if (key.length === 0) {
    return { ok: false, error: `Invalid override '${input}': the key is empty.` };
  }

  return { ok: true, override: { key, rawValue: input.slice(separator + 1) } };
}

export type AppliedOverrides = {
  values: Record<string, unknown>;
  errors: string[];
};

/**
 * Applies overrides in order on top of `base`; a later override of the same key wins.
 *
 * A value that is not a JSON literal and a key that names no configuration variable are
 * reported with different messages.
 */
export function applyOverrides(
  base: Readonly<Record<string, unknown>>,
  overrides: readonly ConfigOverride[],
): AppliedOverrides {
  const values: Record<string, unknown> = { ...base };
  const errors: string[] = [];

  for (const { key, rawValue } of overrides) {
    let value: unknown;
    try {
      value = JSON.parse(rawValue);
    } catch {
      errors.push(
        `Invalid value for override '${key}': ${JSON.stringify(rawValue)} is not a valid JSON literal.`,
      );
      continue;
    }

    const variable = findVariable(key);
    if (!variable || variable.pdk) {
      errors.push(`Unknown configuration variable '${key}' in override.`);
      continue;
    }

    values[key] = value;
  }

  return { values, errors };
}
