import type { LoadedConfig } from "../../config/config-builder.js";

import type { LaunchOptions } from "./options.js";
import type { ConfigBuilder } from "./ports.js";

/**
 * Loads the configuration file named on the command line with its overrides.
 * Failures propagate unchanged: an InvalidConfigError carries every error and warning.
 */
export async function resolveConfig(
  options: LaunchOptions,
  builder: ConfigBuilder,
): Promise<LoadedConfig> {
  return builder.load({
    configFile: options.configFile,
    pdk: options.pdk,
    scl: options.scl,
    pdkRoot: options.pdkRoot,
    overrides: options.configOverrides,
  });
}
