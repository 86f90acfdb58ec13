import path from "node:path";

import fse from "fs-extra";

import { formatErrorMessage } from "../../core/error-format.js";
import { StateParseError } from "../../core/errors.js";
import type { State } from "../../state/state.js";

import type { StateCodec } from "./ports.js";

/**
 * Loads the seed state given with `--with-initial-state`.
 * Without a path nothing is loaded; the flow then falls back to its own resume logic.
 */
export async function loadSeedState(
  statePath: string | undefined,
  codec: StateCodec,
): Promise<State | undefined> {
  if (statePath === undefined) {
    return undefined;
  }

  const resolved = path.resolve(statePath);

  let text: string;
  try {
    text = await fse.readFile(resolved, "utf8");
  } catch (err) {
    throw new StateParseError(resolved, "unreadable", formatErrorMessage(err), err);
  }

  try {
    return codec.loads(text);
  } catch (err) {
    throw new StateParseError(resolved, "malformed", formatErrorMessage(err), err);
  }
}
