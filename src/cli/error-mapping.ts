/*
Purpose: translate every launch failure into a user-facing error and a process exit code.
Assumptions: only FlowError (an expected pipeline failure) exits with 2; everything else exits with 1.
Usage: const failure = mapLaunchError(err); printLaunchFailure(failure, logger, { debug }).
*/

import { EXIT_CODES, type ExitCode } from "../app/launch/exit-codes.js";
import { formatErrorLines, formatErrorMessage } from "../core/error-format.js";
import {
  ConfigError,
  FlowError,
  InvalidConfigError,
  NoRunsFoundError,
  OptionValidationError,
  StateParseError,
  USER_FACING_ERROR_CODES,
  UnknownFlowError,
  UnknownStepError,
  UserFacingError,
} from "../core/errors.js";
import type { CliLogger } from "../core/logger.js";

export type LaunchFailure = {
  exitCode: ExitCode;
  error: UserFacingError;
};

export const QUIT_MESSAGE = "hdlflow will now quit.";

const WARNINGS_HEADER = "The following warnings have also been generated:";

// =============================================================================
// MAPPING
// =============================================================================

export function mapLaunchError(error: unknown): LaunchFailure {
  if (error instanceof FlowError) {
    return {
      exitCode: EXIT_CODES.pipelineFailure,
      error: new UserFacingError({
        code: USER_FACING_ERROR_CODES.pipeline,
        title: "The following error was encountered while running the flow:",
        message: error.message,
        next: QUIT_MESSAGE,
        cause: error,
      }),
    };
  }

  return { exitCode: EXIT_CODES.failure, error: toUserFacingError(error) };
}

function toUserFacingError(error: unknown): UserFacingError {
  if (error instanceof UserFacingError) {
    return error;
  }

  if (error instanceof OptionValidationError) {
    const title = "Invalid command-line options.";
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.options,
      title,
      message: title,
      details: error.violations,
      hint: "Run hdlflow --help for usage.",
      cause: error,
    });
  }

  if (error instanceof InvalidConfigError) {
    const title = `Errors have occurred while loading the ${error.label}:`;
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title,
      message: title,
      details: error.errors,
      warnings: error.warnings,
      next: `${QUIT_MESSAGE} Please check your configuration.`,
      cause: error,
    });
  }

  if (error instanceof ConfigError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Could not load the configuration.",
      message: error.message,
      next: QUIT_MESSAGE,
      cause: error,
    });
  }

  if (error instanceof UnknownFlowError || error instanceof UnknownStepError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.flow,
      title: error.message,
      message: error.message,
      hint:
        error instanceof UnknownFlowError
          ? "Run hdlflow --help to list the built-in flows."
          : undefined,
      next: QUIT_MESSAGE,
      cause: error,
    });
  }

  if (error instanceof StateParseError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.state,
      title: "Could not load the initial state.",
      message: error.message,
      next: QUIT_MESSAGE,
      cause: error,
    });
  }

  if (error instanceof NoRunsFoundError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.run,
      title: error.message,
      message: error.message,
      hint: `No run directories exist under ${error.runsDir}.`,
      cause: error,
    });
  }

  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.unknown,
    title: "The flow has encountered an unexpected error:",
    message: formatErrorMessage(error),
    next: QUIT_MESSAGE,
    cause: error,
  });
}

// =============================================================================
// OUTPUT
// =============================================================================

export function printLaunchFailure(
  failure: LaunchFailure,
  logger: CliLogger,
  opts: { debug?: boolean } = {},
): void {
  const lines = formatErrorLines(failure.error, { mode: opts.debug ? "debug" : "short" });
  let warningsAnnounced = false;

  for (const line of lines) {
    switch (line.kind) {
      case "title":
      case "message":
      case "detail":
        logger.error(line.text);
        break;
      case "warning":
        if (!warningsAnnounced) {
          logger.note(WARNINGS_HEADER);
          warningsAnnounced = true;
        }
        logger.warn(line.text);
        break;
      default:
        logger.note(line.text);
    }
  }
}
