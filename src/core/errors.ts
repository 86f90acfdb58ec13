/*
Purpose: error types shared by the launcher, the flow engine and CLI output.
Assumptions: UserFacingError instances are safe to display to end users.
Usage: throw new InvalidConfigError({ label, errors, warnings }); throw new FlowError("...").
*/

// =============================================================================
// BASE
// =============================================================================

export class HdlflowError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "HdlflowError";
  }
}

// =============================================================================
// LAUNCH ERRORS
// =============================================================================

export class OptionValidationError extends HdlflowError {
  constructor(public readonly violations: string[]) {
    super(violations.join("; "));
    this.name = "OptionValidationError";
  }
}

export class ConfigError extends HdlflowError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class InvalidConfigError extends ConfigError {
  public readonly label: string;
  public readonly errors: string[];
  public readonly warnings: string[];

  constructor(input: { label: string; errors: string[]; warnings: string[] }) {
    super(`${input.errors.length} error(s) occurred while loading the ${input.label}.`);
    this.name = "InvalidConfigError";
    this.label = input.label;
    this.errors = input.errors;
    this.warnings = input.warnings;
  }
}

export type FlowNameSource = "cli" | "meta";

export class UnknownFlowError extends HdlflowError {
  constructor(
    public readonly flowName: string,
    public readonly source: FlowNameSource,
  ) {
    super(
      source === "cli"
        ? `Unknown flow '${flowName}' passed via --flow.`
        : `Unknown flow '${flowName}' specified in configuration's 'meta' object.`,
    );
    this.name = "UnknownFlowError";
  }
}

export class UnknownStepError extends HdlflowError {
  constructor(public readonly stepId: string) {
    super(`Unknown step '${stepId}' in flow step list.`);
    this.name = "UnknownStepError";
  }
}

export type StateParseFailure = "unreadable" | "malformed";

export class StateParseError extends HdlflowError {
  constructor(
    public readonly statePath: string,
    public readonly reason: StateParseFailure,
    detail: string,
    cause?: unknown,
  ) {
    super(
      reason === "unreadable"
        ? `Could not read initial state file ${statePath}: ${detail}`
        : `Initial state file ${statePath} is not a valid state: ${detail}`,
      cause,
    );
    this.name = "StateParseError";
  }
}

export class NoRunsFoundError extends HdlflowError {
  constructor(public readonly runsDir: string) {
    super("--last-run specified, but no runs found.");
    this.name = "NoRunsFoundError";
  }
}

// =============================================================================
// ENGINE ERRORS
// =============================================================================

/** A step reported a failure caused by the design or its inputs. */
export class StepError extends HdlflowError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "StepError";
  }
}

/** A step could not run at all; indicates a tooling defect. */
export class StepException extends HdlflowError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "StepException";
  }
}

/** Expected pipeline failure. */
export class FlowError extends HdlflowError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "FlowError";
  }
}

/** Unexpected engine failure. */
export class FlowException extends HdlflowError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "FlowException";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  options: "OPTIONS_ERROR",
  config: "CONFIG_ERROR",
  flow: "FLOW_ERROR",
  state: "STATE_ERROR",
  run: "RUN_ERROR",
  pipeline: "PIPELINE_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  details?: string[];
  warnings?: string[];
  cause?: unknown;
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly next?: string;
  public readonly details: string[];
  public readonly warnings: string[];
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.details = input.details ?? [];
    this.warnings = input.warnings ?? [];
    this.cause = input.cause;
  }
}
