/*
Purpose: render user-facing errors as typed diagnostic lines and provide ANSI styling helpers.
Assumptions: debug mode may include stack traces; non-TTY output should disable color.
Usage: formatErrorLines(userFacingError, { mode: "debug" }); createAnsiFormatter(resolveColorEnabled({ stream })).
*/

import type { UserFacingError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatOptions = {
  mode?: ErrorFormatMode;
};

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "detail"
  | "warning"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "bold" | "dim" | "red" | "yellow" | "cyan" | "green";

export type AnsiFormatter = (value: string, styles?: AnsiStyle[]) => string;

export type AnsiColorOptions = {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
};

// =============================================================================
// ANSI COLOR HELPERS
// =============================================================================

const ANSI_RESET = "\x1b[0m";

const ANSI_STYLES: Record<AnsiStyle, string> = {
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
};

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  return (value: string, styles: AnsiStyle[] = []): string => {
    if (!enabled || styles.length === 0) {
      return value;
    }

    const prefix = styles.map((style) => ANSI_STYLES[style]).join("");
    return `${prefix}${value}${ANSI_RESET}`;
  };
}

export function resolveColorEnabled(options: AnsiColorOptions = {}): boolean {
  const stream = options.stream ?? process.stderr;
  const isTty = Boolean(stream.isTTY);

  if (options.useColor === undefined) {
    return isTty;
  }

  return options.useColor && isTty;
}

// =============================================================================
// ERROR FORMATTING
// =============================================================================

/**
 * Lines for a mapped launch failure. Debug mode adds the code, then the name, message
 * and stack of the underlying failure (the wrapped cause when there is one).
 */
export function formatErrorLines(
  error: UserFacingError,
  options: ErrorFormatOptions = {},
): ErrorFormatLine[] {
  const mode = options.mode ?? "short";
  const title = error.title.trim() || DEFAULT_ERROR_TITLE;
  const message = error.message.trim();

  const lines: ErrorFormatLine[] = [{ kind: "title", text: title }];
  if (message && message !== title) {
    lines.push({ kind: "message", text: message });
  }
  lines.push(...textLines("detail", error.details));
  lines.push(...textLines("warning", error.warnings));
  lines.push(...textLines("hint", [error.hint]));
  lines.push(...textLines("next", [error.next]));

  if (mode !== "debug") {
    return lines;
  }

  const origin = error.cause instanceof Error ? error.cause : error;
  lines.push({ kind: "code", text: error.code });
  lines.push(...textLines("name", [origin.name]));

  if (origin !== error) {
    const causeMessage = formatErrorMessage(origin).trim();
    if (causeMessage !== message) {
      lines.push(...textLines("cause", [causeMessage]));
    }
  } else if (error.cause !== undefined && error.cause !== null) {
    lines.push(...textLines("cause", [formatErrorMessage(error.cause)]));
  }

  lines.push(...textLines("stack", [origin.stack]));
  return lines;
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message.trim() || error.name;
  }

  if (typeof error === "string") {
    return error;
  }

  if (error && typeof error === "object" && "message" in error) {
    const { message } = error;
    if (typeof message === "string" && message.trim()) {
      return message.trim();
    }
  }

  return String(error);
}

// =============================================================================
// INTERNALS
// =============================================================================

const DEFAULT_ERROR_TITLE = "Unexpected error";

function textLines(
  kind: ErrorFormatLineKind,
  values: ReadonlyArray<string | undefined>,
): ErrorFormatLine[] {
  const lines: ErrorFormatLine[] = [];
  for (const value of values) {
    const text = value?.trim();
    if (text) lines.push({ kind, text });
  }
  return lines;
}
