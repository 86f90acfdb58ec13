import fs from "node:fs";
import path from "node:path";

import {
  createAnsiFormatter,
  resolveColorEnabled,
  type AnsiFormatter,
  type AnsiStyle,
} from "./error-format.js";
import { isoNow } from "./utils.js";

// =============================================================================
// CONSOLE OUTPUT
// =============================================================================

export type OutputStream = {
  write: (chunk: string) => unknown;
  isTTY?: boolean;
};

/**
 * Progress goes to `stdout`; warnings and errors always go to `stderr`.
 */
export type CliLogger = {
  info: (message: string) => void;
  success: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  /** Secondary diagnostic text (hints, stack traces) on the error stream. */
  note: (message: string) => void;
};

export type CliLoggerOptions = {
  stdout?: OutputStream;
  stderr?: OutputStream;
  useColor?: boolean;
};

export function createCliLogger(options: CliLoggerOptions = {}): CliLogger {
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  const out = createAnsiFormatter(resolveColorEnabled({ stream: stdout, useColor: options.useColor }));
  const err = createAnsiFormatter(resolveColorEnabled({ stream: stderr, useColor: options.useColor }));

  return {
    info: (message) => writeLine(stdout, message),
    success: (message) => writeLine(stdout, out(message, ["green"])),
    warn: (message) => writeLine(stderr, prefixed(err, "[warn]", message, ["yellow"])),
    error: (message) => writeLine(stderr, prefixed(err, "[error]", message, ["red"])),
    note: (message) => writeLine(stderr, err(message, ["dim"])),
  };
}

function prefixed(
  format: AnsiFormatter,
  tag: string,
  message: string,
  styles: AnsiStyle[],
): string {
  return `${format(tag, ["bold", ...styles])} ${message}`;
}

function writeLine(stream: OutputStream, line: string): void {
  stream.write(`${line}\n`);
}

// =============================================================================
// RUN EVENT LOG (JSONL)
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export class JsonlLogger {
  private readonly base: JsonObject;

  constructor(
    public readonly filePath: string,
    context: { runTag: string },
  ) {
    this.base = { run_tag: context.runTag };
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  log(type: string, payload: JsonObject = {}): void {
    const event: JsonObject = { ts: isoNow(), type, ...this.base, ...payload };
    fs.appendFileSync(this.filePath, `${JSON.stringify(event)}\n`, "utf8");
  }
}

export function logFlowEvent(logger: JsonlLogger, type: string, payload?: JsonObject): void {
  logger.log(type, payload);
}
