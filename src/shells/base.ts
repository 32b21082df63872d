/**
 * Base Shell Dialect Interface
 *
 * Defines the contract for a supported shell: how its native stack trace is
 * split and decoded, and how shell source is written for it.
 */

import { MalformedFrameError } from "../errors.js";
import type { Frame } from "../trace/frames.js";

export type ShellName = "bash" | "zsh" | "fish";

export type DecodedRecord = Frame | MalformedFrameError;

export interface ShellDialect {
  /** Dialect tag passed on the command line */
  name: ShellName;

  /** Human-readable description */
  description: string;

  /**
   * Records at the start of the trace that belong to the tracepoint plumbing
   * (the stack-capture helper's call site inside tracedbg_tracepoint).
   */
  helperFrames: number;

  /** Wrapper script shipped under shell/ */
  wrapperFile: string;

  /** Split raw stack text into records, innermost first */
  splitRecords: (raw: string) => string[];

  /** Decode records into frames; paths are returned as the shell reported them */
  decodeRecords: (records: readonly string[]) => DecodedRecord[];

  /** Statement removing a variable from the caller's scope */
  unsetVariable: (name: string) => string;

  /** Statement setting and exporting a variable; value must already be validated */
  exportVariable: (name: string, value: string) => string;

  /** Statement ending the calling script unconditionally */
  exitDirective: (status: number) => string;
}

/**
 * Split on a fixed delimiter, trimming each record and dropping blank ones
 */
export function splitOnDelimiter(raw: string, delimiter: string): string[] {
  return raw
    .split(delimiter)
    .map((record) => record.trim())
    .filter((record) => record.length > 0);
}

// The path is the shortest prefix followed by ":<digits>:", so zsh-style
// function names such as "lib::helper" stay intact.
const COLON_RECORD = /^(.+?):(\d+):(.+)$/;

/**
 * Decode a "<file>:<line>:<function>" record (bash and zsh)
 */
export function decodeColonRecord(record: string): DecodedRecord {
  const match = COLON_RECORD.exec(record);
  if (!match) {
    return new MalformedFrameError(record, 'expected "<file>:<line>:<function>"');
  }

  const [, file, lineStr, fn] = match;
  const line = parseInt(lineStr, 10);
  if (line < 1) {
    return new MalformedFrameError(record, `invalid line number ${lineStr}`);
  }

  return { file, line, function: fn.trim() };
}

/**
 * Single-quote a value for bash and zsh
 */
export function quotePosix(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
