/**
 * Call Stack Model
 *
 * Converts a shell's raw stack text into frames, innermost first.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { MalformedFrameError } from "../errors.js";
import type { ShellDialect } from "../shells/base.js";

/** Function name used for code running at the top level of a script */
export const SCRIPT_FUNCTION = "<script>";

export interface Frame {
  /** Absolute path when it could be resolved, otherwise as reported */
  readonly file: string;
  readonly line: number;
  /** Function executing at this location, or SCRIPT_FUNCTION */
  readonly function: string;
}

export type CallStack = readonly Frame[];

export interface NormalizeOptions {
  /** Base for relative paths (default: process.cwd()) */
  cwd?: string;
  /** Override path canonicalisation; return null when the path can't be resolved */
  resolvePath?: (file: string, cwd: string) => string | null;
}

export interface NormalizeResult {
  frames: CallStack;
  /** Records that were dropped */
  errors: MalformedFrameError[];
}

/**
 * Resolve a path against cwd and follow symlinks, as `realpath` does in the
 * wrappers. Returns null for paths that don't exist.
 */
export function resolveFramePath(file: string, cwd: string): string | null {
  try {
    return fs.realpathSync(path.resolve(cwd, file));
  } catch {
    return null;
  }
}

/**
 * Normalize a raw stack trace for the given shell.
 *
 * The first `shell.helperFrames` records are the tracepoint plumbing and are
 * skipped by position. A record that doesn't decode is dropped and reported
 * in `errors`; the rest of the stack is still returned.
 */
export function normalizeCallStack(
  shell: ShellDialect,
  raw: string,
  options: NormalizeOptions = {}
): NormalizeResult {
  const cwd = options.cwd ?? process.cwd();
  const resolvePath = options.resolvePath ?? resolveFramePath;

  const records = shell.splitRecords(raw).slice(shell.helperFrames);
  const frames: Frame[] = [];
  const errors: MalformedFrameError[] = [];

  for (const decoded of shell.decodeRecords(records)) {
    if (decoded instanceof MalformedFrameError) {
      errors.push(decoded);
      continue;
    }
    frames.push({
      ...decoded,
      file: resolvePath(decoded.file, cwd) ?? decoded.file,
    });
  }

  return { frames, errors };
}

/**
 * Short label for a frame, e.g. "myfunction (run.sh:12)"
 */
export function describeFrame(frame: Frame): string {
  return `${frame.function} (${path.basename(frame.file)}:${frame.line})`;
}
