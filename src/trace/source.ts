/**
 * Source Excerpts
 *
 * Reads the scripts named in the call stack so the Trace screen can show the
 * code around each call site.
 */

import * as fs from "node:fs";
import type { CallStack } from "./frames.js";

/** File path → lines, or null when the file couldn't be read */
export type SourceMap = ReadonlyMap<string, readonly string[] | null>;

export type SourceReader = (file: string) => string;

export interface SourceExcerpt {
  /** 1-based number of the first line in `lines` */
  firstLine: number;
  lines: readonly string[];
}

/**
 * Read every distinct file in the stack once.
 */
export function loadSources(
  stack: CallStack,
  read: SourceReader = (file) => fs.readFileSync(file, "utf-8")
): SourceMap {
  const sources = new Map<string, readonly string[] | null>();
  for (const frame of stack) {
    if (sources.has(frame.file)) continue;
    try {
      sources.set(frame.file, read(frame.file).split(/\r?\n/));
    } catch {
      sources.set(frame.file, null);
    }
  }
  return sources;
}

/**
 * A window of `height` lines with `line` as close to the middle as the file
 * allows.
 */
export function excerptAround(
  lines: readonly string[],
  line: number,
  height: number
): SourceExcerpt {
  if (height <= 0 || lines.length === 0) {
    return { firstLine: 1, lines: [] };
  }

  const maxFirst = Math.max(1, lines.length - height + 1);
  const firstLine = Math.min(Math.max(1, line - Math.floor(height / 2)), maxFirst);
  return {
    firstLine,
    lines: lines.slice(firstLine - 1, firstLine - 1 + height),
  };
}
