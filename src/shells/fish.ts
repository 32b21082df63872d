/**
 * Fish Dialect
 *
 * Fish has no per-frame arrays, only `status stack-trace`, whose output the
 * wrapper joins with ';'. Each frame spans two segments:
 *
 *   in function 'otherfunc' with arguments 'a'
 *           called on line 8 of file ./run.fish
 *
 * The header names the function being *called*, so the function executing at
 * a call site is the one named by the next scope-defining header.
 */

import { MalformedFrameError } from "../errors.js";
import { SCRIPT_FUNCTION } from "../trace/frames.js";
import type { DecodedRecord, ShellDialect } from "./base.js";
import { splitOnDelimiter } from "./base.js";

const RECORD_DELIMITER = ";";
const CALL_SITE = /called on line (\d+) of file (.+)$/;
const FUNCTION_HEADER = /^in function '([^']*)'/;
const SOURCE_HEADER = /^from sourcing file /;

/**
 * The scope a record's header opens: a function name, SCRIPT_FUNCTION for a
 * sourced file, or null for headers that open no scope (command
 * substitutions, event handlers, blocks).
 */
function headerScope(record: string): string | null {
  const fn = FUNCTION_HEADER.exec(record);
  if (fn) return fn[1] || SCRIPT_FUNCTION;
  if (SOURCE_HEADER.test(record)) return SCRIPT_FUNCTION;
  return null;
}

/**
 * Merge "called on line" segments into the header segment before them
 */
function splitFishRecords(raw: string): string[] {
  const records: string[] = [];
  for (const segment of splitOnDelimiter(raw, RECORD_DELIMITER)) {
    if (segment.startsWith("called on line") && records.length > 0) {
      records[records.length - 1] += ` ${segment}`;
    } else {
      records.push(segment);
    }
  }
  return records;
}

function decodeFishRecords(records: readonly string[]): DecodedRecord[] {
  return records.map((record, index) => {
    const site = CALL_SITE.exec(record);
    if (!site) {
      return new MalformedFrameError(record, 'missing "called on line <n> of file <path>"');
    }

    const line = parseInt(site[1], 10);
    if (line < 1) {
      return new MalformedFrameError(record, `invalid line number ${site[1]}`);
    }

    let fn = SCRIPT_FUNCTION;
    for (const outer of records.slice(index + 1)) {
      const scope = headerScope(outer);
      if (scope !== null) {
        fn = scope;
        break;
      }
    }

    return { file: site[2].trim(), line, function: fn };
  });
}

/**
 * Quote a value for fish, where only \\ and \' are special inside single quotes
 */
function quoteFish(value: string): string {
  return `'${value.replace(/[\\']/g, "\\$&")}'`;
}

export const fishShell: ShellDialect = {
  name: "fish",
  description: "fish 3+",
  helperFrames: 1,
  wrapperFile: "tracepoint.fish",

  splitRecords: splitFishRecords,

  decodeRecords: decodeFishRecords,

  unsetVariable: (name) => `set -e ${name}`,

  exportVariable: (name, value) => `set -gx ${name} ${quoteFish(value)}`,

  exitDirective: (status) => `exit ${status}`,
};
