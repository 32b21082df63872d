/**
 * Bash Dialect
 *
 * The bash wrapper walks FUNCNAME/BASH_SOURCE/BASH_LINENO and emits one
 * "<file>:<line>:<function>" record per line, innermost first.
 */

import { MalformedFrameError } from "../errors.js";
import { SCRIPT_FUNCTION } from "../trace/frames.js";
import type { ShellDialect } from "./base.js";
import { decodeColonRecord, quotePosix, splitOnDelimiter } from "./base.js";

const RECORD_DELIMITER = "\n";

export const bashShell: ShellDialect = {
  name: "bash",
  description: "GNU Bash 4+",
  helperFrames: 1,
  wrapperFile: "tracepoint.bash",

  splitRecords: (raw) => splitOnDelimiter(raw, RECORD_DELIMITER),

  decodeRecords: (records) =>
    records.map((record) => {
      const decoded = decodeColonRecord(record);
      // FUNCNAME reports the top level of a script as "main"
      if (!(decoded instanceof MalformedFrameError) && decoded.function === "main") {
        return { ...decoded, function: SCRIPT_FUNCTION };
      }
      return decoded;
    }),

  unsetVariable: (name) => `unset ${name}`,

  exportVariable: (name, value) => `export ${name}=${quotePosix(value)}`,

  exitDirective: (status) => `exit ${status}`,
};
