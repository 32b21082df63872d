/**
 * Zsh Dialect
 *
 * The zsh wrapper pairs each funcfiletrace entry ("<file>:<line>") with the
 * function that was running there, one record per line.
 */

import type { ShellDialect } from "./base.js";
import { decodeColonRecord, quotePosix, splitOnDelimiter } from "./base.js";

const RECORD_DELIMITER = "\n";

export const zshShell: ShellDialect = {
  name: "zsh",
  description: "Z shell 5+",
  helperFrames: 1,
  wrapperFile: "tracepoint.zsh",

  splitRecords: (raw) => splitOnDelimiter(raw, RECORD_DELIMITER),

  decodeRecords: (records) => records.map(decodeColonRecord),

  unsetVariable: (name) => `unset ${name}`,

  exportVariable: (name, value) => `export ${name}=${quotePosix(value)}`,

  exitDirective: (status) => `exit ${status}`,
};
