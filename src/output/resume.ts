/**
 * Resume Code Generation
 *
 * Writes the shell source the wrapper evaluates once the debugger exits. The
 * caller runs this text verbatim, so anything that can't be expressed safely
 * throws instead of emitting a partial statement.
 */

import { TERMINATE_STATUS, TRACEPOINT_VAR } from "../config.js";
import { ResumeCodeError } from "../errors.js";
import type { ShellDialect } from "../shells/base.js";
import type { ExitDecision } from "../session/state.js";
import { parseTraceMode, sameTraceMode, traceModeValue, type TraceMode } from "../session/trace-mode.js";

export interface ModeTransition {
  /** Mode the caller's shell holds now */
  from: TraceMode;
  /** Mode it should hold after resuming */
  to: TraceMode;
}

export interface ResumeCodeOptions {
  /** Control variable to mutate (default: TRACEDBG_TRACEPOINT) */
  variable?: string;
  /** Exit status for "terminate" (default: 1) */
  exitStatus?: number;
}

const VARIABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * The statement that makes the caller's control variable match `to`, or null
 * when nothing needs to change.
 */
function modeStatement(shell: ShellDialect, transition: ModeTransition, variable: string): string | null {
  const { from, to } = transition;
  if (sameTraceMode(from, to)) {
    return null;
  }

  const value = traceModeValue(to);
  if (value === undefined) {
    return shell.unsetVariable(variable);
  }

  if (value.includes("\0")) {
    throw new ResumeCodeError("tracepoint names cannot contain NUL bytes");
  }
  // A name that reads back as a different mode would change meaning
  if (!sameTraceMode(parseTraceMode(value), to)) {
    throw new ResumeCodeError(`"${value}" cannot be used as a tracepoint name`);
  }
  return shell.exportVariable(variable, value);
}

/**
 * Generate the code the wrapper evaluates after the session.
 *
 * - terminate: an unconditional exit; no mode change, the script is over
 * - resume: "" when the mode is unchanged, otherwise the statement that
 *   updates the control variable
 *
 * Non-empty output always ends in a newline.
 */
export function generateResumeCode(
  shell: ShellDialect,
  decision: ExitDecision,
  transition: ModeTransition,
  options: ResumeCodeOptions = {}
): string {
  const variable = options.variable ?? TRACEPOINT_VAR;
  const exitStatus = options.exitStatus ?? TERMINATE_STATUS;

  if (!VARIABLE_NAME.test(variable)) {
    throw new ResumeCodeError(`invalid variable name "${variable}"`);
  }
  if (!Number.isInteger(exitStatus) || exitStatus < 0 || exitStatus > 255) {
    throw new ResumeCodeError(`invalid exit status ${exitStatus}`);
  }

  switch (decision) {
    case "terminate":
      return `${shell.exitDirective(exitStatus)}\n`;
    case "resume": {
      const statement = modeStatement(shell, transition, variable);
      return statement === null ? "" : `${statement}\n`;
    }
    default:
      throw new ResumeCodeError(`unsupported decision "${String(decision)}"`);
  }
}
