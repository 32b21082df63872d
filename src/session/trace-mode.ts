/**
 * Trace Mode Resolution
 *
 * Interprets the TRACEDBG_TRACEPOINT value and decides whether a tracepoint
 * should stop. Each tracepoint hit is a separate process, so "fire once" is
 * implemented by handing back a new mode for the resume code to export.
 */

export type TraceMode =
  | { kind: "disabled" }
  | { kind: "named"; name: string }
  | { kind: "next" }
  | { kind: "all" };

export interface TraceModeResolution {
  /** Mode parsed from the control variable */
  mode: TraceMode;
  /** Whether this tracepoint should open the debugger */
  stop: boolean;
  /** Mode the caller's shell should hold once the script resumes */
  after: TraceMode;
}

export const DISABLED: TraceMode = { kind: "disabled" };

/**
 * Parse the raw control value. Values are matched exactly: no trimming, no
 * case folding.
 */
export function parseTraceMode(raw: string | undefined): TraceMode {
  switch (raw) {
    case undefined:
    case "":
      return DISABLED;
    case "all":
      return { kind: "all" };
    case "next":
      return { kind: "next" };
    default:
      return { kind: "named", name: raw };
  }
}

export function shouldStop(mode: TraceMode, tracepoint: string): boolean {
  switch (mode.kind) {
    case "disabled":
      return false;
    case "all":
    case "next":
      return true;
    case "named":
      return mode.name === tracepoint;
  }
}

/**
 * The mode to leave behind after stopping: "next" disarms itself, every
 * other mode stays as it was.
 */
export function modeAfterStop(mode: TraceMode): TraceMode {
  return mode.kind === "next" ? DISABLED : mode;
}

export function resolveTraceMode(raw: string | undefined, tracepoint: string): TraceModeResolution {
  const mode = parseTraceMode(raw);
  const stop = shouldStop(mode, tracepoint);
  return {
    mode,
    stop,
    after: stop ? modeAfterStop(mode) : mode,
  };
}

export function sameTraceMode(a: TraceMode, b: TraceMode): boolean {
  if (a.kind === "named" && b.kind === "named") {
    return a.name === b.name;
  }
  return a.kind === b.kind;
}

/**
 * The control value that represents a mode, or undefined for "disabled"
 */
export function traceModeValue(mode: TraceMode): string | undefined {
  switch (mode.kind) {
    case "disabled":
      return undefined;
    case "all":
    case "next":
      return mode.kind;
    case "named":
      return mode.name;
  }
}

export function describeTraceMode(mode: TraceMode): string {
  switch (mode.kind) {
    case "disabled":
      return "disabled";
    case "all":
      return "all tracepoints";
    case "next":
      return "next tracepoint only";
    case "named":
      return `tracepoint "${mode.name}"`;
  }
}
