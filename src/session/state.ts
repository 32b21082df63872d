/**
 * Session State
 *
 * Everything one debugger invocation knows: the tracepoint that stopped, its
 * call stack, the active screen and the exit modal. Sessions are immutable;
 * the reducer returns a new one for every change.
 */

import type { ShellName } from "../shells/base.js";
import type { SourceMap } from "../trace/source.js";
import type { CallStack } from "../trace/frames.js";
import type { TraceMode } from "./trace-mode.js";

// ========== Screens ==========

/** Tab order */
export const SCREENS = ["home", "trace", "vars", "output"] as const;

export type Screen = (typeof SCREENS)[number];

export const SCREEN_TITLES: Record<Screen, string> = {
  home: "Home",
  trace: "Trace",
  vars: "Vars",
  output: "Output",
};

/**
 * Step forwards (1) or backwards (-1) through the tabs, wrapping around
 */
export function cycleScreen(screen: Screen, step: 1 | -1): Screen {
  const index = SCREENS.indexOf(screen);
  return SCREENS[(index + step + SCREENS.length) % SCREENS.length];
}

// ========== Exit modal ==========

export type ExitOption = "ok" | "cancel";

export type ExitState =
  | { kind: "none" }
  | { kind: "present-modal"; highlighted: ExitOption };

export const NOT_EXITING: ExitState = { kind: "none" };

/** What happens to the calling script when the debugger exits */
export type ExitDecision = "resume" | "terminate";

// ========== Events ==========

export type AppEvent = "exit-requested" | "next-tab" | "prev-tab" | "resume";

export type NavEvent = "up" | "down" | "left" | "right" | "select";

export type TraceEvent = "previous-frame" | "next-frame";

export type VarsEvent =
  | "previous-var"
  | "next-var"
  | "focus-list"
  | "focus-detail"
  | "raw-detail"
  | "split-detail";

export type Event =
  | { type: "app"; event: AppEvent }
  | { type: "nav"; event: NavEvent }
  | { type: "trace"; event: TraceEvent }
  | { type: "vars"; event: VarsEvent };

// ========== Screen state ==========

export interface TraceView {
  /** Index into the call stack; 0 when the stack is empty */
  selectedFrame: number;
}

export interface EnvVar {
  name: string;
  value: string;
}

export interface VarsView {
  /** Sorted by name */
  vars: readonly EnvVar[];
  selectedVar: number;
  focus: "list" | "detail";
  /** Show the value as-is, or split on ':' like PATH */
  detail: "raw" | "split";
  /** Index into the split value */
  selectedItem: number;
}

export interface Session {
  readonly shell: ShellName;
  readonly screen: Screen;
  readonly exitState: ExitState;
  readonly tracepoint: string;
  readonly callStack: CallStack;
  readonly mode: TraceMode;
  /** Mode the script continues with if it is resumed */
  readonly after: TraceMode;
  /** Code evaluated by the caller if the script is resumed */
  readonly resumeCode: string;
  readonly sources: SourceMap;
  readonly trace: TraceView;
  readonly vars: VarsView;
}

export interface SessionInit {
  shell: ShellName;
  tracepoint: string;
  callStack: CallStack;
  mode: TraceMode;
  after: TraceMode;
  resumeCode: string;
  sources?: SourceMap;
  env?: NodeJS.ProcessEnv;
}

export function collectEnvVars(env: NodeJS.ProcessEnv): EnvVar[] {
  const vars: EnvVar[] = [];
  for (const [name, value] of Object.entries(env)) {
    if (value !== undefined) {
      vars.push({ name, value });
    }
  }
  return vars.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

export function createSession(init: SessionInit): Session {
  return {
    shell: init.shell,
    screen: "home",
    exitState: NOT_EXITING,
    tracepoint: init.tracepoint,
    callStack: init.callStack,
    mode: init.mode,
    after: init.after,
    resumeCode: init.resumeCode,
    sources: init.sources ?? new Map(),
    trace: { selectedFrame: 0 },
    vars: {
      vars: collectEnvVars(init.env ?? {}),
      selectedVar: 0,
      focus: "list",
      detail: "raw",
      selectedItem: 0,
    },
  };
}

export function selectedEnvVar(vars: VarsView): EnvVar | undefined {
  return vars.vars[vars.selectedVar];
}

/**
 * The parts of a PATH-like value
 */
export function splitEnvValue(value: string): string[] {
  return value.split(":");
}
