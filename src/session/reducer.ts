/**
 * State Reducer
 *
 * Applies one event to a session. Total by construction: any event the
 * current state has no rule for leaves the session unchanged, so the reducer
 * never throws.
 */

import {
  NOT_EXITING,
  cycleScreen,
  selectedEnvVar,
  splitEnvValue,
  type AppEvent,
  type Event,
  type ExitDecision,
  type ExitOption,
  type Session,
  type TraceEvent,
  type VarsEvent,
  type VarsView,
} from "./state.js";

export interface Transition {
  session: Session;
  /** Set when the debugger should exit; null keeps the loop running */
  exit: ExitDecision | null;
}

function stay(session: Session): Transition {
  return { session, exit: null };
}

function toggle(option: ExitOption): ExitOption {
  return option === "ok" ? "cancel" : "ok";
}

/**
 * Clamp a selection index into [0, length - 1], or 0 for an empty list
 */
function clampIndex(index: number, length: number): number {
  return Math.max(0, Math.min(index, length - 1));
}

export function reduce(session: Session, event: Event): Transition {
  const { exitState } = session;

  // The modal owns all input while it is shown
  if (exitState.kind === "present-modal") {
    if (event.type !== "nav") {
      return stay(session);
    }
    switch (event.event) {
      case "left":
      case "right":
        return stay({
          ...session,
          exitState: { kind: "present-modal", highlighted: toggle(exitState.highlighted) },
        });
      case "up":
      case "down":
        return stay(session);
      case "select":
        return {
          session: { ...session, exitState: NOT_EXITING },
          exit: exitState.highlighted === "ok" ? "terminate" : null,
        };
    }
  }

  switch (event.type) {
    case "app":
      return reduceAppEvent(session, event.event);
    case "nav":
      return stay(session);
    case "trace":
      return session.screen === "trace" ? stay(reduceTraceEvent(session, event.event)) : stay(session);
    case "vars":
      return session.screen === "vars"
        ? stay({ ...session, vars: reduceVarsEvent(session.vars, event.event) })
        : stay(session);
  }
}

function reduceAppEvent(session: Session, event: AppEvent): Transition {
  switch (event) {
    case "exit-requested":
      return stay({ ...session, exitState: { kind: "present-modal", highlighted: "cancel" } });
    case "next-tab":
      return stay({ ...session, screen: cycleScreen(session.screen, 1) });
    case "prev-tab":
      return stay({ ...session, screen: cycleScreen(session.screen, -1) });
    case "resume":
      return { session, exit: "resume" };
  }
}

function reduceTraceEvent(session: Session, event: TraceEvent): Session {
  const step = event === "next-frame" ? 1 : -1;
  const selectedFrame = clampIndex(session.trace.selectedFrame + step, session.callStack.length);
  return { ...session, trace: { selectedFrame } };
}

function reduceVarsEvent(vars: VarsView, event: VarsEvent): VarsView {
  switch (event) {
    case "previous-var":
    case "next-var": {
      const step = event === "next-var" ? 1 : -1;
      if (vars.focus === "detail" && vars.detail === "split") {
        const current = selectedEnvVar(vars);
        const items = current ? splitEnvValue(current.value).length : 0;
        return { ...vars, selectedItem: clampIndex(vars.selectedItem + step, items) };
      }
      const selectedVar = clampIndex(vars.selectedVar + step, vars.vars.length);
      return { ...vars, selectedVar, selectedItem: 0 };
    }
    case "focus-list":
      return { ...vars, focus: "list" };
    case "focus-detail":
      return { ...vars, focus: "detail" };
    case "raw-detail":
      return { ...vars, detail: "raw", selectedItem: 0 };
    case "split-detail":
      return { ...vars, detail: "split", selectedItem: 0 };
  }
}
