/**
 * Session Runner
 *
 * Mounts the TUI on a terminal and waits for the reducer's exit decision.
 * Input closing first ends the session with NoTerminalError; the terminal is
 * restored however the session ends.
 */

import React from "react";
import { NoTerminalError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { Session } from "../session/state.js";
import { App, type SessionResult } from "./components/App.js";
import { KeyBindings } from "./keys.js";
import type { MountedApp, Terminal } from "./terminal.js";
import { createTheme, type Theme } from "./theme.js";

export type { SessionResult } from "./components/App.js";

export interface RunSessionOptions {
  bindings?: KeyBindings;
  theme?: Theme;
  logger?: Logger;
}

export async function runSession(
  initial: Session,
  terminal: Terminal,
  options: RunSessionOptions = {}
): Promise<SessionResult> {
  const bindings = options.bindings ?? new KeyBindings();
  const theme = options.theme ?? createTheme();
  const { logger } = options;

  let finish: (result: SessionResult) => void = () => {};
  let fail: (error: Error) => void = () => {};
  const finished = new Promise<SessionResult>((resolve, reject) => {
    finish = resolve;
    fail = reject;
  });

  let app: MountedApp | null = null;
  let removeCloseHandler = (): void => {};
  try {
    terminal.enter();
    removeCloseHandler = terminal.onClose(() => {
      fail(new NoTerminalError("terminal input closed before a decision was made"));
    });
    app = terminal.mount(
      <App initial={initial} bindings={bindings} theme={theme} logger={logger} onExit={(result) => finish(result)} />
    );
    const result = await finished;
    logger?.debug({ decision: result.decision }, "session finished");
    return result;
  } finally {
    removeCloseHandler();
    app?.unmount();
    terminal.leave();
  }
}
