/**
 * Debugger Entry Point
 *
 * One tracepoint hit, start to finish: decide whether to stop, normalize the
 * stack, run the TUI, and write the code the wrapper evaluates. Nothing is
 * written to stdout unless a full directive is ready.
 */

import { loadConfig } from "./config.js";
import type { Logger } from "./logger.js";
import { generateResumeCode } from "./output/resume.js";
import { createSession, type ExitDecision } from "./session/state.js";
import { describeTraceMode, resolveTraceMode } from "./session/trace-mode.js";
import { requireShell } from "./shells/index.js";
import { describeFrame, normalizeCallStack, type NormalizeOptions } from "./trace/frames.js";
import { loadSources, type SourceReader } from "./trace/source.js";
import type { KeyBindings } from "./ui/keys.js";
import { runSession } from "./ui/loop.js";
import type { Terminal } from "./ui/terminal.js";
import type { Theme } from "./ui/theme.js";

export interface DebuggerOptions {
  shell: string;
  tracepoint: string;
  callStack: string;
}

export interface DebuggerDeps {
  env: NodeJS.ProcessEnv;
  stdout: { write(chunk: string): unknown };
  openTerminal: () => Terminal;
  logger: Logger;
  cwd?: string;
  resolvePath?: NormalizeOptions["resolvePath"];
  readSource?: SourceReader;
  bindings?: KeyBindings;
  theme?: Theme;
}

/**
 * Run the debugger for one tracepoint hit.
 *
 * @returns the exit decision, or null when the tracepoint didn't stop
 */
export async function runDebugger(options: DebuggerOptions, deps: DebuggerDeps): Promise<ExitDecision | null> {
  const { logger } = deps;
  const shell = requireShell(options.shell);
  const config = loadConfig(deps.env);

  const { mode, stop, after } = resolveTraceMode(config.tracepointValue, options.tracepoint);
  logger.info(
    { shell: shell.name, tracepoint: options.tracepoint, mode: describeTraceMode(mode), stop },
    "tracepoint hit"
  );
  if (!stop) {
    return null;
  }

  const { frames, errors } = normalizeCallStack(shell, options.callStack, {
    cwd: deps.cwd,
    resolvePath: deps.resolvePath,
  });
  for (const error of errors) {
    logger.warn({ record: error.record }, error.message);
  }
  logger.debug({ frames: frames.map(describeFrame) }, "call stack");

  // Generated up front so a value that can't be exported fails before the TUI opens
  const resumeCode = generateResumeCode(shell, "resume", { from: mode, to: after });

  const session = createSession({
    shell: shell.name,
    tracepoint: options.tracepoint,
    callStack: frames,
    mode,
    after,
    resumeCode,
    sources: loadSources(frames, deps.readSource),
    env: deps.env,
  });

  const terminal = deps.openTerminal();
  const { decision } = await runSession(session, terminal, {
    bindings: deps.bindings,
    theme: deps.theme,
    logger,
  });

  const code = decision === "resume" ? resumeCode : generateResumeCode(shell, decision, { from: mode, to: after });
  logger.info({ decision, bytes: code.length }, "session finished");
  deps.stdout.write(code);
  return decision;
}
