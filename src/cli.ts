/**
 * tracedbg Command Line
 *
 * The main command is run by a shell wrapper at each tracepoint, with the
 * shell, tracepoint name and captured call stack as options. `hook <shell>`
 * prints the wrapper to source and `shells` lists the supported dialects.
 *
 * stdout carries shell code and nothing else, because the wrapper evals it;
 * diagnostics go to stderr and the TUI draws on the terminal.
 */

import { Command } from "commander";
import { APP_NAME, APP_VERSION, loadConfig } from "./config.js";
import { runDebugger } from "./debugger.js";
import { TracedbgError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { getShell, getShellNames, readWrapper } from "./shells/index.js";
import { TtyTerminal, type Terminal } from "./ui/terminal.js";

export interface CliOptions {
  shell?: string;
  tracepoint: string;
  callStack: string;
}

export interface CliIO {
  /** Receives generated shell code and wrapper source only */
  stdout: { write(chunk: string): unknown };
  env: NodeJS.ProcessEnv;
  openTerminal: () => Terminal;
}

const defaultIO: CliIO = {
  stdout: process.stdout,
  env: process.env,
  openTerminal: () => TtyTerminal.open(),
};

function fail(message: string, ...details: string[]): void {
  console.error(`Error: ${message}`);
  for (const detail of details) {
    console.error(detail);
  }
  process.exitCode = 1;
}

export function createCli(io: CliIO = defaultIO): Command {
  const program = new Command();

  program
    .name(APP_NAME)
    .description("Interactive tracepoint debugger for bash, zsh and fish scripts")
    .version(APP_VERSION);

  // Main command, run by the tracepoint wrappers
  program
    .option("-s, --shell <shell>", `Shell the tracepoint was hit in (${getShellNames().join(", ")})`)
    .option("-t, --tracepoint <name>", "Name of the tracepoint that was hit", "")
    .option("-c, --call-stack <text>", "Stack trace captured by the wrapper", "")
    .action(async (options: CliOptions) => {
      if (!options.shell) {
        fail("--shell is required", `Available shells: ${getShellNames().join(", ")}`);
        return;
      }
      await runMain({ ...options, shell: options.shell }, io);
    });

  program
    .command("hook <shell>")
    .description("Print the tracepoint wrapper for a shell")
    .action((name: string) => {
      const shell = getShell(name);
      if (!shell) {
        fail(`Unknown shell: ${name}`, `Available shells: ${getShellNames().join(", ")}`);
        return;
      }
      io.stdout.write(readWrapper(shell));
    });

  program
    .command("shells")
    .description("List supported shells")
    .action(() => {
      for (const name of getShellNames()) {
        const shell = getShell(name);
        if (!shell) continue;
        console.log(`  ${shell.name.padEnd(6)}${shell.description}`);
      }
    });

  return program;
}

async function runMain(options: Required<CliOptions>, io: CliIO): Promise<void> {
  let logger: Logger | undefined;
  try {
    logger = createLogger(loadConfig(io.env));
    logger.debug({ options }, "invoked");
    await runDebugger(options, {
      env: io.env,
      stdout: io.stdout,
      openTerminal: io.openTerminal,
      logger,
    });
  } catch (error) {
    logger?.fatal({ err: error }, "debugger failed");
    if (error instanceof TracedbgError) {
      fail(error.message);
    } else {
      fail(error instanceof Error ? (error.stack ?? error.message) : String(error));
    }
  }
}
