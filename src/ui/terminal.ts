/**
 * Terminal Access
 *
 * stdout is captured by the wrapper's `$(...)`, so the TUI reads keys from
 * stdin and draws on stderr, falling back to /dev/tty for whichever of the
 * two is not a terminal. ink owns raw mode and drawing once a tree is mounted.
 */

import * as fs from "node:fs";
import * as tty from "node:tty";
import ansiEscapes from "ansi-escapes";
import { render } from "ink";
import type { ReactElement } from "react";
import { NoTerminalError } from "../errors.js";

export interface MountedApp {
  unmount(): void;
}

export interface Terminal {
  /** Switch to the alternate screen */
  enter(): void;
  /** Restore the terminal; safe to call more than once */
  leave(): void;
  /** Start rendering an ink tree on this terminal */
  mount(tree: ReactElement): MountedApp;
  /** Register a handler for the input side going away; returns a function removing it */
  onClose(handler: () => void): () => void;
}

function openTtyFd(flags: "r" | "w"): number {
  let fd: number;
  try {
    fd = fs.openSync("/dev/tty", flags);
  } catch (error) {
    throw new NoTerminalError(
      `stdin/stderr are not terminals and /dev/tty can't be opened (${error instanceof Error ? error.message : String(error)})`
    );
  }
  if (!tty.isatty(fd)) {
    fs.closeSync(fd);
    throw new NoTerminalError("/dev/tty is not a terminal");
  }
  return fd;
}

export class TtyTerminal implements Terminal {
  private input: tty.ReadStream;
  private output: tty.WriteStream;
  private ownsInput: boolean;
  private ownsOutput: boolean;
  private active: boolean = false;

  constructor(input: tty.ReadStream, output: tty.WriteStream, owns: { input: boolean; output: boolean }) {
    this.input = input;
    this.output = output;
    this.ownsInput = owns.input;
    this.ownsOutput = owns.output;
  }

  /**
   * Open the controlling terminal, or fail with NoTerminalError.
   */
  static open(): TtyTerminal {
    const ownsInput = !process.stdin.isTTY;
    const ownsOutput = !process.stderr.isTTY;
    const input = ownsInput ? new tty.ReadStream(openTtyFd("r")) : process.stdin;
    const output = ownsOutput ? new tty.WriteStream(openTtyFd("w")) : process.stderr;
    return new TtyTerminal(input, output, { input: ownsInput, output: ownsOutput });
  }

  enter(): void {
    if (this.active) return;
    this.active = true;
    this.output.write(ansiEscapes.enterAlternativeScreen);
  }

  leave(): void {
    if (!this.active) return;
    this.active = false;
    this.output.write(ansiEscapes.exitAlternativeScreen);
    if (this.ownsInput) this.input.destroy();
    if (this.ownsOutput) this.output.end();
  }

  mount(tree: ReactElement): MountedApp {
    const instance = render(tree, {
      stdin: this.input,
      stdout: this.output,
      stderr: this.output,
      exitOnCtrlC: false,
      patchConsole: false,
    });
    return { unmount: () => instance.unmount() };
  }

  onClose(handler: () => void): () => void {
    this.input.once("end", handler);
    this.input.once("close", handler);
    return () => {
      this.input.off("end", handler);
      this.input.off("close", handler);
    };
  }
}
