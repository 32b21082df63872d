/**
 * Shell Registry
 *
 * Central registry for all supported shell dialects.
 */

export * from "./base.js";
export * from "./bash.js";
export * from "./zsh.js";
export * from "./fish.js";

import * as fs from "node:fs";
import type { ShellDialect, ShellName } from "./base.js";
import { bashShell } from "./bash.js";
import { zshShell } from "./zsh.js";
import { fishShell } from "./fish.js";
import { UnknownShellError } from "../errors.js";

const shells: Map<string, ShellDialect> = new Map([
  ["bash", bashShell],
  ["zsh", zshShell],
  ["fish", fishShell],
]);

/**
 * Get a shell dialect by name
 */
export function getShell(name: string): ShellDialect | undefined {
  return shells.get(name.toLowerCase());
}

/**
 * Get a shell dialect by name, failing on anything unsupported.
 * There is no default dialect to fall back to.
 */
export function requireShell(name: string): ShellDialect {
  const shell = getShell(name);
  if (!shell) {
    throw new UnknownShellError(name, getShellNames());
  }
  return shell;
}

/**
 * Get all supported shell names
 */
export function getShellNames(): ShellName[] {
  return Array.from(shells.values(), (shell) => shell.name);
}

/**
 * Source of the tracepoint wrapper for a shell. The shell/ directory sits two
 * levels above this module in both src/ and dist/.
 */
export function readWrapper(shell: ShellDialect): string {
  return fs.readFileSync(new URL(`../../shell/${shell.wrapperFile}`, import.meta.url), "utf-8");
}
