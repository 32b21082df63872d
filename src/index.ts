#!/usr/bin/env node

/**
 * tracedbg: interactive tracepoint debugger for shell scripts
 *
 * Started by the tracepoint wrappers with the script's stack trace. Draws a
 * TUI on the terminal and prints the shell code the script evaluates when it
 * continues.
 */

import { createCli } from "./cli.js";

const cli = createCli();
await cli.parseAsync();
