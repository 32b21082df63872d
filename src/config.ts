/**
 * Configuration
 *
 * Names shared with the shell wrappers, and the environment settings read at
 * startup.
 */

import { ConfigError } from "./errors.js";

export const APP_NAME = "tracedbg";
export const APP_VERSION = "0.1.0";

/** Session control variable read by the wrappers and by the debugger */
export const TRACEPOINT_VAR = "TRACEDBG_TRACEPOINT";

export const LOG_FILE_VAR = "TRACEDBG_LOG_FILE";
export const LOG_LEVEL_VAR = "TRACEDBG_LOG_LEVEL";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** Exit status the generated code uses when the user terminates the script */
export const TERMINATE_STATUS = 1;

export interface TracedbgConfig {
  /** Raw value of TRACEDBG_TRACEPOINT, undefined when unset */
  tracepointValue: string | undefined;
  /** Log destination; logging is off when undefined */
  logFile?: string;
  logLevel: LogLevel;
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): TracedbgConfig {
  const logFile = env[LOG_FILE_VAR] || undefined;

  const rawLevel = env[LOG_LEVEL_VAR] || "info";
  if (!isLogLevel(rawLevel)) {
    throw new ConfigError(
      `Invalid ${LOG_LEVEL_VAR}: ${rawLevel}. Use one of ${LOG_LEVELS.join(", ")}`
    );
  }

  return {
    tracepointValue: env[TRACEPOINT_VAR],
    logFile,
    logLevel: logFile ? rawLevel : "silent",
  };
}
