/**
 * Logging
 *
 * stdout is evaluated by the calling shell and stderr belongs to the TUI, so
 * logs only ever go to the file named by TRACEDBG_LOG_FILE.
 */

import pino from "pino";
import type { TracedbgConfig } from "./config.js";

export type Logger = pino.Logger;

export function createLogger(config: Pick<TracedbgConfig, "logFile" | "logLevel">): Logger {
  if (!config.logFile) {
    return pino({ level: "silent" });
  }

  return pino(
    {
      level: config.logLevel,
      serializers: { err: pino.stdSerializers.err },
    },
    // Must be flushed before the process exits
    pino.destination({ dest: config.logFile, sync: true, mkdir: true })
  );
}
