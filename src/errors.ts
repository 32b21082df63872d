/**
 * Error Types
 *
 * Everything tracedbg throws on purpose extends TracedbgError, so the CLI can
 * tell an expected failure (bad flag, no terminal) from a bug.
 */

export class TracedbgError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A single stack record could not be decoded. Recovered by dropping the record. */
export class MalformedFrameError extends TracedbgError {
  readonly record: string;

  constructor(record: string, reason: string) {
    super(`Malformed stack record "${record}": ${reason}`);
    this.record = record;
  }
}

export class UnknownShellError extends TracedbgError {
  constructor(shell: string, supported: readonly string[]) {
    super(`Unknown shell: ${shell}. Supported shells: ${supported.join(", ")}`);
  }
}

export class NoTerminalError extends TracedbgError {
  constructor(detail: string) {
    super(`No interactive terminal available: ${detail}`);
  }
}

export class DuplicateBindingError extends TracedbgError {
  constructor(chord: string) {
    super(`Key "${chord}" is bound more than once in the same keymap`);
  }
}

export class ResumeCodeError extends TracedbgError {
  constructor(message: string) {
    super(`Cannot generate resume code: ${message}`);
  }
}

export class ConfigError extends TracedbgError {}
