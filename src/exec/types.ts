import type { CommandInput } from './command.js';

/**
 * Outcome of one process launch. Any exit status, zero or not, lands here.
 * Output is kept as raw bytes; a signal death is reported as `-signal`.
 */
export interface ExecResult {
  readonly exitCode: number;
  readonly stdout: Buffer;
  readonly stderr: Buffer;
}

export interface CommandOutput {
  readonly stdout: Buffer;
  readonly stderr: Buffer;
}

export interface CheckAssertOptions {
  /** Total attempts, at least 1. */
  retries?: number;
  /** Seconds to pause before each retry. */
  pollrate?: number;
  /** Remediation command run before each retry; its exit status is ignored. */
  onRetry?: CommandInput;
}

export interface CheckAssertDefaults {
  retries: number;
  pollrate: number;
}
