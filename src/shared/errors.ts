export enum ExecToolsErrorCode {
  INVALID_COMMAND = 'INVALID_COMMAND',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  LAUNCH_FAILED = 'LAUNCH_FAILED',
  ASSERTION_FAILED = 'ASSERTION_FAILED',
  RETRY_EXHAUSTED = 'RETRY_EXHAUSTED',
  CONFIG_INVALID = 'CONFIG_INVALID',
  PROCESS_FAILED = 'PROCESS_FAILED',
}

export class ExecToolsError extends Error {
  readonly code: ExecToolsErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: ExecToolsErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'ExecToolsError';
    this.code = code;
    this.context = context;
  }
}

// The executable could not be started at all. Non-zero exits are not launch failures.
export class LaunchError extends ExecToolsError {
  readonly cwd: string;
  readonly argv: readonly string[];

  constructor(cwd: string, argv: readonly string[], cause: string) {
    super(ExecToolsErrorCode.LAUNCH_FAILED, `Command failed to spawn: ${argv[0]} [cwd=${cwd}]`, {
      cause,
    });
    this.name = 'LaunchError';
    this.cwd = cwd;
    this.argv = argv;
  }
}

export interface AssertionDetails {
  cwd: string;
  command: string;
  exitCode: number;
  stderr: Buffer;
  attempts: number;
}

export class AssertionFailedError extends ExecToolsError {
  readonly cwd: string;
  readonly command: string;
  readonly exitCode: number;
  readonly stderr: Buffer;
  readonly attempts: number;

  constructor(message: string, details: AssertionDetails) {
    super(ExecToolsErrorCode.ASSERTION_FAILED, message, { ...details });
    this.name = 'AssertionFailedError';
    this.cwd = details.cwd;
    this.command = details.command;
    this.exitCode = details.exitCode;
    this.stderr = details.stderr;
    this.attempts = details.attempts;
  }
}

export class RetryExhaustedError extends ExecToolsError {
  readonly attempts: number;

  constructor(attempts: number) {
    super(ExecToolsErrorCode.RETRY_EXHAUSTED, `Giving up after ${attempts} failed attempt(s)`, {
      attempts,
    });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
  }
}
