// Command execution layer. gather() is the only place a child process is
// launched; checkAssert() and retry() build on top of it.
import { constants } from 'node:os';
import { setTimeout as delay } from 'node:timers/promises';
import execa from 'execa';
import { assertSuccess, SUCCESS } from '../shared/assertion.js';
import { ExecToolsError, ExecToolsErrorCode, LaunchError } from '../shared/errors.js';
import type { DebugSink } from '../shared/logger.js';
import { formatArgv, formatCommand, normalizeCommand, type CommandInput } from './command.js';
import type { DirectoryContext } from './directory.js';
import { retry, type RetryCheck, type RetryTask, type RetryWait } from './retry.js';
import type { CheckAssertDefaults, CheckAssertOptions, CommandOutput, ExecResult } from './types.js';

export type Sleeper = (seconds: number) => Promise<void>;

export interface ExecDeps {
  logger: DebugSink;
  directory: DirectoryContext;
  /** Backoff pause used by checkAssert. Defaults to a real timer. */
  sleep?: Sleeper;
  defaults?: Partial<CheckAssertDefaults>;
}

export const DEFAULT_CHECK_ASSERT: CheckAssertDefaults = {
  retries: 1,
  pollrate: 60,
};

export class Exec {
  private readonly logger: DebugSink;
  private readonly directory: DirectoryContext;
  private readonly sleep: Sleeper;
  private readonly defaults: CheckAssertDefaults;

  constructor(deps: ExecDeps) {
    this.logger = deps.logger;
    this.directory = deps.directory;
    this.sleep = deps.sleep ?? ((seconds) => delay(seconds * 1000));
    this.defaults = { ...DEFAULT_CHECK_ASSERT, ...deps.defaults };
  }

  /**
   * Run a command in the logical working directory and buffer its output.
   * Resolves for every exit status; rejects with LaunchError only when the
   * executable cannot be started.
   */
  async gather(cmd: CommandInput): Promise<ExecResult> {
    const argv = normalizeCommand(cmd);
    const cwd = this.directory.getcwd();
    const info = `[cwd=${cwd}]: ${formatArgv(argv)}`;
    const [file, ...args] = argv;

    this.logger.debug({ cwd, argv }, `Executing:gather ${info}`);
    let result: execa.ExecaReturnValue<Buffer>;
    try {
      result = await execa(file, args, {
        cwd,
        reject: false,
        encoding: null,
        maxBuffer: Infinity,
        stdin: 'ignore',
        stripFinalNewline: false,
      });
    } catch (err) {
      // spawn() itself threw, e.g. on a NUL byte in an argument
      throw new LaunchError(cwd, argv, err instanceof Error ? err.message : String(err));
    }

    let exitCode: number;
    if (result.signal !== undefined) {
      exitCode = -signalNumber(result.signal);
    } else if (typeof result.exitCode === 'number') {
      exitCode = result.exitCode;
    } else if (spawnErrorCode(result) !== undefined) {
      throw new LaunchError(cwd, argv, launchCause(result));
    } else {
      throw new ExecToolsError(ExecToolsErrorCode.PROCESS_FAILED, `Process ended without an exit status: ${file}`, {
        cwd,
        argv,
        cause: launchCause(result),
      });
    }

    const { stdout, stderr } = result;
    this.logger.debug(
      { cwd, argv, exitCode, stdout: stdout.toString(), stderr: stderr.toString() },
      `Process ${info}: exited with: ${exitCode}`
    );
    return { exitCode, stdout, stderr };
  }

  /**
   * Run a command until it exits 0, at most `retries` times, pausing
   * `pollrate` seconds and running `onRetry` before each retry. Throws
   * AssertionFailedError with the last stderr when every attempt fails.
   */
  async checkAssert(cmd: CommandInput, options: CheckAssertOptions = {}): Promise<CommandOutput> {
    const retries = options.retries ?? this.defaults.retries;
    const pollrate = options.pollrate ?? this.defaults.pollrate;
    if (!Number.isInteger(retries) || retries < 1) {
      throw new ExecToolsError(ExecToolsErrorCode.INVALID_ARGUMENT, `retries must be an integer >= 1, got ${retries}`);
    }
    if (!Number.isFinite(pollrate) || pollrate < 0) {
      throw new ExecToolsError(ExecToolsErrorCode.INVALID_ARGUMENT, `pollrate must be a non-negative number, got ${pollrate}`);
    }

    const command = formatCommand(cmd);
    let result = await this.gather(cmd);
    let attempts = 1;
    while (result.exitCode !== SUCCESS && attempts < retries) {
      this.logger.debug(
        { command, failures: attempts, pollrate },
        `assert: Failed ${attempts} times. Retrying in ${pollrate} seconds: ${command}`
      );
      await this.sleep(pollrate);
      if (options.onRetry !== undefined) {
        const remedy = await this.gather(options.onRetry);
        if (remedy.exitCode !== SUCCESS) {
          this.logger.debug(
            { command: formatCommand(options.onRetry), exitCode: remedy.exitCode },
            'assert: on_retry command failed, continuing'
          );
        }
      }
      result = await this.gather(cmd);
      attempts++;
    }

    this.logger.debug(
      { command, exitCode: result.exitCode, attempts },
      `assert: Final result = ${result.exitCode} in ${attempts} tries.`
    );

    const cwd = this.directory.getcwd();
    assertSuccess(result.exitCode, `Error running [${cwd}] ${command}.\n${result.stderr.toString()}`, {
      cwd,
      command,
      exitCode: result.exitCode,
      stderr: result.stderr,
      attempts,
    });
    return { stdout: result.stdout, stderr: result.stderr };
  }

  retry<T>(retries: number, task: RetryTask<T>, check?: RetryCheck<T>, wait?: RetryWait): Promise<T> {
    return retry(retries, task, check, wait);
  }
}

function isSignalName(name: string): name is keyof typeof constants.signals {
  return name in constants.signals;
}

function signalNumber(name: string): number {
  return isSignalName(name) ? constants.signals[name] : 0;
}

// errno-style code ('ENOENT', 'EACCES', ...) left by a failed spawn
function spawnErrorCode(result: object): string | undefined {
  return 'code' in result && typeof result.code === 'string' ? result.code : undefined;
}

function launchCause(result: object): string {
  if ('originalMessage' in result && typeof result.originalMessage === 'string') {
    return result.originalMessage;
  }
  if ('shortMessage' in result && typeof result.shortMessage === 'string') {
    return result.shortMessage;
  }
  return 'unknown spawn error';
}
