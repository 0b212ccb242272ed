export { Exec, DEFAULT_CHECK_ASSERT } from './exec/exec.js';
export type { ExecDeps, Sleeper } from './exec/exec.js';
export { DirectoryContext } from './exec/directory.js';
export { normalizeCommand, formatCommand, formatArgv } from './exec/command.js';
export type { CommandInput } from './exec/command.js';
export { retry, sleepWait } from './exec/retry.js';
export type { RetryTask, RetryCheck, RetryWait } from './exec/retry.js';
export type { ExecResult, CommandOutput, CheckAssertOptions, CheckAssertDefaults } from './exec/types.js';
export { assertSuccess, SUCCESS } from './shared/assertion.js';
export {
  ExecToolsError,
  ExecToolsErrorCode,
  LaunchError,
  AssertionFailedError,
  RetryExhaustedError,
} from './shared/errors.js';
export type { AssertionDetails } from './shared/errors.js';
export { createLogger } from './shared/logger.js';
export type { DebugSink, LogLevel } from './shared/logger.js';
export { loadConfig, createExec, DEFAULT_CONFIG, CONFIG_ENV_VAR, DEFAULT_CONFIG_FILE } from './config/loader.js';
export type { ExecToolsConfig, ConfigResult } from './config/loader.js';
