import { quote, split } from 'shlex';
import { ExecToolsError, ExecToolsErrorCode } from '../shared/errors.js';

/** A pre-split argument list, or a single string split with shell-word rules. */
export type CommandInput = string | readonly string[];

/**
 * Normalize a command to its argument vector. Strings are split with POSIX
 * quoting and escaping only: pipes, redirections, `#` and `$VAR` references
 * stay literal argument text and no shell ever sees them.
 */
export function normalizeCommand(input: CommandInput): string[] {
  const argv = typeof input === 'string' ? splitWords(input) : [...input];
  if (argv.length === 0) {
    throw new ExecToolsError(ExecToolsErrorCode.INVALID_COMMAND, 'Command is empty', {
      command: formatCommand(input),
    });
  }
  return argv;
}

export function formatCommand(input: CommandInput): string {
  return typeof input === 'string' ? input : formatArgv(input);
}

export function formatArgv(argv: readonly string[]): string {
  return argv.map((arg) => quote(arg)).join(' ');
}

function splitWords(command: string): string[] {
  try {
    return split(command);
  } catch (err) {
    throw new ExecToolsError(ExecToolsErrorCode.INVALID_COMMAND, `Cannot split command: ${command}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
}
