import { normalizeCommand, formatCommand } from '../../../src/exec/command.js';
import { ExecToolsError, ExecToolsErrorCode } from '../../../src/shared/errors.js';

describe('normalizeCommand', () => {
  it('splits single-quoted words as one argument', () => {
    expect(normalizeCommand("echo 'a b' c")).toEqual(['echo', 'a b', 'c']);
  });

  it('honours double quotes and backslash escapes', () => {
    expect(normalizeCommand('printf "%s\\n" a\\ b')).toEqual(['printf', '%s\\n', 'a b']);
  });

  it('keeps variable references literal', () => {
    expect(normalizeCommand('echo $HOME ${HOME}')).toEqual(['echo', '$HOME', '${HOME}']);
  });

  it('keeps pipes and redirections inside their word', () => {
    expect(normalizeCommand('grep a|b file')).toEqual(['grep', 'a|b', 'file']);
    expect(normalizeCommand('echo a>b')).toEqual(['echo', 'a>b']);
    expect(normalizeCommand('echo a;b (x)')).toEqual(['echo', 'a;b', '(x)']);
  });

  it('rejects an unterminated quote with INVALID_COMMAND', () => {
    expect(() => normalizeCommand("echo 'open")).toThrow(
      expect.objectContaining({ code: ExecToolsErrorCode.INVALID_COMMAND })
    );
  });

  it('copies a pre-split list', () => {
    const argv = ['git', 'status'];
    const result = normalizeCommand(argv);
    expect(result).toEqual(['git', 'status']);
    expect(result).not.toBe(argv);
  });

  it('rejects an empty list', () => {
    expect(() => normalizeCommand([])).toThrow(ExecToolsError);
  });

  it('rejects a blank string with INVALID_COMMAND', () => {
    expect(() => normalizeCommand('   ')).toThrow(
      expect.objectContaining({ code: ExecToolsErrorCode.INVALID_COMMAND })
    );
  });
});

describe('formatCommand', () => {
  it('returns string commands unchanged', () => {
    expect(formatCommand("echo 'a b'")).toBe("echo 'a b'");
  });

  it('quotes list arguments that contain spaces', () => {
    expect(formatCommand(['echo', 'a b'])).toBe("echo 'a b'");
  });
});
