import { DirectoryContext } from '../../../src/exec/directory.js';

describe('DirectoryContext', () => {
  it('falls back to the process working directory', () => {
    expect(new DirectoryContext().getcwd()).toBe(process.cwd());
  });

  it('overrides the directory inside run() and restores it after', () => {
    const dir = new DirectoryContext(() => '/base');
    const inside = dir.run('/work', () => dir.getcwd());
    expect(inside).toBe('/work');
    expect(dir.getcwd()).toBe('/base');
  });

  it('resolves relative paths against the current override', () => {
    const dir = new DirectoryContext(() => '/base');
    const nested = dir.run('repo', () => dir.run('../other/sub', () => dir.getcwd()));
    expect(nested).toBe('/base/other/sub');
  });

  it('does not change the OS working directory', () => {
    const before = process.cwd();
    const dir = new DirectoryContext();
    dir.run('/', () => undefined);
    expect(process.cwd()).toBe(before);
  });

  it('isolates concurrent async flows', async () => {
    const dir = new DirectoryContext(() => '/base');
    const observe = (target: string, ms: number): Promise<string> =>
      dir.run(target, async () => {
        await new Promise((resolve) => setTimeout(resolve, ms));
        return dir.getcwd();
      });

    const results = await Promise.all([observe('/one', 30), observe('/two', 5)]);
    expect(results).toEqual(['/one', '/two']);
    expect(dir.getcwd()).toBe('/base');
  });
});
