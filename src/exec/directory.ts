import { AsyncLocalStorage } from 'node:async_hooks';
import path from 'node:path';

/**
 * Logical working directory for process launches.
 *
 * Overrides are scoped to the async flow that installed them, so two
 * concurrent `run()` calls never see each other's directory. The OS-level
 * `process.cwd()` is never changed; it only serves as the fallback.
 */
export class DirectoryContext {
  private readonly storage = new AsyncLocalStorage<string>();
  private readonly fallback: () => string;

  constructor(fallback: () => string = () => process.cwd()) {
    this.fallback = fallback;
  }

  getcwd(): string {
    return this.storage.getStore() ?? this.fallback();
  }

  // Relative paths resolve against the current logical directory, like pushd.
  run<T>(dir: string, fn: () => T): T {
    return this.storage.run(path.resolve(this.getcwd(), dir), fn);
  }
}
