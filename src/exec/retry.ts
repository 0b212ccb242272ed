import { setTimeout as delay } from 'node:timers/promises';
import { RetryExhaustedError } from '../shared/errors.js';

export type RetryTask<T> = () => T | Promise<T>;
export type RetryCheck<T> = (result: T) => boolean;
export type RetryWait = (attempt: number) => void | Promise<void>;

/**
 * Call `task` up to `retries` times and return the first result `check`
 * accepts (truthiness by default). `wait` runs between failed attempts with
 * the 0-based index of the attempt that just failed, never after the last.
 */
export async function retry<T>(
  retries: number,
  task: RetryTask<T>,
  check: RetryCheck<T> = Boolean,
  wait?: RetryWait
): Promise<T> {
  for (let attempt = 0; attempt < retries; attempt++) {
    const result = await task();
    if (check(result)) {
      return result;
    }
    if (attempt < retries - 1 && wait !== undefined) {
      await wait(attempt);
    }
  }
  throw new RetryExhaustedError(retries);
}

/** A `wait` callback that pauses for a fixed number of seconds. */
export function sleepWait(seconds: number): RetryWait {
  return () => delay(seconds * 1000);
}
