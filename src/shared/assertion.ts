import { AssertionFailedError, type AssertionDetails } from './errors.js';

export const SUCCESS = 0;

/** Throws AssertionFailedError unless `status` is the success code. */
export function assertSuccess(status: number, message: string, details: AssertionDetails): void {
  if (status !== SUCCESS) {
    throw new AssertionFailedError(message, details);
  }
}
