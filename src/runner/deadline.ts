/**
 * Sample Deadline Watchdog
 *
 * Races a sample against a timer armed at submission. On expiry the
 * sample's AbortSignal fires so subprocess probes can kill their child,
 * and the caller gets a timed-out outcome without waiting any longer.
 */

import { errorMessage } from '../utils';

// -----------------------------------------------------------------------------
// Port: deadline.run
// -----------------------------------------------------------------------------

export interface DeadlineResult<T> {
  success: true;
  value: T;
}

export interface DeadlineTimeout {
  success: false;
  timedOut: true;
  timeoutMs: number;
}

export interface DeadlineError {
  success: false;
  timedOut: false;
  error: string;
}

export type DeadlineOutcome<T> = DeadlineResult<T> | DeadlineTimeout | DeadlineError;

/**
 * Runs a task under a deadline. Never rejects: thrown errors and rejections
 * become a DeadlineError, expiry becomes a DeadlineTimeout.
 *
 * @param task - Work to run; receives the signal aborted on expiry
 * @param timeoutMs - Deadline in milliseconds, or null for no deadline
 */
export async function runWithDeadline<T>(
  task: (signal: AbortSignal) => T | Promise<T>,
  timeoutMs: number | null,
): Promise<DeadlineOutcome<T>> {
  const controller = new AbortController();

  const work: Promise<DeadlineOutcome<T>> = Promise.resolve()
    .then(() => task(controller.signal))
    .then(
      (value): DeadlineOutcome<T> => ({ success: true, value }),
      (error: unknown): DeadlineOutcome<T> => ({
        success: false,
        timedOut: false,
        error: errorMessage(error),
      }),
    );

  if (timeoutMs === null) {
    return work;
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const watchdog = new Promise<DeadlineOutcome<T>>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve({ success: false, timedOut: true, timeoutMs });
    }, timeoutMs);
  });

  try {
    return await Promise.race([work, watchdog]);
  } finally {
    clearTimeout(timer);
  }
}
