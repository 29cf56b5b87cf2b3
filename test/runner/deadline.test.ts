/**
 * Deadline Watchdog Tests
 *
 * Exit criteria:
 *   - Expiry resolves a timed-out outcome and aborts the task's signal
 *   - Throws and rejections become error outcomes
 *   - The timer is cleared when the task wins
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { runWithDeadline } from '../../src/runner/deadline';

describe('runWithDeadline', () => {
  afterEach((): void => {
    vi.useRealTimers();
  });

  it('returns the task value when it finishes in time', async (): Promise<void> => {
    const outcome = await runWithDeadline(async () => 'done', 2000);

    expect(outcome).toEqual({ success: true, value: 'done' });
  });

  it('wraps a synchronous throw into an error outcome', async (): Promise<void> => {
    const outcome = await runWithDeadline(() => {
      throw new Error('probe exploded');
    }, 2000);

    expect(outcome).toEqual({ success: false, timedOut: false, error: 'probe exploded' });
  });

  it('stringifies non-Error rejections', async (): Promise<void> => {
    const outcome = await runWithDeadline(() => Promise.reject('no permission'), 2000);

    expect(outcome).toEqual({ success: false, timedOut: false, error: 'no permission' });
  });

  it('times out a hung task and aborts its signal', async (): Promise<void> => {
    vi.useFakeTimers();
    const signals: AbortSignal[] = [];

    const pending = runWithDeadline((signal) => {
      signals.push(signal);
      return new Promise<never>(() => undefined);
    }, 2000);

    await vi.advanceTimersByTimeAsync(1999);
    expect(signals[0]?.aborted).toBe(false);

    await vi.advanceTimersByTimeAsync(1);

    await expect(pending).resolves.toEqual({ success: false, timedOut: true, timeoutMs: 2000 });
    expect(signals[0]?.aborted).toBe(true);
  });

  it('clears the watchdog timer when the task wins', async (): Promise<void> => {
    vi.useFakeTimers();

    await runWithDeadline(async () => 1, 2000);

    expect(vi.getTimerCount()).toBe(0);
  });

  it('arms no timer without a deadline', async (): Promise<void> => {
    vi.useFakeTimers();
    let release: () => void = () => undefined;

    const pending = runWithDeadline(
      () =>
        new Promise<string>((resolve) => {
          release = () => resolve('late');
        }),
      null,
    );
    await vi.advanceTimersByTimeAsync(60_000);
    expect(vi.getTimerCount()).toBe(0);

    release();

    await expect(pending).resolves.toEqual({ success: true, value: 'late' });
  });
});
