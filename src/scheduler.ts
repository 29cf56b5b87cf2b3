/**
 * Scheduler
 * Layer: core
 *
 * Provided ports:
 *   - scheduler.addSource
 *   - scheduler.removeSource
 *   - scheduler.tick
 *
 * Single fixed-interval ticker that polls every registered source runner
 * once per tick. A tick never waits on a probe: poll() only dispatches.
 */

import type { Probe, SourceId, SourceOptions } from './types';
import { DEFAULT_TICK_INTERVAL_MS } from './types';
import { MonitorUsageError } from './errors';
import { assertValidDebounceConfig } from './debounce';
import { SourceRunner } from './runner';
import type { PollDisposition, SourceRunnerHooks } from './runner';

export interface SchedulerOptions extends SourceRunnerHooks {
  tickIntervalMs?: number;
}

export class Scheduler {
  private readonly runners = new Map<SourceId, SourceRunner>();
  private readonly retiring = new Map<SourceId, Promise<void>>();
  private readonly hooks: SourceRunnerHooks;
  private readonly tickIntervalMs: number;
  private timer: NodeJS.Timeout | undefined;

  constructor(options: SchedulerOptions) {
    const { tickIntervalMs, ...hooks } = options;
    this.hooks = hooks;
    this.tickIntervalMs = tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
  }

  // ---------------------------------------------------------------------------
  // Port: scheduler.addSource
  // ---------------------------------------------------------------------------

  /**
   * Registers a source. If the same id was removed and its last sample is
   * still pending, the new runner waits for it before sampling.
   *
   * @throws MonitorUsageError on a duplicate id or invalid options
   */
  addSource(id: SourceId, options: SourceOptions, probe: Probe): SourceRunner {
    if (this.runners.has(id)) {
      throw new MonitorUsageError('duplicate_source', `Source "${id}" is already registered`);
    }
    assertValidSourceOptions(options);

    const runner = new SourceRunner(id, probe, options, this.hooks, this.retiring.get(id));
    this.runners.set(id, runner);
    return runner;
  }

  // ---------------------------------------------------------------------------
  // Port: scheduler.removeSource
  // ---------------------------------------------------------------------------

  /**
   * Unregisters a source and resets it. An in-flight sample finishes in the
   * background and its result is discarded.
   *
   * @throws MonitorUsageError if the id is not registered
   */
  removeSource(id: SourceId): void {
    const runner = this.requireRunner(id);
    this.runners.delete(id);

    const drained = runner.dispose();
    this.retiring.set(id, drained);
    void drained.then(() => {
      if (this.retiring.get(id) === drained) {
        this.retiring.delete(id);
      }
    });
  }

  /**
   * Hard reset of a registered source without unregistering it.
   */
  resetSource(id: SourceId): void {
    this.requireRunner(id).reset();
  }

  // ---------------------------------------------------------------------------
  // Port: scheduler.tick
  // ---------------------------------------------------------------------------

  /**
   * Polls every registered runner once.
   */
  tick(): Map<SourceId, PollDisposition> {
    const dispositions = new Map<SourceId, PollDisposition>();
    for (const [id, runner] of this.runners) {
      dispositions.set(id, runner.poll());
    }
    return dispositions;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.tick();
    }, this.tickIntervalMs);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = undefined;
  }

  isRunning(): boolean {
    return this.timer !== undefined;
  }

  // ---------------------------------------------------------------------------
  // Accessors
  // ---------------------------------------------------------------------------

  hasSource(id: SourceId): boolean {
    return this.runners.has(id);
  }

  sourceIds(): SourceId[] {
    return [...this.runners.keys()];
  }

  getRunner(id: SourceId): SourceRunner | undefined {
    return this.runners.get(id);
  }

  /**
   * Resolves when every registered and retiring source has no sample
   * outstanding.
   */
  async drained(): Promise<void> {
    const pending = [
      ...[...this.runners.values()].map((runner) => runner.drained()),
      ...this.retiring.values(),
    ];
    await Promise.all(pending);
  }

  private requireRunner(id: SourceId): SourceRunner {
    const runner = this.runners.get(id);
    if (!runner) {
      throw new MonitorUsageError('unknown_source', `Source "${id}" is not registered`);
    }
    return runner;
  }
}

// -----------------------------------------------------------------------------
// Validation
// -----------------------------------------------------------------------------

/**
 * Rejects option values the runner cannot honor.
 */
export function assertValidSourceOptions(options: SourceOptions): void {
  assertValidDebounceConfig(options.debounce);

  for (const [name, value] of [
    ['pollEvery', options.pollEvery],
    ['idlePollEvery', options.idlePollEvery],
  ] as const) {
    if (!Number.isInteger(value) || value < 1) {
      throw new MonitorUsageError(
        'invalid_config',
        `${name} must be an integer >= 1 (got ${String(value)})`,
      );
    }
  }

  if (options.timeoutMs !== null && !(options.timeoutMs > 0)) {
    throw new MonitorUsageError(
      'invalid_config',
      `timeoutMs must be positive or null (got ${String(options.timeoutMs)})`,
    );
  }
}
