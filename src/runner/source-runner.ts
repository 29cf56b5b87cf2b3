/**
 * Source Runner
 *
 * Turns a scheduler tick into at most one probe invocation per source.
 * Each runner owns a serial lane, an in-flight guard, a deadline watchdog
 * and one debounce state. poll() only dispatches; it never waits on the
 * probe.
 */

import type {
  DebounceState,
  DiagnosticEvent,
  DiagnosticSink,
  Probe,
  ProbeContext,
  Reading,
  ReadingStatus,
  SourceId,
  SourceOptions,
  Transition,
} from '../types';
import { createDebounceState, resetDebounce, updateDebounce } from '../debounce';
import { MonitorUsageError } from '../errors';
import { SerialLane } from './lane';
import { runWithDeadline } from './deadline';
import type { DeadlineOutcome } from './deadline';

export type PollDisposition = 'dispatched' | 'in_flight' | 'throttled';

export interface SourceRunnerHooks {
  /** Called once per committed state flip (including resets of an active source) */
  onTransition: (transition: Transition) => void;
  /** Called with every reading that reaches the state machine */
  onReading?: (source: SourceId, reading: Reading) => void;
  diagnostics?: DiagnosticSink;
  now?: () => Date;
}

interface SampleValue {
  reading: Reading;
  shortCircuited: boolean;
}

function isReadingStatus(value: unknown): value is ReadingStatus {
  return value === 'active' || value === 'inactive' || value === 'neutral';
}

/**
 * Coerces whatever a probe returned into a valid Reading.
 * Anything unrecognizable is inactive.
 */
export function normalizeReading(value: unknown): Reading {
  if (typeof value !== 'object' || value === null || !('status' in value)) {
    return { status: 'inactive', detail: 'malformed reading' };
  }
  const { status } = value;
  if (!isReadingStatus(status)) {
    return { status: 'inactive', detail: 'malformed reading' };
  }
  const reading: Reading = { status };
  const progress = 'progress' in value ? value.progress : undefined;
  if (typeof progress === 'number' && Number.isFinite(progress)) {
    reading.progress = Math.min(1, Math.max(0, progress));
  }
  if ('detail' in value && typeof value.detail === 'string') {
    reading.detail = value.detail;
  }
  return reading;
}

export class SourceRunner {
  readonly id: SourceId;
  private readonly probe: Probe;
  private readonly options: SourceOptions;
  private readonly hooks: SourceRunnerHooks;
  private readonly lane: SerialLane;
  private state: DebounceState = createDebounceState();
  private inFlight = false;
  private generation = 0;
  private pollCount = 0;
  private disposed = false;
  private lastReading: Reading | null = null;

  /**
   * @param predecessor - Drain promise of a retired runner for the same
   *   source. Polls are dropped until it settles, so one source never has
   *   two outstanding samples.
   */
  constructor(
    id: SourceId,
    probe: Probe,
    options: SourceOptions,
    hooks: SourceRunnerHooks,
    predecessor?: Promise<void>,
  ) {
    this.id = id;
    this.probe = probe;
    this.options = options;
    this.hooks = hooks;
    this.lane = new SerialLane(predecessor);

    if (predecessor) {
      this.inFlight = true;
      void predecessor.then(() => {
        this.inFlight = false;
      });
    }
  }

  // ---------------------------------------------------------------------------
  // Port: runner.poll
  // ---------------------------------------------------------------------------

  /**
   * Dispatches one sample unless one is already outstanding or the tick is
   * throttled. Returns immediately.
   *
   * @throws MonitorUsageError if the runner has been disposed
   */
  poll(): PollDisposition {
    if (this.disposed) {
      throw new MonitorUsageError('disposed_runner', `poll() on removed source "${this.id}"`);
    }

    if (this.inFlight) {
      this.emit({ ...this.stamp(), kind: 'skipped', reason: 'in_flight' });
      return 'in_flight';
    }

    // Idle sources may poll less often; active ones keep the faster pace
    // so a finish is noticed quickly.
    this.pollCount += 1;
    const every = this.state.isActive ? this.options.pollEvery : this.options.idlePollEvery;
    if (this.pollCount % every !== 0) {
      this.emit({ ...this.stamp(), kind: 'skipped', reason: 'throttled' });
      return 'throttled';
    }

    this.inFlight = true;
    const generation = this.generation;
    void this.lane.submit(() => this.sample(generation));
    return 'dispatched';
  }

  // ---------------------------------------------------------------------------
  // Port: runner.reset
  // ---------------------------------------------------------------------------

  /**
   * Forces the state to {0, 0, inactive}. A sample already in flight keeps
   * running; its result is discarded when it lands.
   */
  reset(): void {
    const wasActive = this.state.isActive;
    this.state = resetDebounce();
    this.generation += 1;
    this.pollCount = 0;
    this.lastReading = null;
    this.probe.reset?.();

    if (wasActive) {
      this.commit(false, 'reset');
    }
  }

  /**
   * Resets and retires the runner. Resolves when any in-flight sample has
   * settled (bounded by the source's deadline).
   */
  dispose(): Promise<void> {
    if (!this.disposed) {
      this.reset();
      this.disposed = true;
    }
    return this.lane.drained();
  }

  // ---------------------------------------------------------------------------
  // Accessors
  // ---------------------------------------------------------------------------

  getState(): DebounceState {
    return { ...this.state };
  }

  getLastReading(): Reading | null {
    return this.lastReading;
  }

  isInFlight(): boolean {
    return this.inFlight;
  }

  isDisposed(): boolean {
    return this.disposed;
  }

  drained(): Promise<void> {
    return this.lane.drained();
  }

  // ---------------------------------------------------------------------------
  // Sampling
  // ---------------------------------------------------------------------------

  private async sample(generation: number): Promise<void> {
    try {
      const outcome = await runWithDeadline(
        (signal) => this.invoke(signal),
        this.options.timeoutMs,
      );
      this.settle(generation, outcome);
    } finally {
      this.inFlight = false;
    }
  }

  private async invoke(signal: AbortSignal): Promise<SampleValue> {
    const context: ProbeContext = {
      source: this.id,
      signal,
      timeoutMs: this.options.timeoutMs,
    };

    if (this.options.precheck && !(await this.options.precheck(context))) {
      return {
        reading: { status: 'inactive', detail: 'precheck failed' },
        shortCircuited: true,
      };
    }

    const raw: unknown = await this.probe(context);
    return { reading: normalizeReading(raw), shortCircuited: false };
  }

  private settle(generation: number, outcome: DeadlineOutcome<SampleValue>): void {
    if (generation !== this.generation) {
      this.emit({ ...this.stamp(), kind: 'discarded', generation });
      return;
    }

    if (outcome.success) {
      this.apply(outcome.value.reading, outcome.value.shortCircuited);
      return;
    }

    if (outcome.timedOut) {
      this.emit({ ...this.stamp(), kind: 'timeout', timeout_ms: outcome.timeoutMs });
      this.apply({ status: 'inactive', detail: 'timed out' }, false);
      return;
    }

    this.emit({ ...this.stamp(), kind: 'probe_error', error: outcome.error });
    this.apply({ status: 'inactive', detail: outcome.error }, false);
  }

  private apply(reading: Reading, shortCircuited: boolean): void {
    const result = updateDebounce(this.state, reading.status, this.options.debounce);
    this.state = result.state;
    this.lastReading = reading;
    this.hooks.onReading?.(this.id, reading);

    this.emit({
      ...this.stamp(),
      kind: 'reading',
      reading,
      short_circuited: shortCircuited,
      consecutive_active: this.state.consecutiveActive,
      consecutive_inactive: this.state.consecutiveInactive,
      is_active: this.state.isActive,
    });

    if (result.transition !== null) {
      this.commit(result.transition, 'reading');
    }
  }

  private commit(active: boolean, cause: Transition['cause']): void {
    this.emit({ ...this.stamp(), kind: 'transition', active, cause });
    this.hooks.onTransition({ source: this.id, active, cause });
  }

  private stamp(): { timestamp: string; source: SourceId; debug?: boolean } {
    const now = this.hooks.now ? this.hooks.now() : new Date();
    const stamp = { timestamp: now.toISOString(), source: this.id };
    return this.options.debug ? { ...stamp, debug: true } : stamp;
  }

  private emit(event: DiagnosticEvent): void {
    this.hooks.diagnostics?.(event);
  }
}
