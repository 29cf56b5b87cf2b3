/**
 * Activity Monitor
 * Layer: core
 *
 * Composes the scheduler and the aggregator into the single object the
 * enable/disable control and the UI layer talk to.
 */

import type {
  DebounceConfig,
  DiagnosticSink,
  Probe,
  Reading,
  SourceId,
  SourceOptions,
} from './types';
import { DEFAULT_PROBE_TIMEOUT_MS } from './types';
import { Scheduler } from './scheduler';
import { Aggregator } from './aggregator';
import type { ActiveSetListener, ReadingListener } from './aggregator';
import type { PollDisposition } from './runner';
import { errorMessage } from './utils';

export interface MonitorOptions {
  tickIntervalMs?: number;
  diagnostics?: DiagnosticSink;
  onListenerError?: (error: unknown) => void;
  now?: () => Date;
}

/**
 * Per-source options as callers provide them; everything but the
 * thresholds has a default.
 */
export type SourceInput = Partial<Omit<SourceOptions, 'debounce'>> & {
  debounce: DebounceConfig;
};

/**
 * Fills per-source defaults: 2s deadline, sample every tick, same pace
 * when idle.
 */
export function resolveSourceOptions(input: SourceInput): SourceOptions {
  const pollEvery = input.pollEvery ?? 1;
  const options: SourceOptions = {
    debounce: { ...input.debounce },
    timeoutMs: input.timeoutMs === undefined ? DEFAULT_PROBE_TIMEOUT_MS : input.timeoutMs,
    pollEvery,
    idlePollEvery: input.idlePollEvery ?? pollEvery,
    debug: input.debug ?? false,
  };
  if (input.precheck) {
    options.precheck = input.precheck;
  }
  return options;
}

/**
 * Fans one diagnostic event out to several sinks. A throwing sink is
 * reported and skipped; it never alters polling.
 */
export function combineSinks(...sinks: DiagnosticSink[]): DiagnosticSink {
  return (event) => {
    for (const sink of sinks) {
      try {
        sink(event);
      } catch (error) {
        console.error(`Diagnostic sink error: ${errorMessage(error)}`);
      }
    }
  };
}

export class ActivityMonitor {
  private readonly scheduler: Scheduler;
  private readonly aggregator: Aggregator;

  constructor(options: MonitorOptions = {}) {
    this.aggregator = new Aggregator(
      options.onListenerError ? { onListenerError: options.onListenerError } : {},
    );

    const diagnostics = options.diagnostics ? combineSinks(options.diagnostics) : undefined;
    this.scheduler = new Scheduler({
      tickIntervalMs: options.tickIntervalMs,
      onTransition: (transition) => this.aggregator.applyTransition(transition),
      onReading: (source, reading) => this.aggregator.recordReading(source, reading),
      ...(diagnostics ? { diagnostics } : {}),
      ...(options.now ? { now: options.now } : {}),
    });
  }

  // ---------------------------------------------------------------------------
  // Enable / disable control
  // ---------------------------------------------------------------------------

  addSource(id: SourceId, input: SourceInput, probe: Probe): void {
    this.scheduler.addSource(id, resolveSourceOptions(input), probe);
  }

  removeSource(id: SourceId): void {
    this.scheduler.removeSource(id);
    this.aggregator.forget(id);
  }

  resetSource(id: SourceId): void {
    this.scheduler.resetSource(id);
    this.aggregator.clearReading(id);
  }

  hasSource(id: SourceId): boolean {
    return this.scheduler.hasSource(id);
  }

  sourceIds(): SourceId[] {
    return this.scheduler.sourceIds();
  }

  // ---------------------------------------------------------------------------
  // Ticking
  // ---------------------------------------------------------------------------

  start(): void {
    this.scheduler.start();
  }

  /**
   * Stops ticking and waits for outstanding samples to settle.
   */
  async stop(): Promise<void> {
    this.scheduler.stop();
    await this.scheduler.drained();
  }

  tick(): Map<SourceId, PollDisposition> {
    return this.scheduler.tick();
  }

  isRunning(): boolean {
    return this.scheduler.isRunning();
  }

  /**
   * Resolves once no sample is outstanding on any source.
   */
  drained(): Promise<void> {
    return this.scheduler.drained();
  }

  // ---------------------------------------------------------------------------
  // Published activity feed
  // ---------------------------------------------------------------------------

  subscribe(listener: ActiveSetListener): () => void {
    return this.aggregator.subscribe(listener);
  }

  subscribeReadings(listener: ReadingListener): () => void {
    return this.aggregator.subscribeReadings(listener);
  }

  getActiveSet(): ReadonlySet<SourceId> {
    return this.aggregator.getActiveSet();
  }

  getReading(id: SourceId): Reading | null {
    return this.aggregator.getReading(id);
  }

  isActive(id: SourceId): boolean {
    return this.scheduler.getRunner(id)?.getState().isActive ?? false;
  }
}
