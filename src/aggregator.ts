/**
 * Aggregator
 * Layer: core
 *
 * Provided ports:
 *   - aggregator.applyTransition
 *   - aggregator.subscribe
 *   - aggregator.subscribeReadings
 *
 * Fans in every source's committed transitions and publishes the set of
 * currently active source ids. Raw readings never trigger a recomputation;
 * a changed progress or detail of an active source is published to reading
 * listeners instead.
 */

import type { Reading, SourceId, Transition } from './types';

export type ActiveSetListener = (active: ReadonlySet<SourceId>) => void;

/** Called when an active source reports a different progress or detail */
export type ReadingListener = (source: SourceId, reading: Reading) => void;

export interface AggregatorOptions {
  /** Receives errors thrown by subscribers; they never reach the sources */
  onListenerError?: (error: unknown) => void;
}

/**
 * Set equality on membership.
 */
export function sameMembers<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): boolean {
  if (a.size !== b.size) return false;
  for (const item of a) {
    if (!b.has(item)) return false;
  }
  return true;
}

export class Aggregator {
  private readonly states = new Map<SourceId, boolean>();
  private readonly readings = new Map<SourceId, Reading>();
  private readonly listeners = new Set<ActiveSetListener>();
  private readonly readingListeners = new Set<ReadingListener>();
  private readonly onListenerError: ((error: unknown) => void) | undefined;
  private active: ReadonlySet<SourceId> = new Set();
  private recomputations = 0;

  constructor(options: AggregatorOptions = {}) {
    this.onListenerError = options.onListenerError;
  }

  // ---------------------------------------------------------------------------
  // Port: aggregator.applyTransition
  // ---------------------------------------------------------------------------

  /**
   * Records one committed flip and recomputes the active set.
   */
  applyTransition(transition: Transition): void {
    this.states.set(transition.source, transition.active);
    this.recompute();
  }

  /**
   * Remembers the latest reading of a source for richer display.
   */
  recordReading(source: SourceId, reading: Reading): void {
    const previous = this.readings.get(source);
    this.readings.set(source, reading);

    if (!this.active.has(source)) return;
    if (previous?.progress === reading.progress && previous?.detail === reading.detail) return;
    this.notify(this.readingListeners, (listener) => listener(source, reading));
  }

  /**
   * Drops the remembered reading of a source that was reset.
   */
  clearReading(source: SourceId): void {
    this.readings.delete(source);
  }

  /**
   * Drops everything known about a removed source.
   */
  forget(source: SourceId): void {
    this.readings.delete(source);
    const wasActive = this.states.get(source) === true;
    this.states.delete(source);
    if (wasActive) {
      this.recompute();
    }
  }

  // ---------------------------------------------------------------------------
  // Port: aggregator.subscribe
  // ---------------------------------------------------------------------------

  /**
   * Registers a listener called with the new active set on every change.
   * Returns an unsubscribe function.
   */
  subscribe(listener: ActiveSetListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Registers a listener for progress and detail changes of active
   * sources. Returns an unsubscribe function.
   */
  subscribeReadings(listener: ReadingListener): () => void {
    this.readingListeners.add(listener);
    return () => {
      this.readingListeners.delete(listener);
    };
  }

  getActiveSet(): ReadonlySet<SourceId> {
    return this.active;
  }

  getReading(source: SourceId): Reading | null {
    return this.readings.get(source) ?? null;
  }

  /** Number of recomputations performed so far */
  getRecomputationCount(): number {
    return this.recomputations;
  }

  // ---------------------------------------------------------------------------
  // Recompute & publish
  // ---------------------------------------------------------------------------

  private recompute(): void {
    this.recomputations += 1;

    const next = new Set<SourceId>();
    for (const [source, isActive] of this.states) {
      if (isActive) next.add(source);
    }

    if (sameMembers(next, this.active)) {
      return;
    }

    this.active = next;
    this.notify(this.listeners, (listener) => listener(next));
  }

  private notify<L>(listeners: ReadonlySet<L>, call: (listener: L) => void): void {
    for (const listener of [...listeners]) {
      try {
        call(listener);
      } catch (error) {
        if (this.onListenerError) {
          this.onListenerError(error);
        } else {
          console.error('ActiveSet listener error:', error);
        }
      }
    }
  }
}
