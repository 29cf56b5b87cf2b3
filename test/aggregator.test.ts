/**
 * Aggregator Tests
 *
 * Exit criteria:
 *   - Listeners see the active set only when its membership changes
 *   - A throwing listener never reaches the sources or other listeners
 */

import { describe, it, expect, vi } from 'vitest';
import { Aggregator, sameMembers } from '../src/aggregator';
import type { SourceId } from '../src/types';

function recordSets(aggregator: Aggregator): SourceId[][] {
  const published: SourceId[][] = [];
  aggregator.subscribe((active) => {
    published.push([...active].sort());
  });
  return published;
}

describe('Aggregator', () => {
  it('publishes the union of active sources', (): void => {
    const aggregator = new Aggregator();
    const published = recordSets(aggregator);

    aggregator.applyTransition({ source: 'xcode', active: true, cause: 'reading' });
    aggregator.applyTransition({ source: 'downloads', active: true, cause: 'reading' });
    aggregator.applyTransition({ source: 'xcode', active: false, cause: 'reading' });

    expect(published).toEqual([['xcode'], ['downloads', 'xcode'], ['downloads']]);
    expect([...aggregator.getActiveSet()]).toEqual(['downloads']);
  });

  it('recomputes without publishing when membership is unchanged', (): void => {
    const aggregator = new Aggregator();
    const published = recordSets(aggregator);

    aggregator.applyTransition({ source: 'a', active: false, cause: 'reset' });
    aggregator.applyTransition({ source: 'a', active: true, cause: 'reading' });
    aggregator.applyTransition({ source: 'a', active: true, cause: 'reading' });

    expect(aggregator.getRecomputationCount()).toBe(3);
    expect(published).toEqual([['a']]);
  });

  it('forgets a removed active source and publishes the change', (): void => {
    const aggregator = new Aggregator();
    aggregator.applyTransition({ source: 'a', active: true, cause: 'reading' });
    aggregator.recordReading('a', { status: 'active', detail: 'Syncing' });
    const published = recordSets(aggregator);

    aggregator.forget('a');

    expect(published).toEqual([[]]);
    expect(aggregator.getReading('a')).toBeNull();
  });

  it('does not recompute when forgetting an inactive source', (): void => {
    const aggregator = new Aggregator();
    aggregator.applyTransition({ source: 'a', active: false, cause: 'reading' });

    aggregator.forget('a');

    expect(aggregator.getRecomputationCount()).toBe(1);
  });

  it('returns the last recorded reading', (): void => {
    const aggregator = new Aggregator();

    aggregator.recordReading('a', { status: 'active', progress: 0.5 });
    aggregator.recordReading('a', { status: 'neutral' });

    expect(aggregator.getReading('a')).toEqual({ status: 'neutral' });
    expect(aggregator.getReading('b')).toBeNull();
  });

  it('routes listener errors to onListenerError and keeps notifying', (): void => {
    const onListenerError = vi.fn();
    const aggregator = new Aggregator({ onListenerError });
    const failure = new Error('renderer crashed');
    aggregator.subscribe(() => {
      throw failure;
    });
    const published = recordSets(aggregator);

    aggregator.applyTransition({ source: 'a', active: true, cause: 'reading' });

    expect(onListenerError).toHaveBeenCalledWith(failure);
    expect(published).toEqual([['a']]);
  });

  it('stops notifying after unsubscribe', (): void => {
    const aggregator = new Aggregator();
    const listener = vi.fn();
    const unsubscribe = aggregator.subscribe(listener);

    unsubscribe();
    aggregator.applyTransition({ source: 'a', active: true, cause: 'reading' });

    expect(listener).not.toHaveBeenCalled();
  });
});

describe('Aggregator.subscribeReadings', () => {
  function recordReadings(aggregator: Aggregator): string[] {
    const published: string[] = [];
    aggregator.subscribeReadings((source, reading) => {
      published.push(`${source}@${String(reading.progress)}`);
    });
    return published;
  }

  it('publishes progress changes of an active source', (): void => {
    const aggregator = new Aggregator();
    aggregator.recordReading('render', { status: 'active', progress: 0.1 });
    aggregator.applyTransition({ source: 'render', active: true, cause: 'reading' });
    const published = recordReadings(aggregator);

    aggregator.recordReading('render', { status: 'active', progress: 0.1 });
    aggregator.recordReading('render', { status: 'active', progress: 0.9 });

    expect(published).toEqual(['render@0.9']);
  });

  it('publishes detail changes of an active source', (): void => {
    const aggregator = new Aggregator();
    aggregator.applyTransition({ source: 'sync', active: true, cause: 'reading' });
    const details: (string | undefined)[] = [];
    aggregator.subscribeReadings((_source, reading) => {
      details.push(reading.detail);
    });

    aggregator.recordReading('sync', { status: 'active', detail: 'Syncing 3 files' });
    aggregator.recordReading('sync', { status: 'active', detail: 'Syncing 1 file' });

    expect(details).toEqual(['Syncing 3 files', 'Syncing 1 file']);
  });

  it('stays quiet for inactive sources', (): void => {
    const aggregator = new Aggregator();
    const published = recordReadings(aggregator);

    aggregator.recordReading('render', { status: 'active', progress: 0.1 });
    aggregator.recordReading('render', { status: 'active', progress: 0.5 });

    expect(published).toEqual([]);
  });

  it('clearReading drops the remembered reading', (): void => {
    const aggregator = new Aggregator();
    aggregator.recordReading('render', { status: 'active', progress: 0.4 });

    aggregator.clearReading('render');

    expect(aggregator.getReading('render')).toBeNull();
  });
});

describe('sameMembers', () => {
  it('compares membership regardless of insertion order', (): void => {
    expect(sameMembers(new Set(['a', 'b']), new Set(['b', 'a']))).toBe(true);
    expect(sameMembers(new Set(['a']), new Set(['a', 'b']))).toBe(false);
    expect(sameMembers(new Set(['a', 'c']), new Set(['a', 'b']))).toBe(false);
    expect(sameMembers(new Set<string>(), new Set<string>())).toBe(true);
  });
});
