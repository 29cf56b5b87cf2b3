/**
 * Shared test helpers: option builders, deferred promises and fake probe
 * contexts.
 */

import type { DebounceConfig, DiagnosticEvent, ProbeContext, SourceOptions } from '../src/types';

export const FIXED_NOW = new Date('2026-01-25T12:00:00.000Z');

export function makeOptions(overrides: Partial<SourceOptions> = {}): SourceOptions {
  return {
    debounce: { activateAfter: 1, deactivateAfter: 1 },
    timeoutMs: 2000,
    pollEvery: 1,
    idlePollEvery: 1,
    debug: false,
    ...overrides,
  };
}

export function thresholds(activateAfter: number, deactivateAfter: number): DebounceConfig {
  return { activateAfter, deactivateAfter };
}

export function makeContext(overrides: Partial<ProbeContext> = {}): ProbeContext {
  return {
    source: 'test-source',
    signal: new AbortController().signal,
    timeoutMs: 2000,
    ...overrides,
  };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Collects diagnostic events and filters them by kind. */
export function eventRecorder(): {
  sink: (event: DiagnosticEvent) => void;
  events: DiagnosticEvent[];
  kinds: () => string[];
} {
  const events: DiagnosticEvent[] = [];
  return {
    sink: (event) => {
      events.push(event);
    },
    events,
    kinds: () => events.map((e) => e.kind),
  };
}
