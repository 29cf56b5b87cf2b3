/**
 * Source Definitions
 * Layer: infra
 *
 * Provided ports:
 *   - sources.build
 *   - sources.reconcile
 *
 * Turns configured sources into monitor registrations and applies the
 * difference between two configurations to a running monitor.
 */

import type { Platform, Probe, SourceId } from './types';
import type { SourceConfig } from './config';
import type { ActivityMonitor, SourceInput } from './monitor';
import { buildPrecheck, buildProbe } from './probes';
import { detect, isSourceSupported } from './platform';

export interface SourceDefaults {
  /** Deadline for sources that don't set `timeoutMs` */
  timeoutMs: number;
}

export interface SourceDefinition {
  id: SourceId;
  label: string;
  input: SourceInput;
  probe: Probe;
}

// -----------------------------------------------------------------------------
// Port: sources.build
// -----------------------------------------------------------------------------

/**
 * Builds the probe, precheck and scheduling input for one configured source.
 * `timeoutMs: null` opts out of the deadline; omitted uses the default.
 */
export function buildSourceDefinition(
  config: SourceConfig,
  defaults: SourceDefaults,
): SourceDefinition {
  const input: SourceInput = {
    debounce: { ...config.debounce },
    timeoutMs: config.timeoutMs === undefined ? defaults.timeoutMs : config.timeoutMs,
    pollEvery: config.pollEvery,
    idlePollEvery: config.idlePollEvery ?? config.pollEvery,
    debug: config.debug,
  };

  const precheck = buildPrecheck(config.precheck);
  if (precheck) {
    input.precheck = precheck;
  }

  return {
    id: config.id,
    label: config.label ?? config.id,
    input,
    probe: buildProbe(config.probe),
  };
}

// -----------------------------------------------------------------------------
// Port: sources.reconcile
// -----------------------------------------------------------------------------

export interface SkippedSource {
  id: SourceId;
  reason: string;
}

export interface ReconcileResult {
  added: SourceId[];
  removed: SourceId[];
  /** Changed definitions: removed and registered again from scratch */
  replaced: SourceId[];
  skipped: SkippedSource[];
}

/**
 * Sources that should run: enabled and supported on this platform.
 */
export function selectRunnable(
  sources: readonly SourceConfig[],
  platform: Platform = detect(),
): { runnable: SourceConfig[]; skipped: SkippedSource[] } {
  const runnable: SourceConfig[] = [];
  const skipped: SkippedSource[] = [];

  for (const source of sources) {
    if (!source.enabled) continue;
    const support = isSourceSupported(source.platforms, platform);
    if (!support.supported) {
      skipped.push({ id: source.id, reason: support.reason ?? 'unsupported platform' });
      continue;
    }
    runnable.push(source);
  }

  return { runnable, skipped };
}

/** Source list together with the defaults it was loaded with */
export interface SourceSet {
  sources: readonly SourceConfig[];
  defaults: SourceDefaults;
}

/**
 * Applies the difference between two source sets to the monitor.
 * Disabled, unsupported and deleted sources are removed (which resets
 * them); new ones are added; changed ones are removed and re-added.
 * Unchanged sources keep their debounce state.
 */
export function reconcileSources(
  monitor: ActivityMonitor,
  previous: SourceSet,
  next: SourceSet,
  platform: Platform = detect(),
): ReconcileResult {
  const before = new Map(
    selectRunnable(previous.sources, platform).runnable.map((s) => [s.id, s]),
  );
  const { runnable, skipped } = selectRunnable(next.sources, platform);
  const after = new Map(runnable.map((s) => [s.id, s]));

  const result: ReconcileResult = { added: [], removed: [], replaced: [], skipped };

  for (const id of before.keys()) {
    if (!after.has(id) && monitor.hasSource(id)) {
      monitor.removeSource(id);
      result.removed.push(id);
    }
  }

  for (const [id, source] of after) {
    const old = before.get(id);
    const registered = monitor.hasSource(id);

    if (
      registered &&
      old &&
      fingerprint(old, previous.defaults) === fingerprint(source, next.defaults)
    ) {
      continue;
    }

    const definition = buildSourceDefinition(source, next.defaults);
    if (registered) {
      monitor.removeSource(id);
      result.replaced.push(id);
    } else {
      result.added.push(id);
    }
    monitor.addSource(definition.id, definition.input, definition.probe);
  }

  return result;
}

/**
 * Serialized definition with the effective deadline, so a changed default
 * counts as a change for sources relying on it.
 */
function fingerprint(source: SourceConfig, defaults: SourceDefaults): string {
  const timeoutMs = source.timeoutMs === undefined ? defaults.timeoutMs : source.timeoutMs;
  return JSON.stringify({ ...source, timeoutMs });
}
