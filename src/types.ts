/**
 * Boundary types for pulsewatch
 *
 * These types define the contracts between the scheduler, the source
 * runners, the aggregator and the probes they drive.
 */

// -----------------------------------------------------------------------------
// SourceId
// Opaque, stable identifier of one monitored source
// -----------------------------------------------------------------------------

export type SourceId = string;

// -----------------------------------------------------------------------------
// Reading
// Normalized result of one probe invocation
// -----------------------------------------------------------------------------

/**
 * `neutral` is the hysteresis band of richer probes: the sample matched
 * neither the active nor the inactive classification.
 */
export type ReadingStatus = 'active' | 'inactive' | 'neutral';

export interface Reading {
  status: ReadingStatus;
  /** Optional progress fraction in [0, 1] for richer display */
  progress?: number;
  /** Short human-readable context (matched line, status text, metric) */
  detail?: string;
}

// -----------------------------------------------------------------------------
// Probe
// The capability every source supplies
// -----------------------------------------------------------------------------

export interface ProbeContext {
  source: SourceId;
  /** Aborted when the sample's deadline expires */
  signal: AbortSignal;
  /** Deadline in milliseconds, null when the source runs without one */
  timeoutMs: number | null;
}

/**
 * Samples current activity. Never invoked concurrently with itself for the
 * same source, provided it honors `signal`: once a deadline expires the
 * source's lane moves on, so a probe that ignores the abort can be called
 * again while its earlier call is still pending. Absence of the underlying
 * process or permission is an inactive reading, not an error.
 */
export interface Probe {
  (context: ProbeContext): Reading | Promise<Reading>;
  /** Clears probe-local memory (previous file sizes etc.) when the source resets */
  reset?: () => void;
}

/** Cheap precondition checked before the probe; false short-circuits to inactive. */
export type Precheck = (context: ProbeContext) => boolean | Promise<boolean>;

// -----------------------------------------------------------------------------
// Debounce
// -----------------------------------------------------------------------------

export interface DebounceConfig {
  /** Consecutive active readings required before committing to active (>= 1) */
  activateAfter: number;
  /** Consecutive inactive readings required before committing to inactive (>= 1) */
  deactivateAfter: number;
}

export interface DebounceState {
  consecutiveActive: number;
  consecutiveInactive: number;
  isActive: boolean;
}

export type TransitionCause = 'reading' | 'reset';

export interface Transition {
  source: SourceId;
  active: boolean;
  cause: TransitionCause;
}

// -----------------------------------------------------------------------------
// Source options
// Per-source scheduling configuration handed to the runner
// -----------------------------------------------------------------------------

export interface SourceOptions {
  debounce: DebounceConfig;
  /** Deadline per sample in milliseconds; null for cheap in-process probes */
  timeoutMs: number | null;
  /** Sample every Nth tick */
  pollEvery: number;
  /** Sample every Nth tick while the source is not active */
  idlePollEvery: number;
  precheck?: Precheck;
  /** Marks this source's diagnostic events with `debug: true` */
  debug: boolean;
}

// -----------------------------------------------------------------------------
// DiagnosticEvent
// Structured, per-source observation of the orchestration internals
// -----------------------------------------------------------------------------

export type SkipReason = 'in_flight' | 'throttled';

interface DiagnosticBase {
  /** ISO timestamp of the event */
  timestamp: string;
  source: SourceId;
  /** Set on every event of a source registered with `debug: true` */
  debug?: boolean;
}

export interface ReadingEvent extends DiagnosticBase {
  kind: 'reading';
  reading: Reading;
  /** True when the reading came from a failed precheck, not the probe */
  short_circuited: boolean;
  consecutive_active: number;
  consecutive_inactive: number;
  is_active: boolean;
}

export interface TransitionEvent extends DiagnosticBase {
  kind: 'transition';
  active: boolean;
  cause: TransitionCause;
}

export interface TimeoutEvent extends DiagnosticBase {
  kind: 'timeout';
  timeout_ms: number;
}

export interface ProbeErrorEvent extends DiagnosticBase {
  kind: 'probe_error';
  error: string;
}

export interface SkippedEvent extends DiagnosticBase {
  kind: 'skipped';
  reason: SkipReason;
}

export interface DiscardedEvent extends DiagnosticBase {
  kind: 'discarded';
  /** Generation the stale sample was dispatched under */
  generation: number;
}

export type DiagnosticEvent =
  | ReadingEvent
  | TransitionEvent
  | TimeoutEvent
  | ProbeErrorEvent
  | SkippedEvent
  | DiscardedEvent;

export type DiagnosticSink = (event: DiagnosticEvent) => void;

// -----------------------------------------------------------------------------
// Platform info
// -----------------------------------------------------------------------------

export type Platform = 'linux' | 'darwin' | 'win32' | 'unknown';

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------

export const DEFAULT_TICK_INTERVAL_MS = 1000;
export const DEFAULT_PROBE_TIMEOUT_MS = 2000;

export const STATE_DIR_NAME = 'pulsewatch';
export const STATUS_FILE_NAME = 'status.json';
export const DIAGNOSTICS_FILE_NAME = 'diagnostics.jsonl';

/** Grace period between SIGTERM and SIGKILL for a timed-out probe subprocess */
export const KILL_GRACE_MS = 500;

/** Size at which the diagnostics log is rotated to `<file>.1` */
export const MAX_DIAGNOSTICS_LOG_BYTES = 10 * 1024 * 1024;

/** Upper bound on captured probe stdout */
export const MAX_PROBE_OUTPUT_BYTES = 1024 * 1024;
