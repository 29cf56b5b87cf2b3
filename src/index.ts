/**
 * pulsewatch
 *
 * Polling and debounce orchestration for activity indicators: probes are
 * sampled on a fixed tick, each source debounces its own readings and the
 * aggregator publishes the set of currently active sources.
 */

export type {
  DebounceConfig,
  DebounceState,
  DiagnosticEvent,
  DiagnosticSink,
  Precheck,
  Probe,
  ProbeContext,
  Reading,
  ReadingStatus,
  SourceId,
  SourceOptions,
  Transition,
} from './types';
export { DEFAULT_PROBE_TIMEOUT_MS, DEFAULT_TICK_INTERVAL_MS } from './types';
export { MonitorUsageError } from './errors';
export type { MonitorUsageErrorCode } from './errors';
export { createDebounceState, updateDebounce, resetDebounce } from './debounce';
export { SourceRunner, normalizeReading, runWithDeadline } from './runner';
export type { PollDisposition } from './runner';
export { Scheduler } from './scheduler';
export { Aggregator, sameMembers } from './aggregator';
export type { ActiveSetListener, ReadingListener } from './aggregator';
export { ActivityMonitor, combineSinks, resolveSourceOptions } from './monitor';
export type { MonitorOptions, SourceInput } from './monitor';
export { parseConfig, loadConfig, resolveConfigPath } from './config';
export type { MonitorConfig, SourceConfig, ProbeConfig } from './config';
export { buildSourceDefinition, reconcileSources } from './sources';
export { buildProbe, buildPrecheck, runCommand, isProcessRunning } from './probes';
export { buildStatusSnapshot, writeStatusSnapshot, readStatusSnapshot } from './status';
export type { StatusSnapshot, StatusEntry } from './status';
export { renderStatusLine } from './output';
export { createLogger, createLoggerSink } from './logger';
export { createFileSink, readDiagnosticLog } from './diagnostic-log';
export { main } from './main';
