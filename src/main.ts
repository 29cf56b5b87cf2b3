/**
 * Main Entry
 * Layer: app
 *
 * CLI entry point: loads the configuration, registers the sources, starts
 * the ticker and publishes every ActiveSet change.
 *
 * Required ports:
 *   - config.load
 *   - sources.reconcile
 *   - status.write
 *   - output.renderStatusLine
 */

import type { DiagnosticSink, Platform, SourceId } from './types';
import type { MonitorConfig } from './config';
import { loadConfig as loadConfigImpl, resolveConfigPath } from './config';
import { ActivityMonitor, combineSinks } from './monitor';
import { reconcileSources, selectRunnable } from './sources';
import type { ReconcileResult, SourceSet } from './sources';
import { buildStatusSnapshot, writeStatusSnapshot } from './status';
import type { SourceLabel, StatusSnapshot } from './status';
import { renderSourceSummary, renderStatusLine } from './output';
import type { SourceSummaryRow } from './output';
import { createLogger, createLoggerSink, isLogLevel } from './logger';
import type { Logger } from './logger';
import { createFileSink } from './diagnostic-log';
import { getDiagnosticsLogPath, getStatusPath } from './paths';
import { detect } from './platform';
import { errorMessage } from './utils';

// -----------------------------------------------------------------------------
// Signal handlers
// -----------------------------------------------------------------------------

/**
 * Creates a SIGINT/SIGTERM handler that stops the monitor, waits for
 * outstanding samples and exits. Repeated signals are ignored.
 *
 * @param stop - Stops ticking and drains the monitor
 * @param exitFn - Process exit function
 */
export function createShutdownHandler(
  stop: () => Promise<void>,
  logger: Logger,
  exitFn: (code: number) => void,
): () => void {
  let stopping = false;
  return () => {
    if (stopping) return;
    stopping = true;
    logger.info('Stopping monitor...');
    void stop().then(
      () => {
        logger.info('Monitor stopped');
        exitFn(0);
      },
      (error: unknown) => {
        logger.error({ error: errorMessage(error) }, 'Monitor failed to stop cleanly');
        exitFn(1);
      },
    );
  };
}

/**
 * Creates a SIGHUP handler. A reload that throws is logged and the
 * current sources keep running.
 */
export function createReloadHandler(reload: () => void, logger: Logger): () => void {
  return () => {
    try {
      reload();
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Configuration reload failed');
    }
  };
}

// -----------------------------------------------------------------------------
// Dependencies
// -----------------------------------------------------------------------------

/**
 * Dependency injection interface for main.
 * Production defaults are used when not provided by tests.
 */
export interface MainDeps {
  registerSignal: (event: NodeJS.Signals, handler: () => void) => void;
  exit: (code: number) => void;
  loadConfig: typeof loadConfigImpl;
  writeStatus: typeof writeStatusSnapshot;
  /** Receives the startup summary and one status line per change */
  print: (text: string) => void;
  createLogger: (config: MonitorConfig) => Logger;
  platform: Platform;
  now: () => Date;
}

const defaultDeps: MainDeps = {
  registerSignal: (event, handler) => {
    process.on(event, handler);
  },
  exit: (code) => {
    process.exit(code);
  },
  loadConfig: loadConfigImpl,
  writeStatus: writeStatusSnapshot,
  print: (text) => {
    process.stdout.write(`${text}\n`);
  },
  createLogger: (config) => createLogger(config.logLevel),
  platform: detect(),
  now: () => new Date(),
};

export interface RunningMonitor {
  monitor: ActivityMonitor;
  logger: Logger;
  /** Re-reads the config file and reconciles the registered sources */
  reload: () => void;
  /** Same as receiving SIGTERM */
  shutdown: () => void;
}

// -----------------------------------------------------------------------------
// Entry point
// -----------------------------------------------------------------------------

/**
 * Starts the monitor. Returns null (after exit(1)) when the configuration
 * cannot be loaded.
 *
 * Startup sequence:
 *   1. Resolve and load the config file
 *   2. Register every enabled source supported on this platform
 *   3. Publish the status line and status file on ActiveSet changes and
 *      on progress changes of active sources; write an idle status file
 *   4. Register SIGINT/SIGTERM (stop, then idle status file) and SIGHUP
 *      (reload), start ticking
 */
export function main(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<MainDeps> = {},
): RunningMonitor | null {
  const deps: MainDeps = { ...defaultDeps, ...overrides };
  const configPath = resolveConfigPath(argv, env);

  const loaded = deps.loadConfig(configPath, env);
  if (!loaded.success) {
    const level = env['PULSEWATCH_LOG_LEVEL'];
    const fallback = createLogger(level && isLogLevel(level) ? level : 'info');
    fallback.error({ path: configPath }, loaded.error);
    deps.exit(1);
    return null;
  }

  let config = loaded.config;
  const logger = deps.createLogger(config);
  logger.info({ path: configPath }, 'Starting monitor...');

  // Replaced on reload
  let labels: SourceLabel[] = [];

  const sinks: DiagnosticSink[] = [createLoggerSink(logger)];
  if (config.diagnostics) {
    const logPath = getDiagnosticsLogPath(env);
    sinks.push(createFileSink(logPath));
    logger.info({ path: logPath }, 'Diagnostics log enabled');
  }

  const monitor = new ActivityMonitor({
    tickIntervalMs: config.tickIntervalMs,
    diagnostics: combineSinks(...sinks),
    onListenerError: (error) => {
      logger.error({ error: errorMessage(error) }, 'ActiveSet listener failed');
    },
    now: deps.now,
  });

  const writeSnapshot = (snapshot: StatusSnapshot): void => {
    const written = deps.writeStatus(snapshot, getStatusPath(config.statusFile, env));
    if (!written.success) {
      logger.warn(written.error);
    }
  };

  const snapshotOf = (active: ReadonlySet<SourceId>): StatusSnapshot =>
    buildStatusSnapshot(active, labels, (id) => monitor.getReading(id), deps.now());

  const publish = (active: ReadonlySet<SourceId>): void => {
    const snapshot = snapshotOf(active);
    deps.print(renderStatusLine(snapshot));
    writeSnapshot(snapshot);
  };

  monitor.subscribe(publish);
  monitor.subscribeReadings(() => {
    publish(monitor.getActiveSet());
  });

  const applySources = (next: MonitorConfig, previous: SourceSet): ReconcileResult => {
    const nextSet = toSourceSet(next);
    const result = reconcileSources(monitor, previous, nextSet, deps.platform);
    for (const skipped of result.skipped) {
      logger.warn({ source: skipped.id }, `Source skipped: ${skipped.reason}`);
    }

    const runnable = selectRunnable(next.sources, deps.platform).runnable;
    labels = runnable.map((s) => ({ id: s.id, label: s.label ?? s.id }));
    return result;
  };

  applySources(config, { sources: [], defaults: { timeoutMs: config.defaultTimeoutMs } });
  deps.print(
    renderSourceSummary(summaryRows(config, deps.platform), skippedLines(config, deps.platform)),
  );

  // Replaces whatever an earlier run left behind
  writeSnapshot(snapshotOf(monitor.getActiveSet()));

  const reload = (): void => {
    const next = deps.loadConfig(configPath, env);
    if (!next.success) {
      logger.warn(next.error);
      logger.warn('Keeping current sources');
      return;
    }

    for (const field of ['tickIntervalMs', 'diagnostics', 'logLevel'] as const) {
      if (next.config[field] !== config[field]) {
        logger.warn({ field }, 'Setting changes take effect after a restart');
      }
    }

    // Restart-only settings keep their running values
    const previous = config;
    config = {
      ...next.config,
      tickIntervalMs: previous.tickIntervalMs,
      diagnostics: previous.diagnostics,
      logLevel: previous.logLevel,
    };

    const result = applySources(config, toSourceSet(previous));
    logger.info(
      { added: result.added, removed: result.removed, replaced: result.replaced },
      'Configuration reloaded',
    );
  };

  const stop = async (): Promise<void> => {
    await monitor.stop();
    writeSnapshot(snapshotOf(new Set()));
  };

  const shutdown = createShutdownHandler(stop, logger, deps.exit);
  deps.registerSignal('SIGINT', shutdown);
  deps.registerSignal('SIGTERM', shutdown);
  deps.registerSignal('SIGHUP', createReloadHandler(reload, logger));

  monitor.start();
  logger.info({ sources: monitor.sourceIds() }, 'Monitor started');

  return { monitor, logger, reload, shutdown };
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

function toSourceSet(config: MonitorConfig): SourceSet {
  return { sources: config.sources, defaults: { timeoutMs: config.defaultTimeoutMs } };
}

function summaryRows(config: MonitorConfig, platform: Platform): SourceSummaryRow[] {
  return selectRunnable(config.sources, platform).runnable.map((source) => ({
    id: source.id,
    label: source.label ?? source.id,
    activateAfter: source.debounce.activateAfter,
    deactivateAfter: source.debounce.deactivateAfter,
    timeoutMs: source.timeoutMs === undefined ? config.defaultTimeoutMs : source.timeoutMs,
    idlePollEvery: source.idlePollEvery ?? source.pollEvery,
  }));
}

function skippedLines(config: MonitorConfig, platform: Platform): string[] {
  return selectRunnable(config.sources, platform).skipped.map(
    (skipped) => `${skipped.id}: ${skipped.reason}`,
  );
}
