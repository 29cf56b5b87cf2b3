/**
 * Logger
 * Layer: infra
 *
 * Provided ports:
 *   - logger.create
 *   - logger.sink
 *
 * pino logger for the CLI, plus a diagnostic sink that maps orchestration
 * events onto log levels: transitions at info, timeouts and probe errors
 * at warn, raw readings and dropped ticks at debug (info for events marked
 * `debug`).
 */

import pino from 'pino';
import type { DestinationStream, Logger } from 'pino';
import type { DiagnosticEvent, DiagnosticSink, SourceId } from './types';

export type { Logger };

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

// -----------------------------------------------------------------------------
// Port: logger.create
// -----------------------------------------------------------------------------

/**
 * Creates the root logger.
 *
 * @param level - Minimum level to emit
 * @param destination - Output stream; stderr when omitted so stdout stays
 *   reserved for the status line
 */
export function createLogger(level: LogLevel = 'info', destination?: DestinationStream): Logger {
  return pino(
    { name: 'pulsewatch', level },
    destination ?? pino.destination({ dest: 2, sync: true }),
  );
}

// -----------------------------------------------------------------------------
// Port: logger.sink
// -----------------------------------------------------------------------------

/**
 * Maps diagnostic events to log lines under a `source` child binding.
 * Readings and skipped ticks of events marked `debug` are raised to info.
 */
export function createLoggerSink(logger: Logger): DiagnosticSink {
  const children = new Map<SourceId, Logger>();

  const forSource = (source: SourceId): Logger => {
    let child = children.get(source);
    if (!child) {
      child = logger.child({ source });
      children.set(source, child);
    }
    return child;
  };

  return (event: DiagnosticEvent) => {
    const log = forSource(event.source);
    const verbose = event.debug === true;

    switch (event.kind) {
      case 'transition':
        log.info(
          { active: event.active, cause: event.cause },
          event.active ? 'source became active' : 'source became inactive',
        );
        break;
      case 'timeout':
        log.warn({ timeout_ms: event.timeout_ms }, 'probe timed out');
        break;
      case 'probe_error':
        log.warn({ error: event.error }, 'probe failed');
        break;
      case 'reading': {
        const fields = {
          status: event.reading.status,
          detail: event.reading.detail,
          progress: event.reading.progress,
          short_circuited: event.short_circuited,
          consecutive_active: event.consecutive_active,
          consecutive_inactive: event.consecutive_inactive,
          is_active: event.is_active,
        };
        if (verbose) log.info(fields, 'reading');
        else log.debug(fields, 'reading');
        break;
      }
      case 'skipped':
        if (verbose) log.info({ reason: event.reason }, 'poll skipped');
        else log.debug({ reason: event.reason }, 'poll skipped');
        break;
      case 'discarded':
        log.debug({ generation: event.generation }, 'stale sample discarded');
        break;
    }
  };
}
