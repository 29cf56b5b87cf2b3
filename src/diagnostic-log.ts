/**
 * Diagnostic Log
 * Layer: infra
 *
 * Provided ports:
 *   - diagnosticLog.append
 *   - diagnosticLog.read
 *   - diagnosticLog.sink
 *
 * Append-only JSONL log of diagnostic events (readings, transitions,
 * timeouts, probe errors, dropped ticks). Each line is a self-contained
 * JSON object (DiagnosticEvent). Helps tell "legitimately idle" apart from
 * "probe is stuck" after the fact.
 *
 * Every tick adds a line per source, so the file sink rotates the log to
 * `<file>.1` once it reaches its size cap; at most two files exist.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { DiagnosticEvent, DiagnosticSink } from './types';
import { MAX_DIAGNOSTICS_LOG_BYTES } from './types';
import { getDiagnosticsLogPath } from './paths';
import { isARealObject } from './utils';

// -----------------------------------------------------------------------------
// Port: diagnosticLog.append
// -----------------------------------------------------------------------------

/**
 * Appends a single event as a JSON line. Creates the file if it does not
 * exist. Returns false when the write failed.
 *
 * Best-effort: swallows write errors so polling is never disrupted by
 * diagnostic logging failures.
 */
export function appendDiagnosticEvent(
  event: DiagnosticEvent,
  logPath: string = getDiagnosticsLogPath(),
): boolean {
  try {
    fs.appendFileSync(logPath, formatLine(event), 'utf-8');
    return true;
  } catch {
    // Diagnostic-only, must not disrupt polling
    return false;
  }
}

function formatLine(event: DiagnosticEvent): string {
  return JSON.stringify(event) + '\n';
}

/**
 * Returns the path the log is moved to on rotation.
 */
export function getRotatedLogPath(logPath: string): string {
  return `${logPath}.1`;
}

function fileSize(logPath: string): number {
  try {
    return fs.statSync(logPath).size;
  } catch {
    return 0;
  }
}

function rotate(logPath: string): void {
  try {
    fs.renameSync(logPath, getRotatedLogPath(logPath));
  } catch {
    // Keep appending to the current file
  }
}

// -----------------------------------------------------------------------------
// Port: diagnosticLog.sink
// -----------------------------------------------------------------------------

/**
 * Creates a sink writing every event to the JSONL log.
 * The parent directory is created up front.
 *
 * @param maxBytes - The log is rotated before a line would take it past
 *   this size
 */
export function createFileSink(
  logPath: string = getDiagnosticsLogPath(),
  maxBytes: number = MAX_DIAGNOSTICS_LOG_BYTES,
): DiagnosticSink {
  fs.mkdirSync(path.dirname(logPath), { recursive: true });
  let size = fileSize(logPath);

  return (event) => {
    const bytes = Buffer.byteLength(formatLine(event));
    if (size > 0 && size + bytes > maxBytes) {
      rotate(logPath);
      size = fileSize(logPath);
    }
    if (appendDiagnosticEvent(event, logPath)) {
      size += bytes;
    }
  };
}

// -----------------------------------------------------------------------------
// Port: diagnosticLog.read
// -----------------------------------------------------------------------------

/**
 * Reads all events from the JSONL file.
 * Returns an empty array if the file does not exist or is unreadable.
 */
export function readDiagnosticLog(logPath: string = getDiagnosticsLogPath()): DiagnosticEvent[] {
  try {
    if (!fs.existsSync(logPath)) return [];
    const content = fs.readFileSync(logPath, 'utf-8');
    return content
      .split('\n')
      .filter(Boolean)
      .map((line): unknown => JSON.parse(line))
      .filter(isDiagnosticEvent);
  } catch {
    return [];
  }
}

const EVENT_KINDS: ReadonlySet<string> = new Set([
  'reading',
  'transition',
  'timeout',
  'probe_error',
  'skipped',
  'discarded',
]);

function isDiagnosticEvent(value: unknown): value is DiagnosticEvent {
  return (
    isARealObject(value) &&
    typeof value['timestamp'] === 'string' &&
    typeof value['source'] === 'string' &&
    typeof value['kind'] === 'string' &&
    EVENT_KINDS.has(value['kind'])
  );
}
