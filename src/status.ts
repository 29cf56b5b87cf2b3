/**
 * Status Snapshot
 * Layer: infra
 *
 * Provided ports:
 *   - status.build
 *   - status.write
 *   - status.read
 *
 * Publishes the current ActiveSet to a JSON file an external renderer can
 * poll. Only the latest snapshot is kept; there is no history.
 * Uses atomic rename for safe writes.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Reading, SourceId } from './types';
import { getStatusPath, getStatusTmpPath } from './paths';
import { isARealObject, isStringOrNull } from './utils';

// -----------------------------------------------------------------------------
// StatusSnapshot
// -----------------------------------------------------------------------------

export interface StatusEntry {
  id: SourceId;
  label: string;
  /** Progress fraction from the last reading, null if the probe reports none */
  progress: number | null;
  detail: string | null;
}

export interface StatusSnapshot {
  /** ISO timestamp of the ActiveSet change */
  updated_at_ts: string;
  /** Active sources in configured order */
  active: StatusEntry[];
}

export interface SourceLabel {
  id: SourceId;
  label: string;
}

// -----------------------------------------------------------------------------
// Port: status.build
// -----------------------------------------------------------------------------

/**
 * Builds a snapshot from the active set. Ordering follows `sources`, since
 * the set itself carries none.
 *
 * @param active - Current ActiveSet
 * @param sources - Known sources in display order
 * @param getReading - Last reading lookup for progress/detail
 */
export function buildStatusSnapshot(
  active: ReadonlySet<SourceId>,
  sources: readonly SourceLabel[],
  getReading: (id: SourceId) => Reading | null,
  now: Date = new Date(),
): StatusSnapshot {
  const entries: StatusEntry[] = [];
  const seen = new Set<SourceId>();

  for (const source of sources) {
    if (!active.has(source.id)) continue;
    seen.add(source.id);
    entries.push(toEntry(source.id, source.label, getReading(source.id)));
  }

  // Active ids without a configured label still show up, after the known ones
  for (const id of active) {
    if (!seen.has(id)) {
      entries.push(toEntry(id, id, getReading(id)));
    }
  }

  return { updated_at_ts: now.toISOString(), active: entries };
}

function toEntry(id: SourceId, label: string, reading: Reading | null): StatusEntry {
  return {
    id,
    label,
    progress: reading?.progress ?? null,
    detail: reading?.detail ?? null,
  };
}

// -----------------------------------------------------------------------------
// Port: status.write
// -----------------------------------------------------------------------------

export interface WriteStatusResult {
  success: true;
  path: string;
}

export interface WriteStatusError {
  success: false;
  error: string;
}

export type WriteStatusOutcome = WriteStatusResult | WriteStatusError;

/**
 * Writes the snapshot atomically.
 * Creates the parent directory if it doesn't exist.
 * Cleans up the temp file on failure.
 */
export function writeStatusSnapshot(
  snapshot: StatusSnapshot,
  statusPath: string = getStatusPath(),
): WriteStatusOutcome {
  const tmpPath = getStatusTmpPath(statusPath);

  try {
    fs.mkdirSync(path.dirname(statusPath), { recursive: true });
    fs.writeFileSync(tmpPath, JSON.stringify(snapshot, null, 2), 'utf-8');
    fs.renameSync(tmpPath, statusPath);
    return { success: true, path: statusPath };
  } catch (err) {
    try {
      fs.unlinkSync(tmpPath);
    } catch {
      // Temp file may never have been created
    }
    const error = err as Error;
    return {
      success: false,
      error: `Failed to write status: ${error.message}`,
    };
  }
}

// -----------------------------------------------------------------------------
// Port: status.read
// -----------------------------------------------------------------------------

export interface ReadStatusResult {
  success: true;
  snapshot: StatusSnapshot;
}

export interface ReadStatusError {
  success: false;
  error: string;
  /** True if the file doesn't exist (no change published yet) */
  notFound: boolean;
}

export type ReadStatusOutcome = ReadStatusResult | ReadStatusError;

/**
 * Reads and validates a snapshot from disk.
 */
export function readStatusSnapshot(statusPath: string = getStatusPath()): ReadStatusOutcome {
  try {
    const content = fs.readFileSync(statusPath, 'utf-8');
    const parsed = JSON.parse(content) as unknown;

    if (!isValidStatusSnapshot(parsed)) {
      return { success: false, error: 'Invalid status structure', notFound: false };
    }
    return { success: true, snapshot: parsed };
  } catch (err) {
    const error = err as NodeJS.ErrnoException;
    if (error.code === 'ENOENT') {
      return { success: false, error: 'Status file not found', notFound: true };
    }
    return {
      success: false,
      error: `Failed to read status: ${error.message}`,
      notFound: false,
    };
  }
}

// -----------------------------------------------------------------------------
// Validation
// -----------------------------------------------------------------------------

/**
 * Validates that parsed JSON has the StatusSnapshot shape.
 */
export function isValidStatusSnapshot(value: unknown): value is StatusSnapshot {
  if (!isARealObject(value)) {
    return false;
  }
  if (typeof value['updated_at_ts'] !== 'string') {
    return false;
  }
  const active = value['active'];
  if (!Array.isArray(active)) {
    return false;
  }
  return active.every(isValidStatusEntry);
}

function isValidStatusEntry(value: unknown): value is StatusEntry {
  if (!isARealObject(value)) {
    return false;
  }
  const progress = value['progress'];
  return (
    typeof value['id'] === 'string' &&
    typeof value['label'] === 'string' &&
    (progress === null || typeof progress === 'number') &&
    isStringOrNull(value['detail'])
  );
}
