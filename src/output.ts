/**
 * Output Renderer
 * Layer: infra
 *
 * Provided ports:
 *   - output.renderStatusLine
 *   - output.renderSourceSummary
 *
 * Console text for the CLI: one status line per ActiveSet change and a
 * startup summary of the registered sources.
 */

import type { StatusEntry, StatusSnapshot } from './status';

// -----------------------------------------------------------------------------
// Port: output.renderStatusLine
// -----------------------------------------------------------------------------

/**
 * Renders one console line, e.g. `Active: Xcode (42%), Dropbox`.
 */
export function renderStatusLine(snapshot: StatusSnapshot): string {
  if (snapshot.active.length === 0) {
    return 'Idle';
  }
  return `Active: ${snapshot.active.map(formatEntry).join(', ')}`;
}

function formatEntry(entry: StatusEntry): string {
  if (entry.progress === null) {
    return entry.label;
  }
  return `${entry.label} (${formatProgress(entry.progress)})`;
}

/**
 * Formats a [0, 1] fraction as a whole percentage.
 */
export function formatProgress(fraction: number): string {
  const clamped = Math.min(1, Math.max(0, fraction));
  return `${Math.round(clamped * 100)}%`;
}

// -----------------------------------------------------------------------------
// Port: output.renderSourceSummary
// -----------------------------------------------------------------------------

export interface SourceSummaryRow {
  id: string;
  label: string;
  activateAfter: number;
  deactivateAfter: number;
  timeoutMs: number | null;
  idlePollEvery: number;
}

/**
 * Renders the startup summary of registered sources.
 */
export function renderSourceSummary(
  rows: readonly SourceSummaryRow[],
  skipped: readonly string[],
): string {
  const lines: string[] = [];
  lines.push(`Monitoring ${rows.length} source${rows.length === 1 ? '' : 's'}:`);

  for (const row of rows) {
    const deadline = row.timeoutMs === null ? 'no deadline' : `${row.timeoutMs}ms deadline`;
    const pace = row.idlePollEvery > 1 ? `, idle every ${row.idlePollEvery} ticks` : '';
    const thresholds = `show ${row.activateAfter} / hide ${row.deactivateAfter}`;
    lines.push(`  ${row.label} [${row.id}] ${thresholds}, ${deadline}${pace}`);
  }

  for (const reason of skipped) {
    lines.push(`  skipped: ${reason}`);
  }

  return lines.join('\n');
}
