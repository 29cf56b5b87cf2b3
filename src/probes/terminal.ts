/**
 * Terminal Text Probe
 *
 * Runs a command that dumps terminal contents (for example an osascript
 * reading every iTerm2 session), splits the dump into sessions and looks
 * for a busy marker in the last few non-empty lines of each one.
 */

import type { Probe } from '../types';
import { runCommand } from './process';

/** Printed by the dump command when the terminal application is not running */
export const NOT_RUNNING_MARKER = 'NOT_RUNNING';

export interface TerminalProbeConfig {
  command: string;
  args: string[];
  sessionSeparator: string;
  /** Non-empty lines kept from the end of each session */
  lineCount: number;
  /** Regular expressions; any match marks the source busy */
  activePatterns: string[];
  /** Regular expressions; a matching line is ignored */
  excludePatterns: string[];
}

export interface TerminalSession {
  content: string;
  lastLines: string[];
}

/**
 * Splits a terminal dump into sessions and keeps the last `lineCount`
 * trimmed, non-empty lines of each.
 */
export function parseSessions(
  output: string,
  separator: string,
  lineCount: number,
): TerminalSession[] {
  return output
    .split(separator)
    .filter((content) => content.trim().length > 0)
    .map((content) => ({
      content,
      lastLines: content
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0)
        .slice(-lineCount),
    }));
}

/**
 * Returns the first line matching an active pattern and no exclude pattern.
 */
export function findBusyLine(
  sessions: readonly TerminalSession[],
  activePatterns: readonly RegExp[],
  excludePatterns: readonly RegExp[] = [],
): string | null {
  for (const session of sessions) {
    for (const line of session.lastLines) {
      if (excludePatterns.some((re) => re.test(line))) continue;
      if (activePatterns.some((re) => re.test(line))) return line;
    }
  }
  return null;
}

export function createTerminalProbe(config: TerminalProbeConfig): Probe {
  const active = config.activePatterns.map((p) => new RegExp(p, 'u'));
  const exclude = config.excludePatterns.map((p) => new RegExp(p, 'u'));

  return async ({ signal }) => {
    const result = await runCommand(config.command, config.args, { signal });
    if (!result.success) {
      return { status: 'inactive', detail: result.error };
    }

    const output = result.stdout.trim();
    if (output === '' || output === NOT_RUNNING_MARKER) {
      return { status: 'inactive', detail: 'terminal not running' };
    }

    const sessions = parseSessions(output, config.sessionSeparator, config.lineCount);
    const line = findBusyLine(sessions, active, exclude);
    if (line === null) {
      return { status: 'inactive' };
    }
    return { status: 'active', detail: line.slice(0, 100) };
  };
}
