/**
 * Command Probe
 *
 * Runs a command and classifies the result either by exit code (0 means
 * active) or by scanning stdout for status text such as "Syncing" or
 * "Building".
 */

import type { Probe, Reading } from '../types';
import { runCommand } from './process';

export type CommandMatch = 'exit-code' | 'output';

export interface CommandProbeConfig {
  command: string;
  args: string[];
  match: CommandMatch;
  /** Case-insensitive substrings that mean active (output mode) */
  activePatterns: string[];
  /** Case-insensitive substrings that mean neither active nor inactive */
  neutralPatterns: string[];
}

/**
 * Classifies command output. Active patterns win over neutral ones; no
 * match is inactive.
 */
export function classifyOutput(
  output: string,
  activePatterns: readonly string[],
  neutralPatterns: readonly string[] = [],
): Reading {
  const text = output.trim();
  const haystack = text.toLowerCase();

  const active = activePatterns.find((p) => haystack.includes(p.toLowerCase()));
  if (active !== undefined) {
    return { status: 'active', detail: text };
  }

  const neutral = neutralPatterns.find((p) => haystack.includes(p.toLowerCase()));
  if (neutral !== undefined) {
    return { status: 'neutral', detail: text };
  }

  return { status: 'inactive' };
}

export function createCommandProbe(config: CommandProbeConfig): Probe {
  return async ({ signal }) => {
    const result = await runCommand(config.command, config.args, { signal });

    // Missing binary, spawn failure or abort: fail closed
    if (!result.success) {
      return { status: 'inactive', detail: result.error };
    }

    if (config.match === 'exit-code') {
      return result.exitCode === 0
        ? { status: 'active' }
        : { status: 'inactive', detail: `exit code ${String(result.exitCode)}` };
    }

    return classifyOutput(result.stdout, config.activePatterns, config.neutralPatterns);
  };
}
