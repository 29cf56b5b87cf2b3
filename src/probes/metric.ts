/**
 * Metric Probe
 *
 * Runs a command printing a number (CPU percentage, queue depth, bytes
 * pending) and classifies it with two thresholds. Values strictly between
 * them form a hysteresis band and read as neutral.
 */

import type { Probe, Reading } from '../types';
import { runCommand } from './process';

export interface MetricProbeConfig {
  command: string;
  args: string[];
  /** Values >= this are active */
  activateAbove: number;
  /** Values <= this are inactive */
  deactivateBelow: number;
  /** If set, progress = value / progressScale, clamped to [0, 1] */
  progressScale?: number;
}

/**
 * Parses the first whitespace-separated token of the output as a number.
 */
export function parseMetric(output: string): number | null {
  const token = output.trim().split(/\s+/)[0];
  if (!token) return null;
  const value = Number.parseFloat(token);
  return Number.isFinite(value) ? value : null;
}

export function classifyMetric(value: number, config: MetricProbeConfig): Reading {
  const detail = `value=${value}`;
  const reading: Reading =
    value >= config.activateAbove
      ? { status: 'active', detail }
      : value <= config.deactivateBelow
        ? { status: 'inactive', detail }
        : { status: 'neutral', detail };

  if (config.progressScale !== undefined) {
    reading.progress = Math.min(1, Math.max(0, value / config.progressScale));
  }
  return reading;
}

export function createMetricProbe(config: MetricProbeConfig): Probe {
  return async ({ signal }) => {
    const result = await runCommand(config.command, config.args, { signal });
    if (!result.success) {
      return { status: 'inactive', detail: result.error };
    }

    const value = parseMetric(result.stdout);
    if (value === null) {
      return { status: 'inactive', detail: 'unparseable metric' };
    }
    return classifyMetric(value, config);
  };
}
