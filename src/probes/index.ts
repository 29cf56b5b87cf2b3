/**
 * Probe Factory
 *
 * Builds probes and prechecks from validated configuration.
 */

import type { Precheck, Probe } from '../types';
import type { PrecheckConfig, ProbeConfig } from '../config';
import { createCommandProbe } from './command';
import { createTerminalProbe } from './terminal';
import { createMetricProbe } from './metric';
import { createGrowingFilesProbe } from './growing-files';
import { isProcessRunning } from './process';

export function buildProbe(config: ProbeConfig): Probe {
  switch (config.type) {
    case 'command':
      return createCommandProbe(config);
    case 'terminal':
      return createTerminalProbe(config);
    case 'metric':
      return createMetricProbe(config);
    case 'growing-files':
      return createGrowingFilesProbe(config);
  }
}

export function buildPrecheck(config: PrecheckConfig | undefined): Precheck | undefined {
  if (!config) return undefined;
  return ({ signal }) => isProcessRunning(config.process, signal);
}

export { createCommandProbe, classifyOutput } from './command';
export { createTerminalProbe, parseSessions, findBusyLine } from './terminal';
export { createMetricProbe, classifyMetric, parseMetric } from './metric';
export { createGrowingFilesProbe } from './growing-files';
export { runCommand, terminateProcess, isProcessRunning } from './process';
