/**
 * Path Resolver
 * Layer: infra
 *
 * Provided ports:
 *   - paths.stateDir
 *   - paths.statusPath
 *   - paths.diagnosticsLogPath
 *
 * Resolves where the status snapshot and the diagnostics log live.
 */

import * as os from 'os';
import * as path from 'path';
import { STATE_DIR_NAME, STATUS_FILE_NAME, DIAGNOSTICS_FILE_NAME } from './types';

// -----------------------------------------------------------------------------
// Port: paths.stateDir
// -----------------------------------------------------------------------------

/**
 * Returns the absolute path to the state directory.
 * PULSEWATCH_STATE_DIR wins; otherwise a directory under the OS temp dir.
 * Creates the path string only; does not create the directory.
 */
export function getStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env['PULSEWATCH_STATE_DIR'];
  if (override) {
    return path.resolve(override);
  }
  return path.join(os.tmpdir(), STATE_DIR_NAME);
}

// -----------------------------------------------------------------------------
// Port: paths.statusPath
// -----------------------------------------------------------------------------

/**
 * Returns the absolute path to status.json, or the configured override.
 */
export function getStatusPath(configured?: string, env: NodeJS.ProcessEnv = process.env): string {
  if (configured) {
    return path.resolve(expandHome(configured));
  }
  return path.join(getStateDir(env), STATUS_FILE_NAME);
}

/**
 * Returns the path for the atomic write temporary file
 */
export function getStatusTmpPath(statusPath: string): string {
  return `${statusPath}.tmp`;
}

// -----------------------------------------------------------------------------
// Port: paths.diagnosticsLogPath
// -----------------------------------------------------------------------------

/**
 * Returns the absolute path to diagnostics.jsonl
 */
export function getDiagnosticsLogPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getStateDir(env), DIAGNOSTICS_FILE_NAME);
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

/**
 * Expands a leading ~ to the current user's home directory.
 */
export function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2));
  return p;
}
