/**
 * Probe Subprocess Execution
 *
 * Runs probe commands as child processes and terminates them when the
 * sample's deadline fires: SIGTERM first, SIGKILL if the child is still
 * alive after a grace period.
 */

import { spawn } from 'child_process';
import { KILL_GRACE_MS, MAX_PROBE_OUTPUT_BYTES } from '../types';

// -----------------------------------------------------------------------------
// Child process surface
// Narrow view of ChildProcess used here, so tests can supply a fake
// -----------------------------------------------------------------------------

export interface KillableProcess {
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'exit', listener: () => void): unknown;
}

export interface ProbeChild extends KillableProcess {
  readonly stdout: { on(event: 'data', listener: (chunk: Buffer) => void): unknown } | null;
  on(event: 'error', listener: (err: NodeJS.ErrnoException) => void): unknown;
  on(event: 'close', listener: (code: number | null) => void): unknown;
}

export type SpawnFn = (command: string, args: string[]) => ProbeChild;

const spawnIgnoringStderr: SpawnFn = (command, args) =>
  spawn(command, args, { stdio: ['ignore', 'pipe', 'ignore'] });

// -----------------------------------------------------------------------------
// Port: process.terminate
// -----------------------------------------------------------------------------

export interface KillResult {
  success: true;
}

export interface KillError {
  success: false;
  error: string;
  /** True if the process had already exited */
  notFound: boolean;
}

export type KillOutcome = KillResult | KillError;

function hasExited(child: KillableProcess): boolean {
  return child.exitCode !== null || child.signalCode !== null;
}

/**
 * Sends SIGTERM and schedules SIGKILL escalation if the child ignores it.
 *
 * @param child - Process to stop
 * @param graceMs - Delay before SIGKILL
 */
export function terminateProcess(
  child: KillableProcess,
  graceMs: number = KILL_GRACE_MS,
): KillOutcome {
  if (hasExited(child)) {
    return { success: false, error: 'Process already exited', notFound: true };
  }

  try {
    child.kill('SIGTERM');
  } catch (err) {
    const error = err as Error;
    return { success: false, error: `Failed to send SIGTERM: ${error.message}`, notFound: false };
  }

  const escalation = setTimeout(() => {
    if (!hasExited(child)) {
      child.kill('SIGKILL');
    }
  }, graceMs);
  escalation.unref();
  child.once('exit', () => clearTimeout(escalation));

  return { success: true };
}

// -----------------------------------------------------------------------------
// Port: process.run
// -----------------------------------------------------------------------------

export interface CommandResult {
  success: true;
  stdout: string;
  exitCode: number | null;
}

export interface CommandError {
  success: false;
  error: string;
  /** True if the executable does not exist */
  notFound: boolean;
  /** True if the run was cut short by the abort signal */
  aborted: boolean;
}

export type CommandOutcome = CommandResult | CommandError;

const ABORTED: CommandError = {
  success: false,
  error: 'Command aborted',
  notFound: false,
  aborted: true,
};

export interface RunCommandOptions {
  signal?: AbortSignal;
  maxOutputBytes?: number;
  killGraceMs?: number;
  spawn?: SpawnFn;
}

/**
 * Runs a command and collects stdout. Never rejects.
 * stderr is ignored; output beyond maxOutputBytes is dropped.
 */
export function runCommand(
  command: string,
  args: readonly string[],
  options: RunCommandOptions = {},
): Promise<CommandOutcome> {
  const {
    signal,
    maxOutputBytes = MAX_PROBE_OUTPUT_BYTES,
    killGraceMs = KILL_GRACE_MS,
    spawn: spawnChild = spawnIgnoringStderr,
  } = options;

  if (signal?.aborted) {
    return Promise.resolve(ABORTED);
  }

  return new Promise((resolve) => {
    let child: ProbeChild;
    try {
      child = spawnChild(command, [...args]);
    } catch (err) {
      const error = err as Error;
      resolve({
        success: false,
        error: `Failed to spawn ${command}: ${error.message}`,
        notFound: false,
        aborted: false,
      });
      return;
    }

    const chunks: Buffer[] = [];
    let size = 0;
    let aborted = false;
    let settled = false;

    const onAbort = (): void => {
      aborted = true;
      terminateProcess(child, killGraceMs);
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    const finish = (outcome: CommandOutcome): void => {
      if (settled) return;
      settled = true;
      signal?.removeEventListener('abort', onAbort);
      resolve(outcome);
    };

    child.stdout?.on('data', (chunk: Buffer) => {
      if (size >= maxOutputBytes) return;
      const room = maxOutputBytes - size;
      const kept = chunk.length > room ? chunk.subarray(0, room) : chunk;
      chunks.push(kept);
      size += kept.length;
    });

    child.on('error', (err: NodeJS.ErrnoException) => {
      finish({
        success: false,
        error: `Failed to run ${command}: ${err.message}`,
        notFound: err.code === 'ENOENT',
        aborted,
      });
    });

    child.on('close', (code: number | null) => {
      if (aborted) {
        finish(ABORTED);
        return;
      }
      finish({ success: true, stdout: Buffer.concat(chunks).toString('utf-8'), exitCode: code });
    });
  });
}

// -----------------------------------------------------------------------------
// Port: process.isRunning
// -----------------------------------------------------------------------------

/**
 * Cheap precondition: is a process with this exact name running?
 * Any failure to check counts as not running.
 */
export async function isProcessRunning(name: string, signal?: AbortSignal): Promise<boolean> {
  const result = await runCommand('pgrep', ['-x', name], signal ? { signal } : {});
  return result.success && result.exitCode === 0;
}
