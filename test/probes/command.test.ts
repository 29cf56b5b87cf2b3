/**
 * Command Probe Tests
 *
 * Mocks: runCommand (no subprocess is spawned).
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { classifyOutput, createCommandProbe } from '../../src/probes/command';
import type { CommandProbeConfig } from '../../src/probes/command';
import { runCommand } from '../../src/probes/process';
import { makeContext } from '../helpers';

vi.mock('../../src/probes/process', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../src/probes/process')>();
  return {
    ...actual,
    runCommand: vi.fn(),
  };
});

function makeConfig(overrides: Partial<CommandProbeConfig> = {}): CommandProbeConfig {
  return {
    command: 'sync-status',
    args: ['--short'],
    match: 'exit-code',
    activePatterns: [],
    neutralPatterns: [],
    ...overrides,
  };
}

describe('classifyOutput', () => {
  it('matches active patterns case-insensitively', (): void => {
    expect(classifyOutput('  Syncing 3 files\n', ['syncing'])).toEqual({
      status: 'active',
      detail: 'Syncing 3 files',
    });
  });

  it('prefers active over neutral patterns', (): void => {
    expect(classifyOutput('Paused, syncing soon', ['syncing'], ['paused']).status).toBe('active');
  });

  it('reads neutral patterns as neutral', (): void => {
    expect(classifyOutput('Paused', ['syncing'], ['paused'])).toEqual({
      status: 'neutral',
      detail: 'Paused',
    });
  });

  it('is inactive without a match', (): void => {
    expect(classifyOutput('Up to date', ['syncing'], ['paused'])).toEqual({ status: 'inactive' });
  });
});

describe('createCommandProbe', () => {
  beforeEach((): void => {
    vi.mocked(runCommand).mockReset();
  });

  it('passes the abort signal through to the command', async (): Promise<void> => {
    vi.mocked(runCommand).mockResolvedValue({ success: true, stdout: '', exitCode: 0 });
    const context = makeContext();

    await createCommandProbe(makeConfig())(context);

    expect(runCommand).toHaveBeenCalledWith('sync-status', ['--short'], {
      signal: context.signal,
    });
  });

  it('is active on exit code 0 in exit-code mode', async (): Promise<void> => {
    vi.mocked(runCommand).mockResolvedValue({ success: true, stdout: '', exitCode: 0 });

    await expect(createCommandProbe(makeConfig())(makeContext())).resolves.toEqual({
      status: 'active',
    });
  });

  it('is inactive on a non-zero exit code', async (): Promise<void> => {
    vi.mocked(runCommand).mockResolvedValue({ success: true, stdout: '', exitCode: 1 });

    await expect(createCommandProbe(makeConfig())(makeContext())).resolves.toEqual({
      status: 'inactive',
      detail: 'exit code 1',
    });
  });

  it('fails closed when the command cannot run', async (): Promise<void> => {
    vi.mocked(runCommand).mockResolvedValue({
      success: false,
      error: 'Failed to run sync-status: spawn sync-status ENOENT',
      notFound: true,
      aborted: false,
    });

    await expect(createCommandProbe(makeConfig())(makeContext())).resolves.toEqual({
      status: 'inactive',
      detail: 'Failed to run sync-status: spawn sync-status ENOENT',
    });
  });

  it('classifies stdout in output mode', async (): Promise<void> => {
    vi.mocked(runCommand).mockResolvedValue({
      success: true,
      stdout: 'Building target App\n',
      exitCode: 0,
    });
    const probe = createCommandProbe(
      makeConfig({ match: 'output', activePatterns: ['building'] }),
    );

    await expect(probe(makeContext())).resolves.toEqual({
      status: 'active',
      detail: 'Building target App',
    });
  });
});
