/**
 * Growing Files Probe Tests
 *
 * Uses a real temporary directory.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createGrowingFilesProbe } from '../../src/probes/growing-files';
import { makeContext } from '../helpers';

describe('createGrowingFilesProbe', () => {
  let testDir: string;

  beforeEach((): void => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'growing-files-test-'));
  });

  afterEach((): void => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it('is inactive without partial files', async (): Promise<void> => {
    fs.writeFileSync(path.join(testDir, 'done.zip'), 'complete');
    const probe = createGrowingFilesProbe({ directory: testDir, extensions: ['.part'] });

    await expect(probe(makeContext())).resolves.toEqual({ status: 'inactive' });
  });

  it('tracks growth between samples', async (): Promise<void> => {
    const file = path.join(testDir, 'movie.mkv.part');
    const probe = createGrowingFilesProbe({ directory: testDir, extensions: ['part'] });
    fs.writeFileSync(file, '0123456789');

    await expect(probe(makeContext())).resolves.toEqual({
      status: 'active',
      detail: 'movie.mkv.part',
    });
    await expect(probe(makeContext())).resolves.toEqual({ status: 'inactive', detail: 'stalled' });

    fs.appendFileSync(file, 'more');

    await expect(probe(makeContext())).resolves.toEqual({
      status: 'active',
      detail: 'movie.mkv.part',
    });
  });

  it('forgets sizes on reset', async (): Promise<void> => {
    fs.writeFileSync(path.join(testDir, 'a.crdownload'), 'abc');
    const probe = createGrowingFilesProbe({ directory: testDir, extensions: ['.crdownload'] });
    await probe(makeContext());

    probe.reset?.();

    await expect(probe(makeContext())).resolves.toEqual({
      status: 'active',
      detail: 'a.crdownload',
    });
  });

  it('matches extensions case-insensitively', async (): Promise<void> => {
    fs.writeFileSync(path.join(testDir, 'b.Part'), 'x');
    const probe = createGrowingFilesProbe({ directory: testDir, extensions: ['PART'] });

    await expect(probe(makeContext())).resolves.toEqual({ status: 'active', detail: 'b.Part' });
  });

  it('is inactive when the directory cannot be read', async (): Promise<void> => {
    const probe = createGrowingFilesProbe({
      directory: path.join(testDir, 'missing'),
      extensions: ['.part'],
    });

    await expect(probe(makeContext())).resolves.toEqual({
      status: 'inactive',
      detail: 'directory unreadable',
    });
  });
});
