/**
 * Platform Detection Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as os from 'os';

vi.mock('os', async () => {
  const actual = await vi.importActual<typeof import('os')>('os');
  return {
    ...actual,
    platform: vi.fn(),
  };
});

import { detect, isSourceSupported } from '../src/platform';

describe('detect', () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  it.each(['linux', 'darwin', 'win32'] as const)('returns %s', (platform) => {
    vi.mocked(os.platform).mockReturnValue(platform);
    expect(detect()).toBe(platform);
  });

  it('returns unknown for other platforms', () => {
    vi.mocked(os.platform).mockReturnValue('freebsd');
    expect(detect()).toBe('unknown');
  });
});

describe('isSourceSupported', () => {
  it('supports a source without a platform list everywhere', () => {
    expect(isSourceSupported(undefined, 'linux')).toEqual({ platform: 'linux', supported: true });
    expect(isSourceSupported([], 'win32')).toEqual({ platform: 'win32', supported: true });
  });

  it('supports a listed platform', () => {
    expect(isSourceSupported(['darwin', 'linux'], 'linux').supported).toBe(true);
  });

  it('explains why an unlisted platform is unsupported', () => {
    expect(isSourceSupported(['darwin'], 'linux')).toEqual({
      platform: 'linux',
      supported: false,
      reason: 'requires darwin, running on linux',
    });
  });
});
