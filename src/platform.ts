/**
 * Platform Detection
 * Layer: infra
 *
 * Provided ports:
 *   - platform.detect
 *   - platform.isSourceSupported
 *
 * Sources may declare which platforms their probe works on (an AppleScript
 * probe only makes sense on macOS). Unsupported sources are skipped.
 */

import * as os from 'os';
import type { Platform } from './types';

// -----------------------------------------------------------------------------
// Port: platform.detect
// -----------------------------------------------------------------------------

/**
 * Detects the current platform.
 */
export function detect(): Platform {
  const platform = os.platform();
  switch (platform) {
    case 'linux':
      return 'linux';
    case 'darwin':
      return 'darwin';
    case 'win32':
      return 'win32';
    default:
      return 'unknown';
  }
}

// -----------------------------------------------------------------------------
// Port: platform.isSourceSupported
// -----------------------------------------------------------------------------

export interface SupportInfo {
  platform: Platform;
  supported: boolean;
  reason?: string;
}

/**
 * Checks a source's declared platforms against the current one.
 * A source without a platform list runs everywhere.
 */
export function isSourceSupported(
  platforms: readonly Platform[] | undefined,
  current: Platform = detect(),
): SupportInfo {
  if (!platforms || platforms.length === 0) {
    return { platform: current, supported: true };
  }

  if (platforms.includes(current)) {
    return { platform: current, supported: true };
  }

  return {
    platform: current,
    supported: false,
    reason: `requires ${platforms.join(' or ')}, running on ${current}`,
  };
}
