/**
 * Debounce State Machine
 * Layer: core
 *
 * Provided ports:
 *   - debounce.update
 *   - debounce.reset
 *
 * Pure logic converting raw readings into stable activity transitions.
 *
 * Algorithm (per reading):
 *   if reading is active:
 *     consecutiveActive += 1, consecutiveInactive = 0
 *     if consecutiveActive >= activateAfter and not active: commit active
 *   else if reading is inactive:
 *     consecutiveInactive += 1, consecutiveActive = 0
 *     if consecutiveInactive >= deactivateAfter and active: commit inactive
 *   else (neutral):
 *     no change; an isolated ambiguous sample cannot move either counter
 */

import type { DebounceConfig, DebounceState, ReadingStatus } from './types';
import { MonitorUsageError } from './errors';

// -----------------------------------------------------------------------------
// State factory
// -----------------------------------------------------------------------------

/**
 * Creates the initial (and post-reset) debounce state.
 */
export function createDebounceState(): DebounceState {
  return {
    consecutiveActive: 0,
    consecutiveInactive: 0,
    isActive: false,
  };
}

/**
 * Validates threshold values. Thresholds below 1 are a usage error.
 */
export function assertValidDebounceConfig(config: DebounceConfig): void {
  for (const [name, value] of Object.entries(config)) {
    if (!Number.isInteger(value) || value < 1) {
      throw new MonitorUsageError(
        'invalid_config',
        `Debounce threshold ${name} must be an integer >= 1 (got ${String(value)})`,
      );
    }
  }
}

// -----------------------------------------------------------------------------
// Port: debounce.update
// -----------------------------------------------------------------------------

export interface DebounceResult {
  /** Updated state */
  state: DebounceState;
  /** Committed state if this reading crossed a threshold, null otherwise */
  transition: boolean | null;
}

/**
 * Applies one reading to the state.
 * Pure function - returns new state without mutating input.
 *
 * @param state - Current debounce state
 * @param status - Classified reading
 * @param config - Show/hide thresholds
 */
export function updateDebounce(
  state: DebounceState,
  status: ReadingStatus,
  config: DebounceConfig,
): DebounceResult {
  if (status === 'active') {
    const consecutiveActive = state.consecutiveActive + 1;
    const commits = consecutiveActive >= config.activateAfter && !state.isActive;
    return {
      state: {
        consecutiveActive,
        consecutiveInactive: 0,
        isActive: state.isActive || commits,
      },
      transition: commits ? true : null,
    };
  }

  if (status === 'inactive') {
    const consecutiveInactive = state.consecutiveInactive + 1;
    const commits = consecutiveInactive >= config.deactivateAfter && state.isActive;
    return {
      state: {
        consecutiveActive: 0,
        consecutiveInactive,
        isActive: state.isActive && !commits,
      },
      transition: commits ? false : null,
    };
  }

  // Hysteresis band
  return { state, transition: null };
}

// -----------------------------------------------------------------------------
// Port: debounce.reset
// -----------------------------------------------------------------------------

/**
 * Hard reset: both counters to zero and inactive, regardless of prior state.
 */
export function resetDebounce(): DebounceState {
  return createDebounceState();
}
