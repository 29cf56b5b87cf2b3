/**
 * Debounce State Machine Tests
 *
 * Exit criteria:
 *   - Asymmetric thresholds commit on the Nth consecutive reading
 *   - Neutral readings leave the state untouched
 *   - Reset forces {0, 0, inactive}
 */

import { describe, it, expect } from 'vitest';
import {
  assertValidDebounceConfig,
  createDebounceState,
  resetDebounce,
  updateDebounce,
} from '../src/debounce';
import { MonitorUsageError } from '../src/errors';
import type { DebounceConfig, DebounceState, ReadingStatus } from '../src/types';

// -----------------------------------------------------------------------------
// Test helpers
// -----------------------------------------------------------------------------

function makeState(overrides: Partial<DebounceState> = {}): DebounceState {
  return { ...createDebounceState(), ...overrides };
}

/** Feeds readings in order and returns the transitions produced at each step. */
function feed(
  statuses: ReadingStatus[],
  config: DebounceConfig,
  initial: DebounceState = createDebounceState(),
): { state: DebounceState; transitions: (boolean | null)[] } {
  let state = initial;
  const transitions: (boolean | null)[] = [];
  for (const status of statuses) {
    const result = updateDebounce(state, status, config);
    state = result.state;
    transitions.push(result.transition);
  }
  return { state, transitions };
}

// -----------------------------------------------------------------------------
// updateDebounce
// -----------------------------------------------------------------------------

describe('updateDebounce', () => {
  const showFastHideSlow: DebounceConfig = { activateAfter: 1, deactivateAfter: 3 };

  it('shows on the first active reading and hides on the third inactive one', (): void => {
    const { state, transitions } = feed(
      ['active', 'inactive', 'inactive', 'inactive'],
      showFastHideSlow,
    );

    expect(transitions).toEqual([true, null, null, false]);
    expect(state).toEqual({ consecutiveActive: 0, consecutiveInactive: 3, isActive: false });
  });

  it('survives a brief inactive gap shorter than the hide threshold', (): void => {
    const { state, transitions } = feed(
      ['active', 'inactive', 'inactive', 'active'],
      showFastHideSlow,
    );

    expect(transitions).toEqual([true, null, null, null]);
    expect(state).toEqual({ consecutiveActive: 1, consecutiveInactive: 0, isActive: true });
  });

  it('requires two consecutive readings each way with symmetric thresholds', (): void => {
    const config = { activateAfter: 2, deactivateAfter: 2 };

    const { transitions } = feed(
      ['active', 'inactive', 'active', 'active', 'inactive', 'active', 'inactive', 'inactive'],
      config,
    );

    expect(transitions).toEqual([null, null, null, true, null, null, null, false]);
  });

  it('keeps counting active readings while active without re-committing', (): void => {
    const { state, transitions } = feed(['active', 'active', 'active'], showFastHideSlow);

    expect(transitions).toEqual([true, null, null]);
    expect(state.consecutiveActive).toBe(3);
  });

  it('never commits inactive while already inactive', (): void => {
    const { state, transitions } = feed(
      ['inactive', 'inactive', 'inactive', 'inactive'],
      showFastHideSlow,
    );

    expect(transitions).toEqual([null, null, null, null]);
    expect(state).toEqual({ consecutiveActive: 0, consecutiveInactive: 4, isActive: false });
  });

  it('returns the same state for a neutral reading', (): void => {
    const state = makeState({ consecutiveActive: 1, isActive: true });

    const result = updateDebounce(state, 'neutral', showFastHideSlow);

    expect(result.state).toBe(state);
    expect(result.transition).toBeNull();
  });

  it('does not let a neutral reading break an inactive streak', (): void => {
    const { transitions } = feed(
      ['active', 'inactive', 'neutral', 'inactive', 'neutral', 'inactive'],
      showFastHideSlow,
    );

    expect(transitions).toEqual([true, null, null, null, null, false]);
  });

  it('does not mutate the input state', (): void => {
    const state = makeState();
    const snapshot = { ...state };

    updateDebounce(state, 'active', showFastHideSlow);

    expect(state).toEqual(snapshot);
  });
});

// -----------------------------------------------------------------------------
// resetDebounce
// -----------------------------------------------------------------------------

describe('resetDebounce', () => {
  it('returns zero counters and inactive', (): void => {
    expect(resetDebounce()).toEqual({
      consecutiveActive: 0,
      consecutiveInactive: 0,
      isActive: false,
    });
  });

  it('needs a full activation streak again after reset', (): void => {
    const config = { activateAfter: 2, deactivateAfter: 2 };
    const before = feed(['active', 'active'], config);
    expect(before.state.isActive).toBe(true);

    const after = feed(['active', 'active'], config, resetDebounce());

    expect(after.transitions).toEqual([null, true]);
  });
});

// -----------------------------------------------------------------------------
// assertValidDebounceConfig
// -----------------------------------------------------------------------------

describe('assertValidDebounceConfig', () => {
  it('accepts thresholds of 1 and above', (): void => {
    expect(() => assertValidDebounceConfig({ activateAfter: 1, deactivateAfter: 5 })).not.toThrow();
  });

  it('rejects a zero threshold', (): void => {
    expect(() => assertValidDebounceConfig({ activateAfter: 0, deactivateAfter: 3 })).toThrow(
      'Debounce threshold activateAfter must be an integer >= 1 (got 0)',
    );
  });

  it('rejects a fractional threshold with invalid_config', (): void => {
    let caught: unknown;
    try {
      assertValidDebounceConfig({ activateAfter: 1, deactivateAfter: 1.5 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(MonitorUsageError);
    expect(caught).toMatchObject({
      code: 'invalid_config',
      message: 'Debounce threshold deactivateAfter must be an integer >= 1 (got 1.5)',
    });
  });
});
