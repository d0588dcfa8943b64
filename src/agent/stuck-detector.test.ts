/**
 * @fileoverview Unit tests for stuck-loop detection and recovery
 */

import { describe, it, expect } from 'vitest';
import {
  RecoveryStrategy,
  attemptRecovery,
  detectStuckPattern,
  selectRecoveryStrategy,
} from './stuck-detector.js';
import { ActionKind, createLoopState } from '../types/index.js';

describe('detectStuckPattern', () => {
  it('should ignore histories shorter than five actions', () => {
    expect(detectStuckPattern(['A', 'A', 'A', 'A'], 3)).toBeNull();
  });

  it('should trigger on four identical trailing actions with the default repeat limit', () => {
    expect(detectStuckPattern(['X', 'A', 'A', 'A', 'A'], 3)).toBe('repeat');
  });

  it('should not trigger on three identical trailing actions', () => {
    expect(detectStuckPattern(['X', 'Y', 'A', 'A', 'A'], 3)).toBeNull();
  });

  it('should detect an A-B oscillation over six actions', () => {
    expect(detectStuckPattern(['A', 'B', 'A', 'B', 'A', 'B'], 3)).toBe('oscillation');
  });

  it('should not treat a broken alternation as oscillation', () => {
    expect(detectStuckPattern(['A', 'B', 'A', 'C', 'A', 'B'], 3)).toBeNull();
  });

  it('should honour a custom repeat limit', () => {
    expect(detectStuckPattern(['A', 'B', 'C', 'D', 'D'], 1)).toBe('repeat');
  });
});

describe('recovery', () => {
  function stateWithKinds(kinds: ActionKind[]) {
    const state = createLoopState('goal', 10);
    state.actionKinds.push(...kinds);
    state.actionsTaken.push(...kinds.map(kind => `do ${kind}`));
    return state;
  }

  it('should switch to a directory scan after repeated reads', () => {
    const state = stateWithKinds([ActionKind.SCAN_DIRECTORY, ActionKind.READ_FILE, ActionKind.READ_FILE, ActionKind.READ_FILE]);
    expect(selectRecoveryStrategy(state)).toBe(RecoveryStrategy.SWITCH_TO_DIRECTORY_SCAN);
  });

  it('should switch to a file search after repeated scans', () => {
    const state = stateWithKinds([ActionKind.SCAN_DIRECTORY, ActionKind.SCAN_DIRECTORY, ActionKind.SCAN_DIRECTORY]);
    expect(selectRecoveryStrategy(state)).toBe(RecoveryStrategy.SWITCH_TO_FILE_SEARCH);
  });

  it('should fall back to LLM reasoning for mixed actions', () => {
    const state = stateWithKinds([ActionKind.READ_FILE, ActionKind.SEARCH_FILES, ActionKind.READ_FILE]);
    expect(selectRecoveryStrategy(state)).toBe(RecoveryStrategy.TRY_LLM_REASONING);
  });

  it('should record the strategy in the context', () => {
    const state = stateWithKinds([ActionKind.READ_FILE, ActionKind.READ_FILE, ActionKind.READ_FILE]);

    const outcome = attemptRecovery(state, 1_234);

    expect(outcome).toEqual({ escalated: false, strategy: RecoveryStrategy.SWITCH_TO_DIRECTORY_SCAN });
    expect(state.currentContext).toEqual({
      recovery_attempt: 1_234,
      recovery_strategy: 'switch_to_directory_scan',
    });
    expect(state.stuckRecoveries).toEqual(['switch_to_directory_scan']);
  });

  it('should escalate once three recoveries were applied', () => {
    const state = stateWithKinds([ActionKind.READ_FILE]);
    attemptRecovery(state);
    attemptRecovery(state);
    attemptRecovery(state);

    expect(attemptRecovery(state)).toEqual({ escalated: true });
    expect(state.stuckRecoveries).toHaveLength(3);
  });
});
