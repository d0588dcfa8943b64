/**
 * @fileoverview Stuck-loop detection and recovery selection.
 *
 * Detection looks only at the action history: an exact repeat of the last
 * few descriptions, or an A-B-A-B-A-B oscillation. Recovery never forces an
 * action; it records a strategy in the loop context for the agent to read.
 *
 * @module explorer/agent/stuck-detector
 * @version 0.1.0
 */

import { ActionKind } from '../types/core.types.js';
import type { LoopState, LoopStateView } from '../types/core.types.js';

/** Fewest recorded actions before detection runs */
export const MIN_ACTIONS_FOR_DETECTION = 5;

/** Prior recoveries after which a new detection escalates */
export const MAX_RECOVERIES = 3;

const OSCILLATION_WINDOW = 6;
const RECOVERY_WINDOW = 3;

/**
 * Strategy recorded in the context after a detection.
 */
export enum RecoveryStrategy {
  SWITCH_TO_DIRECTORY_SCAN = 'switch_to_directory_scan',
  SWITCH_TO_FILE_SEARCH = 'switch_to_file_search',
  TRY_LLM_REASONING = 'try_llm_reasoning',
}

export type StuckPattern = 'repeat' | 'oscillation';

/**
 * Result of applying recovery.
 */
export type RecoveryOutcome =
  | { readonly escalated: true }
  | { readonly escalated: false; readonly strategy: RecoveryStrategy };

/**
 * Detects a stuck pattern in the action history.
 *
 * @param maxSameActionRepeats - repeats tolerated before the next identical
 * action counts as stuck
 * @returns the pattern found, or null
 */
export function detectStuckPattern(
  actionsTaken: ReadonlyArray<string>,
  maxSameActionRepeats: number,
): StuckPattern | null {
  if (actionsTaken.length < MIN_ACTIONS_FOR_DETECTION) {
    return null;
  }

  const repeatWindow = maxSameActionRepeats + 1;
  if (actionsTaken.length >= repeatWindow) {
    const recent = actionsTaken.slice(-repeatWindow);
    if (recent.every(action => action === recent[0])) {
      return 'repeat';
    }
  }

  if (actionsTaken.length >= OSCILLATION_WINDOW) {
    const [a0, b0, a1, b1, a2, b2] = actionsTaken.slice(-OSCILLATION_WINDOW);
    if (a0 === a1 && a1 === a2 && b0 === b1 && b1 === b2) {
      return 'oscillation';
    }
  }

  return null;
}

/**
 * Picks a recovery strategy from the kinds of the most recent actions.
 */
export function selectRecoveryStrategy(state: LoopStateView): RecoveryStrategy {
  const recent = state.actionKinds.slice(-RECOVERY_WINDOW);

  if (recent.length > 0 && recent.every(kind => kind === ActionKind.READ_FILE)) {
    return RecoveryStrategy.SWITCH_TO_DIRECTORY_SCAN;
  }
  if (recent.length > 0 && recent.every(kind => kind === ActionKind.SCAN_DIRECTORY)) {
    return RecoveryStrategy.SWITCH_TO_FILE_SEARCH;
  }
  return RecoveryStrategy.TRY_LLM_REASONING;
}

/**
 * Applies recovery to the loop state, or reports escalation when too many
 * recoveries were already attempted.
 */
export function attemptRecovery(state: LoopState, now: number = Date.now()): RecoveryOutcome {
  if (state.stuckRecoveries.length >= MAX_RECOVERIES) {
    return { escalated: true };
  }

  const strategy = selectRecoveryStrategy(state);
  state.currentContext['recovery_attempt'] = now;
  state.currentContext['recovery_strategy'] = strategy;
  state.stuckRecoveries.push(strategy);
  return { escalated: false, strategy };
}
