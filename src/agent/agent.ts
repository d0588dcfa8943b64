/**
 * @fileoverview Exploration agent contract.
 *
 * An agent supplies the decisions; the loop controller supplies
 * everything else. Reasoning and planning receive a read-only view of the
 * loop state. Observation is the one hook allowed to write to it.
 *
 * @module explorer/agent/agent
 * @version 0.1.0
 */

import type {
  Action,
  LoopState,
  LoopStateView,
  Observation,
} from '../types/core.types.js';

/**
 * Insight fragments that signal the goal is met, matched case-insensitively.
 */
export const DEFAULT_COMPLETION_MARKERS: ReadonlyArray<string> = ['completed', 'achieved'];

/** Recent observations checked for completion markers */
const GOAL_WINDOW = 3;

/**
 * What an agent must provide to be driven by the loop controller.
 */
export interface ExplorationAgent {
  /** Name used in traces, logs and metrics */
  readonly name: string;

  /**
   * Decides what to do next, as free text recorded in the reasoning history.
   */
  reason(state: LoopStateView): string | Promise<string>;

  /**
   * Turns the reasoning into a concrete action.
   */
  planAction(state: LoopStateView, reasoning: string): Action | Promise<Action>;

  /**
   * Absorbs an observation. Defaults to {@link defaultObserve}.
   */
  observe?(state: LoopState, observation: Observation): void | Promise<void>;

  /**
   * Human-readable summary of what the loop found.
   */
  generateSummary(state: LoopStateView): string;

  /**
   * Goal test. Defaults to {@link isGoalAchievedByMarkers}.
   */
  isGoalAchieved?(state: LoopStateView): boolean;
}

/**
 * Convenience base class wiring the default observe and goal test.
 *
 * @example
 * ```typescript
 * class ReadmeAgent extends BaseExplorationAgent {
 *   readonly name = 'ReadmeAgent';
 *   reason() { return 'Read the README'; }
 *   planAction() {
 *     return createAction(ActionKind.READ_FILE, 'Read README', { filePath: 'README.md' });
 *   }
 *   generateSummary(state: LoopStateView) {
 *     return `Read ${state.actionsTaken.length} files`;
 *   }
 * }
 * ```
 */
export abstract class BaseExplorationAgent implements ExplorationAgent {
  abstract readonly name: string;

  /** Override to change what counts as "done" */
  protected readonly completionMarkers: ReadonlyArray<string> = DEFAULT_COMPLETION_MARKERS;

  abstract reason(state: LoopStateView): string | Promise<string>;

  abstract planAction(state: LoopStateView, reasoning: string): Action | Promise<Action>;

  abstract generateSummary(state: LoopStateView): string;

  observe(state: LoopState, observation: Observation): void {
    defaultObserve(state, observation);
  }

  isGoalAchieved(state: LoopStateView): boolean {
    return isGoalAchievedByMarkers(state, this.completionMarkers);
  }
}

/**
 * Appends the insight and records the outcome in the context:
 * `last_successful_action` and `last_result` on success, `last_error`
 * otherwise.
 */
export function defaultObserve(state: LoopState, observation: Observation): void {
  state.observations.push(observation.insight);

  if (observation.success) {
    state.currentContext['last_successful_action'] = observation.actionTaken;
    state.currentContext['last_result'] = observation.result;
  } else {
    state.currentContext['last_error'] = observation.insight;
  }
}

/**
 * True when one of the last three observations contains a marker.
 */
export function isGoalAchievedByMarkers(
  state: LoopStateView,
  markers: ReadonlyArray<string> = DEFAULT_COMPLETION_MARKERS,
): boolean {
  const lowered = markers.map(marker => marker.toLowerCase());
  return state.observations
    .slice(-GOAL_WINDOW)
    .some(observation => {
      const text = observation.toLowerCase();
      return lowered.some(marker => text.includes(marker));
    });
}
