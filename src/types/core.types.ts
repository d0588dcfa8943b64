/**
 * @fileoverview Core type definitions for the exploration engine.
 *
 * These types form the shared vocabulary of the loop controller, the tool
 * executor, the cache and the tracer. Every component references these
 * primitives so data flows through the loop with a single shape.
 *
 * @module explorer/types
 * @version 0.1.0
 */

/**
 * Unique identifier type used throughout the system.
 */
export type UniqueId = string & { readonly __brand: 'UniqueId' };

/**
 * Unix timestamp in milliseconds.
 */
export type Timestamp = number & { readonly __brand: 'Timestamp' };

/**
 * Phases of a single exploration loop.
 *
 * The loop follows a strict state machine:
 * INIT → REASONING → ACTING → OBSERVING → (REASONING | DONE | ABORTED)
 *
 * @remarks
 * - INIT: Loop state created, no iteration started yet
 * - REASONING: Agent is deciding what to do next
 * - ACTING: Planned action is running through the tool executor
 * - OBSERVING: Agent is absorbing the observation
 * - DONE: Loop ended cleanly (goal achieved or a budget ran out)
 * - ABORTED: Loop ended by the circuit breaker, error budget or stuck escalation
 */
export enum LoopPhase {
  INIT = 'INIT',
  REASONING = 'REASONING',
  ACTING = 'ACTING',
  OBSERVING = 'OBSERVING',
  DONE = 'DONE',
  ABORTED = 'ABORTED',
}

/**
 * Kinds of actions an agent can request.
 * Each kind maps to one tool in the registry.
 */
export enum ActionKind {
  SCAN_DIRECTORY = 'scan_directory',
  LIST_FILES = 'list_files',
  READ_FILE = 'read_file',
  SEARCH_FILES = 'search_files',
  ANALYZE_CODE = 'analyze_code',
  LLM_REASONING = 'llm_reasoning',
  LLM_SUMMARY = 'llm_summary',
  CACHE_LOOKUP = 'cache_lookup',
  CACHE_STORE = 'cache_store',
}

/**
 * Why a loop stopped.
 */
export enum TerminationReason {
  GOAL_ACHIEVED = 'GOAL_ACHIEVED',
  MAX_ITERATIONS = 'MAX_ITERATIONS',
  TOTAL_TIMEOUT = 'TOTAL_TIMEOUT',
  CIRCUIT_BREAKER = 'CIRCUIT_BREAKER',
  ERROR_BUDGET = 'ERROR_BUDGET',
  STUCK_ESCALATION = 'STUCK_ESCALATION',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Severity levels for logging.
 */
export enum Severity {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  FATAL = 'FATAL',
}

/**
 * Parameter map handed to a tool.
 */
export type ActionParameters = Readonly<Record<string, unknown>>;

/**
 * A requested unit of work. Produced by `planAction` and never mutated.
 */
export interface Action {
  /** Which tool should run */
  readonly kind: ActionKind;

  /** Human-readable description, also used for stuck-loop detection */
  readonly description: string;

  /** Tool parameters */
  readonly parameters: ActionParameters;

  /** What the agent expects to learn */
  readonly expectedOutcome: string;

  /** Optional explicit tool name, informational only */
  readonly toolName: string | null;
}

/**
 * The structured result of executing an Action.
 */
export interface Observation {
  /** Description of the action that produced this observation */
  readonly actionTaken: string;

  /** Raw tool output, opaque to the controller */
  readonly result: unknown;

  readonly success: boolean;

  /** One-line, human-readable takeaway */
  readonly insight: string;

  /** Confidence in the result (0.0 - 1.0) */
  readonly confidence: number;

  readonly suggestedNextAction: string | null;

  /** Estimated progress towards the goal (0.0 - 1.0) */
  readonly goalProgress: number;
}

/**
 * Mutable state of one exploration loop.
 *
 * Owned by the loop controller for the duration of one `executeLoop` call.
 * Agents receive a read-only view in `reason` and `planAction`.
 */
export interface LoopState {
  goal: string;
  iteration: number;
  maxIterations: number;
  observations: string[];
  actionsTaken: string[];
  /** Kinds of the actions in `actionsTaken`, index-aligned */
  actionKinds: ActionKind[];
  reasoningHistory: string[];
  cacheHits: number;
  errorCount: number;
  consecutiveErrors: number;
  currentContext: Record<string, unknown>;
  /** Last raw result per action kind */
  toolResults: Partial<Record<ActionKind, unknown>>;
  /** Recovery strategies applied after stuck-loop detections */
  stuckRecoveries: string[];
}

/**
 * Read-only view of the loop state handed to reasoning and planning.
 */
export interface LoopStateView {
  readonly goal: string;
  readonly iteration: number;
  readonly maxIterations: number;
  readonly observations: ReadonlyArray<string>;
  readonly actionsTaken: ReadonlyArray<string>;
  readonly actionKinds: ReadonlyArray<ActionKind>;
  readonly reasoningHistory: ReadonlyArray<string>;
  readonly cacheHits: number;
  readonly errorCount: number;
  readonly consecutiveErrors: number;
  readonly currentContext: Readonly<Record<string, unknown>>;
  readonly toolResults: Readonly<Partial<Record<ActionKind, unknown>>>;
  readonly stuckRecoveries: ReadonlyArray<string>;
}

/**
 * Final outcome of `executeLoop`. Always produced, even on failure.
 */
export interface LoopResult {
  /** Tracing session id, null when tracing is disabled */
  readonly sessionId: UniqueId | null;
  readonly goal: string;
  readonly iterations: number;
  readonly elapsedMs: number;
  readonly observations: ReadonlyArray<string>;
  readonly actionsTaken: ReadonlyArray<string>;
  readonly reasoningHistory: ReadonlyArray<string>;
  readonly cacheHits: number;
  readonly errorCount: number;
  readonly finalContext: Readonly<Record<string, unknown>>;
  readonly goalAchieved: boolean;
  readonly terminationReason: TerminationReason;
  readonly phase: LoopPhase.DONE | LoopPhase.ABORTED;
  readonly summary: string;
  /** Set only for unexpected internal failures */
  readonly error?: string;
}

/**
 * Creates a branded UniqueId from a string.
 */
export function createUniqueId(value: string): UniqueId {
  return value as UniqueId;
}

/**
 * Creates a branded Timestamp from current time.
 */
export function createTimestamp(value?: number): Timestamp {
  return (value ?? Date.now()) as Timestamp;
}

/**
 * Creates a frozen Action.
 */
export function createAction(
  kind: ActionKind,
  description: string,
  parameters: Record<string, unknown> = {},
  options: { expectedOutcome?: string; toolName?: string } = {},
): Action {
  return Object.freeze({
    kind,
    description,
    parameters: Object.freeze({ ...parameters }),
    expectedOutcome: options.expectedOutcome ?? '',
    toolName: options.toolName ?? null,
  });
}

/**
 * Creates a frozen Observation with neutral defaults.
 */
export function createObservation(
  fields: Pick<Observation, 'actionTaken' | 'success' | 'insight'> & Partial<Observation>,
): Observation {
  return Object.freeze({
    result: null,
    confidence: 0,
    suggestedNextAction: null,
    goalProgress: 0,
    ...fields,
  });
}

/**
 * Creates a fresh loop state for a goal.
 */
export function createLoopState(goal: string, maxIterations: number): LoopState {
  return {
    goal,
    iteration: 0,
    maxIterations,
    observations: [],
    actionsTaken: [],
    actionKinds: [],
    reasoningHistory: [],
    cacheHits: 0,
    errorCount: 0,
    consecutiveErrors: 0,
    currentContext: {},
    toolResults: {},
    stuckRecoveries: [],
  };
}
