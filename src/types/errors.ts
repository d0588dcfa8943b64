/**
 * @fileoverview Error taxonomy for the exploration engine.
 *
 * Every error raised inside the loop is one of these classes. The loop
 * controller catches them at the iteration boundary and turns them into
 * failed observations or `error` trace records; none escape `executeLoop`.
 *
 * @module explorer/types/errors
 * @version 0.1.0
 */

import type { ActionKind } from './core.types.js';

/**
 * Base class for all engine errors.
 */
export class ExplorationError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  /** Whether the tool executor may retry after this error */
  readonly recoverable: boolean;

  constructor(message: string, code: string, recoverable: boolean) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.recoverable = recoverable;
  }
}

/**
 * Action parameters failed the per-kind requirements. Never retried.
 */
export class ValidationError extends ExplorationError {
  readonly kind: ActionKind;
  readonly issues: ReadonlyArray<string>;

  constructor(kind: ActionKind, issues: ReadonlyArray<string>) {
    super(`Parameter validation failed: ${issues.join('; ')}`, 'VALIDATION_FAILED', false);
    this.kind = kind;
    this.issues = issues;
  }
}

/**
 * A tool call threw or otherwise failed.
 */
export class ToolExecutionError extends ExplorationError {
  readonly kind: ActionKind;

  constructor(kind: ActionKind, message: string, code: string = 'EXECUTION_ERROR') {
    super(message, code, true);
    this.kind = kind;
  }
}

/**
 * A tool call did not settle within its time budget.
 */
export class ToolTimeoutError extends ToolExecutionError {
  readonly timeoutMs: number;

  constructor(kind: ActionKind, timeoutMs: number) {
    super(kind, `Tool execution timed out after ${timeoutMs}ms`, 'TOOL_TIMEOUT');
    this.timeoutMs = timeoutMs;
  }
}

/**
 * A tool returned a malformed or empty result.
 */
export class ResultValidationError extends ExplorationError {
  readonly kind: ActionKind;

  constructor(kind: ActionKind, message: string) {
    super(message, 'RESULT_INVALID', true);
    this.kind = kind;
  }
}

/**
 * A repetitive or oscillating action pattern was detected.
 */
export class StuckLoopError extends ExplorationError {
  readonly pattern: 'repeat' | 'oscillation';
  readonly escalated: boolean;

  constructor(pattern: 'repeat' | 'oscillation', escalated: boolean) {
    super(
      escalated
        ? `Stuck loop (${pattern}) could not be recovered, escalating`
        : `Stuck loop detected (${pattern})`,
      'STUCK_LOOP',
      !escalated,
    );
    this.pattern = pattern;
    this.escalated = escalated;
  }
}

/**
 * An iteration, wall-clock or iteration-count budget ran out.
 */
export class BudgetExceededError extends ExplorationError {
  readonly budget: 'iteration_timeout' | 'total_timeout' | 'max_iterations';
  readonly limit: number;

  constructor(budget: 'iteration_timeout' | 'total_timeout' | 'max_iterations', limit: number) {
    super(`Budget exceeded: ${budget} (${limit})`, 'BUDGET_EXCEEDED', false);
    this.budget = budget;
    this.limit = limit;
  }
}

/**
 * Too many consecutive failed iterations.
 */
export class CircuitBreakerError extends ExplorationError {
  readonly consecutiveErrors: number;

  constructor(consecutiveErrors: number) {
    super(`Circuit breaker opened after ${consecutiveErrors} consecutive errors`, 'CIRCUIT_OPEN', false);
    this.consecutiveErrors = consecutiveErrors;
  }
}

/**
 * Configuration values failed validation.
 */
export class ConfigurationError extends ExplorationError {
  readonly issues: ReadonlyArray<string>;

  constructor(issues: ReadonlyArray<string>) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'INVALID_CONFIG', false);
    this.issues = issues;
  }
}

/**
 * Normalises any thrown value into a message.
 */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}

/**
 * Normalises any thrown value into an Error instance.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(toErrorMessage(error));
}
