/**
 * @fileoverview Tool Executor - turns an Action into an Observation.
 *
 * Pipeline per action:
 * 1. Validate parameters (failure → failed observation, no tool call)
 * 2. Resolve the tool in the registry (missing → failed observation)
 * 3. Consult the cache for cacheable kinds
 * 4. Invoke with a timeout, validate the result, retry on failure
 * 5. Build the observation (insight, confidence) and cache the result
 *
 * The executor never mutates loop state; it reports what happened in an
 * {@link ExecutionOutcome} and the loop controller applies it.
 *
 * @module explorer/tools/tool-executor
 * @version 0.1.0
 */

import { ActionKind, createObservation } from '../types/core.types.js';
import type { Action, ActionParameters, Observation } from '../types/core.types.js';
import {
  ExplorationError,
  ResultValidationError,
  ToolExecutionError,
  ToolTimeoutError,
  ValidationError,
  toError,
} from '../types/errors.js';
import type { ExplorationConfig } from '../config/config.js';
import type { ResultCache } from '../cache/result-cache.js';
import { Logger, createLogger } from '../observability/logger.js';
import { ToolRegistry } from './tool-registry.js';
import { isRecord, validateParameters, validateResult } from './validation.js';

/**
 * Kinds whose results are cached by parameters.
 */
export const CACHEABLE_KINDS: ReadonlySet<ActionKind> = new Set([
  ActionKind.SCAN_DIRECTORY,
  ActionKind.LIST_FILES,
  ActionKind.READ_FILE,
  ActionKind.SEARCH_FILES,
  ActionKind.ANALYZE_CODE,
]);

/**
 * Coarse classes of tool failure, used for logging.
 */
export type ToolErrorClass =
  | 'file_not_found'
  | 'permission_denied'
  | 'timeout'
  | 'network_error'
  | 'generic_error';

/**
 * Configuration subset the executor reads.
 */
export type ToolExecutorConfig = Pick<
  ExplorationConfig,
  'toolTimeoutMs' | 'maxToolRetries' | 'toolValidationEnabled' | 'retryDelayMs'
>;

export interface ToolExecutorOptions {
  readonly registry: ToolRegistry;
  readonly config: ToolExecutorConfig;
  /** Result cache; null disables caching */
  readonly cache?: ResultCache | null;
  readonly logger?: Logger;
  /** Delay between retries, replaceable in tests */
  readonly sleep?: (ms: number) => Promise<void>;
}

/**
 * Everything the controller needs to know about one execution.
 */
export interface ExecutionOutcome {
  readonly observation: Observation;
  /** True when the action reached a tool or the cache */
  readonly attempted: boolean;
  readonly cacheHit: boolean;
  /** Tool calls made, including retries */
  readonly attempts: number;
  /** True when every attempt failed */
  readonly exhaustedRetries: boolean;
  /** Final error, null on success */
  readonly error: ExplorationError | null;
  readonly errorClass: ToolErrorClass | null;
}

/**
 * Executes actions against registered tools.
 *
 * @example
 * ```typescript
 * const executor = new ToolExecutor({ registry, config, cache });
 * const observation = await executor.act(
 *   createAction(ActionKind.READ_FILE, 'Read README', { filePath: 'README.md' }),
 * );
 * ```
 */
export class ToolExecutor {
  private readonly registry: ToolRegistry;
  private readonly config: ToolExecutorConfig;
  private readonly cache: ResultCache | null;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: ToolExecutorOptions) {
    this.registry = options.registry;
    this.config = options.config;
    this.cache = options.cache ?? null;
    this.logger = options.logger ?? createLogger('executor');
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Executes an action and returns only its observation.
   */
  async act(action: Action): Promise<Observation> {
    const outcome = await this.execute(action);
    return outcome.observation;
  }

  /**
   * Executes an action and reports the full outcome.
   */
  async execute(action: Action): Promise<ExecutionOutcome> {
    if (this.config.toolValidationEnabled) {
      const issues = validateParameters(action.kind, action.parameters);
      if (issues.length > 0) {
        const error = new ValidationError(action.kind, issues);
        this.logger.warn('Rejected action parameters', { kind: action.kind, issues });
        return this.failedOutcome(action, error, 0, false);
      }
    }

    if (!this.registry.has(action.kind)) {
      const error = new ToolExecutionError(
        action.kind,
        `No tool registered for '${action.kind}'`,
        'TOOL_NOT_FOUND',
      );
      this.logger.warn('Missing tool', { kind: action.kind });
      return this.failedOutcome(action, error, 0, false);
    }

    const cacheKey = this.cacheKeyFor(action);
    if (cacheKey !== null && this.cache !== null) {
      const cached = this.cache.get(cacheKey);
      if (cached !== undefined) {
        this.logger.debug('Cache hit', { kind: action.kind });
        return {
          observation: this.successObservation(action, cached),
          attempted: true,
          cacheHit: true,
          attempts: 0,
          exhaustedRetries: false,
          error: null,
          errorClass: null,
        };
      }
    }

    return this.executeWithRetries(action, cacheKey);
  }

  /**
   * Cache key for an action, or null when its kind is not cacheable.
   */
  cacheKeyFor(action: Action): string | null {
    if (!CACHEABLE_KINDS.has(action.kind)) {
      return null;
    }
    return buildCacheKey(action.kind, action.parameters);
  }

  // ============ Private Methods ============

  private async executeWithRetries(action: Action, cacheKey: string | null): Promise<ExecutionOutcome> {
    const maxAttempts = this.config.maxToolRetries + 1;
    let lastError: ExplorationError = new ToolExecutionError(action.kind, 'Tool was not invoked');
    let lastClass: ToolErrorClass = 'generic_error';

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      try {
        const result = await this.registry.invoke(action.kind, action.parameters, {
          timeoutMs: this.config.toolTimeoutMs,
          attempt,
          logger: this.logger.child({ bindings: { kind: action.kind, attempt } }).asExecutionLogger(),
        });

        if (this.config.toolValidationEnabled) {
          const problem = validateResult(action.kind, result);
          if (problem !== null) {
            throw new ResultValidationError(action.kind, problem);
          }
        }

        if (cacheKey !== null && this.cache !== null) {
          this.cache.set(cacheKey, result);
        }

        return {
          observation: this.successObservation(action, result),
          attempted: true,
          cacheHit: false,
          attempts: attempt + 1,
          exhaustedRetries: false,
          error: null,
          errorClass: null,
        };
      } catch (error) {
        lastError = toExplorationError(action.kind, error);
        lastClass = classifyToolError(error);

        const willRetry = attempt + 1 < maxAttempts;
        this.logger.warn('Tool attempt failed', {
          kind: action.kind,
          attempt: attempt + 1,
          maxAttempts,
          errorClass: lastClass,
          reason: lastError.message,
          willRetry,
        });

        if (willRetry) {
          await this.sleep(this.config.retryDelayMs);
        }
      }
    }

    this.logger.error(
      'Tool retries exhausted',
      { kind: action.kind, attempts: maxAttempts, errorClass: lastClass },
      lastError,
    );
    return { ...this.failedOutcome(action, lastError, maxAttempts, true), errorClass: lastClass };
  }

  private successObservation(action: Action, result: unknown): Observation {
    return createObservation({
      actionTaken: action.description,
      result,
      success: true,
      insight: generateInsight(action.kind, result),
      confidence: calculateConfidence(action.kind, result),
    });
  }

  private failedOutcome(
    action: Action,
    error: ExplorationError,
    attempts: number,
    exhaustedRetries: boolean,
  ): ExecutionOutcome {
    return {
      observation: createObservation({
        actionTaken: action.description,
        success: false,
        insight: `Action failed: ${error.message}`,
        confidence: 0,
      }),
      attempted: exhaustedRetries,
      cacheHit: false,
      attempts,
      exhaustedRetries,
      error,
      errorClass: null,
    };
  }
}

// ============ Helpers ============

/**
 * Cache key: action kind plus the parameters as key-sorted JSON.
 */
export function buildCacheKey(kind: ActionKind, params: ActionParameters): string {
  return `${kind}:${canonicalJson(params)}`;
}

/**
 * JSON with object keys sorted at every level.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (isRecord(value)) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(value[key]);
    }
    return sorted;
  }
  return value;
}

/**
 * One-line takeaway for a successful result.
 */
export function generateInsight(kind: ActionKind, result: unknown): string {
  const fields = isRecord(result) ? result : {};
  switch (kind) {
    case ActionKind.SCAN_DIRECTORY:
      return `Scanned directory with ${numberField(fields, 'totalFiles')} files`;
    case ActionKind.READ_FILE:
      return `Read file with ${numberField(fields, 'lineCount')} lines`;
    case ActionKind.SEARCH_FILES:
      return `Found ${arrayLength(fields, 'results')} files matching pattern`;
    default:
      return `Executed ${kind}`;
  }
}

/**
 * Confidence in a successful result.
 */
export function calculateConfidence(kind: ActionKind, result: unknown): number {
  switch (kind) {
    case ActionKind.READ_FILE:
    case ActionKind.SCAN_DIRECTORY:
      return 0.9;
    case ActionKind.SEARCH_FILES:
      return arrayLength(isRecord(result) ? result : {}, 'results') > 0 ? 0.8 : 0.3;
    default:
      return 0.7;
  }
}

/**
 * Buckets a thrown value into a coarse failure class.
 */
export function classifyToolError(error: unknown): ToolErrorClass {
  if (error instanceof ToolTimeoutError) {
    return 'timeout';
  }

  const code = errorCode(error);
  const message = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();

  if (code === 'ETIMEDOUT' || message.includes('timed out') || message.includes('timeout')) {
    return 'timeout';
  }
  if (code === 'ENOENT' || message.includes('not found') || message.includes('no such file')) {
    return 'file_not_found';
  }
  if (code === 'EACCES' || code === 'EPERM' || message.includes('permission denied')) {
    return 'permission_denied';
  }
  if (
    code === 'ECONNREFUSED' ||
    code === 'ECONNRESET' ||
    code === 'ENOTFOUND' ||
    code === 'EAI_AGAIN' ||
    message.includes('network')
  ) {
    return 'network_error';
  }
  return 'generic_error';
}

function errorCode(error: unknown): string | null {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
}

function toExplorationError(kind: ActionKind, error: unknown): ExplorationError {
  if (error instanceof ExplorationError) {
    return error;
  }
  return new ToolExecutionError(kind, toError(error).message, errorCode(error) ?? 'EXECUTION_ERROR');
}

function numberField(fields: Record<string, unknown>, key: string): number {
  const value = fields[key];
  return typeof value === 'number' ? value : 0;
}

function arrayLength(fields: Record<string, unknown>, key: string): number {
  const value = fields[key];
  return Array.isArray(value) ? value.length : 0;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
