/**
 * @fileoverview Loop Controller - drives an agent through Reason → Act → Observe.
 *
 * The controller owns the loop state for one `executeLoop` call and is the
 * only component that decides when the loop ends. Each iteration:
 *
 * 1. REASONING - `agent.reason()`, recorded in the reasoning history
 * 2. ACTING - `agent.planAction()`, then the tool executor
 * 3. OBSERVING - `agent.observe()` or the default observer
 *
 * Between iterations it enforces the iteration and wall-clock budgets, the
 * consecutive-error circuit breaker, the error budget and stuck-loop
 * detection. Nothing thrown inside an iteration or by an event listener
 * escapes `executeLoop`.
 *
 * @module explorer/agent/loop-controller
 * @version 0.1.0
 */

import { EventEmitter } from 'eventemitter3';
import type {
  Action,
  LoopResult,
  LoopState,
  LoopStateView,
  Observation,
  UniqueId,
} from '../types/core.types.js';
import {
  LoopPhase,
  TerminationReason,
  createLoopState,
} from '../types/core.types.js';
import {
  BudgetExceededError,
  CircuitBreakerError,
  ConfigurationError,
  StuckLoopError,
  toError,
  toErrorMessage,
} from '../types/errors.js';
import { DEFAULT_EXPLORATION_CONFIG, type ExplorationConfig } from '../config/config.js';
import { ResultCache } from '../cache/result-cache.js';
import type { CodeRepository } from '../repository/code-repository.js';
import { Logger, createLogger } from '../observability/logger.js';
import {
  SessionTracer,
  getDefaultTracer,
  type TracePhase,
} from '../observability/tracer.js';
import { ToolRegistry } from '../tools/tool-registry.js';
import { ToolExecutor, type ExecutionOutcome } from '../tools/tool-executor.js';
import { createBuiltinRegistry } from '../tools/builtin.js';
import type { LlmClient } from '../tools/llm-tools.js';
import { LoopLifecycle } from './lifecycle.js';
import { defaultObserve, isGoalAchievedByMarkers, type ExplorationAgent } from './agent.js';
import {
  attemptRecovery,
  detectStuckPattern,
  type RecoveryOutcome,
  type StuckPattern,
} from './stuck-detector.js';

/**
 * Events emitted by the loop controller.
 */
export interface LoopControllerEvents {
  'loop:start': (goal: string, sessionId: UniqueId | null) => void;
  'iteration:start': (iteration: number, state: LoopStateView) => void;
  'phase:complete': (phase: TracePhase, iteration: number, durationMs: number, success: boolean) => void;
  'loop:phase': (from: LoopPhase, to: LoopPhase, iteration: number) => void;
  'loop:stuck': (pattern: StuckPattern, outcome: RecoveryOutcome) => void;
  'loop:end': (result: LoopResult) => void;
}

/**
 * Options for the loop controller. Either a registry or a repository must
 * be given; with only a repository the built-in tools are registered.
 */
export interface LoopControllerOptions {
  readonly agent: ExplorationAgent;
  readonly config?: ExplorationConfig;
  readonly registry?: ToolRegistry;
  readonly repository?: CodeRepository;
  /** LLM client for the built-in llm tools */
  readonly llmClient?: LlmClient | null;
  /** Result cache; built from the config when omitted, null disables caching */
  readonly cache?: ResultCache | null;
  /** Tracer; the default tracer or a new one when omitted, null disables tracing */
  readonly tracer?: SessionTracer | null;
  readonly logger?: Logger;
  /** Millisecond clock for budgets and recovery timestamps */
  readonly clock?: () => number;
  /** Pause between iterations and tool retries */
  readonly sleep?: (ms: number) => Promise<void>;
}

/**
 * Why and how the loop stopped.
 */
interface Termination {
  readonly reason: TerminationReason;
  readonly message: string;
}

/**
 * How an iteration ended. An abandoned iteration whose tool call already
 * exhausted its retries has had its error counted.
 */
type IterationOutcome =
  | { readonly kind: 'completed'; readonly success: boolean }
  | { readonly kind: 'abandoned'; readonly errorCounted: boolean }
  | { readonly kind: 'failed'; readonly error: Error };

/**
 * Runs exploration loops for one agent.
 *
 * @example
 * ```typescript
 * const controller = new LoopController({
 *   agent: new DocumentationAgent(),
 *   repository: new LocalRepository('./my-project'),
 *   config: createConfig({ maxIterations: 15 }),
 * });
 *
 * controller.on('loop:stuck', (pattern) => console.warn('stuck:', pattern));
 * const result = await controller.executeLoop('Map the documentation');
 * console.log(result.summary);
 * ```
 */
export class LoopController extends EventEmitter<LoopControllerEvents> {
  private readonly agent: ExplorationAgent;
  private readonly config: ExplorationConfig;
  private readonly registry: ToolRegistry;
  private readonly cache: ResultCache | null;
  private readonly tracer: SessionTracer | null;
  private readonly logger: Logger;
  private readonly executor: ToolExecutor;
  private readonly clock: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: LoopControllerOptions) {
    super();
    this.agent = options.agent;
    this.config = options.config ?? DEFAULT_EXPLORATION_CONFIG;
    this.clock = options.clock ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? createLogger('loop', { minLevel: this.config.logLevel });

    this.cache = options.cache !== undefined ? options.cache : this.createDefaultCache();
    this.tracer = options.tracer !== undefined ? options.tracer : this.createDefaultTracer();
    this.registry = this.resolveRegistry(options);

    this.executor = new ToolExecutor({
      registry: this.registry,
      config: this.config,
      cache: this.cache,
      logger: this.logger.child({ module: 'executor' }),
      sleep: this.sleep,
    });
  }

  getCache(): ResultCache | null {
    return this.cache;
  }

  getTracer(): SessionTracer | null {
    return this.tracer;
  }

  getRegistry(): ToolRegistry {
    return this.registry;
  }

  /**
   * Runs the loop until the goal is achieved or a budget ends it.
   * Never rejects; failures are reported in the result.
   */
  async executeLoop(goal: string, maxIterations?: number): Promise<LoopResult> {
    const state = createLoopState(goal, maxIterations ?? this.config.maxIterations);
    const startedAt = this.clock();
    const sessionId = this.startTraceSession(goal);
    const log = sessionId !== null ? this.logger.child({ bindings: { sessionId } }) : this.logger;

    const lifecycle = new LoopLifecycle(sessionId, this.clock);
    lifecycle.on('phase:change', (from, to, iteration) => {
      this.notify('loop:phase', log, () => this.emit('loop:phase', from, to, iteration));
    });

    this.notify('loop:start', log, () => this.emit('loop:start', goal, sessionId));
    log.info('Loop started', {
      agent: this.agent.name,
      goal,
      maxIterations: state.maxIterations,
    });

    let termination: Termination;
    let internalError: string | undefined;
    try {
      termination = await this.runIterations(state, lifecycle, sessionId, startedAt, log);
    } catch (error) {
      internalError = toErrorMessage(error);
      log.error('Loop failed', { iteration: state.iteration }, toError(error));
      termination = { reason: TerminationReason.INTERNAL_ERROR, message: `Internal error: ${internalError}` };
    }

    const result = await this.finishLoop(state, lifecycle, sessionId, startedAt, termination, log, internalError);
    this.notify('loop:end', log, () => this.emit('loop:end', result));
    return result;
  }

  // ============ Iteration Methods ============

  private async runIterations(
    state: LoopState,
    lifecycle: LoopLifecycle,
    sessionId: UniqueId | null,
    startedAt: number,
    log: Logger,
  ): Promise<Termination> {
    for (;;) {
      const stop = this.checkTermination(state, startedAt);
      if (stop !== null) {
        return stop;
      }

      state.iteration++;
      lifecycle.beginIteration(state.iteration);
      this.emit('iteration:start', state.iteration, state);
      log.debug('Iteration started', { iteration: state.iteration });
      const actionsBefore = state.actionsTaken.length;

      const outcome = await this.runIteration(state, lifecycle, sessionId);

      const failure = this.applyIterationOutcome(state, sessionId, outcome, log);
      if (failure !== null) {
        return failure;
      }

      if (this.config.stuckDetectionEnabled && state.actionsTaken.length > actionsBefore) {
        const escalation = this.checkStuck(state, log);
        if (escalation !== null) {
          return escalation;
        }
      }

      if (this.config.iterationDelayMs > 0) {
        await this.sleep(this.config.iterationDelayMs);
      }
    }
  }

  private async runIteration(
    state: LoopState,
    lifecycle: LoopLifecycle,
    sessionId: UniqueId | null,
  ): Promise<IterationOutcome> {
    const iterationStart = this.clock();

    try {
      const reasonStart = this.clock();
      const reasoning = await this.agent.reason(state);
      state.reasoningHistory.push(reasoning);
      this.tracePhase(sessionId, 'reason', state.iteration, { reasoning }, this.clock() - reasonStart, true);

      if (this.iterationExpired(iterationStart)) {
        return { kind: 'abandoned', errorCounted: false };
      }

      lifecycle.enter(LoopPhase.ACTING, 'Reasoning complete');
      const actStart = this.clock();
      const action = await this.agent.planAction(state, reasoning);
      const execution = await this.executor.execute(action);
      this.recordExecution(state, action, execution);

      const { observation } = execution;
      this.tracePhase(
        sessionId,
        'act',
        state.iteration,
        {
          action: action.description,
          kind: action.kind,
          success: observation.success,
          cacheHit: execution.cacheHit,
          attempts: execution.attempts,
        },
        this.clock() - actStart,
        observation.success,
        observation.success ? undefined : observation.insight,
      );

      if (this.iterationExpired(iterationStart)) {
        return { kind: 'abandoned', errorCounted: execution.exhaustedRetries };
      }

      lifecycle.enter(LoopPhase.OBSERVING, observation.success ? 'Action succeeded' : 'Action failed');
      const observeStart = this.clock();
      await this.observe(state, observation);
      this.tracePhase(
        sessionId,
        'observe',
        state.iteration,
        { insight: observation.insight, goalProgress: observation.goalProgress },
        this.clock() - observeStart,
        true,
      );

      return { kind: 'completed', success: observation.success };
    } catch (error) {
      return { kind: 'failed', error: toError(error) };
    }
  }

  /**
   * Updates error counters for the finished iteration and returns a
   * termination when the circuit breaker or error budget trips.
   */
  private applyIterationOutcome(
    state: LoopState,
    sessionId: UniqueId | null,
    outcome: IterationOutcome,
    log: Logger,
  ): Termination | null {
    switch (outcome.kind) {
      case 'completed':
        state.consecutiveErrors = outcome.success ? 0 : state.consecutiveErrors + 1;
        break;

      case 'abandoned': {
        const error = new BudgetExceededError('iteration_timeout', this.config.iterationTimeoutMs);
        if (outcome.errorCounted) {
          state.consecutiveErrors++;
        } else {
          this.countError(state);
        }
        this.tracePhase(sessionId, 'error', state.iteration, { error: error.message }, 0, false, error.message);
        log.warn('Iteration abandoned', { iteration: state.iteration, limitMs: error.limit });
        break;
      }

      case 'failed': {
        this.countError(state);
        this.tracePhase(
          sessionId,
          'error',
          state.iteration,
          { error: outcome.error.message },
          0,
          false,
          outcome.error.message,
        );
        log.error('Iteration failed', { iteration: state.iteration }, outcome.error);

        if (!this.config.errorRecoveryEnabled) {
          return {
            reason: TerminationReason.ERROR_BUDGET,
            message: `Error recovery is disabled; stopped after: ${outcome.error.message}`,
          };
        }
        break;
      }
    }

    if (state.consecutiveErrors >= this.config.maxConsecutiveErrors) {
      const error = new CircuitBreakerError(state.consecutiveErrors);
      log.error(error.message, { iteration: state.iteration });
      return { reason: TerminationReason.CIRCUIT_BREAKER, message: error.message };
    }

    if (state.errorCount >= this.config.maxErrors) {
      const message = `Error budget exhausted after ${state.errorCount} errors`;
      log.error(message, { iteration: state.iteration });
      return { reason: TerminationReason.ERROR_BUDGET, message };
    }

    return null;
  }

  private checkStuck(state: LoopState, log: Logger): Termination | null {
    const pattern = detectStuckPattern(state.actionsTaken, this.config.maxSameActionRepeats);
    if (pattern === null) {
      return null;
    }

    const recovery = attemptRecovery(state, this.clock());
    this.emit('loop:stuck', pattern, recovery);

    const error = new StuckLoopError(pattern, recovery.escalated);
    if (recovery.escalated) {
      log.error(error.message, { iteration: state.iteration, recoveries: state.stuckRecoveries.length });
      return { reason: TerminationReason.STUCK_ESCALATION, message: error.message };
    }

    log.warn(error.message, { iteration: state.iteration, strategy: recovery.strategy });
    return null;
  }

  private checkTermination(state: LoopStateView, startedAt: number): Termination | null {
    if (this.isGoalAchieved(state)) {
      return {
        reason: TerminationReason.GOAL_ACHIEVED,
        message: `Goal achieved after ${state.iteration} iterations`,
      };
    }

    if (state.iteration >= state.maxIterations) {
      const error = new BudgetExceededError('max_iterations', state.maxIterations);
      return { reason: TerminationReason.MAX_ITERATIONS, message: error.message };
    }

    if (this.clock() - startedAt > this.config.totalTimeoutMs) {
      const error = new BudgetExceededError('total_timeout', this.config.totalTimeoutMs);
      return { reason: TerminationReason.TOTAL_TIMEOUT, message: error.message };
    }

    return null;
  }

  // ============ Private Methods ============

  private recordExecution(state: LoopState, action: Action, execution: ExecutionOutcome): void {
    if (execution.cacheHit) {
      state.cacheHits++;
    }
    if (execution.attempted && (execution.observation.success || execution.exhaustedRetries)) {
      state.actionsTaken.push(action.description);
      state.actionKinds.push(action.kind);
    }
    if (execution.observation.success) {
      state.toolResults[action.kind] = execution.observation.result;
    }
    if (execution.exhaustedRetries) {
      state.errorCount++;
    }
  }

  private async observe(state: LoopState, observation: Observation): Promise<void> {
    if (this.agent.observe) {
      await this.agent.observe(state, observation);
    } else {
      defaultObserve(state, observation);
    }
  }

  private isGoalAchieved(state: LoopStateView): boolean {
    if (this.agent.isGoalAchieved) {
      return this.agent.isGoalAchieved(state);
    }
    return isGoalAchievedByMarkers(state);
  }

  private iterationExpired(iterationStart: number): boolean {
    return this.clock() - iterationStart > this.config.iterationTimeoutMs;
  }

  private countError(state: LoopState): void {
    state.errorCount++;
    state.consecutiveErrors++;
  }

  private tracePhase(
    sessionId: UniqueId | null,
    phase: TracePhase,
    iteration: number,
    content: Record<string, unknown>,
    durationMs: number,
    success: boolean,
    error?: string,
  ): void {
    if (this.tracer !== null && sessionId !== null) {
      this.tracer.tracePhase(sessionId, phase, iteration, content, durationMs, success, error);
    }
    this.emit('phase:complete', phase, iteration, durationMs, success);
  }

  private async finishLoop(
    state: LoopState,
    lifecycle: LoopLifecycle,
    sessionId: UniqueId | null,
    startedAt: number,
    termination: Termination,
    log: Logger,
    internalError?: string,
  ): Promise<LoopResult> {
    const phase = lifecycle.end(termination.reason, termination.message);

    const result: LoopResult = {
      sessionId,
      goal: state.goal,
      iterations: state.iteration,
      elapsedMs: this.clock() - startedAt,
      observations: [...state.observations],
      actionsTaken: [...state.actionsTaken],
      reasoningHistory: [...state.reasoningHistory],
      cacheHits: state.cacheHits,
      errorCount: state.errorCount,
      finalContext: { ...state.currentContext },
      goalAchieved: termination.reason === TerminationReason.GOAL_ACHIEVED,
      terminationReason: termination.reason,
      phase,
      summary: `Loop ended (${termination.reason}): ${termination.message}\n\n${this.agentSummary(state, log)}`,
      ...(internalError !== undefined ? { error: internalError } : {}),
    };

    if (this.tracer !== null && sessionId !== null) {
      try {
        await this.tracer.endSession(sessionId, { ...result, phaseHistory: lifecycle.getHistory() });
      } catch (error) {
        log.error('Failed to end trace session', {}, toError(error));
      }
    }

    log.info('Loop finished', {
      terminationReason: result.terminationReason,
      iterations: result.iterations,
      errors: result.errorCount,
      elapsedMs: result.elapsedMs,
    });
    return result;
  }

  private startTraceSession(goal: string): UniqueId | null {
    if (this.tracer === null) {
      return null;
    }
    try {
      return this.tracer.startSession(this.agent.name, goal);
    } catch (error) {
      this.logger.error('Failed to start trace session', {}, toError(error));
      return null;
    }
  }

  /**
   * Runs an emit whose listeners must not end the loop.
   */
  private notify(event: keyof LoopControllerEvents, log: Logger, emit: () => boolean): void {
    try {
      emit();
    } catch (error) {
      log.error('Event listener failed', { event }, toError(error));
    }
  }

  private agentSummary(state: LoopStateView, log: Logger): string {
    try {
      return this.agent.generateSummary(state);
    } catch (error) {
      log.error('Summary generation failed', {}, toError(error));
      return `Summary unavailable: ${toErrorMessage(error)}`;
    }
  }

  private createDefaultCache(): ResultCache | null {
    if (!this.config.cacheEnabled) {
      return null;
    }
    return new ResultCache({
      maxSize: this.config.cacheMaxSize,
      ttlMs: this.config.cacheTtlMs,
      directory: this.config.cacheDirectory,
      clock: this.clock,
      logger: this.logger.child({ module: 'cache' }),
    });
  }

  private createDefaultTracer(): SessionTracer | null {
    if (!this.config.tracingEnabled) {
      return null;
    }
    return getDefaultTracer() ?? new SessionTracer({
      traceDirectory: this.config.traceDirectory,
      logger: this.logger.child({ module: 'tracer' }),
    });
  }

  private resolveRegistry(options: LoopControllerOptions): ToolRegistry {
    if (options.registry) {
      return options.registry;
    }
    if (options.repository) {
      return createBuiltinRegistry({
        repository: options.repository,
        llmClient: options.llmClient ?? null,
        cache: this.cache,
      });
    }
    throw new ConfigurationError(['registry: either a tool registry or a repository is required']);
  }
}

/**
 * Convenience wrapper running a single loop.
 */
export function executeLoop(
  options: LoopControllerOptions,
  goal: string,
  maxIterations?: number,
): Promise<LoopResult> {
  return new LoopController(options).executeLoop(goal, maxIterations);
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
