/**
 * @fileoverview Unit tests for LoopController
 */

import { describe, it, expect, vi } from 'vitest';
import { LoopController, executeLoop } from './loop-controller.js';
import { BaseExplorationAgent, type ExplorationAgent } from './agent.js';
import {
  ActionKind,
  LoopPhase,
  TerminationReason,
  createAction,
  type Action,
  type LoopState,
  type LoopStateView,
  type Observation,
} from '../types/index.js';
import { ConfigurationError } from '../types/errors.js';
import { createConfig, type ExplorationConfig } from '../config/config.js';
import { ResultCache } from '../cache/result-cache.js';
import { InMemoryRepository } from '../repository/code-repository.js';
import { Logger, MemoryTransport } from '../observability/logger.js';
import { MetricsAccumulator } from '../observability/metrics.js';
import { SessionTracer } from '../observability/tracer.js';
import { ToolRegistry } from '../tools/tool-registry.js';

function quietLogger(): Logger {
  return new Logger({ transports: [new MemoryTransport()] });
}

function testConfig(overrides: Partial<ExplorationConfig> = {}): ExplorationConfig {
  return createConfig({
    iterationDelayMs: 0,
    retryDelayMs: 0,
    cacheEnabled: false,
    tracingEnabled: false,
    ...overrides,
  });
}

/**
 * Agent driven by a planning function; the goal test is optional.
 */
function scriptedAgent(
  plan: (state: LoopStateView) => Action,
  extras: Partial<Pick<ExplorationAgent, 'reason' | 'isGoalAchieved' | 'observe'>> = {},
): ExplorationAgent {
  return {
    name: 'ScriptedAgent',
    reason: extras.reason ?? (state => `Thinking about iteration ${state.iteration}`),
    planAction: state => plan(state),
    generateSummary: state => `Took ${state.actionsTaken.length} actions`,
    ...(extras.isGoalAchieved ? { isGoalAchieved: extras.isGoalAchieved } : {}),
    ...(extras.observe ? { observe: extras.observe } : {}),
  };
}

const PROJECT_FILES = {
  'main.py': "print('hello')\n",
  'README.md': '# Demo\n\nA demo project\n',
};

describe('LoopController', () => {
  describe('construction', () => {
    it('should require a registry or a repository', () => {
      const agent = scriptedAgent(() => createAction(ActionKind.SCAN_DIRECTORY, 'Scan'));

      expect(() => new LoopController({ agent, config: testConfig(), logger: quietLogger() })).toThrow(
        ConfigurationError,
      );
    });

    it('should build a cache from the config when enabled', () => {
      const agent = scriptedAgent(() => createAction(ActionKind.SCAN_DIRECTORY, 'Scan'));
      const controller = new LoopController({
        agent,
        repository: new InMemoryRepository(),
        config: testConfig({ cacheEnabled: true, cacheMaxSize: 7 }),
        logger: quietLogger(),
      });

      expect(controller.getCache()?.stats().maxSize).toBe(7);
      expect(controller.getTracer()).toBeNull();
      expect(controller.getRegistry().has(ActionKind.CACHE_STORE)).toBe(true);
    });
  });

  describe('termination', () => {
    it('should stop at exactly maxIterations', async () => {
      const agent = scriptedAgent(state =>
        createAction(ActionKind.SCAN_DIRECTORY, `Scan ${state.iteration}`, { directory: '.' }),
      );

      const result = await executeLoop(
        { agent, repository: new InMemoryRepository(PROJECT_FILES), config: testConfig(), logger: quietLogger() },
        'Explore',
        5,
      );

      expect(result.iterations).toBe(5);
      expect(result.terminationReason).toBe(TerminationReason.MAX_ITERATIONS);
      expect(result.phase).toBe(LoopPhase.DONE);
      expect(result.goalAchieved).toBe(false);
      expect(result.actionsTaken).toEqual(['Scan 1', 'Scan 2', 'Scan 3', 'Scan 4', 'Scan 5']);
      expect(result.summary).toBe(
        'Loop ended (MAX_ITERATIONS): Budget exceeded: max_iterations (5)\n\nTook 5 actions',
      );
      expect(result.error).toBeUndefined();
    });

    it('should use the configured iteration limit when none is given', async () => {
      const agent = scriptedAgent(state =>
        createAction(ActionKind.SCAN_DIRECTORY, `Scan ${state.iteration}`),
      );

      const result = await executeLoop(
        {
          agent,
          repository: new InMemoryRepository(PROJECT_FILES),
          config: testConfig({ maxIterations: 2 }),
          logger: quietLogger(),
        },
        'Explore',
      );

      expect(result.iterations).toBe(2);
    });

    it('should stop once the total time budget is exceeded', async () => {
      let now = 0;
      const agent = scriptedAgent(
        state => createAction(ActionKind.SCAN_DIRECTORY, `Scan ${state.iteration}`),
        {
          reason: () => {
            now += 1000;
            return 'Keep going';
          },
        },
      );

      const result = await executeLoop(
        {
          agent,
          repository: new InMemoryRepository(PROJECT_FILES),
          config: testConfig({ totalTimeoutMs: 2500, iterationTimeoutMs: 10_000 }),
          logger: quietLogger(),
          clock: () => now,
        },
        'Explore',
      );

      expect(result.iterations).toBe(3);
      expect(result.terminationReason).toBe(TerminationReason.TOTAL_TIMEOUT);
      expect(result.phase).toBe(LoopPhase.DONE);
      expect(result.elapsedMs).toBe(3000);
    });

    it('should not start an iteration when the goal is already achieved', async () => {
      const plan = vi.fn(() => createAction(ActionKind.SCAN_DIRECTORY, 'Scan'));
      const agent = scriptedAgent(plan, { isGoalAchieved: () => true });

      const result = await executeLoop(
        { agent, repository: new InMemoryRepository(), config: testConfig(), logger: quietLogger() },
        'Nothing to do',
      );

      expect(result.iterations).toBe(0);
      expect(result.goalAchieved).toBe(true);
      expect(plan).not.toHaveBeenCalled();
    });
  });

  describe('end to end', () => {
    it('should scan and then read the README', async () => {
      const agent = scriptedAgent(
        state =>
          state.iteration === 1
            ? createAction(ActionKind.SCAN_DIRECTORY, 'Scan repository', { directory: '.' })
            : createAction(ActionKind.READ_FILE, 'Read README', { filePath: 'README.md' }),
        { isGoalAchieved: state => state.toolResults[ActionKind.READ_FILE] !== undefined },
      );

      const result = await executeLoop(
        { agent, repository: new InMemoryRepository(PROJECT_FILES), config: testConfig(), logger: quietLogger() },
        'Find the README',
      );

      expect(result.goalAchieved).toBe(true);
      expect(result.terminationReason).toBe(TerminationReason.GOAL_ACHIEVED);
      expect(result.iterations).toBe(2);
      expect(result.actionsTaken).toEqual(['Scan repository', 'Read README']);
      expect(result.observations).toEqual(['Scanned directory with 2 files', 'Read file with 4 lines']);
      expect(result.reasoningHistory).toEqual(['Thinking about iteration 1', 'Thinking about iteration 2']);
      expect(result.finalContext['last_successful_action']).toBe('Read README');
      expect(result.finalContext['last_result']).toMatchObject({
        filePath: 'README.md',
        content: '# Demo\n\nA demo project\n',
      });
      expect(result.errorCount).toBe(0);
      expect(result.sessionId).toBeNull();
    });

    it('should leave the goal open when no insight carries a completion marker', async () => {
      const agent = scriptedAgent(state =>
        state.iteration === 1
          ? createAction(ActionKind.SCAN_DIRECTORY, 'Scan repository', { directory: '.' })
          : createAction(ActionKind.READ_FILE, 'Read main.py', { filePath: 'main.py' }),
      );

      const result = await executeLoop(
        { agent, repository: new InMemoryRepository(PROJECT_FILES), config: testConfig(), logger: quietLogger() },
        'Understand main.py',
        2,
      );

      expect(result.actionsTaken).toEqual(['Scan repository', 'Read main.py']);
      expect(result.observations).toEqual(['Scanned directory with 2 files', 'Read file with 2 lines']);
      expect(result.goalAchieved).toBe(false);
      expect(result.terminationReason).toBe(TerminationReason.MAX_ITERATIONS);
      expect(result.finalContext['last_successful_action']).toBe('Read main.py');
    });

    it('should end on a completion marker with the default goal test', async () => {
      class MarkerAgent extends BaseExplorationAgent {
        readonly name = 'MarkerAgent';

        reason(): string {
          return 'Read the README';
        }

        planAction(): Action {
          return createAction(ActionKind.READ_FILE, 'Read README', { filePath: 'README.md' });
        }

        override observe(state: LoopState, observation: Observation): void {
          super.observe(state, observation);
          state.observations.push('Exploration completed');
        }

        generateSummary(): string {
          return 'Done';
        }
      }

      const result = await executeLoop(
        {
          agent: new MarkerAgent(),
          repository: new InMemoryRepository(PROJECT_FILES),
          config: testConfig(),
          logger: quietLogger(),
        },
        'Read docs',
      );

      expect(result.iterations).toBe(1);
      expect(result.goalAchieved).toBe(true);
      expect(result.summary).toBe('Loop ended (GOAL_ACHIEVED): Goal achieved after 1 iterations\n\nDone');
    });

    it('should count cache hits for repeated reads', async () => {
      const agent = scriptedAgent(state =>
        createAction(ActionKind.READ_FILE, `Read main ${state.iteration}`, { filePath: 'main.py' }),
      );

      const result = await executeLoop(
        {
          agent,
          repository: new InMemoryRepository(PROJECT_FILES),
          config: testConfig(),
          cache: new ResultCache({ maxSize: 10, ttlMs: 60_000, logger: quietLogger() }),
          logger: quietLogger(),
        },
        'Read main',
        3,
      );

      expect(result.cacheHits).toBe(2);
      expect(result.actionsTaken).toHaveLength(3);
    });
  });

  describe('error handling', () => {
    it('should open the circuit breaker on always-invalid actions without calling the tool', async () => {
      const readTool = vi.fn(() => ({ content: 'unused' }));
      const registry = new ToolRegistry();
      registry.register(ActionKind.READ_FILE, readTool);
      const agent = scriptedAgent(() => createAction(ActionKind.READ_FILE, 'Read nothing'));

      const result = await executeLoop(
        { agent, registry, config: testConfig(), logger: quietLogger() },
        'Read',
      );

      expect(result.iterations).toBeLessThanOrEqual(3);
      expect(result.iterations).toBe(3);
      expect(result.terminationReason).toBe(TerminationReason.CIRCUIT_BREAKER);
      expect(result.phase).toBe(LoopPhase.ABORTED);
      expect(result.goalAchieved).toBe(false);
      expect(result.actionsTaken).toEqual([]);
      expect(result.errorCount).toBe(0);
      expect(readTool).not.toHaveBeenCalled();
      expect(result.summary).toBe(
        'Loop ended (CIRCUIT_BREAKER): Circuit breaker opened after 3 consecutive errors\n\nTook 0 actions',
      );
    });

    it('should record a failed action once its retries are exhausted', async () => {
      const registry = new ToolRegistry();
      const searchTool = vi.fn(() => {
        throw new Error('index unavailable');
      });
      registry.register(ActionKind.SEARCH_FILES, searchTool);
      const agent = scriptedAgent(state =>
        createAction(ActionKind.SEARCH_FILES, `Search ${state.iteration}`, { pattern: 'todo' }),
      );

      const result = await executeLoop(
        { agent, registry, config: testConfig({ maxToolRetries: 1 }), logger: quietLogger() },
        'Search',
        1,
      );

      expect(searchTool).toHaveBeenCalledTimes(2);
      expect(result.actionsTaken).toEqual(['Search 1']);
      expect(result.errorCount).toBe(1);
      expect(result.observations).toEqual(['Action failed: index unavailable']);
      expect(result.finalContext['last_error']).toBe('Action failed: index unavailable');
    });

    it('should survive an exception in reasoning and continue', async () => {
      const agent = scriptedAgent(
        state => createAction(ActionKind.SCAN_DIRECTORY, `Scan ${state.iteration}`),
        {
          reason: state => {
            if (state.iteration === 1) {
              throw new Error('model offline');
            }
            return 'Recovered';
          },
        },
      );

      const result = await executeLoop(
        { agent, repository: new InMemoryRepository(PROJECT_FILES), config: testConfig(), logger: quietLogger() },
        'Explore',
        3,
      );

      expect(result.iterations).toBe(3);
      expect(result.errorCount).toBe(1);
      expect(result.reasoningHistory).toEqual(['Recovered', 'Recovered']);
      expect(result.actionsTaken).toEqual(['Scan 2', 'Scan 3']);
      expect(result.terminationReason).toBe(TerminationReason.MAX_ITERATIONS);
    });

    it('should abort once the error budget is spent', async () => {
      const agent = scriptedAgent(() => {
        throw new Error('cannot plan');
      });

      const result = await executeLoop(
        {
          agent,
          repository: new InMemoryRepository(),
          config: testConfig({ maxErrors: 2, maxConsecutiveErrors: 5 }),
          logger: quietLogger(),
        },
        'Explore',
      );

      expect(result.iterations).toBe(2);
      expect(result.errorCount).toBe(2);
      expect(result.terminationReason).toBe(TerminationReason.ERROR_BUDGET);
      expect(result.phase).toBe(LoopPhase.ABORTED);
      expect(result.error).toBeUndefined();
    });

    it('should stop at the first exception when error recovery is disabled', async () => {
      const agent = scriptedAgent(() => {
        throw new Error('cannot plan');
      });

      const result = await executeLoop(
        {
          agent,
          repository: new InMemoryRepository(),
          config: testConfig({ errorRecoveryEnabled: false }),
          logger: quietLogger(),
        },
        'Explore',
      );

      expect(result.iterations).toBe(1);
      expect(result.terminationReason).toBe(TerminationReason.ERROR_BUDGET);
    });

    it('should abandon iterations that exceed their time budget', async () => {
      let now = 0;
      const readTool = vi.fn(() => ({ content: 'x' }));
      const registry = new ToolRegistry();
      registry.register(ActionKind.READ_FILE, readTool);
      const agent = scriptedAgent(
        () => createAction(ActionKind.READ_FILE, 'Read', { filePath: 'a.txt' }),
        {
          reason: () => {
            now += 100;
            return 'Slow thought';
          },
        },
      );

      const result = await executeLoop(
        {
          agent,
          registry,
          config: testConfig({ iterationTimeoutMs: 50 }),
          logger: quietLogger(),
          clock: () => now,
        },
        'Read',
      );

      expect(readTool).not.toHaveBeenCalled();
      expect(result.reasoningHistory).toHaveLength(3);
      expect(result.errorCount).toBe(3);
      expect(result.terminationReason).toBe(TerminationReason.CIRCUIT_BREAKER);
    });

    it('should count a timed-out action with exhausted retries as one error', async () => {
      let now = 0;
      const registry = new ToolRegistry();
      registry.register(ActionKind.SEARCH_FILES, () => {
        now += 100;
        throw new Error('index unavailable');
      });
      const agent = scriptedAgent(state =>
        createAction(ActionKind.SEARCH_FILES, `Search ${state.iteration}`, { pattern: 'todo' }),
      );

      const result = await executeLoop(
        {
          agent,
          registry,
          config: testConfig({ maxToolRetries: 0, iterationTimeoutMs: 50 }),
          logger: quietLogger(),
          clock: () => now,
        },
        'Search',
        1,
      );

      expect(result.actionsTaken).toEqual(['Search 1']);
      expect(result.observations).toEqual([]);
      expect(result.errorCount).toBe(1);
      expect(result.terminationReason).toBe(TerminationReason.MAX_ITERATIONS);
    });

    it('should report internal failures without rejecting', async () => {
      const agent = scriptedAgent(() => createAction(ActionKind.SCAN_DIRECTORY, 'Scan'), {
        isGoalAchieved: () => {
          throw new Error('broken predicate');
        },
      });

      const result = await executeLoop(
        { agent, repository: new InMemoryRepository(), config: testConfig(), logger: quietLogger() },
        'Explore',
      );

      expect(result.terminationReason).toBe(TerminationReason.INTERNAL_ERROR);
      expect(result.phase).toBe(LoopPhase.ABORTED);
      expect(result.error).toBe('broken predicate');
      expect(result.summary).toBe(
        'Loop ended (INTERNAL_ERROR): Internal error: broken predicate\n\nTook 0 actions',
      );
    });
  });

  describe('stuck detection', () => {
    it('should record recoveries and escalate after three', async () => {
      const agent = scriptedAgent(() =>
        createAction(ActionKind.SCAN_DIRECTORY, 'Scan root', { directory: '.' }),
      );
      const controller = new LoopController({
        agent,
        repository: new InMemoryRepository(PROJECT_FILES),
        config: testConfig(),
        logger: quietLogger(),
      });
      const onStuck = vi.fn();
      controller.on('loop:stuck', onStuck);

      const result = await controller.executeLoop('Explore');

      expect(result.iterations).toBe(8);
      expect(result.terminationReason).toBe(TerminationReason.STUCK_ESCALATION);
      expect(result.phase).toBe(LoopPhase.ABORTED);
      expect(result.finalContext['recovery_strategy']).toBe('switch_to_file_search');
      expect(onStuck).toHaveBeenCalledTimes(4);
      expect(onStuck).toHaveBeenLastCalledWith('repeat', { escalated: true });
    });

    it('should not detect again after iterations that add no action', async () => {
      const agent = scriptedAgent(
        () => createAction(ActionKind.SCAN_DIRECTORY, 'Scan root', { directory: '.' }),
        {
          reason: state => {
            if (state.iteration > 5) {
              throw new Error('model offline');
            }
            return 'Scan again';
          },
        },
      );
      const controller = new LoopController({
        agent,
        repository: new InMemoryRepository(PROJECT_FILES),
        config: testConfig({ maxConsecutiveErrors: 10, maxErrors: 10 }),
        logger: quietLogger(),
      });
      const onStuck = vi.fn();
      controller.on('loop:stuck', onStuck);

      const result = await controller.executeLoop('Explore', 9);

      expect(onStuck).toHaveBeenCalledTimes(1);
      expect(onStuck).toHaveBeenCalledWith('repeat', {
        escalated: false,
        strategy: 'switch_to_file_search',
      });
      expect(result.iterations).toBe(9);
      expect(result.errorCount).toBe(4);
      expect(result.terminationReason).toBe(TerminationReason.MAX_ITERATIONS);
    });

    it('should skip detection when disabled', async () => {
      const agent = scriptedAgent(() => createAction(ActionKind.SCAN_DIRECTORY, 'Scan root'));

      const result = await executeLoop(
        {
          agent,
          repository: new InMemoryRepository(PROJECT_FILES),
          config: testConfig({ stuckDetectionEnabled: false }),
          logger: quietLogger(),
        },
        'Explore',
        10,
      );

      expect(result.terminationReason).toBe(TerminationReason.MAX_ITERATIONS);
      expect(result.finalContext['recovery_strategy']).toBeUndefined();
    });
  });

  describe('tracing and events', () => {
    it('should trace every phase into a session', async () => {
      const metrics = new MetricsAccumulator();
      const tracer = new SessionTracer({ logger: quietLogger(), metrics });
      const agent = scriptedAgent(
        state => createAction(ActionKind.SCAN_DIRECTORY, `Scan ${state.iteration}`),
      );
      const controller = new LoopController({
        agent,
        repository: new InMemoryRepository(PROJECT_FILES),
        config: testConfig(),
        tracer,
        logger: quietLogger(),
      });
      const phases: string[] = [];
      controller.on('phase:complete', phase => phases.push(phase));
      const onEnd = vi.fn();
      controller.on('loop:end', onEnd);

      const result = await controller.executeLoop('Explore', 2);

      expect(result.sessionId).not.toBeNull();
      expect(phases).toEqual(['reason', 'act', 'observe', 'reason', 'act', 'observe']);
      expect(tracer.getActiveSessionIds()).toEqual([]);
      expect(metrics.snapshot()).toMatchObject({
        totalSessions: 1,
        totalIterations: 2,
        agentUsage: { ScriptedAgent: 1 },
      });
      expect(onEnd).toHaveBeenCalledWith(result);
    });

    it('should resolve when loop listeners throw', async () => {
      const transport = new MemoryTransport();
      const tracer = new SessionTracer({ logger: quietLogger(), metrics: new MetricsAccumulator() });
      const endSession = vi.spyOn(tracer, 'endSession');
      const agent = scriptedAgent(state => createAction(ActionKind.SCAN_DIRECTORY, `Scan ${state.iteration}`));
      const controller = new LoopController({
        agent,
        repository: new InMemoryRepository(PROJECT_FILES),
        config: testConfig(),
        tracer,
        logger: new Logger({ module: 'loop', transports: [transport] }),
      });
      controller.on('loop:start', () => {
        throw new Error('start listener failed');
      });
      const onEnd = vi.fn(() => {
        throw new Error('end listener failed');
      });
      controller.on('loop:end', onEnd);

      const result = await controller.executeLoop('Explore', 1);

      expect(result.terminationReason).toBe(TerminationReason.MAX_ITERATIONS);
      expect(result.error).toBeUndefined();
      expect(onEnd).toHaveBeenCalledTimes(1);
      expect(endSession).toHaveBeenCalledTimes(1);
      expect(tracer.getActiveSessionIds()).toEqual([]);
      const failures = transport
        .findByModule('loop')
        .filter(entry => entry.message === 'Event listener failed')
        .map(entry => entry.data['event']);
      expect(failures).toEqual(['loop:start', 'loop:end']);
    });

    it('should report lifecycle phase changes and end in the lifecycle phase', async () => {
      const tracer = new SessionTracer({ logger: quietLogger(), metrics: new MetricsAccumulator() });
      const endSession = vi.spyOn(tracer, 'endSession');
      const agent = scriptedAgent(() => createAction(ActionKind.SCAN_DIRECTORY, 'Scan root'));
      const controller = new LoopController({
        agent,
        repository: new InMemoryRepository(PROJECT_FILES),
        config: testConfig(),
        tracer,
        logger: quietLogger(),
      });
      const changes: Array<[LoopPhase, LoopPhase, number]> = [];
      controller.on('loop:phase', (from, to, iteration) => {
        changes.push([from, to, iteration]);
      });

      const result = await controller.executeLoop('Explore', 1);

      expect(changes).toEqual([
        [LoopPhase.INIT, LoopPhase.REASONING, 1],
        [LoopPhase.REASONING, LoopPhase.ACTING, 1],
        [LoopPhase.ACTING, LoopPhase.OBSERVING, 1],
        [LoopPhase.OBSERVING, LoopPhase.DONE, 1],
      ]);
      expect(result.phase).toBe(LoopPhase.DONE);
      expect(endSession).toHaveBeenCalledTimes(1);
      expect(endSession.mock.calls[0][1]).toMatchObject({
        terminationReason: TerminationReason.MAX_ITERATIONS,
        phaseHistory: [
          { phase: LoopPhase.INIT, iteration: 0 },
          { phase: LoopPhase.REASONING, iteration: 1 },
          { phase: LoopPhase.ACTING, iteration: 1 },
          { phase: LoopPhase.OBSERVING, iteration: 1 },
          { phase: LoopPhase.DONE, iteration: 1, exitedAt: null },
        ],
      });
    });

    it('should trace failed iterations as errors', async () => {
      const agent = scriptedAgent(() => {
        throw new Error('cannot plan');
      });
      const controller = new LoopController({
        agent,
        repository: new InMemoryRepository(),
        config: testConfig({ maxIterations: 1 }),
        tracer: new SessionTracer({ logger: quietLogger(), metrics: new MetricsAccumulator() }),
        logger: quietLogger(),
      });
      const phases: Array<[string, boolean]> = [];
      controller.on('phase:complete', (phase, _iteration, _ms, success) => phases.push([phase, success]));

      await controller.executeLoop('Explore');

      expect(phases).toEqual([
        ['reason', true],
        ['error', false],
      ]);
    });
  });
});
