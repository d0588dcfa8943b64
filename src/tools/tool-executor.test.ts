/**
 * @fileoverview Unit tests for ToolExecutor
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  ToolExecutor,
  buildCacheKey,
  canonicalJson,
  classifyToolError,
  generateInsight,
  calculateConfidence,
  type ToolExecutorConfig,
} from './tool-executor.js';
import { ToolRegistry } from './tool-registry.js';
import { ResultCache } from '../cache/result-cache.js';
import { Logger, MemoryTransport } from '../observability/logger.js';
import {
  ActionKind,
  ExplorationError,
  Severity,
  ToolTimeoutError,
  createAction,
} from '../types/index.js';

const config: ToolExecutorConfig = {
  toolTimeoutMs: 1_000,
  maxToolRetries: 2,
  toolValidationEnabled: true,
  retryDelayMs: 25,
};

function createSleep() {
  return vi.fn(async (_ms: number): Promise<void> => undefined);
}

describe('ToolExecutor', () => {
  let registry: ToolRegistry;
  let transport: MemoryTransport;
  let logger: Logger;
  let sleep: ReturnType<typeof createSleep>;

  beforeEach(() => {
    registry = new ToolRegistry();
    transport = new MemoryTransport();
    logger = new Logger({ minLevel: Severity.DEBUG, transports: [transport], module: 'executor' });
    sleep = createSleep();
  });

  function createExecutor(overrides: Partial<ToolExecutorConfig> = {}, cache: ResultCache | null = null): ToolExecutor {
    return new ToolExecutor({ registry, config: { ...config, ...overrides }, cache, logger, sleep });
  }

  describe('parameter validation', () => {
    it('should not invoke the tool when a required parameter is missing', async () => {
      const tool = vi.fn(() => ({ content: 'never' }));
      registry.register(ActionKind.READ_FILE, tool);

      const outcome = await createExecutor().execute(createAction(ActionKind.READ_FILE, 'Read nothing'));

      expect(tool).not.toHaveBeenCalled();
      expect(outcome.attempted).toBe(false);
      expect(outcome.observation.success).toBe(false);
      expect(outcome.observation.insight).toBe('Action failed: Parameter validation failed: filePath: Required');
      expect(outcome.error?.code).toBe('VALIDATION_FAILED');
    });

    it('should skip validation when disabled', async () => {
      const tool = vi.fn(() => ({ anything: true }));
      registry.register(ActionKind.READ_FILE, tool);

      const outcome = await createExecutor({ toolValidationEnabled: false }).execute(
        createAction(ActionKind.READ_FILE, 'Read without checks'),
      );

      expect(tool).toHaveBeenCalledTimes(1);
      expect(outcome.observation.success).toBe(true);
    });
  });

  it('should fail without retrying when no tool is registered', async () => {
    const outcome = await createExecutor().execute(
      createAction(ActionKind.LIST_FILES, 'List', { pattern: '*' }),
    );

    expect(outcome.observation.insight).toBe("Action failed: No tool registered for 'list_files'");
    expect(outcome.attempted).toBe(false);
    expect(outcome.attempts).toBe(0);
    expect(sleep).not.toHaveBeenCalled();
  });

  describe('success', () => {
    it('should build insight and confidence from the result', async () => {
      registry.register(ActionKind.SCAN_DIRECTORY, () => ({ contents: [], totalFiles: 2 }));

      const observation = await createExecutor().act(
        createAction(ActionKind.SCAN_DIRECTORY, 'Scan root', { directory: '.' }),
      );

      expect(observation).toMatchObject({
        actionTaken: 'Scan root',
        success: true,
        insight: 'Scanned directory with 2 files',
        confidence: 0.9,
        result: { contents: [], totalFiles: 2 },
      });
    });
  });

  describe('retries', () => {
    it('should retry invalid results and succeed on a later attempt', async () => {
      const tool = vi
        .fn()
        .mockReturnValueOnce({ content: '' })
        .mockReturnValueOnce({ content: '# Demo', lineCount: 1 });
      registry.register(ActionKind.READ_FILE, tool);

      const outcome = await createExecutor().execute(
        createAction(ActionKind.READ_FILE, 'Read README', { filePath: 'README.md' }),
      );

      expect(outcome.observation.success).toBe(true);
      expect(outcome.attempts).toBe(2);
      expect(sleep).toHaveBeenCalledWith(25);
    });

    it('should fail with the last error once retries are exhausted', async () => {
      let calls = 0;
      registry.register(ActionKind.READ_FILE, () => {
        calls++;
        throw Object.assign(new Error(`missing #${calls}`), { code: 'ENOENT' });
      });

      const outcome = await createExecutor().execute(
        createAction(ActionKind.READ_FILE, 'Read gone', { filePath: 'gone.md' }),
      );

      expect(calls).toBe(3);
      expect(sleep).toHaveBeenCalledTimes(2);
      expect(outcome.attempted).toBe(true);
      expect(outcome.exhaustedRetries).toBe(true);
      expect(outcome.errorClass).toBe('file_not_found');
      expect(outcome.observation.insight).toBe('Action failed: missing #3');
      expect(outcome.error?.code).toBe('ENOENT');
      expect(transport.findByLevel(Severity.ERROR)).toHaveLength(1);
    });

    it('should treat error payloads as failures', async () => {
      registry.register(ActionKind.SEARCH_FILES, () => ({ error: 'index offline' }));

      const outcome = await createExecutor({ maxToolRetries: 0 }).execute(
        createAction(ActionKind.SEARCH_FILES, 'Search', { pattern: 'x' }),
      );

      expect(outcome.observation.insight).toBe('Action failed: Tool returned error: index offline');
      expect(outcome.error?.code).toBe('RESULT_INVALID');
    });
  });

  describe('caching', () => {
    it('should serve repeated cacheable actions from the cache', async () => {
      const cache = new ResultCache({ maxSize: 10, ttlMs: 60_000, logger });
      const tool = vi.fn(() => ({ content: '# Demo', lineCount: 1 }));
      registry.register(ActionKind.READ_FILE, tool);
      const executor = createExecutor({}, cache);

      const first = await executor.execute(
        createAction(ActionKind.READ_FILE, 'Read README', { filePath: 'README.md', maxLines: 50 }),
      );
      const second = await executor.execute(
        createAction(ActionKind.READ_FILE, 'Read README again', { maxLines: 50, filePath: 'README.md' }),
      );

      expect(tool).toHaveBeenCalledTimes(1);
      expect(first.cacheHit).toBe(false);
      expect(second.cacheHit).toBe(true);
      expect(second.observation.result).toEqual({ content: '# Demo', lineCount: 1 });
    });

    it('should not cache non-cacheable kinds', async () => {
      const cache = new ResultCache({ maxSize: 10, ttlMs: 60_000, logger });
      registry.register(ActionKind.LLM_REASONING, () => ({ reasoning: 'r' }));

      await createExecutor({}, cache).execute(
        createAction(ActionKind.LLM_REASONING, 'Think', { question: 'what next?' }),
      );

      expect(cache.size()).toBe(0);
    });
  });
});

describe('helpers', () => {
  it('should build key-order independent cache keys', () => {
    expect(buildCacheKey(ActionKind.READ_FILE, { maxLines: 5, filePath: 'a' })).toBe(
      'read_file:{"filePath":"a","maxLines":5}',
    );
    expect(canonicalJson({ b: [{ d: 1, c: 2 }], a: null })).toBe('{"a":null,"b":[{"c":2,"d":1}]}');
  });

  it('should word insights per kind', () => {
    expect(generateInsight(ActionKind.READ_FILE, { lineCount: 12 })).toBe('Read file with 12 lines');
    expect(generateInsight(ActionKind.SEARCH_FILES, { results: [1, 2] })).toBe('Found 2 files matching pattern');
    expect(generateInsight(ActionKind.ANALYZE_CODE, {})).toBe('Executed analyze_code');
  });

  it('should score confidence per kind', () => {
    expect(calculateConfidence(ActionKind.SEARCH_FILES, { results: [] })).toBe(0.3);
    expect(calculateConfidence(ActionKind.SEARCH_FILES, { results: [1] })).toBe(0.8);
    expect(calculateConfidence(ActionKind.LIST_FILES, {})).toBe(0.7);
  });

  it('should classify thrown errors', () => {
    expect(classifyToolError(new ToolTimeoutError(ActionKind.READ_FILE, 10))).toBe('timeout');
    expect(classifyToolError(Object.assign(new Error('denied'), { code: 'EACCES' }))).toBe('permission_denied');
    expect(classifyToolError(new Error('Network unreachable'))).toBe('network_error');
    expect(classifyToolError(new ExplorationError('No such file or directory: a', 'ENOENT', true))).toBe(
      'file_not_found',
    );
    expect(classifyToolError('weird')).toBe('generic_error');
  });
});
