/**
 * @fileoverview Unit tests for ToolRegistry
 */

import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest';
import { ToolRegistry } from './tool-registry.js';
import { ActionKind, ToolTimeoutError } from '../types/index.js';
import type { ExecutionLogger, ToolCallContext } from '../types/index.js';

const silentLogger: ExecutionLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

describe('ToolRegistry', () => {
  let registry: ToolRegistry;

  beforeEach(() => {
    registry = new ToolRegistry();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('registration', () => {
    it('should register a tool and emit an event', () => {
      const onRegistered = vi.fn();
      registry.on('tool:registered', onRegistered);

      registry.register(ActionKind.READ_FILE, () => ({ content: 'x' }));

      expect(registry.has(ActionKind.READ_FILE)).toBe(true);
      expect(registry.kinds()).toEqual([ActionKind.READ_FILE]);
      expect(onRegistered).toHaveBeenCalledTimes(1);
    });

    it('should reject duplicate registration', () => {
      registry.register(ActionKind.READ_FILE, () => null);

      expect(() => registry.register(ActionKind.READ_FILE, () => null)).toThrow(
        "Tool for 'read_file' is already registered",
      );
    });

    it('should replace and unregister tools', async () => {
      registry.register(ActionKind.READ_FILE, () => 'old');
      registry.replace(ActionKind.READ_FILE, () => 'new');

      await expect(
        registry.invoke(ActionKind.READ_FILE, {}, { timeoutMs: 100, logger: silentLogger }),
      ).resolves.toBe('new');

      expect(registry.unregister(ActionKind.READ_FILE)).toBe(true);
      expect(registry.unregister(ActionKind.READ_FILE)).toBe(false);
    });
  });

  describe('invoke', () => {
    it('should pass parameters and call context to the tool', async () => {
      let seen: ToolCallContext | null = null;
      registry.register(ActionKind.SEARCH_FILES, (params, context) => {
        seen = context;
        return { results: [params['pattern']] };
      });

      const result = await registry.invoke(
        ActionKind.SEARCH_FILES,
        { pattern: 'todo' },
        { timeoutMs: 100, attempt: 2, logger: silentLogger },
      );

      expect(result).toEqual({ results: ['todo'] });
      expect(seen).toMatchObject({ attempt: 2 });
    });

    it('should turn synchronous throws into rejections', async () => {
      registry.register(ActionKind.READ_FILE, () => {
        throw new Error('boom');
      });

      await expect(
        registry.invoke(ActionKind.READ_FILE, {}, { timeoutMs: 100, logger: silentLogger }),
      ).rejects.toThrow('boom');
    });

    it('should reject unknown kinds', async () => {
      await expect(
        registry.invoke(ActionKind.LIST_FILES, {}, { timeoutMs: 100, logger: silentLogger }),
      ).rejects.toThrow("No tool registered for 'list_files'");
    });

    it('should time out, abort the signal and ignore the late result', async () => {
      vi.useFakeTimers();
      let signal: AbortSignal | null = null;
      registry.register(ActionKind.SCAN_DIRECTORY, (_params, context) => {
        signal = context.abortSignal;
        return new Promise(resolve => setTimeout(() => resolve({ contents: [] }), 1_000));
      });

      const pending = registry.invoke(ActionKind.SCAN_DIRECTORY, {}, { timeoutMs: 50, logger: silentLogger });
      const assertion = expect(pending).rejects.toBeInstanceOf(ToolTimeoutError);
      await vi.advanceTimersByTimeAsync(50);
      await assertion;

      expect(signal).toMatchObject({ aborted: true });
      await vi.advanceTimersByTimeAsync(1_000);
      expect(registry.getMetrics(ActionKind.SCAN_DIRECTORY)?.failureCount).toBe(1);
    });
  });

  describe('metrics', () => {
    it('should track invocations and failures', async () => {
      let fail = false;
      registry.register(ActionKind.LIST_FILES, () => {
        if (fail) throw new Error('nope');
        return { files: [] };
      });

      await registry.invoke(ActionKind.LIST_FILES, {}, { timeoutMs: 100, logger: silentLogger });
      fail = true;
      await registry.invoke(ActionKind.LIST_FILES, {}, { timeoutMs: 100, logger: silentLogger }).catch(() => undefined);

      const metrics = registry.getMetrics(ActionKind.LIST_FILES);
      expect(metrics?.invocationCount).toBe(2);
      expect(metrics?.failureCount).toBe(1);
      expect(metrics?.lastInvokedAt).not.toBeNull();
    });
  });
});
