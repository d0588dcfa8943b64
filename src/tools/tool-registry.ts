/**
 * @fileoverview Tool Registry - maps each action kind to the function that
 * executes it.
 *
 * The registry owns dispatch and the per-call timeout. It tracks usage
 * metrics per tool and emits events for every invocation. Validation,
 * caching and retries live one level up, in the tool executor.
 *
 * @module explorer/tools/tool-registry
 * @version 0.1.0
 */

import { v4 as uuidv4 } from 'uuid';
import { EventEmitter } from 'eventemitter3';
import type { ActionKind, ActionParameters, UniqueId } from '../types/core.types.js';
import { createUniqueId, createTimestamp } from '../types/core.types.js';
import type { ExecutionLogger, ToolFunction, ToolRegistryEntry } from '../types/tools.types.js';
import { ToolTimeoutError, toError } from '../types/errors.js';

/**
 * Events emitted by the Tool Registry.
 */
export interface ToolRegistryEvents {
  'tool:registered': (entry: ToolRegistryEntry) => void;
  'tool:unregistered': (kind: ActionKind) => void;
  'tool:invoked': (kind: ActionKind, executionId: UniqueId) => void;
  'tool:completed': (kind: ActionKind, executionId: UniqueId, durationMs: number) => void;
  'tool:failed': (kind: ActionKind, executionId: UniqueId, error: Error) => void;
}

/**
 * Options for a single invocation.
 */
export interface InvokeOptions {
  readonly timeoutMs: number;
  readonly attempt?: number;
  readonly logger: ExecutionLogger;
}

/**
 * Central registry for tool dispatch.
 *
 * @example
 * ```typescript
 * const registry = new ToolRegistry();
 * registry.register(ActionKind.READ_FILE, async params => repo.readFile(String(params.filePath)));
 * const result = await registry.invoke(ActionKind.READ_FILE, { filePath: 'README.md' }, {
 *   timeoutMs: 5_000,
 *   logger,
 * });
 * ```
 */
export class ToolRegistry extends EventEmitter<ToolRegistryEvents> {
  private readonly tools = new Map<ActionKind, ToolRegistryEntry>();

  /**
   * Registers the tool for an action kind.
   *
   * @throws Error if a tool is already registered for the kind
   */
  register(kind: ActionKind, execute: ToolFunction): void {
    if (this.tools.has(kind)) {
      throw new Error(`Tool for '${kind}' is already registered`);
    }

    const entry: ToolRegistryEntry = {
      kind,
      execute,
      registeredAt: createTimestamp(),
      invocationCount: 0,
      failureCount: 0,
      lastInvokedAt: null,
      averageDurationMs: 0,
    };

    this.tools.set(kind, entry);
    this.emit('tool:registered', entry);
  }

  /**
   * Registers or replaces the tool for an action kind.
   */
  replace(kind: ActionKind, execute: ToolFunction): void {
    this.unregister(kind);
    this.register(kind, execute);
  }

  /**
   * @returns true if the tool was unregistered, false if not found
   */
  unregister(kind: ActionKind): boolean {
    const existed = this.tools.delete(kind);
    if (existed) {
      this.emit('tool:unregistered', kind);
    }
    return existed;
  }

  has(kind: ActionKind): boolean {
    return this.tools.has(kind);
  }

  /**
   * Lists the registered action kinds.
   */
  kinds(): ReadonlyArray<ActionKind> {
    return [...this.tools.keys()];
  }

  /**
   * Invokes the tool for a kind, racing it against a timer.
   *
   * On expiry the call's abort signal fires and the call is abandoned; a
   * late settlement is ignored.
   *
   * @throws Error if no tool is registered for the kind
   * @throws ToolTimeoutError if the call does not settle in time
   */
  async invoke(kind: ActionKind, params: ActionParameters, options: InvokeOptions): Promise<unknown> {
    const entry = this.tools.get(kind);
    if (!entry) {
      throw new Error(`No tool registered for '${kind}'`);
    }

    const executionId = createUniqueId(uuidv4());
    const abortController = new AbortController();
    const startTime = Date.now();

    this.emit('tool:invoked', kind, executionId);

    try {
      const result = await this.executeWithTimeout(
        kind,
        () => entry.execute(params, {
          executionId,
          attempt: options.attempt ?? 0,
          abortSignal: abortController.signal,
          logger: options.logger,
        }),
        abortController,
        options.timeoutMs,
      );

      const durationMs = Date.now() - startTime;
      this.updateMetrics(kind, durationMs, true);
      this.emit('tool:completed', kind, executionId, durationMs);
      return result;
    } catch (error) {
      this.updateMetrics(kind, Date.now() - startTime, false);
      this.emit('tool:failed', kind, executionId, toError(error));
      throw error;
    }
  }

  /**
   * Gets metrics for a specific tool.
   */
  getMetrics(kind: ActionKind): ToolRegistryEntry | null {
    return this.tools.get(kind) ?? null;
  }

  // ============ Private Methods ============

  private executeWithTimeout(
    kind: ActionKind,
    run: () => unknown,
    abortController: AbortController,
    timeoutMs: number,
  ): Promise<unknown> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        abortController.abort();
        reject(new ToolTimeoutError(kind, timeoutMs));
      }, timeoutMs);

      // Synchronous throws become rejections of the same chain
      Promise.resolve()
        .then(run)
        .then(
          result => {
            clearTimeout(timer);
            resolve(result);
          },
          (error: unknown) => {
            clearTimeout(timer);
            reject(error);
          },
        );
    });
  }

  private updateMetrics(kind: ActionKind, durationMs: number, success: boolean): void {
    const entry = this.tools.get(kind);
    if (!entry) return;

    const newCount = entry.invocationCount + 1;
    const newAverage =
      (entry.averageDurationMs * entry.invocationCount + durationMs) / newCount;

    this.tools.set(kind, {
      ...entry,
      invocationCount: newCount,
      failureCount: entry.failureCount + (success ? 0 : 1),
      lastInvokedAt: createTimestamp(),
      averageDurationMs: newAverage,
    });
  }
}
