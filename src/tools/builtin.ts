/**
 * @fileoverview Wiring of the built-in tools into a registry.
 *
 * @module explorer/tools/builtin
 * @version 0.1.0
 */

import { ActionKind } from '../types/core.types.js';
import type { ToolFunction } from '../types/tools.types.js';
import type { CodeRepository } from '../repository/code-repository.js';
import type { ResultCache } from '../cache/result-cache.js';
import { ToolRegistry } from './tool-registry.js';
import { createRepositoryTools } from './repository-tools.js';
import { createLlmTools, type LlmClient } from './llm-tools.js';
import { createCacheTools } from './cache-tools.js';

export interface BuiltinToolsOptions {
  readonly repository: CodeRepository;
  /** Real LLM client; the heuristic client answers when null or failing */
  readonly llmClient?: LlmClient | null;
  readonly cache?: ResultCache | null;
}

/**
 * Creates a registry holding a tool for every action kind.
 */
export function createBuiltinRegistry(options: BuiltinToolsOptions): ToolRegistry {
  const registry = new ToolRegistry();
  registerAll(registry, createRepositoryTools(options.repository));
  registerAll(registry, createLlmTools(options.llmClient ?? null));
  registerAll(registry, createCacheTools(options.cache ?? null));
  return registry;
}

function registerAll(
  registry: ToolRegistry,
  tools: Readonly<Partial<Record<ActionKind, ToolFunction>>>,
): void {
  for (const kind of Object.values(ActionKind)) {
    const execute = tools[kind];
    if (execute !== undefined) {
      registry.register(kind, execute);
    }
  }
}
