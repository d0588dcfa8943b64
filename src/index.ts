/**
 * @fileoverview Public API of the exploration engine.
 *
 * A Reason → Act → Observe loop controller driving pluggable agents over a
 * code repository, with cached and retried tool calls, stuck-loop
 * detection and session tracing.
 *
 * @example
 * ```typescript
 * import { DocumentationAgent, LocalRepository, executeLoop } from 'repo-explorer';
 *
 * const result = await executeLoop(
 *   { agent: new DocumentationAgent(), repository: new LocalRepository('.') },
 *   'Explain the install steps',
 * );
 * console.log(result.summary);
 * ```
 *
 * @module explorer
 * @version 0.1.0
 */

export * from './types/index.js';
export * from './config/index.js';
export * from './cache/index.js';
export * from './repository/index.js';
export * from './observability/index.js';
export * from './tools/index.js';
export * from './agent/index.js';
