/**
 * @fileoverview Tools module public exports.
 *
 * @module explorer/tools
 * @version 0.1.0
 */

export { ToolRegistry, type ToolRegistryEvents, type InvokeOptions } from './tool-registry.js';
export {
  ToolExecutor,
  CACHEABLE_KINDS,
  buildCacheKey,
  canonicalJson,
  generateInsight,
  calculateConfidence,
  classifyToolError,
  type ToolErrorClass,
  type ToolExecutorConfig,
  type ToolExecutorOptions,
  type ExecutionOutcome,
} from './tool-executor.js';
export {
  PARAMETER_SCHEMAS,
  validateParameters,
  validateResult,
  isRecord,
} from './validation.js';
export {
  createRepositoryTools,
  scanDirectory,
  listFiles,
  readFile,
  searchFiles,
  analyzeCode,
  detectLanguage,
  extractKeyPatterns,
  MAX_MATCHES_PER_FILE,
} from './repository-tools.js';
export {
  createLlmTools,
  HeuristicLlmClient,
  type LlmClient,
  type ReasoningRequest,
  type ReasoningResponse,
  type SummaryRequest,
  type SummaryResponse,
} from './llm-tools.js';
export { createCacheTools } from './cache-tools.js';
export { createBuiltinRegistry, type BuiltinToolsOptions } from './builtin.js';
