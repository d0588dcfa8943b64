/**
 * @fileoverview Tool contract type definitions.
 *
 * Tools are the mechanism by which agents interact with a repository,
 * an LLM or the cache. The executor only knows the contract
 * `(params) → result | error`; everything else about a tool is opaque.
 *
 * @module explorer/types/tools
 * @version 0.1.0
 */

import type { ActionKind, ActionParameters, Timestamp, UniqueId } from './core.types.js';

/**
 * Logger interface handed to tool calls.
 */
export interface ExecutionLogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Context provided to each tool call.
 */
export interface ToolCallContext {
  /** Unique ID for this call */
  readonly executionId: UniqueId;

  /** Zero-based attempt number */
  readonly attempt: number;

  /** Aborted when the call times out; the call is abandoned either way */
  readonly abortSignal: AbortSignal;

  readonly logger: ExecutionLogger;
}

/**
 * Function signature every tool implements.
 */
export type ToolFunction<TResult = unknown> = (
  params: ActionParameters,
  context: ToolCallContext,
) => TResult | Promise<TResult>;

/**
 * Registry entry for a registered tool.
 */
export interface ToolRegistryEntry {
  readonly kind: ActionKind;
  readonly execute: ToolFunction;
  readonly registeredAt: Timestamp;
  readonly invocationCount: number;
  readonly failureCount: number;
  readonly lastInvokedAt: Timestamp | null;
  readonly averageDurationMs: number;
}

// ============ Built-in tool result shapes ============

export interface DirectoryEntry {
  readonly path: string;
  readonly isDirectory: boolean;
  readonly size: number;
}

export interface ScanDirectoryResult {
  readonly directory: string;
  readonly contents: ReadonlyArray<DirectoryEntry>;
  readonly totalFiles: number;
  readonly totalDirectories: number;
}

export interface ListedFile {
  readonly path: string;
  readonly size: number;
  readonly extension: string;
}

export interface ListFilesResult {
  readonly pattern: string;
  readonly directory: string;
  readonly files: ReadonlyArray<ListedFile>;
  readonly count: number;
}

export interface ReadFileResult {
  readonly filePath: string;
  readonly content: string;
  readonly lineCount: number;
  readonly truncated: boolean;
  readonly size: number;
}

export interface SearchMatch {
  readonly lineNumber: number;
  readonly content: string;
}

export interface SearchHit {
  readonly filePath: string;
  readonly matches: ReadonlyArray<SearchMatch>;
  readonly totalMatches: number;
}

export interface SearchFilesResult {
  readonly pattern: string;
  readonly fileTypes: ReadonlyArray<string>;
  readonly results: ReadonlyArray<SearchHit>;
  readonly totalFilesMatched: number;
}

export interface AnalyzeCodeResult {
  readonly filePath: string;
  readonly totalLines: number;
  readonly nonEmptyLines: number;
  readonly estimatedComplexity: number;
  readonly language: string;
  readonly keyPatterns: ReadonlyArray<string>;
}

export interface LlmReasoningResult {
  readonly reasoning: string;
  readonly confidence: number;
  readonly suggestedActions: ReadonlyArray<string>;
  readonly fallback: boolean;
}

export interface LlmSummaryResult {
  readonly summary: string;
  readonly keyPoints: ReadonlyArray<string>;
  readonly confidence: number;
  readonly fallback: boolean;
}

export interface CacheLookupResult {
  readonly key: string;
  readonly found: boolean;
  readonly value: unknown;
}

export interface CacheStoreResult {
  readonly key: string;
  readonly stored: boolean;
}
