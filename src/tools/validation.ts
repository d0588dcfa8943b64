/**
 * @fileoverview Parameter and result validation for tool calls.
 *
 * Each action kind has a zod schema describing its parameters. The
 * executor checks parameters before dispatch (failures are never retried)
 * and checks results after each call (failures are retried).
 *
 * @module explorer/tools/validation
 * @version 0.1.0
 */

import { z } from 'zod';
import { ActionKind, type ActionParameters } from '../types/core.types.js';

// ============ Parameter Schemas ============

export const ScanDirectoryParamsSchema = z.object({
  directory: z.string().default('.'),
  maxDepth: z.number().int().nonnegative().default(2),
});

export const ListFilesParamsSchema = z.object({
  pattern: z.string().default('*'),
  directory: z.string().default('.'),
});

export const ReadFileParamsSchema = z.object({
  filePath: z.string().min(1, 'filePath must be a non-empty string'),
  maxLines: z.number().int().positive().default(100),
});

export const SearchFilesParamsSchema = z.object({
  pattern: z.string().min(1, 'pattern must be a non-empty string'),
  fileTypes: z.array(z.string()).default([]),
  maxResults: z.number().int().positive().default(50),
});

export const AnalyzeCodeParamsSchema = z.object({
  filePath: z.string().min(1, 'filePath must be a non-empty string'),
  analysisType: z.string().default('basic'),
});

export const LlmReasoningParamsSchema = z.object({
  question: z.string(),
  context: z.string().default(''),
  agentType: z.string().default('generic'),
});

export const LlmSummaryParamsSchema = z.object({
  content: z.string().default(''),
  summaryType: z.string().default('general'),
  focus: z.string().default('all'),
});

export const CacheLookupParamsSchema = z.object({
  key: z.string().min(1, 'key must be a non-empty string'),
});

export const CacheStoreParamsSchema = z.object({
  key: z.string().min(1, 'key must be a non-empty string'),
  value: z.unknown(),
});

/**
 * Parameter schema per action kind.
 */
export const PARAMETER_SCHEMAS = {
  [ActionKind.SCAN_DIRECTORY]: ScanDirectoryParamsSchema,
  [ActionKind.LIST_FILES]: ListFilesParamsSchema,
  [ActionKind.READ_FILE]: ReadFileParamsSchema,
  [ActionKind.SEARCH_FILES]: SearchFilesParamsSchema,
  [ActionKind.ANALYZE_CODE]: AnalyzeCodeParamsSchema,
  [ActionKind.LLM_REASONING]: LlmReasoningParamsSchema,
  [ActionKind.LLM_SUMMARY]: LlmSummaryParamsSchema,
  [ActionKind.CACHE_LOOKUP]: CacheLookupParamsSchema,
  [ActionKind.CACHE_STORE]: CacheStoreParamsSchema,
} satisfies Record<ActionKind, z.ZodTypeAny>;

// ============ Validation ============

/**
 * Checks action parameters against the schema for their kind.
 *
 * @returns the list of issues, empty when the parameters are valid
 */
export function validateParameters(kind: ActionKind, params: ActionParameters): string[] {
  const result = PARAMETER_SCHEMAS[kind].safeParse(params);
  if (result.success) {
    return [];
  }
  return result.error.issues.map(issue => {
    const where = issue.path.join('.');
    return where === '' ? issue.message : `${where}: ${issue.message}`;
  });
}

/**
 * Checks a tool result for the kind that produced it.
 *
 * @returns an error message, or null when the result is acceptable
 */
export function validateResult(kind: ActionKind, result: unknown): string | null {
  if (result === null || result === undefined) {
    return 'Tool returned no result';
  }
  if (!isRecord(result)) {
    return null;
  }
  if ('error' in result) {
    return `Tool returned error: ${String(result['error'])}`;
  }

  switch (kind) {
    case ActionKind.READ_FILE: {
      if (!('content' in result)) {
        return 'read_file result missing content';
      }
      const content = result['content'];
      if (typeof content !== 'string' || content.length === 0) {
        return 'read_file returned empty content';
      }
      return null;
    }
    case ActionKind.SCAN_DIRECTORY:
      return 'contents' in result ? null : 'scan_directory result missing contents';
    case ActionKind.SEARCH_FILES:
      return 'results' in result ? null : 'search_files result missing results';
    default:
      return null;
  }
}

/**
 * Narrows a value to a plain object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
