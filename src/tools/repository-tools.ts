/**
 * @fileoverview Built-in repository tools: scan, list, read, search and
 * analyze over a {@link CodeRepository}.
 *
 * Failures are thrown, never returned as `{ error }` payloads, so the
 * executor can classify and retry them.
 *
 * @module explorer/tools/repository-tools
 * @version 0.1.0
 */

import * as path from 'path';
import { ActionKind } from '../types/core.types.js';
import type {
  AnalyzeCodeResult,
  ListFilesResult,
  ReadFileResult,
  ScanDirectoryResult,
  SearchFilesResult,
  SearchHit,
  SearchMatch,
  ToolFunction,
} from '../types/tools.types.js';
import { toErrorMessage } from '../types/errors.js';
import { type CodeRepository, normalizeRepositoryPath } from '../repository/code-repository.js';
import {
  AnalyzeCodeParamsSchema,
  ListFilesParamsSchema,
  ReadFileParamsSchema,
  ScanDirectoryParamsSchema,
  SearchFilesParamsSchema,
} from './validation.js';

/** Matching lines kept per file in a search result */
export const MAX_MATCHES_PER_FILE = 10;

const LANGUAGE_BY_EXTENSION: Readonly<Record<string, string>> = {
  '.py': 'python',
  '.js': 'javascript',
  '.ts': 'typescript',
  '.tsx': 'typescript',
  '.java': 'java',
  '.go': 'go',
  '.rs': 'rust',
  '.cpp': 'cpp',
  '.c': 'c',
  '.md': 'markdown',
  '.yaml': 'yaml',
  '.yml': 'yaml',
  '.json': 'json',
};

/**
 * Creates the repository-backed tools keyed by action kind.
 */
export function createRepositoryTools(
  repository: CodeRepository,
): Readonly<Partial<Record<ActionKind, ToolFunction>>> {
  return {
    [ActionKind.SCAN_DIRECTORY]: (params, context) =>
      scanDirectory(repository, params, context.abortSignal),
    [ActionKind.LIST_FILES]: (params, context) =>
      listFiles(repository, params, context.abortSignal),
    [ActionKind.READ_FILE]: (params, context) =>
      readFile(repository, params, context.abortSignal),
    [ActionKind.SEARCH_FILES]: (params, context) =>
      searchFiles(repository, params, context.abortSignal, message => context.logger.debug(message)),
    [ActionKind.ANALYZE_CODE]: (params, context) =>
      analyzeCode(repository, params, context.abortSignal),
  };
}

// ============ Tool Implementations ============

/**
 * Lists entries below a directory up to `maxDepth` nesting levels.
 */
export async function scanDirectory(
  repository: CodeRepository,
  params: unknown,
  signal?: AbortSignal,
): Promise<ScanDirectoryResult> {
  const input = ScanDirectoryParamsSchema.parse(params);
  const entries = await repository.walk(input.directory, { maxDepth: input.maxDepth, signal });

  const contents = entries.map(entry => ({
    path: entry.path,
    isDirectory: entry.isDirectory,
    size: entry.isDirectory ? 0 : entry.size,
  }));

  return {
    directory: input.directory,
    contents,
    totalFiles: contents.filter(c => !c.isDirectory).length,
    totalDirectories: contents.filter(c => c.isDirectory).length,
  };
}

/**
 * Lists files whose path contains `pattern` (`*` matches all).
 */
export async function listFiles(
  repository: CodeRepository,
  params: unknown,
  signal?: AbortSignal,
): Promise<ListFilesResult> {
  const input = ListFilesParamsSchema.parse(params);
  const entries = await repository.walk(input.directory, { signal });

  const files = entries
    .filter(entry => !entry.isDirectory)
    .filter(entry => input.pattern === '*' || entry.path.includes(input.pattern))
    .map(entry => ({
      path: entry.path,
      size: entry.size,
      extension: path.posix.extname(entry.path),
    }));

  return {
    pattern: input.pattern,
    directory: input.directory,
    files,
    count: files.length,
  };
}

/**
 * Reads a file, keeping at most `maxLines` lines.
 */
export async function readFile(
  repository: CodeRepository,
  params: unknown,
  signal?: AbortSignal,
): Promise<ReadFileResult> {
  const input = ReadFileParamsSchema.parse(params);
  const raw = await repository.readFile(input.filePath, signal);

  const lines = raw.split('\n');
  const truncated = lines.length > input.maxLines;
  const content = truncated ? lines.slice(0, input.maxLines).join('\n') : raw;

  return {
    filePath: normalizeRepositoryPath(input.filePath),
    content,
    lineCount: lines.length,
    truncated,
    size: content.length,
  };
}

/**
 * Case-insensitive substring search across files.
 *
 * Files that cannot be read are skipped. Stops after `maxResults` matching
 * files.
 */
export async function searchFiles(
  repository: CodeRepository,
  params: unknown,
  signal?: AbortSignal,
  onSkip?: (message: string) => void,
): Promise<SearchFilesResult> {
  const input = SearchFilesParamsSchema.parse(params);
  const needle = input.pattern.toLowerCase();
  const entries = await repository.walk('', { signal });
  const results: SearchHit[] = [];

  for (const entry of entries) {
    if (entry.isDirectory) continue;
    if (input.fileTypes.length > 0 && !input.fileTypes.some(ft => entry.path.endsWith(ft))) {
      continue;
    }

    let content: string;
    try {
      content = await repository.readFile(entry.path, signal);
    } catch (error) {
      signal?.throwIfAborted();
      onSkip?.(`Skipping unreadable file ${entry.path}: ${toErrorMessage(error)}`);
      continue;
    }

    const matches: SearchMatch[] = [];
    content.split('\n').forEach((line, index) => {
      if (line.toLowerCase().includes(needle)) {
        matches.push({ lineNumber: index + 1, content: line.trim() });
      }
    });
    if (matches.length === 0) continue;

    results.push({
      filePath: entry.path,
      matches: matches.slice(0, MAX_MATCHES_PER_FILE),
      totalMatches: matches.length,
    });
    if (results.length >= input.maxResults) break;
  }

  return {
    pattern: input.pattern,
    fileTypes: input.fileTypes,
    results,
    totalFilesMatched: results.length,
  };
}

/**
 * Line counts, a rough complexity figure, language and key patterns.
 */
export async function analyzeCode(
  repository: CodeRepository,
  params: unknown,
  signal?: AbortSignal,
): Promise<AnalyzeCodeResult> {
  const input = AnalyzeCodeParamsSchema.parse(params);
  const content = await repository.readFile(input.filePath, signal);

  const lines = content.split('\n');
  const nonEmptyLines = lines.filter(line => line.trim().length > 0).length;

  return {
    filePath: normalizeRepositoryPath(input.filePath),
    totalLines: lines.length,
    nonEmptyLines,
    estimatedComplexity: Math.floor(nonEmptyLines / 10),
    language: detectLanguage(input.filePath),
    keyPatterns: extractKeyPatterns(content),
  };
}

// ============ Helpers ============

/**
 * Language name from a file extension, `unknown` when unmapped.
 */
export function detectLanguage(filePath: string): string {
  return LANGUAGE_BY_EXTENSION[path.posix.extname(filePath).toLowerCase()] ?? 'unknown';
}

/**
 * Coarse structural markers found in source text.
 */
export function extractKeyPatterns(content: string): string[] {
  const patterns: string[] = [];
  if (content.includes('class ')) {
    patterns.push('contains_classes');
  }
  if (content.includes('def ') || content.includes('function ')) {
    patterns.push('contains_functions');
  }
  if (content.includes('import ') || content.includes('from ')) {
    patterns.push('has_imports');
  }
  if (content.includes('TODO') || content.includes('FIXME')) {
    patterns.push('has_todos');
  }
  return patterns;
}
