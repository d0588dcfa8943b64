/**
 * @fileoverview Code Repository - read-only view of the source tree that
 * the built-in tools explore.
 *
 * Paths are always repository-relative and POSIX-separated. `''` and `'.'`
 * both denote the repository root; any path that escapes the root is
 * rejected before the filesystem is touched.
 *
 * @module explorer/repository/code-repository
 * @version 0.1.0
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { ExplorationError } from '../types/errors.js';

/**
 * A file or directory inside the repository.
 */
export interface RepositoryEntry {
  /** Repository-relative POSIX path */
  readonly path: string;
  readonly isDirectory: boolean;
  /** Size in bytes; 0 for directories */
  readonly size: number;
}

/**
 * Options for walking a repository.
 */
export interface WalkOptions {
  /**
   * Deepest nesting level to include. Direct children of the walked
   * directory are level 0. Unbounded when omitted.
   */
  readonly maxDepth?: number;
  readonly signal?: AbortSignal;
}

/**
 * Read-only access to a source tree.
 */
export interface CodeRepository {
  /** Human-readable location of the repository */
  readonly root: string;

  /**
   * Lists every entry below `directory`, sorted by path. Excluded
   * directories and binary artifacts are never returned.
   */
  walk(directory?: string, options?: WalkOptions): Promise<ReadonlyArray<RepositoryEntry>>;

  /**
   * Reads a file as UTF-8 text.
   */
  readFile(filePath: string, signal?: AbortSignal): Promise<string>;
}

/**
 * Directory names skipped during a walk.
 */
export const EXCLUDED_DIRECTORIES: ReadonlySet<string> = new Set([
  '.git',
  'node_modules',
  '__pycache__',
  '.venv',
  'venv',
]);

/**
 * Extensions of compiled artifacts skipped during a walk.
 */
export const EXCLUDED_EXTENSIONS: ReadonlySet<string> = new Set([
  '.pyc',
  '.pyo',
  '.pyd',
  '.so',
  '.dll',
  '.exe',
]);

/**
 * Normalizes a repository-relative path. Returns `''` for the root.
 *
 * @throws ExplorationError with code PATH_OUTSIDE_ROOT when the path
 * escapes the repository
 */
export function normalizeRepositoryPath(input: string): string {
  const posix = input.replace(/\\/g, '/');
  if (path.posix.isAbsolute(posix)) {
    throw outsideRoot(input);
  }

  const normalized = path.posix.normalize(posix).replace(/\/+$/, '');
  if (normalized === '.' || normalized === '') {
    return '';
  }
  if (normalized === '..' || normalized.startsWith('../')) {
    throw outsideRoot(input);
  }
  return normalized;
}

/**
 * True when the entry should be hidden from walks.
 */
export function isExcludedPath(relativePath: string): boolean {
  const segments = relativePath.split('/');
  if (segments.some(segment => EXCLUDED_DIRECTORIES.has(segment))) {
    return true;
  }
  return EXCLUDED_EXTENSIONS.has(path.posix.extname(relativePath).toLowerCase());
}

/**
 * Nesting level of `entryPath` below `directory` (direct children are 0).
 */
export function depthBelow(directory: string, entryPath: string): number {
  const relative = directory === '' ? entryPath : entryPath.slice(directory.length + 1);
  return relative.split('/').length - 1;
}

/**
 * Repository backed by the local filesystem, sandboxed to a root directory.
 *
 * @example
 * ```typescript
 * const repo = new LocalRepository('./my-project');
 * const entries = await repo.walk('src', { maxDepth: 1 });
 * const readme = await repo.readFile('README.md');
 * ```
 */
export class LocalRepository implements CodeRepository {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  async walk(directory = '', options: WalkOptions = {}): Promise<ReadonlyArray<RepositoryEntry>> {
    const start = normalizeRepositoryPath(directory);
    const entries: RepositoryEntry[] = [];
    await this.walkDirectory(start, 0, options, entries);
    return sortByPath(entries);
  }

  async readFile(filePath: string, signal?: AbortSignal): Promise<string> {
    const absolutePath = this.resolvePath(normalizeRepositoryPath(filePath));
    return fs.readFile(absolutePath, { encoding: 'utf-8', signal });
  }

  /**
   * Resolves a normalized relative path to an absolute one inside the root.
   */
  resolvePath(relativePath: string): string {
    const resolved = path.resolve(this.root, relativePath);
    if (resolved !== this.root && !resolved.startsWith(this.root + path.sep)) {
      throw outsideRoot(relativePath);
    }
    return resolved;
  }

  // ============ Private Methods ============

  private async walkDirectory(
    relativeDir: string,
    depth: number,
    options: WalkOptions,
    into: RepositoryEntry[],
  ): Promise<void> {
    options.signal?.throwIfAborted();

    const dirEntries = await fs.readdir(this.resolvePath(relativeDir), { withFileTypes: true });

    for (const dirEntry of dirEntries) {
      const entryPath = relativeDir === '' ? dirEntry.name : `${relativeDir}/${dirEntry.name}`;
      if (isExcludedPath(entryPath)) continue;

      if (dirEntry.isDirectory()) {
        into.push({ path: entryPath, isDirectory: true, size: 0 });
        if (options.maxDepth === undefined || depth < options.maxDepth) {
          await this.walkDirectory(entryPath, depth + 1, options, into);
        }
      } else if (dirEntry.isFile()) {
        const stats = await fs.stat(this.resolvePath(entryPath));
        into.push({ path: entryPath, isDirectory: false, size: stats.size });
      }
    }
  }
}

/**
 * Repository held entirely in memory. Directories are implied by the file
 * paths.
 *
 * @example
 * ```typescript
 * const repo = new InMemoryRepository({
 *   'main.py': 'print("hello")',
 *   'README.md': '# Demo',
 * });
 * ```
 */
export class InMemoryRepository implements CodeRepository {
  readonly root = 'memory://';
  private readonly files = new Map<string, string>();

  constructor(files: Readonly<Record<string, string>> = {}) {
    for (const [filePath, content] of Object.entries(files)) {
      this.files.set(normalizeRepositoryPath(filePath), content);
    }
  }

  /**
   * Adds or replaces a file.
   */
  writeFile(filePath: string, content: string): void {
    this.files.set(normalizeRepositoryPath(filePath), content);
  }

  async walk(directory = '', options: WalkOptions = {}): Promise<ReadonlyArray<RepositoryEntry>> {
    options.signal?.throwIfAborted();
    const start = normalizeRepositoryPath(directory);
    const prefix = start === '' ? '' : `${start}/`;

    const directories = new Set<string>();
    const entries: RepositoryEntry[] = [];

    for (const [filePath, content] of this.files) {
      if (!filePath.startsWith(prefix) || isExcludedPath(filePath)) continue;

      const segments = filePath.slice(prefix.length).split('/');
      for (let i = 1; i < segments.length; i++) {
        directories.add(prefix + segments.slice(0, i).join('/'));
      }
      entries.push({ path: filePath, isDirectory: false, size: Buffer.byteLength(content, 'utf-8') });
    }

    if (start !== '' && entries.length === 0) {
      throw notFound(start);
    }

    for (const dirPath of directories) {
      entries.push({ path: dirPath, isDirectory: true, size: 0 });
    }

    const maxDepth = options.maxDepth;
    const visible = maxDepth === undefined
      ? entries
      : entries.filter(entry => depthBelow(start, entry.path) <= maxDepth);

    return sortByPath(visible);
  }

  async readFile(filePath: string, signal?: AbortSignal): Promise<string> {
    signal?.throwIfAborted();
    const normalized = normalizeRepositoryPath(filePath);
    const content = this.files.get(normalized);
    if (content === undefined) {
      throw notFound(normalized);
    }
    return content;
  }
}

// ============ Helpers ============

function sortByPath(entries: RepositoryEntry[]): RepositoryEntry[] {
  return entries.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}

function outsideRoot(input: string): ExplorationError {
  return new ExplorationError(`Path escapes repository root: ${input}`, 'PATH_OUTSIDE_ROOT', false);
}

function notFound(relativePath: string): ExplorationError {
  return new ExplorationError(`No such file or directory: ${relativePath}`, 'ENOENT', true);
}
