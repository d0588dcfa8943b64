/**
 * @fileoverview Repository module public exports.
 *
 * @module explorer/repository
 * @version 0.1.0
 */

export {
  LocalRepository,
  InMemoryRepository,
  normalizeRepositoryPath,
  isExcludedPath,
  depthBelow,
  EXCLUDED_DIRECTORIES,
  EXCLUDED_EXTENSIONS,
  type CodeRepository,
  type RepositoryEntry,
  type WalkOptions,
} from './code-repository.js';
