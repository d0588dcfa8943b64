/**
 * @fileoverview Types module public exports.
 *
 * @module explorer/types
 * @version 0.1.0
 */

export * from './core.types.js';
export * from './tools.types.js';
export * from './errors.js';
