/**
 * @fileoverview Config module public exports.
 *
 * @module explorer/config
 * @version 0.1.0
 */

export {
  ExplorationConfigSchema,
  DEFAULT_EXPLORATION_CONFIG,
  createConfig,
  applyProfile,
  detectProfile,
  loadConfigFromEnv,
  configToRecord,
  type ExplorationConfig,
  type PerformanceProfile,
} from './config.js';
