/**
 * @fileoverview Agent module public exports.
 *
 * @module explorer/agent
 * @version 0.1.0
 */

export {
  LoopLifecycle,
  terminalPhaseFor,
  type LifecycleEvents,
  type PhaseRecord,
  type TerminalPhase,
} from './lifecycle.js';

export {
  BaseExplorationAgent,
  DEFAULT_COMPLETION_MARKERS,
  defaultObserve,
  isGoalAchievedByMarkers,
  type ExplorationAgent,
} from './agent.js';

export {
  LoopController,
  executeLoop,
  type LoopControllerEvents,
  type LoopControllerOptions,
} from './loop-controller.js';

export {
  RecoveryStrategy,
  MIN_ACTIONS_FOR_DETECTION,
  MAX_RECOVERIES,
  detectStuckPattern,
  selectRecoveryStrategy,
  attemptRecovery,
  type StuckPattern,
  type RecoveryOutcome,
} from './stuck-detector.js';

export {
  DocumentationAgent,
  isDocumentationFile,
  classifyDocument,
  analyzeDocument,
  documentInsights,
  type DocumentType,
  type DocumentHeading,
  type DocumentAnalysis,
  type DocumentationAgentOptions,
} from './documentation-agent.js';
