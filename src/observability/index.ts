/**
 * @fileoverview Observability module public exports.
 *
 * @module explorer/observability
 * @version 0.1.0
 */

export {
  Logger,
  ConsoleTransport,
  MemoryTransport,
  createLogger,
  type LogEntry,
  type LogError,
  type LogTransport,
  type LoggerConfig,
} from './logger.js';

export {
  SessionTracer,
  loadSessionTrace,
  initDefaultTracer,
  getDefaultTracer,
  shutdownDefaultTracer,
  type TracePhase,
  type TraceRecord,
  type PhaseMetrics,
  type SessionMetrics,
  type SessionRecord,
  type TracerOptions,
  type PersistedSession,
} from './tracer.js';

export {
  MetricsAccumulator,
  durationStats,
  getProcessMetrics,
  type GlobalMetrics,
  type PhaseDurationStats,
  type TimedPhase,
} from './metrics.js';
