/**
 * @fileoverview Session Tracer - records reason/act/observe phases per loop.
 *
 * Traces are essential for:
 * - Debugging agent behavior
 * - Understanding decision patterns
 * - Performance analysis across sessions
 *
 * A session is opened when a loop starts, accumulates one record per
 * phase, and is finalized (and optionally written to disk) when the loop
 * ends. Cross-session figures live in a shared `MetricsAccumulator`.
 *
 * @module explorer/observability/tracer
 * @version 0.1.0
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { UniqueId, Timestamp } from '../types/core.types.js';
import { createUniqueId, createTimestamp } from '../types/core.types.js';
import { toError } from '../types/errors.js';
import { Logger, createLogger } from './logger.js';
import {
  MetricsAccumulator,
  getProcessMetrics,
  type GlobalMetrics,
  type TimedPhase,
} from './metrics.js';

/**
 * Phase a trace record belongs to.
 */
export type TracePhase = 'reason' | 'act' | 'observe' | 'error';

/**
 * A single trace entry.
 */
export interface TraceRecord {
  readonly traceId: string;
  readonly sessionId: UniqueId;
  readonly agentName: string;
  readonly iteration: number;
  readonly phase: TracePhase;
  readonly timestamp: Timestamp;
  readonly durationMs: number;
  readonly content: Readonly<Record<string, unknown>>;
  readonly success: boolean;
  readonly error: string | null;
}

/**
 * Aggregate timing of one phase within a session.
 */
export interface PhaseMetrics {
  readonly count: number;
  readonly totalMs: number;
  readonly avgMs: number;
  readonly maxMs: number;
}

/**
 * Metrics computed for a session.
 */
export interface SessionMetrics {
  readonly totalDurationMs: number;
  /** Sum of the recorded phase durations */
  readonly processingDurationMs: number;
  readonly totalTraces: number;
  readonly iterations: number;
  readonly errors: number;
  readonly successRate: number;
  readonly phases: Readonly<Record<TimedPhase, PhaseMetrics>>;
}

/**
 * A complete session trace.
 */
export interface SessionRecord {
  readonly sessionId: UniqueId;
  readonly agentName: string;
  readonly goal: string;
  readonly startedAt: Timestamp;
  readonly endedAt: Timestamp | null;
  readonly totalIterations: number;
  readonly traces: ReadonlyArray<TraceRecord>;
  readonly finalResult: object | null;
  readonly metrics: SessionMetrics | null;
  /** Where the session was written, if persisted */
  readonly tracePath: string | null;
}

/**
 * Options for the session tracer.
 */
export interface TracerOptions {
  /** Directory for persisted session files; null disables persistence */
  readonly traceDirectory?: string | null;
  readonly logger?: Logger;
  /** Accumulator to report to; the process-wide one when omitted */
  readonly metrics?: MetricsAccumulator;
}

interface ActiveSession {
  readonly sessionId: UniqueId;
  readonly agentName: string;
  readonly goal: string;
  readonly startedAt: Timestamp;
  readonly traces: TraceRecord[];
}

/**
 * Records exploration sessions.
 *
 * @example
 * ```typescript
 * const tracer = new SessionTracer({ traceDirectory: './traces' });
 * const sessionId = tracer.startSession('DocumentationAgent', 'Map the docs');
 * tracer.tracePhase(sessionId, 'reason', 1, { reasoning: 'scan first' }, 4);
 * const session = await tracer.endSession(sessionId, { goalAchieved: true });
 * ```
 */
export class SessionTracer {
  private readonly traceDirectory: string | null;
  private readonly logger: Logger;
  private readonly metrics: MetricsAccumulator;
  private readonly activeSessions = new Map<UniqueId, ActiveSession>();

  constructor(options: TracerOptions = {}) {
    this.traceDirectory = options.traceDirectory ?? null;
    this.logger = options.logger ?? createLogger('tracer');
    this.metrics = options.metrics ?? getProcessMetrics();
  }

  /**
   * Opens a session and returns its id.
   */
  startSession(agentName: string, goal: string): UniqueId {
    const sessionId = createUniqueId(uuidv4());

    this.activeSessions.set(sessionId, {
      sessionId,
      agentName,
      goal,
      startedAt: createTimestamp(),
      traces: [],
    });
    this.metrics.recordSessionStart(agentName);

    this.logger.info(`Started session for ${agentName}`, { sessionId, goal });

    return sessionId;
  }

  /**
   * Records one phase. Returns the trace id, or null for an unknown session.
   */
  tracePhase(
    sessionId: UniqueId,
    phase: TracePhase,
    iteration: number,
    content: Record<string, unknown>,
    durationMs: number = 0,
    success: boolean = true,
    error?: string,
  ): string | null {
    const session = this.activeSessions.get(sessionId);
    if (!session) {
      this.logger.warn('Session not found for tracing', { sessionId, phase });
      return null;
    }

    const traceId = `${sessionId}-${iteration}-${phase}-${session.traces.length}`;
    const record: TraceRecord = {
      traceId,
      sessionId,
      agentName: session.agentName,
      iteration,
      phase,
      timestamp: createTimestamp(),
      durationMs,
      content,
      success,
      error: error ?? null,
    };

    session.traces.push(record);
    this.metrics.recordPhase(phase, durationMs, success);

    this.logger.info(
      `${success ? 'OK  ' : 'FAIL'} ${session.agentName} [iter ${iteration}] ${phase.toUpperCase()}: ${summarizeContent(content)}`,
    );
    if (error !== undefined) {
      this.logger.error(`Error in ${phase}: ${error}`, { sessionId, iteration });
    }
    if (durationMs > 0) {
      this.logger.debug(`${phase} took ${durationMs}ms`, { sessionId, iteration });
    }

    return traceId;
  }

  /**
   * Finalizes a session, computes its metrics and persists it when a trace
   * directory is configured. Returns null for an unknown session.
   */
  async endSession(sessionId: UniqueId, finalResult: object): Promise<SessionRecord | null> {
    const session = this.activeSessions.get(sessionId);
    if (!session) {
      this.logger.warn('Session not found for ending', { sessionId });
      return null;
    }
    this.activeSessions.delete(sessionId);

    const endedAt = createTimestamp();
    const totalIterations = new Set(session.traces.map(t => t.iteration)).size;
    const metrics = calculateSessionMetrics(session.traces, endedAt - session.startedAt, totalIterations);

    this.metrics.recordSessionEnd(totalIterations, metrics.totalDurationMs);

    this.logger.info(`Completed session in ${metrics.totalDurationMs}ms`, {
      sessionId,
      iterations: totalIterations,
    });

    const record: SessionRecord = {
      sessionId,
      agentName: session.agentName,
      goal: session.goal,
      startedAt: session.startedAt,
      endedAt,
      totalIterations,
      traces: [...session.traces],
      finalResult,
      metrics,
      tracePath: null,
    };

    if (this.traceDirectory === null) {
      return record;
    }

    const tracePath = await this.persistSession(this.traceDirectory, record);
    return { ...record, tracePath };
  }

  /**
   * Metrics for a session that is still open.
   */
  getSessionMetrics(sessionId: UniqueId): SessionMetrics | null {
    const session = this.activeSessions.get(sessionId);
    if (!session) return null;

    const iterations = new Set(session.traces.map(t => t.iteration)).size;
    return calculateSessionMetrics(session.traces, Date.now() - session.startedAt, iterations);
  }

  /**
   * Cross-session metrics.
   */
  getGlobalMetrics(): GlobalMetrics {
    return this.metrics.snapshot();
  }

  /**
   * Ids of sessions started but not yet ended.
   */
  getActiveSessionIds(): ReadonlyArray<UniqueId> {
    return [...this.activeSessions.keys()];
  }

  /**
   * Writes the global metrics as JSON.
   */
  async exportMetrics(outputFile: string): Promise<void> {
    await fs.mkdir(path.dirname(outputFile), { recursive: true });
    await fs.writeFile(outputFile, JSON.stringify(this.getGlobalMetrics(), null, 2), 'utf-8');
    this.logger.info('Exported metrics', { outputFile });
  }

  /**
   * Human-readable summary of an open session.
   */
  getTraceSummary(sessionId: UniqueId): string {
    const session = this.activeSessions.get(sessionId);
    if (!session) {
      return `Session ${sessionId} not found`;
    }

    const iterations = new Set(session.traces.map(t => t.iteration)).size;
    const lines = [
      `Trace summary for ${session.agentName} (session ${sessionId})`,
      `Goal: ${session.goal}`,
      `Iterations: ${iterations}`,
      '='.repeat(50),
    ];

    for (const trace of session.traces) {
      lines.push(
        `${trace.success ? 'OK  ' : 'FAIL'} iter ${trace.iteration} - ${trace.phase.toUpperCase()}: ${summarizeContent(trace.content)}`,
      );
      if (trace.error !== null) {
        lines.push(`   error: ${trace.error}`);
      }
      if (trace.durationMs > 0) {
        lines.push(`   duration: ${trace.durationMs}ms`);
      }
    }

    return lines.join('\n');
  }

  // ============ Private Methods ============

  private async persistSession(directory: string, record: SessionRecord): Promise<string | null> {
    const fileName = `trace_${record.sessionId}_${safeFileSegment(record.agentName)}.json`;
    const tracePath = path.join(directory, fileName);
    const session = {
      sessionId: record.sessionId,
      agentName: record.agentName,
      goal: record.goal,
      startedAt: record.startedAt,
      endedAt: record.endedAt,
      totalIterations: record.totalIterations,
      finalResult: record.finalResult,
      metrics: record.metrics,
    };

    try {
      await fs.mkdir(directory, { recursive: true });
      await fs.writeFile(tracePath, JSON.stringify({ session, traces: record.traces }, null, 2), 'utf-8');
      this.logger.debug('Saved session trace', { tracePath });
      return tracePath;
    } catch (error) {
      this.logger.error('Failed to save session trace', { tracePath }, toError(error));
      return null;
    }
  }
}

// ============ Persisted format ============

const TraceRecordSchema = z.object({
  traceId: z.string(),
  sessionId: z.string(),
  agentName: z.string(),
  iteration: z.number(),
  phase: z.enum(['reason', 'act', 'observe', 'error']),
  timestamp: z.number(),
  durationMs: z.number(),
  content: z.record(z.unknown()),
  success: z.boolean(),
  error: z.string().nullable(),
});

const PersistedSessionSchema = z.object({
  session: z.object({
    sessionId: z.string(),
    agentName: z.string(),
    goal: z.string(),
    startedAt: z.number(),
    endedAt: z.number().nullable(),
    totalIterations: z.number(),
    finalResult: z.record(z.unknown()).nullable(),
    metrics: z.record(z.unknown()).nullable(),
  }),
  traces: z.array(TraceRecordSchema),
});

export type PersistedSession = z.infer<typeof PersistedSessionSchema>;

/**
 * Reads back a session file written by `endSession`.
 */
export async function loadSessionTrace(tracePath: string): Promise<PersistedSession> {
  const raw = await fs.readFile(tracePath, 'utf-8');
  return PersistedSessionSchema.parse(JSON.parse(raw));
}

// ============ Default tracer lifetime ============

let defaultTracer: SessionTracer | null = null;

/**
 * Creates the process default tracer. Calling it again replaces the
 * previous instance.
 */
export function initDefaultTracer(options: TracerOptions = {}): SessionTracer {
  defaultTracer = new SessionTracer(options);
  return defaultTracer;
}

/**
 * Returns the default tracer, or null before `initDefaultTracer`.
 */
export function getDefaultTracer(): SessionTracer | null {
  return defaultTracer;
}

/**
 * Drops the default tracer.
 */
export function shutdownDefaultTracer(): void {
  defaultTracer = null;
}

// ============ Helpers ============

function calculateSessionMetrics(
  traces: ReadonlyArray<TraceRecord>,
  totalDurationMs: number,
  iterations: number,
): SessionMetrics {
  const phases: Record<TimedPhase, PhaseMetrics> = {
    reason: phaseMetrics(traces, 'reason'),
    act: phaseMetrics(traces, 'act'),
    observe: phaseMetrics(traces, 'observe'),
  };

  const successes = traces.filter(t => t.success).length;

  return {
    totalDurationMs,
    processingDurationMs: traces.reduce((sum, t) => sum + t.durationMs, 0),
    totalTraces: traces.length,
    iterations,
    errors: traces.length - successes,
    successRate: traces.length > 0 ? successes / traces.length : 0,
    phases,
  };
}

function phaseMetrics(traces: ReadonlyArray<TraceRecord>, phase: TimedPhase): PhaseMetrics {
  const durations = traces.filter(t => t.phase === phase).map(t => t.durationMs);
  const totalMs = durations.reduce((sum, d) => sum + d, 0);
  return {
    count: durations.length,
    totalMs,
    avgMs: durations.length > 0 ? totalMs / durations.length : 0,
    maxMs: durations.length > 0 ? Math.max(...durations) : 0,
  };
}

function summarizeContent(content: Readonly<Record<string, unknown>>): string {
  const summary = content['summary'];
  if (typeof summary === 'string') return summary;
  return JSON.stringify(content).slice(0, 100);
}

function safeFileSegment(value: string): string {
  return value.replace(/[^a-zA-Z0-9_-]/g, '_');
}
