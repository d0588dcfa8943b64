/**
 * @fileoverview Process-wide trace metrics accumulator.
 *
 * One accumulator is shared by every tracer (and therefore every agent) in
 * the process. Each update is a synchronous mutation completed within a
 * single tick, so loops interleaving on the event loop never observe a
 * half-applied update.
 *
 * @module explorer/observability/metrics
 * @version 0.1.0
 */

import type { TracePhase } from './tracer.js';

/**
 * Duration statistics for one phase.
 */
export interface PhaseDurationStats {
  readonly count: number;
  readonly avgMs: number;
  readonly minMs: number;
  readonly maxMs: number;
}

/**
 * Snapshot of the accumulated metrics.
 */
export interface GlobalMetrics {
  readonly totalSessions: number;
  readonly activeSessions: number;
  readonly totalIterations: number;
  readonly totalErrors: number;
  readonly avgSessionDurationMs: number;
  readonly agentUsage: Readonly<Record<string, number>>;
  readonly phaseDurations: Readonly<Record<TimedPhase, ReadonlyArray<number>>>;
  readonly phaseStats: Readonly<Record<TimedPhase, PhaseDurationStats>>;
}

/**
 * Phases whose durations are tracked; `error` records carry no timing.
 */
export type TimedPhase = Exclude<TracePhase, 'error'>;

/**
 * Accumulates cross-session metrics for the lifetime of the process.
 */
export class MetricsAccumulator {
  private totalSessions = 0;
  private activeSessions = 0;
  private completedSessions = 0;
  private totalIterations = 0;
  private totalErrors = 0;
  private avgSessionDurationMs = 0;
  private readonly agentUsage = new Map<string, number>();
  private readonly phaseDurations: Record<TimedPhase, number[]> = {
    reason: [],
    act: [],
    observe: [],
  };

  /**
   * True until the first session starts.
   */
  isIdle(): boolean {
    return this.totalSessions === 0;
  }

  recordSessionStart(agentName: string): void {
    this.totalSessions++;
    this.activeSessions++;
    this.agentUsage.set(agentName, (this.agentUsage.get(agentName) ?? 0) + 1);
  }

  recordPhase(phase: TracePhase, durationMs: number, success: boolean): void {
    if (phase !== 'error') {
      this.phaseDurations[phase].push(durationMs);
    }
    if (!success) {
      this.totalErrors++;
    }
  }

  recordSessionEnd(iterations: number, durationMs: number): void {
    this.activeSessions = Math.max(0, this.activeSessions - 1);
    this.completedSessions++;
    this.totalIterations += iterations;
    this.avgSessionDurationMs =
      (this.avgSessionDurationMs * (this.completedSessions - 1) + durationMs) /
      this.completedSessions;
  }

  snapshot(): GlobalMetrics {
    const phaseDurations = {
      reason: [...this.phaseDurations.reason],
      act: [...this.phaseDurations.act],
      observe: [...this.phaseDurations.observe],
    };

    return {
      totalSessions: this.totalSessions,
      activeSessions: this.activeSessions,
      totalIterations: this.totalIterations,
      totalErrors: this.totalErrors,
      avgSessionDurationMs: this.avgSessionDurationMs,
      agentUsage: Object.fromEntries(this.agentUsage),
      phaseDurations,
      phaseStats: {
        reason: durationStats(phaseDurations.reason),
        act: durationStats(phaseDurations.act),
        observe: durationStats(phaseDurations.observe),
      },
    };
  }
}

/**
 * Computes count/avg/min/max over a list of durations.
 */
export function durationStats(durations: ReadonlyArray<number>): PhaseDurationStats {
  if (durations.length === 0) {
    return { count: 0, avgMs: 0, minMs: 0, maxMs: 0 };
  }
  const total = durations.reduce((sum, d) => sum + d, 0);
  return {
    count: durations.length,
    avgMs: total / durations.length,
    minMs: Math.min(...durations),
    maxMs: Math.max(...durations),
  };
}

let processMetrics: MetricsAccumulator | null = null;

/**
 * The accumulator shared by every tracer that is not given its own.
 * Created on first use and kept for the lifetime of the process.
 */
export function getProcessMetrics(): MetricsAccumulator {
  if (processMetrics === null) {
    processMetrics = new MetricsAccumulator();
  }
  return processMetrics;
}
