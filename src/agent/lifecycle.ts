/**
 * @fileoverview Loop Lifecycle - the phase state machine of one loop run.
 *
 * The loop controller moves the lifecycle through every phase of every
 * iteration and ends it with the termination reason. The terminal phase
 * reported in a `LoopResult` is the one the lifecycle settled on.
 *
 * State Machine:
 * ```
 *            ┌──────────────────────────────────────┐
 *            ▼                                      │
 *   INIT ──► REASONING ──► ACTING ──► OBSERVING ────┘
 *     │          │            │           │
 *     └──────────┴────────────┴───────────┴──► DONE | ABORTED
 *
 *   REASONING and ACTING fall back to REASONING when an iteration
 *   is abandoned.
 * ```
 *
 * @module explorer/agent/lifecycle
 * @version 0.1.0
 */

import { EventEmitter } from 'eventemitter3';
import { v4 as uuidv4 } from 'uuid';
import type { UniqueId } from '../types/core.types.js';
import { LoopPhase, TerminationReason, createUniqueId } from '../types/core.types.js';
import { ExplorationError } from '../types/errors.js';

export type TerminalPhase = LoopPhase.DONE | LoopPhase.ABORTED;

/**
 * Events emitted by the lifecycle.
 */
export interface LifecycleEvents {
  'phase:change': (from: LoopPhase, to: LoopPhase, iteration: number, note: string) => void;
}

/**
 * One visited phase. `exitedAt` is null for the phase the loop is in.
 */
export interface PhaseRecord {
  readonly phase: LoopPhase;
  readonly iteration: number;
  readonly note: string;
  readonly enteredAt: number;
  readonly exitedAt: number | null;
}

const NEXT_PHASES: Readonly<Record<LoopPhase, ReadonlyArray<LoopPhase>>> = {
  [LoopPhase.INIT]: [LoopPhase.REASONING, LoopPhase.DONE, LoopPhase.ABORTED],
  [LoopPhase.REASONING]: [LoopPhase.ACTING, LoopPhase.REASONING, LoopPhase.DONE, LoopPhase.ABORTED],
  [LoopPhase.ACTING]: [LoopPhase.OBSERVING, LoopPhase.REASONING, LoopPhase.DONE, LoopPhase.ABORTED],
  [LoopPhase.OBSERVING]: [LoopPhase.REASONING, LoopPhase.DONE, LoopPhase.ABORTED],
  [LoopPhase.DONE]: [],
  [LoopPhase.ABORTED]: [],
};

/** Termination reasons that abort rather than finish the loop */
const ABORTING_REASONS: ReadonlySet<TerminationReason> = new Set([
  TerminationReason.CIRCUIT_BREAKER,
  TerminationReason.ERROR_BUDGET,
  TerminationReason.STUCK_ESCALATION,
  TerminationReason.INTERNAL_ERROR,
]);

/**
 * Terminal phase for a termination reason.
 */
export function terminalPhaseFor(reason: TerminationReason): TerminalPhase {
  return ABORTING_REASONS.has(reason) ? LoopPhase.ABORTED : LoopPhase.DONE;
}

/**
 * Phase state machine of a single loop run.
 *
 * @example
 * ```typescript
 * const lifecycle = new LoopLifecycle(sessionId);
 * lifecycle.on('phase:change', (from, to, iteration) => {
 *   logger.debug('Phase change', { from, to, iteration });
 * });
 *
 * lifecycle.beginIteration(1);
 * lifecycle.enter(LoopPhase.ACTING, 'read_file');
 * lifecycle.end(TerminationReason.GOAL_ACHIEVED, 'README found');
 * ```
 */
export class LoopLifecycle extends EventEmitter<LifecycleEvents> {
  readonly loopId: UniqueId;
  private readonly clock: () => number;
  private readonly closed: PhaseRecord[] = [];
  private current: PhaseRecord;
  private iteration = 0;
  private terminal: TerminalPhase | null = null;

  constructor(loopId?: UniqueId | null, clock: () => number = Date.now) {
    super();
    this.loopId = loopId ?? createUniqueId(uuidv4());
    this.clock = clock;
    this.current = { phase: LoopPhase.INIT, iteration: 0, note: 'Loop initialized', enteredAt: clock(), exitedAt: null };
  }

  getCurrentPhase(): LoopPhase {
    return this.current.phase;
  }

  /**
   * The phase the loop ended in, or null while it is running.
   */
  getTerminalPhase(): TerminalPhase | null {
    return this.terminal;
  }

  /**
   * Every phase visited so far, the current one last.
   */
  getHistory(): ReadonlyArray<PhaseRecord> {
    return [...this.closed, this.current];
  }

  canEnter(phase: LoopPhase): boolean {
    return NEXT_PHASES[this.current.phase].includes(phase);
  }

  /**
   * Starts an iteration in REASONING.
   */
  beginIteration(iteration: number): void {
    this.iteration = iteration;
    this.enter(LoopPhase.REASONING, `Iteration ${iteration}`);
  }

  /**
   * Moves to the next phase of the running iteration.
   *
   * @throws ExplorationError with code INVALID_TRANSITION
   */
  enter(phase: LoopPhase, note: string): void {
    if (!this.canEnter(phase)) {
      throw new ExplorationError(
        `Invalid phase transition: '${this.current.phase}' → '${phase}'`,
        'INVALID_TRANSITION',
        false,
      );
    }
    this.move(phase, note);
  }

  /**
   * Ends the loop in the phase the termination reason calls for. Ending
   * an ended loop keeps the first terminal phase.
   */
  end(reason: TerminationReason, note: string): TerminalPhase {
    if (this.terminal !== null) {
      return this.terminal;
    }
    const phase = terminalPhaseFor(reason);
    this.move(phase, note);
    this.terminal = phase;
    return phase;
  }

  // ============ Private Methods ============

  private move(phase: LoopPhase, note: string): void {
    const now = this.clock();
    const from = this.current.phase;
    this.closed.push({ ...this.current, exitedAt: now });
    this.current = { phase, iteration: this.iteration, note, enteredAt: now, exitedAt: null };
    this.emit('phase:change', from, phase, this.iteration, note);
  }
}
