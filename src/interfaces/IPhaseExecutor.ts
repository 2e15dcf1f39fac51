/**
 * @fileoverview Phase Executor Interface
 *
 * Defines the contract for the tracked phase handlers used by
 * {@link PhaseRunner}. Each phase (prepare, run, check) implements this
 * interface so the runner can gate, classify and persist them uniformly.
 *
 * @module interfaces/IPhaseExecutor
 */

import type { ExecutionContext, TrackedPhase } from '../testcase/types';
import type { ITester } from './ITester';

/**
 * Context passed to a phase executor.
 */
export interface PhaseContext {
  /** The test case being executed */
  execution: ExecutionContext;
  /** Tester resolved for this test case in the current invocation */
  tester: ITester;
  /** The phase being executed */
  phase: TrackedPhase;
  /** Aborted when the user interrupts this phase */
  signal: AbortSignal;
}

/**
 * Result returned by a phase executor.
 *
 * Unexpected failures are thrown, not returned; `success: false` is the
 * controlled negative outcome (a check that did not pass).
 */
export interface PhaseResult {
  /** Whether the phase succeeded */
  success: boolean;
  /** Message to record alongside a negative outcome */
  message?: string;
}

/**
 * Interface for tracked phase handlers.
 */
export interface IPhaseExecutor {
  /**
   * Execute the phase.
   *
   * @param context - Phase execution context with paths, tester and signal.
   * @returns Result indicating success or a controlled failure.
   */
  execute(context: PhaseContext): Promise<PhaseResult>;
}
