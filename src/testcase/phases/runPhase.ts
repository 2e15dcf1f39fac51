/**
 * @fileoverview Run Phase Executor
 *
 * @module testcase/phases/runPhase
 */

import type { IPhaseExecutor, PhaseContext, PhaseResult } from '../../interfaces/IPhaseExecutor';

/**
 * Executes the run phase of a test case. The tester may return before the
 * underlying work is complete (e.g. after submitting a batch job); check
 * eligibility is decided separately through `runFinished()`.
 */
export class RunPhaseExecutor implements IPhaseExecutor {
  async execute(context: PhaseContext): Promise<PhaseResult> {
    await context.tester.run({ signal: context.signal });
    return { success: true };
  }
}
