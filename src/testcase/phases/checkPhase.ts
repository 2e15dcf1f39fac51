/**
 * @fileoverview Check Phase Executor
 *
 * Runs the tester's comparison. A falsy result is a controlled failure,
 * distinct from an error raised while checking.
 *
 * @module testcase/phases/checkPhase
 */

import type { IPhaseExecutor, PhaseContext, PhaseResult } from '../../interfaces/IPhaseExecutor';

/**
 * Executes the check phase of a test case.
 */
export class CheckPhaseExecutor implements IPhaseExecutor {
  async execute(context: PhaseContext): Promise<PhaseResult> {
    const passed = await context.tester.test({ signal: context.signal });
    if (!passed) {
      return { success: false, message: 'Results do not match the reference' };
    }
    return { success: true };
  }
}
