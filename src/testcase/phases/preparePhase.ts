/**
 * @fileoverview Prepare Phase Executor
 *
 * Resets the work directory (remove if present, recreate) and hands over to
 * the tester's `prepare`.
 *
 * @module testcase/phases/preparePhase
 */

import type { IFileSystem } from '../../interfaces/IFileSystem';
import type { IPhaseExecutor, PhaseContext, PhaseResult } from '../../interfaces/IPhaseExecutor';

/**
 * Executes the prepare phase of a test case.
 */
export class PreparePhaseExecutor implements IPhaseExecutor {
  constructor(private readonly fileSystem: IFileSystem) {}

  async execute(context: PhaseContext): Promise<PhaseResult> {
    const { workDir } = context.execution;

    if (await this.fileSystem.existsAsync(workDir)) {
      await this.fileSystem.rmAsync(workDir, { recursive: true, force: true });
    }
    await this.fileSystem.mkdirAsync(workDir, { recursive: true });

    await context.tester.prepare({ signal: context.signal });
    return { success: true };
  }
}
