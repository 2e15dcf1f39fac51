/**
 * @fileoverview Phase module barrel exports.
 *
 * @module testcase/phases
 */

import type { IFileSystem } from '../../interfaces/IFileSystem';
import type { IPhaseExecutor } from '../../interfaces/IPhaseExecutor';
import type { TrackedPhase } from '../types';
import { CheckPhaseExecutor } from './checkPhase';
import { PreparePhaseExecutor } from './preparePhase';
import { RunPhaseExecutor } from './runPhase';

export { PreparePhaseExecutor } from './preparePhase';
export { RunPhaseExecutor } from './runPhase';
export { CheckPhaseExecutor } from './checkPhase';

/**
 * Build the default executor for every tracked phase.
 */
export function createPhaseExecutors(fileSystem: IFileSystem): Record<TrackedPhase, IPhaseExecutor> {
  return {
    prepare: new PreparePhaseExecutor(fileSystem),
    run: new RunPhaseExecutor(),
    check: new CheckPhaseExecutor(),
  };
}
