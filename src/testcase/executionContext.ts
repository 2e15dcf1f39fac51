/**
 * @fileoverview Execution Context construction.
 *
 * @module testcase/executionContext
 */

import * as path from 'path';
import type { ILogSink } from '../interfaces/ILogSink';
import type { ExecutionContext, TestCaseId } from './types';
import { TranscriptLogSink } from './logSinks';

/**
 * Roots and naming shared by every context of a run.
 */
export interface ContextRoots {
  testRoot: string;
  workRoot: string;
  statusFileName: string;
}

/**
 * Derive the work directory of a test case. Deterministic, so that
 * repeated invocations reuse or recreate the same location.
 */
export function workDirFor(workRoot: string, testCaseId: TestCaseId): string {
  return path.resolve(workRoot, ...testCaseId.split('/'));
}

/**
 * Build the execution context of one test case.
 *
 * @param logSink - Transcript sink; a fresh {@link TranscriptLogSink} when omitted
 */
export function createExecutionContext(
  roots: ContextRoots,
  testCaseId: TestCaseId,
  logSink: ILogSink = new TranscriptLogSink(),
): ExecutionContext {
  const testRoot = path.resolve(roots.testRoot);
  const workRoot = path.resolve(roots.workRoot);
  const workDir = workDirFor(workRoot, testCaseId);
  return {
    testRoot,
    testCaseId,
    testDir: path.resolve(testRoot, ...testCaseId.split('/')),
    workRoot,
    workDir,
    statusFilePath: path.join(workDir, roots.statusFileName),
    logSink,
  };
}
