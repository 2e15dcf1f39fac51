/**
 * @fileoverview Test Case Types
 *
 * Phases, phase statuses, persisted records and per-test-case execution
 * context shared by the whole engine.
 *
 * @module testcase/types
 */

import type { ILogSink } from '../interfaces/ILogSink';

// ============================================================================
// PHASES
// ============================================================================

/**
 * Every phase a test case goes through, in execution order.
 */
export type ExecutionPhase = 'prepare' | 'run' | 'check' | 'report' | 'cleanup';

/**
 * Phases whose outcome is persisted. Report and cleanup always re-execute.
 */
export type TrackedPhase = 'prepare' | 'run' | 'check';

/** Tracked phases in their fixed execution order. */
export const TRACKED_PHASES: readonly TrackedPhase[] = ['prepare', 'run', 'check'];

// ============================================================================
// PHASE STATUS
// ============================================================================

/**
 * Outcome of a tracked phase.
 *
 * `not-run` is the only initial value. `ok` is final; every other terminal
 * status is re-attempted by the next invocation that requests the phase.
 */
export type PhaseStatus =
  | 'not-run'      // Never attempted (or gating prevented it)
  | 'ok'           // Completed successfully
  | 'failed'       // Ran and produced a controlled negative result
  | 'error'        // Raised an unexpected error
  | 'interrupted'; // Cancelled by the user mid-phase

/** All phase statuses. */
export const PHASE_STATUSES: readonly PhaseStatus[] = ['not-run', 'ok', 'failed', 'error', 'interrupted'];

/**
 * Labels used in progress lines and report tables.
 */
export const STATUS_LABELS: Readonly<Record<PhaseStatus, string>> = {
  'not-run': 'Not run',
  ok: 'OK',
  failed: 'FAILED',
  error: 'Error',
  interrupted: 'Interrupted',
};

/**
 * Statuses that count against the run's exit code.
 */
export function isUnsuccessful(status: PhaseStatus): boolean {
  return status === 'failed' || status === 'error' || status === 'interrupted';
}

// ============================================================================
// RECORDS
// ============================================================================

/** Identifier of a test case: its path relative to the test root, `/` separated. */
export type TestCaseId = string;

/**
 * Persisted state of one test case.
 */
export interface TestRecord {
  /** Status of every tracked phase */
  status: Record<TrackedPhase, PhaseStatus>;
  /** Transcript accumulated over the test case's lifetime */
  log: string;
}

/**
 * Create a record with every phase `not-run` and an empty log.
 */
export function createFreshRecord(): TestRecord {
  return {
    status: { prepare: 'not-run', run: 'not-run', check: 'not-run' },
    log: '',
  };
}

// ============================================================================
// CONTEXT
// ============================================================================

/**
 * User-supplied `key=value` variables, constant for the whole run.
 */
export type ExternalContext = Readonly<Record<string, string>>;

/**
 * Paths and identifiers of one test case for one invocation.
 *
 * Everything except `logSink` is fixed at construction. The work directory is
 * derived from the work root and the identifier, so repeated invocations reuse
 * the same location.
 */
export interface ExecutionContext {
  readonly testRoot: string;
  readonly testCaseId: TestCaseId;
  readonly testDir: string;
  readonly workRoot: string;
  readonly workDir: string;
  readonly statusFilePath: string;
  /** Per-test-case transcript, persisted with the record */
  logSink: ILogSink;
}
