/**
 * @fileoverview Orchestrator
 *
 * Top-level driver of a validation run:
 *
 * 1. resolve patterns into test-case identifiers;
 * 2. build one execution context per identifier;
 * 3. for each test case in discovery order, run the requested tracked phases
 *    in the fixed order prepare → run → check;
 * 4. render the report over all selected test cases, if requested;
 * 5. run cleanup, if requested.
 *
 * Test cases are processed strictly one after another. A phase failure is
 * contained to its test case; only a run-level interrupt stops the loop.
 *
 * @module testcase/orchestrator
 */

import type { IFileSystem } from '../interfaces/IFileSystem';
import type { ILogSink } from '../interfaces/ILogSink';
import type { IPhaseExecutor } from '../interfaces/IPhaseExecutor';
import type { IStatusStore } from '../interfaces/IStatusStore';
import type { ITester } from '../interfaces/ITester';
import type { ITesterLoader } from '../interfaces/ITesterLoader';
import { errorMessage, RunAbortedError } from '../core/errors';
import { Logger } from '../core/logger';
import { createExecutionContext } from './executionContext';
import type { InterruptMonitor } from './interruptMonitor';
import { TranscriptLogSink } from './logSinks';
import type { PatternResolver } from './patternResolver';
import { PhaseRunner } from './phaseRunner';
import { createPhaseExecutors } from './phases';
import type { ReportAggregator, ReportRow } from './reportAggregator';
import {
  ExecutionContext,
  ExecutionPhase,
  ExternalContext,
  isUnsuccessful,
  TestCaseId,
  TestRecord,
  TRACKED_PHASES,
  TrackedPhase,
} from './types';

const log = Logger.for('orchestrator');

/**
 * What to run.
 */
export interface RunRequest {
  testRoot: string;
  workRoot: string;
  /** Files listing one pattern per line */
  patternFiles: readonly string[];
  /** Patterns given directly, appended after the pattern-file lines */
  patterns: readonly string[];
  /** Requested phases */
  phases: ReadonlySet<ExecutionPhase>;
  externalContext: ExternalContext;
  /** Write the detailed report here instead of the summary sink */
  reportFile?: string;
  /** Only resolve and print the identifiers */
  listOnly?: boolean;
}

/**
 * What happened.
 */
export interface RunSummary {
  testCaseIds: TestCaseId[];
  /** Records of test cases processed by the execution loop */
  records: Map<TestCaseId, TestRecord>;
  /** Summary rows, when the report phase ran */
  reportRows?: ReportRow[];
  /** Test cases with at least one failed, error or interrupted phase */
  unsuccessful: TestCaseId[];
}

/**
 * Dependencies of {@link Orchestrator}.
 */
export interface OrchestratorDeps {
  fileSystem: IFileSystem;
  statusStore: IStatusStore;
  testerLoader: ITesterLoader;
  interrupts: InterruptMonitor;
  patternResolver: PatternResolver;
  reportAggregator: ReportAggregator;
  /** Process-lifetime progress and report sink */
  summary: ILogSink;
  statusFileName: string;
  /** Phase executors; defaults to {@link createPhaseExecutors} */
  executors?: Record<TrackedPhase, IPhaseExecutor>;
}

/**
 * Drives pattern resolution, phase execution, report and cleanup.
 */
export class Orchestrator {
  private readonly phaseRunner: PhaseRunner;

  constructor(private readonly deps: OrchestratorDeps) {
    this.phaseRunner = new PhaseRunner({
      statusStore: deps.statusStore,
      interrupts: deps.interrupts,
      executors: deps.executors ?? createPhaseExecutors(deps.fileSystem),
      summary: deps.summary,
    });
  }

  /**
   * Execute a run.
   *
   * @throws {RunAbortedError} When the user aborted the whole run.
   * @throws {PatternFileError} When a pattern file cannot be read.
   */
  async execute(request: RunRequest): Promise<RunSummary> {
    const { patternResolver, summary } = this.deps;
    const testCaseIds = await patternResolver.resolve(request.testRoot, request.patternFiles, request.patterns);

    if (request.listOnly) {
      testCaseIds.forEach((id) => summary.writeLine(id));
      return { testCaseIds, records: new Map(), unsuccessful: [] };
    }

    if (testCaseIds.length === 0) {
      log.warn('No test cases matched the given patterns', { testRoot: request.testRoot });
    }

    const roots = {
      testRoot: request.testRoot,
      workRoot: request.workRoot,
      statusFileName: this.deps.statusFileName,
    };
    const contexts = testCaseIds.map((id) => createExecutionContext(roots, id));
    const testers = new Map<TestCaseId, Promise<ITester>>();
    const testerFor = (context: ExecutionContext): Promise<ITester> => {
      let tester = testers.get(context.testCaseId);
      if (!tester) {
        tester = this.deps.testerLoader.load(context, request.externalContext);
        testers.set(context.testCaseId, tester);
      }
      return tester;
    };

    const records = new Map<TestCaseId, TestRecord>();
    let reportRows: ReportRow[] | undefined;
    const requestedTracked = TRACKED_PHASES.filter((phase) => request.phases.has(phase));

    this.deps.interrupts.attach();
    try {
      if (requestedTracked.length > 0) {
        for (const context of contexts) {
          this.ensureNotAborted();
          records.set(context.testCaseId, await this.runTestCase(context, requestedTracked, testerFor));
        }
      }

      if (request.phases.has('report')) {
        this.ensureNotAborted();
        reportRows = this.deps.reportAggregator.render(contexts, summary, request.reportFile);
      }

      if (request.phases.has('cleanup')) {
        for (const context of contexts) {
          this.ensureNotAborted();
          await this.cleanup(context, testerFor);
        }
      }
    } finally {
      this.deps.interrupts.detach();
    }

    return {
      testCaseIds,
      records,
      reportRows,
      unsuccessful: collectUnsuccessful(records, reportRows),
    };
  }

  /**
   * Run the requested tracked phases of one test case.
   */
  private async runTestCase(
    context: ExecutionContext,
    phases: readonly TrackedPhase[],
    testerFor: (context: ExecutionContext) => Promise<ITester>,
  ): Promise<TestRecord> {
    const record = this.deps.statusStore.load(context.statusFilePath);
    const transcript = new TranscriptLogSink(record.log);
    context.logSink = transcript;
    const run = { context, record, transcript, getTester: () => testerFor(context) };

    for (const phase of phases) {
      this.ensureNotAborted();
      const outcome = await this.phaseRunner.runPhase(run, phase);
      if (outcome.kind === 'tester-unavailable') {
        log.warn(`${context.testCaseId}: skipping remaining phases, tester unavailable`);
        break;
      }
    }
    this.ensureNotAborted();
    return record;
  }

  /**
   * Invoke the tester's cleanup, then remove the work directory. Both are
   * best effort.
   */
  private async cleanup(
    context: ExecutionContext,
    testerFor: (context: ExecutionContext) => Promise<ITester>,
  ): Promise<void> {
    const { summary, fileSystem } = this.deps;
    const id = context.testCaseId;
    let label = 'OK';

    try {
      const tester = await testerFor(context);
      await tester.cleanup();
    } catch (error) {
      label = 'Error';
      log.error(`${id}: cleanup failed`, { error: errorMessage(error) });
    }

    try {
      await fileSystem.rmAsync(context.workDir, { recursive: true, force: true });
    } catch (error) {
      log.debug(`${id}: could not remove ${context.workDir}`, { error: errorMessage(error) });
    }
    summary.writeLine(`${id}:\tcleanup:\t${label}`);
  }

  private ensureNotAborted(): void {
    if (this.deps.interrupts.isRunAborted()) {
      throw new RunAbortedError();
    }
  }
}

/**
 * Test cases with a failed, error or interrupted phase. Report rows, read
 * back from disk, take precedence over the in-memory records.
 */
function collectUnsuccessful(
  records: Map<TestCaseId, TestRecord>,
  reportRows: ReportRow[] | undefined,
): TestCaseId[] {
  const statuses: Array<[TestCaseId, TestRecord['status']]> = reportRows
    ? reportRows.map((row) => [row.testCaseId, row.status])
    : Array.from(records.entries()).map(([id, record]) => [id, record.status]);
  return statuses
    .filter(([, status]) => TRACKED_PHASES.some((phase) => isUnsuccessful(status[phase])))
    .map(([id]) => id);
}
