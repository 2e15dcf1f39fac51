/**
 * @fileoverview Phase Runner
 *
 * Executes one tracked phase of one test case: applies the gating rules,
 * wraps the phase executor in an error boundary that classifies the outcome,
 * and persists the record right after every attempt.
 *
 * Gating (a phase executes only if all hold):
 *
 * | Phase   | Own status | Upstream                                    |
 * |---------|------------|---------------------------------------------|
 * | prepare | not ok     | —                                           |
 * | run     | not ok     | prepare ok                                  |
 * | check   | not ok     | run ok and `tester.runFinished()` is true   |
 *
 * @module testcase/phaseRunner
 */

import type { ILogSink } from '../interfaces/ILogSink';
import type { IPhaseExecutor, PhaseResult } from '../interfaces/IPhaseExecutor';
import type { IStatusStore } from '../interfaces/IStatusStore';
import type { ITester } from '../interfaces/ITester';
import { errorMessage, PhaseInterruptedError } from '../core/errors';
import { Logger } from '../core/logger';
import type { InterruptMonitor } from './interruptMonitor';
import { indentText, TranscriptLogSink } from './logSinks';
import { ExecutionContext, PhaseStatus, STATUS_LABELS, TestRecord, TrackedPhase } from './types';

const log = Logger.for('phase-runner');

/**
 * State of one test case for the current invocation.
 */
export interface TestCaseRun {
  context: ExecutionContext;
  /** Record loaded from disk at the start of the invocation */
  record: TestRecord;
  /** Transcript seeded with the persisted log */
  transcript: TranscriptLogSink;
  /** Resolves the tester; called at most once per invocation by the orchestrator's cache */
  getTester: () => Promise<ITester>;
}

/**
 * Outcome of {@link PhaseRunner.runPhase}.
 */
export type PhaseOutcome =
  | { kind: 'executed'; status: PhaseStatus }
  | { kind: 'skipped'; reason: string }
  | { kind: 'tester-unavailable'; message: string };

/**
 * Dependencies of {@link PhaseRunner}.
 */
export interface PhaseRunnerDeps {
  statusStore: IStatusStore;
  interrupts: InterruptMonitor;
  executors: Record<TrackedPhase, IPhaseExecutor>;
  /** Process-lifetime progress sink */
  summary: ILogSink;
}

/**
 * Reject as soon as `signal` aborts, otherwise settle like `work`.
 */
export function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(new PhaseInterruptedError());
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new PhaseInterruptedError());
    signal.addEventListener('abort', onAbort, { once: true });
    void work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Upstream requirement of each tracked phase.
 */
function upstreamBlock(phase: TrackedPhase, record: TestRecord): string | undefined {
  if (phase === 'run' && record.status.prepare !== 'ok') {
    return `prepare is ${STATUS_LABELS[record.status.prepare]}`;
  }
  if (phase === 'check' && record.status.run !== 'ok') {
    return `run is ${STATUS_LABELS[record.status.run]}`;
  }
  return undefined;
}

/**
 * Gates, executes, classifies and persists tracked phases.
 */
export class PhaseRunner {
  constructor(private readonly deps: PhaseRunnerDeps) {}

  /**
   * Execute `phase` for a test case if its gating rules allow it.
   *
   * Never throws for phase failures: they become the phase status. The
   * record is saved after every attempt, before this method returns.
   */
  async runPhase(run: TestCaseRun, phase: TrackedPhase): Promise<PhaseOutcome> {
    const { context, record } = run;
    const id = context.testCaseId;

    if (record.status[phase] === 'ok') {
      log.debug(`${id}: ${phase} already OK, skipping`);
      return { kind: 'skipped', reason: 'already OK' };
    }

    const blocked = upstreamBlock(phase, record);
    if (blocked) {
      log.debug(`${id}: ${phase} skipped, ${blocked}`);
      return { kind: 'skipped', reason: blocked };
    }

    let tester: ITester;
    try {
      tester = await run.getTester();
    } catch (error) {
      const message = errorMessage(error);
      log.error(`${id}: cannot resolve tester`, { error: message });
      this.reportStart(run, phase);
      this.finish(run, phase, 'error', message);
      return { kind: 'tester-unavailable', message };
    }

    if (phase === 'check') {
      let finished: boolean;
      try {
        finished = tester.runFinished();
      } catch (error) {
        this.reportStart(run, phase);
        this.finish(run, phase, 'error', `runFinished failed: ${errorMessage(error)}`);
        return { kind: 'executed', status: 'error' };
      }
      if (!finished) {
        const reason = 'run not finished yet';
        run.transcript.writeLine(`${id}:\t${phase}:\tskipped, ${reason}`);
        this.deps.summary.writeLine(`${id}:\t${phase}:\tNot finished`);
        this.persist(run);
        return { kind: 'skipped', reason };
      }
    }

    const status = await this.execute(run, phase, tester);
    return { kind: 'executed', status };
  }

  /**
   * Run the phase executor inside the error boundary.
   */
  private async execute(run: TestCaseRun, phase: TrackedPhase, tester: ITester): Promise<PhaseStatus> {
    const { interrupts, executors } = this.deps;
    this.reportStart(run, phase);

    const signal = interrupts.beginPhase();
    let status: PhaseStatus;
    let message: string | undefined;
    try {
      const result: PhaseResult = await raceAbort(
        executors[phase].execute({ execution: run.context, tester, phase, signal }),
        signal,
      );
      status = result.success ? 'ok' : 'failed';
      message = result.message;
    } catch (error) {
      if (signal.aborted) {
        status = 'interrupted';
      } else {
        status = 'error';
        message = errorMessage(error);
        log.debug(`${run.context.testCaseId}: ${phase} raised`, error);
      }
    } finally {
      interrupts.endPhase();
    }

    this.finish(run, phase, status, message);

    if (status === 'interrupted') {
      await interrupts.gracePause();
    }
    return status;
  }

  private reportStart(run: TestCaseRun, phase: TrackedPhase): void {
    const line = `${run.context.testCaseId}:\t${phase}:\tstarted...`;
    this.deps.summary.writeLine(line);
    run.transcript.writeLine(line);
  }

  /**
   * Record the status, write result lines and persist the record.
   */
  private finish(run: TestCaseRun, phase: TrackedPhase, status: PhaseStatus, message?: string): void {
    const line = `${run.context.testCaseId}:\t${phase}:\t${STATUS_LABELS[status]}`;
    this.deps.summary.writeLine(line);
    run.transcript.writeLine(line);
    if (message) {
      run.transcript.write(indentText(message));
    }

    run.record.status[phase] = status;
    this.persist(run);
  }

  private persist(run: TestCaseRun): void {
    run.record.log = run.transcript.text();
    this.deps.statusStore.save(run.context.statusFilePath, run.record);
  }
}
