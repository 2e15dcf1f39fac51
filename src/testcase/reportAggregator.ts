/**
 * @fileoverview Report Aggregator
 *
 * Reloads every selected test case's record from disk and renders a summary
 * table plus the detailed transcripts. Records are read from disk rather than
 * memory because the report may run in a later invocation than execution.
 *
 * @module testcase/reportAggregator
 */

import type { IFileSystem } from '../interfaces/IFileSystem';
import type { ILogSink } from '../interfaces/ILogSink';
import type { IStatusStore } from '../interfaces/IStatusStore';
import { errorMessage } from '../core/errors';
import { Logger } from '../core/logger';
import { ExecutionContext, PhaseStatus, STATUS_LABELS, TestCaseId, TrackedPhase } from './types';

const log = Logger.for('report');

/** Width of separator lines. */
export const REPORT_LINE_WIDTH = 79;

const SEPARATOR = '-'.repeat(REPORT_LINE_WIDTH);

/**
 * One line of the summary table.
 */
export interface ReportRow {
  testCaseId: TestCaseId;
  status: Record<TrackedPhase, PhaseStatus>;
}

/**
 * Format a summary table cell row.
 */
export function formatSummaryRow(id: string, prepare: string, run: string, check: string): string {
  return `${id.padEnd(40)} ${prepare.padEnd(12)} ${run.padEnd(12)} ${check}`.trimEnd();
}

/**
 * Header lines of the summary table.
 */
export function summaryHeader(): string[] {
  return [SEPARATOR, formatSummaryRow('testcase', 'prepare', 'run', 'check'), SEPARATOR];
}

/**
 * Header lines introducing a test case's transcript in the detail stream.
 */
export function detailHeader(id: TestCaseId): string[] {
  const rule = '='.repeat(REPORT_LINE_WIDTH);
  return [rule, `==  ${id}`, rule];
}

/**
 * Renders reports from persisted records.
 *
 * @example
 * ```typescript
 * const aggregator = new ReportAggregator(store, fileSystem);
 * const rows = aggregator.render(contexts, stdoutSink, 'report.log');
 * ```
 */
export class ReportAggregator {
  constructor(
    private readonly statusStore: IStatusStore,
    private readonly fileSystem: IFileSystem,
  ) {}

  /**
   * Render the summary to `sink` and the details to `detailFile`, or to
   * `sink` after the summary when no file is given.
   *
   * @returns One row per test case, in the given order.
   */
  render(contexts: readonly ExecutionContext[], sink: ILogSink, detailFile?: string): ReportRow[] {
    const rows: ReportRow[] = [];
    const detail: string[] = [];

    summaryHeader().forEach((line) => sink.writeLine(line));
    for (const context of contexts) {
      const record = this.statusStore.load(context.statusFilePath);
      rows.push({ testCaseId: context.testCaseId, status: { ...record.status } });
      sink.writeLine(formatSummaryRow(
        context.testCaseId,
        STATUS_LABELS[record.status.prepare],
        STATUS_LABELS[record.status.run],
        STATUS_LABELS[record.status.check],
      ));

      detail.push(...detailHeader(context.testCaseId));
      detail.push(record.log.replace(/\n$/, ''));
    }
    sink.writeLine(SEPARATOR);

    const detailText = detail.join('\n') + '\n';
    if (detailFile) {
      try {
        this.fileSystem.writeFileSync(detailFile, detailText);
        sink.writeLine(`Detailed logs written to ${detailFile}`);
        return rows;
      } catch (error) {
        log.warn(`Cannot write report file ${detailFile}, echoing details instead`, { error: errorMessage(error) });
      }
    }

    detail.forEach((line) => sink.write(line));
    return rows;
  }
}
