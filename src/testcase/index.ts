/**
 * @fileoverview Test case engine exports.
 *
 * @module testcase
 */

export * from './types';
export { PatternResolver, parsePatternFile } from './patternResolver';
export type { GlobFn } from './patternResolver';
export { JsonStatusStore, STATUS_FILE_VERSION } from './statusStore';
export { createExecutionContext, workDirFor } from './executionContext';
export type { ContextRoots } from './executionContext';
export { StreamLogSink, TranscriptLogSink, indentText } from './logSinks';
export { InterruptMonitor } from './interruptMonitor';
export type { SignalSource } from './interruptMonitor';
export { PhaseRunner, raceAbort } from './phaseRunner';
export type { PhaseOutcome, TestCaseRun } from './phaseRunner';
export { ReportAggregator, formatSummaryRow, summaryHeader, detailHeader } from './reportAggregator';
export type { ReportRow } from './reportAggregator';
export { Orchestrator } from './orchestrator';
export type { RunRequest, RunSummary } from './orchestrator';
export { RunConfigManager } from './configManager';
export { parsePhaseLetters, PHASE_LETTERS, DEFAULT_ACTIONS } from './phaseSelection';
export * from './phases';
