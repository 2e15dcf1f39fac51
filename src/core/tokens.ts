/**
 * @fileoverview Service tokens for dependency injection container.
 * 
 * Each token corresponds to an interface in src/interfaces/ or to a
 * concrete engine component.
 * 
 * @module core/tokens
 */

import type { IConfigProvider as IConfigProviderService } from '../interfaces/IConfigProvider';
import type { IFileSystem as IFileSystemService } from '../interfaces/IFileSystem';
import type { ILogSink as ILogSinkService } from '../interfaces/ILogSink';
import type { IStatusStore as IStatusStoreService } from '../interfaces/IStatusStore';
import type { ITesterLoader as ITesterLoaderService } from '../interfaces/ITesterLoader';
import type { RunConfigManager as RunConfigManagerService } from '../testcase/configManager';
import type { InterruptMonitor as InterruptMonitorService } from '../testcase/interruptMonitor';
import type { Orchestrator as OrchestratorService } from '../testcase/orchestrator';
import type { PatternResolver as PatternResolverService } from '../testcase/patternResolver';
import type { ReportAggregator as ReportAggregatorService } from '../testcase/reportAggregator';
import { createToken } from './container';

// ─── Infrastructure ────────────────────────────────────────────────────────

/** File system operations. */
export const IFileSystem = createToken<IFileSystemService>('IFileSystem');

/** Raw configuration access. */
export const IConfigProvider = createToken<IConfigProviderService>('IConfigProvider');

/** Process-lifetime progress and report output (stdout). */
export const SummarySink = createToken<ILogSinkService>('SummarySink');

// ─── Engine ────────────────────────────────────────────────────────────────

/** Typed configuration accessors. */
export const RunConfigManager = createToken<RunConfigManagerService>('RunConfigManager');

/** Per-test-case status persistence. */
export const IStatusStore = createToken<IStatusStoreService>('IStatusStore');

/** Tester resolution. */
export const ITesterLoader = createToken<ITesterLoaderService>('ITesterLoader');

/** SIGINT handling. */
export const InterruptMonitor = createToken<InterruptMonitorService>('InterruptMonitor');

/** Pattern expansion. */
export const PatternResolver = createToken<PatternResolverService>('PatternResolver');

/** Report rendering. */
export const ReportAggregator = createToken<ReportAggregatorService>('ReportAggregator');

/** Top-level run driver. */
export const Orchestrator = createToken<OrchestratorService>('Orchestrator');
