/**
 * @fileoverview Central export for all interfaces.
 * 
 * Import interfaces from this module for convenience:
 * ```typescript
 * import { ITester, IStatusStore } from './interfaces';
 * ```
 * 
 * @module interfaces
 */

export * from './IConfigProvider';
export * from './IFileSystem';
export * from './ILogger';
export * from './ILogSink';
export * from './IPhaseExecutor';
export * from './IProcessSpawner';
export * from './IStatusStore';
export * from './ITester';
export * from './ITesterLoader';
