/**
 * @fileoverview Library entry point.
 *
 * Test suites embed the engine through {@link createContainer} or by
 * constructing an {@link Orchestrator} directly; tester modules import the
 * building blocks from here.
 *
 * @module valrun
 */

export * from './interfaces';
export * from './testcase';
export * from './tester';
export {
  ValrunError,
  PatternFileError,
  TesterLoadError,
  PhaseInterruptedError,
  RunAbortedError,
  UsageError,
  errorMessage,
} from './core/errors';
export { Logger, ComponentLogger } from './core/logger';
export type { LogComponent, LogLevel, LoggerOptions } from './core/logger';
export { DefaultFileSystem } from './core/defaultFileSystem';
export { JsonConfigProvider, envKeyFor } from './core/configProvider';
export { parseContextVariables } from './core/contextVariables';
export { ServiceContainer, createToken } from './core/container';
export type { Token, ServiceFactory } from './core/container';
export * as Tokens from './core/tokens';
export { createContainer } from './composition';
export type { CompositionOptions } from './composition';
export { runCli, buildProgram } from './cli';
export type { CliIo } from './cli';
