/**
 * @fileoverview Composition Root — DI container wiring for the CLI.
 *
 * Creates a {@link ServiceContainer} with all production service implementations
 * registered. This is the single place where concrete classes meet their interfaces.
 *
 * ## Dependency Graph
 *
 * ```
 * IFileSystem      ──→ DefaultFileSystem      (singleton)
 * IConfigProvider  ──→ JsonConfigProvider     (singleton, uses IFileSystem)
 *   └─ RunConfigManager                       (singleton)
 * SummarySink      ──→ StreamLogSink(stdout)  (singleton)
 * IStatusStore     ──→ JsonStatusStore        (singleton, uses IFileSystem)
 * ITesterLoader    ──→ ModuleTesterLoader     (singleton, uses IFileSystem, RunConfigManager)
 * InterruptMonitor                            (singleton, uses RunConfigManager)
 * PatternResolver / ReportAggregator          (singletons)
 * Orchestrator                                (singleton, uses all of the above)
 * ```
 *
 * @module composition
 */

import { ServiceContainer } from './core/container';
import { JsonConfigProvider } from './core/configProvider';
import { DefaultFileSystem } from './core/defaultFileSystem';
import * as Tokens from './core/tokens';
import { RunConfigManager } from './testcase/configManager';
import { InterruptMonitor } from './testcase/interruptMonitor';
import { StreamLogSink } from './testcase/logSinks';
import { Orchestrator } from './testcase/orchestrator';
import { PatternResolver } from './testcase/patternResolver';
import { ReportAggregator } from './testcase/reportAggregator';
import { JsonStatusStore } from './testcase/statusStore';
import { ModuleTesterLoader } from './tester/moduleTesterLoader';

/**
 * Inputs of the composition root.
 */
export interface CompositionOptions {
  /** Optional JSON configuration file */
  configFile?: string;
  /** Environment for configuration overrides (default `process.env`) */
  env?: NodeJS.ProcessEnv;
  /** Destination of progress lines and the report (default stdout) */
  stdout?: { write(chunk: string): unknown };
}

/**
 * Create and wire the production DI container.
 *
 * @throws {UsageError} When the configuration file is unreadable or malformed.
 */
export function createContainer(options: CompositionOptions = {}): ServiceContainer {
  const container = new ServiceContainer();

  // ─── Infrastructure ──────────────────────────────────────────────────
  container.registerSingleton(Tokens.IFileSystem, () => new DefaultFileSystem());

  container.registerSingleton(
    Tokens.IConfigProvider,
    (c) => new JsonConfigProvider(c.resolve(Tokens.IFileSystem), { filePath: options.configFile, env: options.env }),
  );

  container.registerSingleton(
    Tokens.RunConfigManager,
    (c) => new RunConfigManager(c.resolve(Tokens.IConfigProvider)),
  );

  container.registerSingleton(
    Tokens.SummarySink,
    () => new StreamLogSink(options.stdout ?? process.stdout),
  );

  // ─── Engine ──────────────────────────────────────────────────────────
  container.registerSingleton(
    Tokens.IStatusStore,
    (c) => new JsonStatusStore(c.resolve(Tokens.IFileSystem)),
  );

  container.registerSingleton(
    Tokens.ITesterLoader,
    (c) => new ModuleTesterLoader(c.resolve(Tokens.IFileSystem), c.resolve(Tokens.RunConfigManager).testerModule),
  );

  container.registerSingleton(
    Tokens.InterruptMonitor,
    (c) => new InterruptMonitor({ graceMs: c.resolve(Tokens.RunConfigManager).interruptGraceMs }),
  );

  container.registerSingleton(
    Tokens.PatternResolver,
    (c) => new PatternResolver(c.resolve(Tokens.IFileSystem)),
  );

  container.registerSingleton(
    Tokens.ReportAggregator,
    (c) => new ReportAggregator(c.resolve(Tokens.IStatusStore), c.resolve(Tokens.IFileSystem)),
  );

  container.registerSingleton(
    Tokens.Orchestrator,
    (c) => new Orchestrator({
      fileSystem: c.resolve(Tokens.IFileSystem),
      statusStore: c.resolve(Tokens.IStatusStore),
      testerLoader: c.resolve(Tokens.ITesterLoader),
      interrupts: c.resolve(Tokens.InterruptMonitor),
      patternResolver: c.resolve(Tokens.PatternResolver),
      reportAggregator: c.resolve(Tokens.ReportAggregator),
      summary: c.resolve(Tokens.SummarySink),
      statusFileName: c.resolve(Tokens.RunConfigManager).statusFileName,
    }),
  );

  return container;
}
