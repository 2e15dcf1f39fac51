/**
 * @fileoverview Module Tester Loader
 *
 * Default {@link ITesterLoader}: each test directory carries a CommonJS
 * module (by default `tester.js`) exporting a factory:
 *
 * ```js
 * exports.createTester = (context, externalContext) => ({
 *   prepare() {}, run() {}, runFinished() { return true; },
 *   test() { return true; }, cleanup() {},
 * });
 * ```
 *
 * A default-exported function is accepted as the factory too.
 *
 * @module tester/moduleTesterLoader
 */

import * as path from 'path';
import type { IFileSystem } from '../interfaces/IFileSystem';
import { isTester, ITester } from '../interfaces/ITester';
import type { ITesterLoader } from '../interfaces/ITesterLoader';
import { errorMessage, TesterLoadError } from '../core/errors';
import { Logger } from '../core/logger';
import type { ExecutionContext, ExternalContext } from '../testcase/types';

const log = Logger.for('tester');

/** Loads a module by absolute path. */
export type ModuleImporter = (modulePath: string) => Promise<unknown>;

const defaultImporter: ModuleImporter = (modulePath) => import(modulePath);

/**
 * Find the tester factory exported by a loaded module.
 */
function findFactory(loaded: unknown, depth = 0): ((...args: unknown[]) => unknown) | undefined {
  if (typeof loaded === 'function') {
    return (...args) => Reflect.apply(loaded, undefined, args);
  }
  if (typeof loaded !== 'object' || loaded === null || depth > 1) {
    return undefined;
  }
  for (const candidate of [Reflect.get(loaded, 'createTester'), Reflect.get(loaded, 'default')]) {
    const factory = findFactory(candidate, depth + 1);
    if (factory) {
      return factory;
    }
  }
  return undefined;
}

/**
 * Resolves testers from a module inside each test directory.
 */
export class ModuleTesterLoader implements ITesterLoader {
  constructor(
    private readonly fileSystem: IFileSystem,
    private readonly moduleName: string,
    private readonly importer: ModuleImporter = defaultImporter,
  ) {}

  async load(context: ExecutionContext, externalContext: ExternalContext): Promise<ITester> {
    const modulePath = path.join(context.testDir, this.moduleName);
    if (!(await this.fileSystem.existsAsync(modulePath))) {
      throw new TesterLoadError(modulePath, 'file not found');
    }

    let loaded: unknown;
    try {
      loaded = await this.importer(modulePath);
    } catch (error) {
      throw new TesterLoadError(modulePath, errorMessage(error));
    }

    const factory = findFactory(loaded);
    if (!factory) {
      throw new TesterLoadError(modulePath, 'module exports no createTester function');
    }

    const tester = await factory(context, externalContext);
    if (!isTester(tester)) {
      throw new TesterLoadError(modulePath, 'factory did not return a tester');
    }
    log.debug(`Loaded tester for ${context.testCaseId}`, { modulePath });
    return tester;
  }
}
