/**
 * @fileoverview Preparator copying an input directory into the work directory.
 *
 * @module tester/simplePreparator
 */

import * as path from 'path';
import type { IFileSystem } from '../interfaces/IFileSystem';
import type { TesterCallOptions } from '../interfaces/ITester';
import { PhaseInterruptedError } from '../core/errors';
import type { Preparator } from './types';

/** Conventional name of the input directory inside a test directory. */
export const INPUT_DIR = 'input';

/**
 * Copies every entry of `inputDir` (directories recursively) into `workDir`.
 * Cleanup does nothing: the engine removes the work directory itself.
 */
export class SimplePreparator implements Preparator {
  constructor(
    private readonly fileSystem: IFileSystem,
    private readonly inputDir: string,
    private readonly workDir: string,
  ) {}

  async prepare(options: TesterCallOptions): Promise<void> {
    const entries = await this.fileSystem.readdirAsync(this.inputDir);
    for (const entry of entries.sort()) {
      if (options.signal.aborted) {
        throw new PhaseInterruptedError();
      }
      await this.fileSystem.copyAsync(path.join(this.inputDir, entry), path.join(this.workDir, entry));
    }
  }

  cleanup(): void {
    // Nothing beyond the engine's work directory removal.
  }
}
