/**
 * @fileoverview Calculator executing a command line in the work directory.
 *
 * Standard input is taken from a `STDIN` file when present; standard output
 * and error go to `STDOUT` and `STDERR`. A `.runfinished` marker is written
 * once the command exits successfully, which is what `runFinished()` polls.
 *
 * @module tester/simpleCalculator
 */

import * as path from 'path';
import type { IFileSystem } from '../interfaces/IFileSystem';
import { ChildProcessLike, DefaultProcessSpawner, IProcessSpawner } from '../interfaces/IProcessSpawner';
import type { TesterCallOptions } from '../interfaces/ITester';
import { PhaseInterruptedError } from '../core/errors';
import { Logger } from '../core/logger';
import type { Calculator } from './types';

const log = Logger.for('tester');

export const STDIN_FILE = 'STDIN';
export const STDOUT_FILE = 'STDOUT';
export const STDERR_FILE = 'STDERR';
export const FINISH_MARKER = '.runfinished';

/**
 * Wait for a child process to exit, killing it when `signal` aborts.
 */
function waitForExit(child: ChildProcessLike, signal: AbortSignal): Promise<number | null> {
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      child.kill('SIGTERM');
      reject(new PhaseInterruptedError());
    };
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    child.on('error', (err) => {
      signal.removeEventListener('abort', onAbort);
      reject(err);
    });
    child.on('exit', (code) => {
      signal.removeEventListener('abort', onAbort);
      resolve(code);
    });
  });
}

/**
 * Runs a command line to completion inside the work directory.
 */
export class SimpleCalculator implements Calculator {
  private readonly finishMarker: string;

  /**
   * @param commandLine - Program followed by its arguments
   */
  constructor(
    private readonly fileSystem: IFileSystem,
    private readonly workDir: string,
    private readonly commandLine: readonly string[],
    private readonly spawner: IProcessSpawner = new DefaultProcessSpawner(),
  ) {
    this.finishMarker = path.join(workDir, FINISH_MARKER);
  }

  async run(options: TesterCallOptions): Promise<void> {
    const [command, ...args] = this.commandLine;
    if (!command) {
      throw new Error('Empty command line');
    }
    this.fileSystem.unlinkSync(this.finishMarker);

    const stdinPath = path.join(this.workDir, STDIN_FILE);
    const stdinFd = this.fileSystem.existsSync(stdinPath) ? this.fileSystem.openSync(stdinPath, 'r') : undefined;
    const stdoutFd = this.fileSystem.openSync(path.join(this.workDir, STDOUT_FILE), 'w');
    const stderrFd = this.fileSystem.openSync(path.join(this.workDir, STDERR_FILE), 'w');

    let code: number | null;
    try {
      log.debug(`Spawning ${this.commandLine.join(' ')}`, { cwd: this.workDir });
      const child = this.spawner.spawn(command, args, {
        cwd: this.workDir,
        stdio: [stdinFd ?? 'ignore', stdoutFd, stderrFd],
      });
      code = await waitForExit(child, options.signal);
    } finally {
      [stdinFd, stdoutFd, stderrFd].forEach((fd) => {
        if (fd !== undefined) {this.fileSystem.closeSync(fd);}
      });
    }

    if (code !== 0) {
      throw new Error(`Command '${command}' exited with code ${code ?? 'null'}`);
    }
    this.fileSystem.writeFileSync(this.finishMarker, '');
  }

  runFinished(): boolean {
    return this.fileSystem.existsSync(this.finishMarker);
  }
}
