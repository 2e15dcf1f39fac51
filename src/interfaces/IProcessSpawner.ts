/**
 * @fileoverview Interface for process spawning abstraction.
 * 
 * Thin wrapper around child_process.spawn to enable dependency injection
 * and unit testing without spawning real processes.
 * 
 * @module interfaces/IProcessSpawner
 */

import { spawn } from 'child_process';
import type { SpawnOptions } from 'child_process';

/**
 * Minimal child process interface for testability.
 * Matches the subset of ChildProcess used by consumers.
 */
export interface ChildProcessLike {
  readonly pid?: number;
  readonly exitCode: number | null;
  readonly killed: boolean;
  kill(signal?: NodeJS.Signals | number): boolean;
  on(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

/**
 * Interface for spawning child processes.
 * 
 * @example
 * ```typescript
 * class SimpleCalculator {
 *   constructor(private readonly spawner: IProcessSpawner) {}
 *   
 *   run(cwd: string) {
 *     const proc = this.spawner.spawn('./simulate', ['input.dat'], { cwd });
 *     // ...
 *   }
 * }
 * ```
 */
export interface IProcessSpawner {
  /**
   * Spawn a child process.
   * 
   * @param command - The command to run
   * @param args - Arguments to pass to the command
   * @param options - Spawn options (cwd, env, stdio, etc.)
   * @returns A child process handle
   */
  spawn(command: string, args: string[], options: SpawnOptions): ChildProcessLike;
}

/**
 * Default process spawner that delegates to child_process.spawn.
 */
export class DefaultProcessSpawner implements IProcessSpawner {
  spawn(command: string, args: string[], options: SpawnOptions): ChildProcessLike {
    return spawn(command, args, options);
  }
}
