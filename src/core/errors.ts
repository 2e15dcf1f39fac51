/**
 * @fileoverview Error types raised by the engine and its glue.
 *
 * Phase outcomes are never propagated as errors past the per-test-case loop;
 * only {@link RunAbortedError} and the start-up errors below reach the CLI.
 *
 * @module core/errors
 */

/**
 * Base class for every error this package raises.
 */
export class ValrunError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A pattern file named on the command line could not be read.
 */
export class PatternFileError extends ValrunError {
  constructor(public readonly filePath: string, cause: string) {
    super(`Cannot read pattern file '${filePath}': ${cause}`);
  }
}

/**
 * No usable tester could be produced for a test case.
 */
export class TesterLoadError extends ValrunError {
  constructor(public readonly modulePath: string, reason: string) {
    super(`Cannot load tester from '${modulePath}': ${reason}`);
  }
}

/**
 * The running phase was cancelled by a user interrupt.
 */
export class PhaseInterruptedError extends ValrunError {
  constructor() {
    super('Interrupted by user');
  }
}

/**
 * The user asked to stop the whole run (second interrupt).
 */
export class RunAbortedError extends ValrunError {
  constructor() {
    super('Run aborted by user');
  }
}

/**
 * Invalid command-line usage.
 */
export class UsageError extends ValrunError {}

/**
 * Extract a printable message from anything that was thrown.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
