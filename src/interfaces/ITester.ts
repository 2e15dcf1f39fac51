/**
 * @fileoverview Tester capability.
 *
 * A tester implements the lifecycle of one test case. The engine only
 * sequences these calls and records their outcome; what they do (copy input
 * decks, launch a simulation, compare numbers) is up to the test-suite author.
 *
 * @module interfaces/ITester
 */

/**
 * Options passed to every abortable lifecycle call.
 */
export interface TesterCallOptions {
  /** Aborted when the user interrupts the running phase. */
  signal: AbortSignal;
}

/**
 * Lifecycle operations of a single test case.
 *
 * `prepare`, `run` and `cleanup` signal failure by throwing. `test` returns
 * pass/fail and throws only for infrastructure errors. `runFinished` must not
 * block and must not have side effects: it is polled to decide whether the
 * check phase is eligible.
 */
export interface ITester {
  prepare(options: TesterCallOptions): Promise<void> | void;
  run(options: TesterCallOptions): Promise<void> | void;
  runFinished(): boolean;
  test(options: TesterCallOptions): Promise<boolean> | boolean;
  cleanup(): Promise<void> | void;
}

const TESTER_METHODS = ['prepare', 'run', 'runFinished', 'test', 'cleanup'] as const;

/**
 * Type guard for objects returned by tester factories.
 */
export function isTester(value: unknown): value is ITester {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return TESTER_METHODS.every((name) => typeof Reflect.get(value, name) === 'function');
}
