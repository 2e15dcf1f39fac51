/**
 * @fileoverview Building-block roles a tester can be composed from.
 *
 * @module tester/types
 */

import type { TesterCallOptions } from '../interfaces/ITester';

/** Sets up and tears down the work directory. */
export interface Preparator {
  prepare(options: TesterCallOptions): Promise<void> | void;
  cleanup(): Promise<void> | void;
}

/** Runs (or starts) the calculation. */
export interface Calculator {
  run(options: TesterCallOptions): Promise<void> | void;
  runFinished(): boolean;
}

/** Compares results against reference data. */
export interface Checker {
  test(options: TesterCallOptions): Promise<boolean> | boolean;
}
