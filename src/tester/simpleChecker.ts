/**
 * @fileoverview Base class for checkers comparing numbers against reference
 * values.
 *
 * @module tester/simpleChecker
 */

import type { TesterCallOptions } from '../interfaces/ITester';
import type { TestLog } from './testLog';
import type { Checker } from './types';

/**
 * Checker carrying a transcript writer and an absolute tolerance for float
 * comparisons. Subclasses implement {@link test}.
 *
 * @example
 * ```typescript
 * class EnergyChecker extends SimpleChecker {
 *   test(): boolean {
 *     return this.checkValue('total energy', readEnergy(workDir), -76.0107);
 *   }
 * }
 * new EnergyChecker(new TestLog(context.logSink), 1e-6);
 * ```
 */
export abstract class SimpleChecker implements Checker {
  /**
   * @throws {RangeError} If `absTolerance` is negative or not a number.
   */
  constructor(
    protected readonly testLog: TestLog,
    readonly absTolerance: number,
  ) {
    if (!(absTolerance >= 0)) {
      throw new RangeError(`Tolerance must be a non-negative number, got ${absTolerance}`);
    }
  }

  abstract test(options: TesterCallOptions): Promise<boolean> | boolean;

  /** Whether `actual` differs from `expected` by at most the tolerance. */
  withinTolerance(actual: number, expected: number): boolean {
    return Math.abs(actual - expected) <= this.absTolerance;
  }

  /**
   * Compare one value and write a success or failure line for it.
   */
  protected checkValue(label: string, actual: number, expected: number): boolean {
    const passed = this.withinTolerance(actual, expected);
    if (passed) {
      this.testLog.success(`${label}: ${actual}`);
    } else {
      this.testLog.failure(`${label}: ${actual} (expected ${expected} +/- ${this.absTolerance})`);
    }
    return passed;
  }
}
