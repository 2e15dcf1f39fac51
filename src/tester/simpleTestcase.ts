/**
 * @fileoverview Composite tester.
 *
 * @module tester/simpleTestcase
 */

import type { ITester, TesterCallOptions } from '../interfaces/ITester';
import type { Calculator, Checker, Preparator } from './types';

/**
 * Tester forwarding each lifecycle call to the preparator, calculator or
 * checker responsible for it.
 */
export class SimpleTestcase implements ITester {
  constructor(
    private readonly preparator: Preparator,
    private readonly calculator: Calculator,
    private readonly checker: Checker,
  ) {}

  async prepare(options: TesterCallOptions): Promise<void> {
    await this.preparator.prepare(options);
  }

  async run(options: TesterCallOptions): Promise<void> {
    await this.calculator.run(options);
  }

  runFinished(): boolean {
    return this.calculator.runFinished();
  }

  async test(options: TesterCallOptions): Promise<boolean> {
    return this.checker.test(options);
  }

  async cleanup(): Promise<void> {
    await this.preparator.cleanup();
  }
}
