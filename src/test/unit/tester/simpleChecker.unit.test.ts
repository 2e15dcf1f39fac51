/**
 * @fileoverview Unit tests for SimpleChecker.
 */

import { suite, test, setup } from 'mocha';
import * as assert from 'assert';
import { SimpleChecker } from '../../../tester/simpleChecker';
import { TestLog } from '../../../tester/testLog';
import { RecordingSink } from '../mocks/engine';

type Comparison = [label: string, actual: number, expected: number];

class ValueChecker extends SimpleChecker {
  constructor(testLog: TestLog, absTolerance: number, private readonly comparisons: Comparison[]) {
    super(testLog, absTolerance);
  }

  test(): boolean {
    return this.comparisons
      .map(([label, actual, expected]) => this.checkValue(label, actual, expected))
      .every((passed) => passed);
  }
}

suite('SimpleChecker', () => {
  let sink: RecordingSink;
  let testLog: TestLog;

  setup(() => {
    sink = new RecordingSink();
    testLog = new TestLog(sink);
  });

  test('compares within the absolute tolerance', () => {
    const checker = new ValueChecker(testLog, 0.25, []);

    assert.strictEqual(checker.withinTolerance(1.0, 1.1), true);
    assert.strictEqual(checker.withinTolerance(0.5, 0.75), true);
    assert.strictEqual(checker.withinTolerance(-0.5, 0.5), false);
  });

  test('a zero tolerance needs exact values', () => {
    const checker = new ValueChecker(testLog, 0, []);

    assert.strictEqual(checker.withinTolerance(2, 2), true);
    assert.strictEqual(checker.withinTolerance(2, 2.5), false);
  });

  test('logs one result line per compared value', () => {
    const checker = new ValueChecker(testLog, 0.25, [['energy', -1.5, -1.5], ['dipole', 0.5, 1]]);

    const passed = checker.test();

    const failure = 'dipole: 0.5 (expected 1 +/- 0.25)';
    assert.strictEqual(passed, false);
    assert.deepStrictEqual(sink.lines, [
      'energy: -1.5' + ' '.repeat(60) + '[Ok]',
      failure + ' '.repeat(72 - failure.length) + '[FAILED]',
    ]);
  });

  test('passes when every value is within tolerance', () => {
    const checker = new ValueChecker(testLog, 1e-3, [['charge', 0.0004, 0]]);
    assert.strictEqual(checker.test(), true);
  });

  test('rejects negative and non-numeric tolerances', () => {
    assert.throws(() => new ValueChecker(testLog, -1, []), RangeError);
    assert.throws(() => new ValueChecker(testLog, Number.NaN, []), /got NaN/);
  });
});
