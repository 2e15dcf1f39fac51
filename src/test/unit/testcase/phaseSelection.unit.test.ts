/**
 * @fileoverview Unit tests for action-letter parsing.
 */

import { suite, test } from 'mocha';
import * as assert from 'assert';
import { UsageError } from '../../../core/errors';
import { DEFAULT_ACTIONS, parsePhaseLetters } from '../../../testcase/phaseSelection';

suite('parsePhaseLetters', () => {
  test('default actions select every phase but cleanup', () => {
    assert.deepStrictEqual([...parsePhaseLetters(DEFAULT_ACTIONS)], ['prepare', 'run', 'check', 'report']);
  });

  test('letter order and repetition do not matter', () => {
    assert.deepStrictEqual([...parsePhaseLetters('cpp')], ['cleanup', 'prepare']);
  });

  test('t selects check and s selects report', () => {
    assert.deepStrictEqual([...parsePhaseLetters('ts')], ['check', 'report']);
  });

  test('rejects unknown letters', () => {
    assert.throws(
      () => parsePhaseLetters('px'),
      (err: unknown) => err instanceof UsageError && err.message === "Unknown action 'x' (valid: prtsc)",
    );
  });

  test('rejects an empty selection', () => {
    assert.throws(() => parsePhaseLetters(''), /No action selected/);
  });
});
