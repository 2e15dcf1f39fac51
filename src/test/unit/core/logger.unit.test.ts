/**
 * @fileoverview Unit tests for Logger.
 *
 * Tests per-component debug control, level filtering, line formatting and
 * the console fallback before initialization.
 *
 * @module test/unit/core/logger.unit.test
 */

import { suite, test, setup, teardown } from 'mocha';
import * as assert from 'assert';
import * as sinon from 'sinon';
import { formatData, Logger } from '../../../core/logger';

suite('Logger Unit Tests', () => {
  let lines: string[];

  setup(() => {
    lines = [];
    Logger.reset();
  });

  teardown(() => {
    sinon.restore();
    Logger.reset();
  });

  suite('initialize', () => {
    test('formats lines with timestamp, padded level and component', () => {
      Logger.initialize({ writeLine: (line) => lines.push(line) });

      Logger.for('orchestrator').info('Starting');

      assert.strictEqual(lines.length, 1);
      assert.match(lines[0], /^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[INFO \] \[orchestrator\] Starting$/);
    });

    test('debug output only for enabled components', () => {
      Logger.initialize({ debug: ['patterns'], writeLine: (line) => lines.push(line) });

      Logger.for('patterns').debug('visible');
      Logger.for('report').debug('hidden');

      assert.strictEqual(lines.length, 1);
      assert.ok(lines[0].endsWith('[DEBUG] [patterns] visible'));
    });

    test("'all' enables debug for every component", () => {
      const logger = Logger.initialize({ debug: 'all', writeLine: (line) => lines.push(line) });

      assert.strictEqual(logger.isDebugEnabled('interrupts'), true);
      assert.strictEqual(Logger.for('status-store').isDebugEnabled(), true);
    });

    test('unknown component names are ignored', () => {
      const logger = Logger.initialize({ debug: ['nonsense', 'config'], writeLine: (line) => lines.push(line) });

      assert.strictEqual(logger.isDebugEnabled('config'), true);
      assert.strictEqual(logger.isDebugEnabled('cli'), false);
    });

    test('level filters non-debug output', () => {
      Logger.initialize({ level: 'warn', writeLine: (line) => lines.push(line) });
      const log = Logger.for('cli');

      log.info('dropped');
      log.warn('kept');
      log.error('kept too');

      assert.strictEqual(lines.length, 2);
      assert.ok(lines[0].endsWith('[WARN ] [cli] kept'));
      assert.ok(lines[1].endsWith('[ERROR] [cli] kept too'));
    });

    test('appends data below the message', () => {
      Logger.initialize({ writeLine: (line) => lines.push(line) });

      Logger.for('report').warn('Cannot write', { file: 'r.log' });

      assert.ok(lines[0].endsWith('[report] Cannot write\n  {\n    "file": "r.log"\n  }'));
    });
  });

  suite('ComponentLogger before initialize', () => {
    test('routes warnings and errors to the console', () => {
      const warn = sinon.stub(console, 'warn');
      const error = sinon.stub(console, 'error');

      Logger.for('tester').warn('careful');
      Logger.for('tester').error('broken');

      assert.ok(warn.calledOnceWithExactly('[valrun:tester] careful'));
      assert.ok(error.calledOnceWithExactly('[valrun:tester] broken'));
    });

    test('drops debug and info', () => {
      const log = sinon.stub(console, 'log');
      const warn = sinon.stub(console, 'warn');

      Logger.for('tester').debug('quiet');
      Logger.for('tester').info('quiet');

      assert.ok(log.notCalled);
      assert.ok(warn.notCalled);
      assert.strictEqual(Logger.for('tester').isDebugEnabled(), false);
    });
  });

  suite('formatData', () => {
    test('returns empty string for undefined', () => {
      assert.strictEqual(formatData(undefined), '');
    });

    test('indents JSON', () => {
      assert.strictEqual(formatData({ a: 1 }), '\n  {\n    "a": 1\n  }');
    });

    test('prints error message and stack', () => {
      const err = new Error('bad');
      err.stack = 'Error: bad\n    at here';
      assert.strictEqual(formatData(err), '\n  Error: bad\n  Stack: Error: bad\n    at here');
    });

    test('falls back for unserializable data', () => {
      const cyclic: Record<string, unknown> = {};
      cyclic.self = cyclic;
      assert.strictEqual(formatData(cyclic), '\n  [Unserializable data: object]');
    });
  });
});
