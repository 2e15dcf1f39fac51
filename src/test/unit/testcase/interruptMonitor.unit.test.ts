/**
 * @fileoverview Unit tests for InterruptMonitor.
 *
 * SIGINT is simulated through an EventEmitter standing in for `process`.
 */

import { suite, test, setup, teardown } from 'mocha';
import * as assert from 'assert';
import { Logger } from '../../../core/logger';
import { InterruptMonitor } from '../../../testcase/interruptMonitor';
import { FakeSignalSource } from '../mocks/engine';

suite('InterruptMonitor', () => {
  let source: FakeSignalSource;
  let monitor: InterruptMonitor;

  setup(() => {
    Logger.initialize({ writeLine: () => undefined });
    source = new FakeSignalSource();
    monitor = new InterruptMonitor({ graceMs: 40, source });
    monitor.attach();
  });

  teardown(() => {
    monitor.detach();
    Logger.reset();
  });

  test('an interrupt during a phase aborts only that phase', () => {
    const signal = monitor.beginPhase();

    source.interrupt();

    assert.strictEqual(signal.aborted, true);
    assert.strictEqual(monitor.isRunAborted(), false);
  });

  test('a second interrupt during the same phase aborts the run', () => {
    monitor.beginPhase();

    source.interrupt();
    source.interrupt();

    assert.strictEqual(monitor.isRunAborted(), true);
  });

  test('an interrupt with no phase running aborts the run', () => {
    source.interrupt();
    assert.strictEqual(monitor.isRunAborted(), true);
  });

  test('each phase gets a fresh signal', () => {
    const first = monitor.beginPhase();
    source.interrupt();
    monitor.endPhase();

    const second = monitor.beginPhase();

    assert.strictEqual(first.aborted, true);
    assert.strictEqual(second.aborted, false);
  });

  test('an interrupt during the grace pause aborts the run', async () => {
    monitor.beginPhase();
    source.interrupt();
    monitor.endPhase();

    const pause = monitor.gracePause();
    setTimeout(() => source.interrupt(), 5);
    await pause;

    assert.strictEqual(monitor.isRunAborted(), true);
  });

  test('a quiet grace pause leaves the run going', async () => {
    await monitor.gracePause();
    assert.strictEqual(monitor.isRunAborted(), false);
  });

  test('attach and detach are idempotent', () => {
    monitor.attach();
    assert.strictEqual(source.listenerCount('SIGINT'), 1);

    monitor.detach();
    monitor.detach();
    assert.strictEqual(source.listenerCount('SIGINT'), 0);

    source.interrupt();
    assert.strictEqual(monitor.isRunAborted(), false);
  });
});
