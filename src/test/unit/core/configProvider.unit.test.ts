/**
 * @fileoverview Unit tests for JsonConfigProvider and RunConfigManager.
 *
 * @module test/unit/core/configProvider.unit.test
 */

import { suite, test, setup, teardown } from 'mocha';
import * as assert from 'assert';
import * as fs from 'fs';
import * as path from 'path';
import { envKeyFor, JsonConfigProvider } from '../../../core/configProvider';
import { DefaultFileSystem } from '../../../core/defaultFileSystem';
import { UsageError } from '../../../core/errors';
import { Logger } from '../../../core/logger';
import {
  DEFAULT_INTERRUPT_GRACE_MS,
  DEFAULT_STATUS_FILE_NAME,
  DEFAULT_TESTER_MODULE,
  RunConfigManager,
} from '../../../testcase/configManager';
import { makeTempDir, removeTempDir } from '../mocks/engine';

suite('JsonConfigProvider', () => {
  let tempDir: string;
  let logLines: string[];
  const fileSystem = new DefaultFileSystem();

  function writeConfig(content: unknown): string {
    const file = path.join(tempDir, 'valrun.json');
    fs.writeFileSync(file, typeof content === 'string' ? content : JSON.stringify(content));
    return file;
  }

  setup(() => {
    tempDir = makeTempDir('valrun-config-');
    logLines = [];
    Logger.initialize({ writeLine: (line) => logLines.push(line) });
  });

  teardown(() => {
    removeTempDir(tempDir);
    Logger.reset();
  });

  test('returns defaults without a file', () => {
    const provider = new JsonConfigProvider(fileSystem, { env: {} });
    assert.strictEqual(provider.getConfig('interrupt', 'graceMs', 1000), 1000);
  });

  test('reads values from the file', () => {
    const filePath = writeConfig({ interrupt: { graceMs: 500 }, logging: { debug: ['report'] } });
    const provider = new JsonConfigProvider(fileSystem, { filePath, env: {} });

    assert.strictEqual(provider.getConfig('interrupt', 'graceMs', 1000), 500);
    assert.deepStrictEqual(provider.getConfig<string[]>('logging', 'debug', []), ['report']);
  });

  test('ignores file values of the wrong type', () => {
    const filePath = writeConfig({ interrupt: { graceMs: 'fast' } });
    const provider = new JsonConfigProvider(fileSystem, { filePath, env: {} });

    assert.strictEqual(provider.getConfig('interrupt', 'graceMs', 1000), 1000);
    assert.strictEqual(logLines.length, 1);
    assert.ok(logLines[0].endsWith('Ignoring configuration interrupt.graceMs: expected number'));
  });

  test('environment overrides the file', () => {
    const filePath = writeConfig({ interrupt: { graceMs: 500 } });
    const provider = new JsonConfigProvider(fileSystem, { filePath, env: { VALRUN_INTERRUPT_GRACEMS: '250' } });

    assert.strictEqual(provider.getConfig('interrupt', 'graceMs', 1000), 250);
  });

  test('invalid environment values fall back to the file', () => {
    const filePath = writeConfig({ interrupt: { graceMs: 500 } });
    const provider = new JsonConfigProvider(fileSystem, { filePath, env: { VALRUN_INTERRUPT_GRACEMS: 'abc' } });

    assert.strictEqual(provider.getConfig('interrupt', 'graceMs', 1000), 500);
    assert.ok(logLines[0].endsWith("Ignoring invalid value for VALRUN_INTERRUPT_GRACEMS: 'abc'"));
  });

  test('environment lists are comma separated', () => {
    const provider = new JsonConfigProvider(fileSystem, { env: { VALRUN_LOGGING_DEBUG: 'patterns, report,' } });
    assert.deepStrictEqual(provider.getConfig<string[]>('logging', 'debug', []), ['patterns', 'report']);
  });

  test('environment booleans accept true and 1', () => {
    const provider = new JsonConfigProvider(fileSystem, { env: { VALRUN_A_B: '1', VALRUN_A_C: 'no' } });
    assert.strictEqual(provider.getConfig('a', 'b', false), true);
    assert.strictEqual(provider.getConfig('a', 'c', true), false);
  });

  test('malformed file is a usage error', () => {
    const filePath = writeConfig('{ not json');
    assert.throws(() => new JsonConfigProvider(fileSystem, { filePath, env: {} }), UsageError);
  });

  test('sections must be objects', () => {
    const filePath = writeConfig({ interrupt: 5 });
    assert.throws(
      () => new JsonConfigProvider(fileSystem, { filePath, env: {} }),
      (err: unknown) => err instanceof UsageError && err.message === `Configuration file '${filePath}' must map section names to objects`,
    );
  });

  test('missing file is a usage error', () => {
    assert.throws(
      () => new JsonConfigProvider(fileSystem, { filePath: path.join(tempDir, 'absent.json'), env: {} }),
      UsageError,
    );
  });

  test('envKeyFor upper-cases and replaces separators', () => {
    assert.strictEqual(envKeyFor('status', 'fileName'), 'VALRUN_STATUS_FILENAME');
    assert.strictEqual(envKeyFor('tester', 'module-name'), 'VALRUN_TESTER_MODULE_NAME');
  });
});

suite('RunConfigManager', () => {
  test('returns defaults without a provider', () => {
    const config = new RunConfigManager();

    assert.strictEqual(config.interruptGraceMs, DEFAULT_INTERRUPT_GRACE_MS);
    assert.strictEqual(config.statusFileName, DEFAULT_STATUS_FILE_NAME);
    assert.strictEqual(config.testerModule, DEFAULT_TESTER_MODULE);
    assert.deepStrictEqual(config.debugComponents, []);
  });

  test('reads through the provider', () => {
    const provider = new JsonConfigProvider(new DefaultFileSystem(), {
      env: {
        VALRUN_STATUS_FILENAME: 'state.json',
        VALRUN_TESTER_MODULE: 'suite-tester.js',
        VALRUN_LOGGING_DEBUG: 'cli',
      },
    });
    const config = new RunConfigManager(provider);

    assert.strictEqual(config.statusFileName, 'state.json');
    assert.strictEqual(config.testerModule, 'suite-tester.js');
    assert.deepStrictEqual(config.debugComponents, ['cli']);
  });

  test('clamps negative grace windows to zero', () => {
    const provider = new JsonConfigProvider(new DefaultFileSystem(), { env: { VALRUN_INTERRUPT_GRACEMS: '-5' } });
    assert.strictEqual(new RunConfigManager(provider).interruptGraceMs, 0);
  });
});
