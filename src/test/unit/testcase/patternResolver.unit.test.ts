/**
 * @fileoverview Unit tests for PatternResolver.
 *
 * Ordering and deduplication are tested against a stubbed glob; one suite
 * runs the real glob over a temporary test root.
 */

import { suite, test, setup, teardown } from 'mocha';
import * as assert from 'assert';
import * as sinon from 'sinon';
import * as fs from 'fs';
import * as path from 'path';
import { DefaultFileSystem } from '../../../core/defaultFileSystem';
import { Logger } from '../../../core/logger';
import { PatternFileError } from '../../../core/errors';
import { GlobFn, parsePatternFile, PatternResolver } from '../../../testcase/patternResolver';
import { makeTempDir, makeTestDirs, removeTempDir } from '../mocks/engine';

function globFrom(table: Record<string, string[]>): GlobFn {
  return async (pattern) => table[pattern] ?? [];
}

suite('PatternResolver', () => {
  let tempDir: string;
  const fileSystem = new DefaultFileSystem();

  setup(() => {
    tempDir = makeTempDir('valrun-patterns-');
    Logger.initialize({ writeLine: () => undefined });
  });

  teardown(() => {
    removeTempDir(tempDir);
    Logger.reset();
  });

  suite('parsePatternFile', () => {
    test('trims lines and drops blanks and comments', () => {
      assert.deepStrictEqual(
        parsePatternFile('  scf/*  \n\n# slow ones\nmd/ar\r\n   \n'),
        ['scf/*', 'md/ar'],
      );
    });

    test('strips trailing comments', () => {
      assert.deepStrictEqual(
        parsePatternFile('scf/* # smoke\n  # all of md\nmd/ar#argon\n   #\n'),
        ['scf/*', 'md/ar'],
      );
    });
  });

  suite('collectPatterns', () => {
    test('puts pattern-file lines before inline patterns', async () => {
      const listFile = path.join(tempDir, 'smoke.txt');
      fs.writeFileSync(listFile, 'b\nc\n');
      const resolver = new PatternResolver(fileSystem, globFrom({}));

      assert.deepStrictEqual(await resolver.collectPatterns([listFile], ['a', '  ']), ['b', 'c', 'a']);
    });

    test('raises PatternFileError for unreadable files', async () => {
      const missing = path.join(tempDir, 'missing.txt');
      const resolver = new PatternResolver(fileSystem, globFrom({}));

      await assert.rejects(
        resolver.collectPatterns([missing], []),
        (err: unknown) => err instanceof PatternFileError && err.filePath === missing,
      );
    });
  });

  suite('resolve', () => {
    test('sorts within a pattern and keeps the first occurrence across patterns', async () => {
      makeTestDirs(tempDir, ['ab', 'ac']);
      const resolver = new PatternResolver(fileSystem, globFrom({ 'a*': ['ac', 'ab'], ab: ['ab'] }));

      assert.deepStrictEqual(await resolver.resolve(tempDir, [], ['a*', 'ab']), ['ab', 'ac']);
    });

    test('earlier patterns decide position', async () => {
      makeTestDirs(tempDir, ['a', 'z']);
      const resolver = new PatternResolver(fileSystem, globFrom({ z: ['z'], '*': ['a', 'z'] }));

      assert.deepStrictEqual(await resolver.resolve(tempDir, [], ['z', '*']), ['z', 'a']);
    });

    test('patterns matching nothing contribute nothing', async () => {
      makeTestDirs(tempDir, ['x']);
      const resolver = new PatternResolver(fileSystem, globFrom({ x: ['x'] }));

      assert.deepStrictEqual(await resolver.resolve(tempDir, [], ['none', 'x']), ['x']);
    });

    test('normalizes separators and trailing slashes', async () => {
      makeTestDirs(tempDir, ['scf/h2o', 'md/ar']);
      const resolver = new PatternResolver(fileSystem, globFrom({ p: ['scf\\h2o/', './md/ar'] }));

      assert.deepStrictEqual(await resolver.resolve(tempDir, [], ['p']), ['md/ar', 'scf/h2o']);
    });

    test('drops the test root and matches outside it', async () => {
      makeTestDirs(tempDir, ['t1']);
      const resolver = new PatternResolver(fileSystem, globFrom({ p: ['', '.', '..', '../t1', tempDir, 't1'] }));

      assert.deepStrictEqual(await resolver.resolve(tempDir, [], ['p']), ['t1']);
    });

    test('skips test cases containing other selected test cases', async () => {
      makeTestDirs(tempDir, ['a/b', 'c']);
      const resolver = new PatternResolver(fileSystem, globFrom({ p: ['a', 'a/b', 'c'] }));

      assert.deepStrictEqual(await resolver.resolve(tempDir, [], ['p']), ['a/b', 'c']);
    });

    test('globs relative to the test root', async () => {
      const globFn = sinon.stub<Parameters<GlobFn>, ReturnType<GlobFn>>().resolves([]);
      const resolver = new PatternResolver(fileSystem, globFn);

      await resolver.resolve('/suite', [], ['scf/*']);

      assert.ok(globFn.calledOnceWithExactly('scf/*', { cwd: '/suite' }));
    });

    test('expands real directories with the default glob', async () => {
      makeTestDirs(tempDir, ['scf/h2o', 'scf/co', 'md/ar']);
      const resolver = new PatternResolver(fileSystem);

      assert.deepStrictEqual(await resolver.resolve(tempDir, [], ['scf/*', 'md/*', 'scf/co']), ['scf/co', 'scf/h2o', 'md/ar']);
    });

    test('ignores plain files next to test directories', async () => {
      makeTestDirs(tempDir, ['t1', 't2']);
      fs.writeFileSync(path.join(tempDir, 'README'), 'suite notes');
      const resolver = new PatternResolver(fileSystem);

      assert.deepStrictEqual(await resolver.resolve(tempDir, [], ['*']), ['t1', 't2']);
    });

    test('a recursive pattern selects neither the root nor files', async () => {
      makeTestDirs(tempDir, ['t1', 't2']);
      fs.writeFileSync(path.join(tempDir, 'README'), 'suite notes');
      fs.writeFileSync(path.join(tempDir, 't1', 'tester.js'), '');
      const resolver = new PatternResolver(fileSystem);

      assert.deepStrictEqual(await resolver.resolve(tempDir, [], ['**']), ['t1', 't2']);
    });
  });
});
