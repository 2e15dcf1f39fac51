/**
 * @fileoverview Pattern Resolver
 *
 * Expands test-name patterns into an ordered, deduplicated list of test-case
 * identifiers relative to the test root.
 *
 * @module testcase/patternResolver
 */

import * as path from 'path';
import { glob } from 'glob';
import type { IFileSystem } from '../interfaces/IFileSystem';
import { errorMessage, PatternFileError } from '../core/errors';
import { Logger } from '../core/logger';
import type { TestCaseId } from './types';

const log = Logger.for('patterns');

/** Glob matcher: returns matches of `pattern` relative to `cwd`. */
export type GlobFn = (pattern: string, options: { cwd: string }) => Promise<string[]>;

const defaultGlob: GlobFn = (pattern, options) => glob(pattern, { cwd: options.cwd, posix: true });

/**
 * Parse the content of a pattern file.
 *
 * Everything from the first `#` of a line is a comment. Lines are trimmed
 * and blank ones dropped.
 */
export function parsePatternFile(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.split('#', 1)[0].trim())
    .filter((line) => line.length > 0);
}

/**
 * Normalize a glob match into a test-case identifier, or `undefined` when the
 * match is the test root itself or lies outside it.
 */
function toIdentifier(match: string): TestCaseId | undefined {
  const segments = match
    .replace(/\\/g, '/')
    .split('/')
    .filter((segment) => segment.length > 0 && segment !== '.');
  if (segments.length === 0 || segments.includes('..') || path.isAbsolute(match)) {
    return undefined;
  }
  return segments.join('/');
}

/**
 * Drop identifiers that contain another selected identifier. Preparing `a`
 * recreates its work directory, which would remove the state of `a/b`.
 */
function withoutAncestors(identifiers: readonly TestCaseId[]): TestCaseId[] {
  return identifiers.filter((id) => {
    const nested = identifiers.find((other) => other.startsWith(`${id}/`));
    if (nested) {
      log.warn(`Skipping ${id}: it contains the selected test case ${nested}`);
      return false;
    }
    return true;
  });
}

/**
 * Resolves pattern files and inline patterns into test-case identifiers.
 *
 * @example
 * ```typescript
 * const resolver = new PatternResolver(new DefaultFileSystem());
 * const ids = await resolver.resolve('/suite', ['smoke.txt'], ['scf/*']);
 * ```
 */
export class PatternResolver {
  constructor(
    private readonly fileSystem: IFileSystem,
    private readonly globFn: GlobFn = defaultGlob,
  ) {}

  /**
   * Collect patterns: every pattern-file line (files in order, lines in file
   * order) followed by the inline patterns.
   *
   * @throws {PatternFileError} If a named pattern file cannot be read.
   */
  async collectPatterns(patternFiles: readonly string[], inlinePatterns: readonly string[]): Promise<string[]> {
    const patterns: string[] = [];
    for (const file of patternFiles) {
      let content: string;
      try {
        content = await this.fileSystem.readFileAsync(file);
      } catch (error) {
        throw new PatternFileError(file, errorMessage(error));
      }
      patterns.push(...parsePatternFile(content));
    }
    patterns.push(...inlinePatterns.map((pattern) => pattern.trim()).filter((pattern) => pattern.length > 0));
    return patterns;
  }

  /**
   * Expand patterns against `testRoot`.
   *
   * Only directories below `testRoot` count. Matches of a single pattern
   * are sorted; across patterns the first occurrence of an identifier
   * decides its position. A pattern matching nothing contributes nothing.
   */
  async resolve(
    testRoot: string,
    patternFiles: readonly string[],
    inlinePatterns: readonly string[],
  ): Promise<TestCaseId[]> {
    const patterns = await this.collectPatterns(patternFiles, inlinePatterns);
    const seen = new Set<TestCaseId>();
    const identifiers: TestCaseId[] = [];

    for (const pattern of patterns) {
      const matches: TestCaseId[] = [];
      for (const match of await this.globFn(pattern, { cwd: testRoot })) {
        const id = toIdentifier(match);
        if (id !== undefined && await this.isDirectory(path.join(testRoot, id))) {
          matches.push(id);
        }
      }
      if (matches.length === 0) {
        log.debug(`Pattern matched nothing: ${pattern}`, { testRoot });
      }
      for (const id of matches.sort()) {
        if (!seen.has(id)) {
          seen.add(id);
          identifiers.push(id);
        }
      }
    }

    const resolved = withoutAncestors(identifiers);
    log.debug(`Resolved ${resolved.length} test case(s) from ${patterns.length} pattern(s)`);
    return resolved;
  }

  private async isDirectory(candidate: string): Promise<boolean> {
    try {
      return (await this.fileSystem.statAsync(candidate)).isDirectory();
    } catch (error) {
      log.debug(`Ignoring match ${candidate}`, { error: errorMessage(error) });
      return false;
    }
  }
}
