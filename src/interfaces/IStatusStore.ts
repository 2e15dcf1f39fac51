/**
 * @fileoverview Interface for per-test-case status persistence.
 *
 * @module interfaces/IStatusStore
 */

import type { TestRecord } from '../testcase/types';

/**
 * Loads and saves {@link TestRecord}s.
 *
 * Both operations are fail-soft: losing cached status only costs redundant
 * re-execution, so neither may throw.
 */
export interface IStatusStore {
  /**
   * Load the record stored at `filePath`.
   *
   * @returns The stored record, or a fresh one (all phases `not-run`, empty
   *   log) when the file is missing, unreadable or corrupt.
   */
  load(filePath: string): TestRecord;

  /**
   * Persist `record` to `filePath`. Write failures are logged, not thrown.
   */
  save(filePath: string, record: TestRecord): void;
}
