/**
 * @fileoverview Parsing of `key=value` context variables.
 *
 * @module core/contextVariables
 */

import { UsageError } from './errors';

/**
 * Split `key=value` assignments into a frozen mapping. The value is
 * everything after the first `=`; later assignments win.
 *
 * @throws {UsageError} When an assignment has no `=` or an empty key.
 */
export function parseContextVariables(assignments: readonly string[]): Readonly<Record<string, string>> {
  const result: Record<string, string> = {};
  for (const assignment of assignments) {
    const separator = assignment.indexOf('=');
    const key = separator < 0 ? '' : assignment.slice(0, separator).trim();
    if (!key) {
      throw new UsageError(`Invalid context variable '${assignment}', expected key=value`);
    }
    result[key] = assignment.slice(separator + 1);
  }
  return Object.freeze(result);
}
