/**
 * @fileoverview Phase selection from action letters.
 *
 * @module testcase/phaseSelection
 */

import { UsageError } from '../core/errors';
import type { ExecutionPhase } from './types';

/**
 * Letter of each phase on the command line.
 */
export const PHASE_LETTERS: Readonly<Record<string, ExecutionPhase>> = {
  p: 'prepare',
  r: 'run',
  t: 'check',
  s: 'report',
  c: 'cleanup',
};

/** Phases run when no letters are given. */
export const DEFAULT_ACTIONS = 'prts';

/**
 * Parse a letter combination such as `prts` into the requested phases.
 *
 * @throws {UsageError} On an unknown letter or an empty combination.
 */
export function parsePhaseLetters(letters: string): Set<ExecutionPhase> {
  const phases = new Set<ExecutionPhase>();
  for (const letter of letters) {
    const phase = PHASE_LETTERS[letter];
    if (!phase) {
      throw new UsageError(`Unknown action '${letter}' (valid: ${Object.keys(PHASE_LETTERS).join('')})`);
    }
    phases.add(phase);
  }
  if (phases.size === 0) {
    throw new UsageError('No action selected');
  }
  return phases;
}
