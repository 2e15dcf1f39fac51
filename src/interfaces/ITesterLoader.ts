/**
 * @fileoverview Tester resolution boundary.
 *
 * @module interfaces/ITesterLoader
 */

import type { ExecutionContext, ExternalContext } from '../testcase/types';
import type { ITester } from './ITester';

/**
 * Produces exactly one tester per test case per process invocation.
 *
 * Same inputs must yield a functionally equivalent tester. Resolution may
 * throw; the engine then records an error for the phase being attempted.
 */
export interface ITesterLoader {
  load(context: ExecutionContext, externalContext: ExternalContext): Promise<ITester>;
}
