/**
 * Base executor interface
 */

import type { ExecutionObservation, RunDefaults, TestCase } from '../models/index.js';

/**
 * Runs one case and reports what happened. Implementations never throw for
 * problems with the case itself (missing binary, timeout); those come back as
 * an `error` observation.
 */
export interface CaseExecutor {
  readonly name: string;
  run(testCase: TestCase, defaults: RunDefaults): Promise<ExecutionObservation>;
}
