/**
 * Run Orchestrator - Runs the cases of a config in order
 */

import type { Logger } from 'pino';
import type { CaseExecutor } from '../executors/index.js';
import { evaluate } from '../matcher/index.js';
import { ExecutionErrorReasons, Outcomes, SkipReasons, isFailingOutcome } from '../models/index.js';
import type {
  CaseResult,
  ExecutionObservation,
  ResultSet,
  RunConfig,
  RunDefaults,
  SkipReason,
  TestCase,
} from '../models/index.js';
import { createNameFilter } from './filter.js';
import { ResultSetBuilder } from './result-set.js';

export interface RunOptions {
  /** Substring, or glob when it contains `*` or `?`, matched against case names. */
  filter?: string;
  /** Stop after the first FAIL or ERROR; the rest are recorded as SKIPPED. */
  failFast?: boolean;
}

function skipped(testCase: TestCase, reason: SkipReason): CaseResult {
  return { outcome: Outcomes.SKIPPED, testCase, reason, durationMs: 0 };
}

export class RunOrchestrator {
  constructor(
    private readonly executor: CaseExecutor,
    private readonly logger: Logger
  ) {}

  async runAll(config: RunConfig, options: RunOptions = {}): Promise<ResultSet> {
    const builder = new ResultSetBuilder();
    const selected = createNameFilter(options.filter);
    let halted = false;

    this.logger.info(
      { source: config.source, cases: config.tests.length, filter: options.filter, failFast: options.failFast === true },
      'Run started'
    );

    // Sequential on purpose: cases may share files in their working directory
    for (const testCase of config.tests) {
      if (!selected(testCase.name)) {
        builder.append(skipped(testCase, SkipReasons.FILTERED));
        continue;
      }
      if (halted) {
        builder.append(skipped(testCase, SkipReasons.FAIL_FAST));
        continue;
      }

      const result = await this.runCase(testCase, config.defaults);
      builder.append(result);

      if (options.failFast === true && isFailingOutcome(result.outcome)) {
        halted = true;
        this.logger.info({ case: testCase.name, outcome: result.outcome }, 'Fail-fast: skipping remaining cases');
      }
    }

    const resultSet = builder.finalize();
    this.logger.info({ counts: resultSet.counts, durationMs: resultSet.durationMs }, 'Run finished');
    return resultSet;
  }

  async runCase(testCase: TestCase, defaults: RunDefaults): Promise<CaseResult> {
    this.logger.debug({ case: testCase.name }, 'Case started');

    const observation = await this.observe(testCase, defaults);
    const result = this.judge(testCase, observation);

    this.logger.debug(
      { case: testCase.name, outcome: result.outcome, durationMs: result.durationMs },
      'Case finished'
    );
    return result;
  }

  private async observe(testCase: TestCase, defaults: RunDefaults): Promise<ExecutionObservation> {
    const startedAt = performance.now();
    try {
      return await this.executor.run(testCase, defaults);
    } catch (error) {
      // A broken executor must not take sibling cases down with it
      this.logger.error({ case: testCase.name, error }, 'Executor failed');
      return {
        kind: 'error',
        reason: ExecutionErrorReasons.LAUNCH,
        message: `executor ${this.executor.name} failed: ${error instanceof Error ? error.message : String(error)}`,
        stdout: '',
        stderr: '',
        durationMs: Math.round(performance.now() - startedAt),
      };
    }
  }

  private judge(testCase: TestCase, observation: ExecutionObservation): CaseResult {
    if (observation.kind === 'error') {
      return { outcome: Outcomes.ERROR, testCase, observation, durationMs: observation.durationMs };
    }

    const match = evaluate(testCase.expect, observation);
    if (match.passed) {
      return { outcome: Outcomes.PASS, testCase, observation, durationMs: observation.durationMs };
    }
    return {
      outcome: Outcomes.FAIL,
      testCase,
      observation,
      mismatches: match.mismatches,
      durationMs: observation.durationMs,
    };
  }
}
