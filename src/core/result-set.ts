/**
 * ResultSet builder
 * Created empty, appended to as cases finish, finalized once
 */

import { Outcomes, type CaseResult, type ResultCounts, type ResultSet } from '../models/index.js';

export function countResults(results: readonly CaseResult[]): ResultCounts {
  const passed = results.filter((r) => r.outcome === Outcomes.PASS).length;
  const failed = results.filter((r) => r.outcome === Outcomes.FAIL).length;
  const errored = results.filter((r) => r.outcome === Outcomes.ERROR).length;
  const skipped = results.filter((r) => r.outcome === Outcomes.SKIPPED).length;
  return {
    total: results.length,
    ran: passed + failed + errored,
    passed,
    failed,
    errored,
    skipped,
  };
}

export class ResultSetBuilder {
  private readonly results: CaseResult[] = [];
  private readonly startedAt: number;
  private finalized = false;

  constructor(private readonly clock: () => number = () => performance.now()) {
    this.startedAt = clock();
  }

  append(result: CaseResult): void {
    if (this.finalized) {
      throw new Error(`Cannot append '${result.testCase.name}': result set already finalized`);
    }
    this.results.push(Object.freeze(result));
  }

  finalize(): ResultSet {
    if (this.finalized) {
      throw new Error('Result set already finalized');
    }
    this.finalized = true;
    const results = Object.freeze([...this.results]);
    return Object.freeze({
      results,
      counts: Object.freeze(countResults(results)),
      durationMs: Math.round(this.clock() - this.startedAt),
    });
  }
}
