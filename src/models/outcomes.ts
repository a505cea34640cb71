/**
 * Outcome tags, matching modes and exit codes
 */

// Case outcomes
export const Outcomes = {
  PASS: 'PASS',
  FAIL: 'FAIL', // Ran, but output or exit code disagreed
  ERROR: 'ERROR', // Could not be run or observed (missing binary, timeout)
  SKIPPED: 'SKIPPED',
} as const;

export type Outcome = (typeof Outcomes)[keyof typeof Outcomes];

export type FailingOutcome = Extract<Outcome, 'FAIL' | 'ERROR'>;

export function isFailingOutcome(outcome: Outcome): outcome is FailingOutcome {
  return outcome === Outcomes.FAIL || outcome === Outcomes.ERROR;
}

export const SkipReasons = {
  FILTERED: 'filtered',
  FAIL_FAST: 'fail-fast',
} as const;

export type SkipReason = (typeof SkipReasons)[keyof typeof SkipReasons];

// Text matching modes for stdout/stderr
export const MatchModes = {
  EXACT: 'exact',
  CONTAINS: 'contains',
  PREFIX: 'prefix',
  GLOB: 'glob',
} as const;

export type MatchMode = (typeof MatchModes)[keyof typeof MatchModes];

// When captured output is echoed in the report
export const PrintPolicies = {
  PASS: 'pass',
  FAIL: 'fail',
  ALWAYS: 'always',
  NEVER: 'never',
} as const;

export type PrintWhen = (typeof PrintPolicies)[keyof typeof PrintPolicies];

export function shouldEcho(when: PrintWhen, outcome: Outcome): boolean {
  switch (when) {
    case 'always':
      return outcome !== Outcomes.SKIPPED;
    case 'never':
      return false;
    case 'pass':
      return outcome === Outcomes.PASS;
    case 'fail':
      return isFailingOutcome(outcome);
    default:
      return assertNever(when);
  }
}

export const ExecutionErrorReasons = {
  TIMEOUT: 'timeout',
  NOT_FOUND: 'not-found',
  PERMISSION: 'permission',
  LAUNCH: 'launch',
} as const;

export type ExecutionErrorReason =
  (typeof ExecutionErrorReasons)[keyof typeof ExecutionErrorReasons];

// Process exit codes of the runner itself
export const ExitCodes = {
  SUCCESS: 0,
  FAILURES: 1,
  USAGE: 2, // Config error, no cases ran, bad arguments
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

// Exhaustiveness checking
export function assertNever(x: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(x)}`);
}
