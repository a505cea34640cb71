/**
 * In-memory model of a validated run: cases, observations and results
 */

import type {
  ExecutionErrorReason,
  MatchMode,
  PrintWhen,
  SkipReason,
} from './outcomes.js';

// ============================================================================
// Configuration model
// ============================================================================

/**
 * How a case is started. A `shell` command goes through the system shell;
 * an `argv` command runs the program directly with the given arguments.
 */
export type Launch =
  | { readonly kind: 'shell'; readonly command: string }
  | { readonly kind: 'argv'; readonly file: string; readonly args: readonly string[] };

export interface StreamExpectation {
  readonly text: string;
  readonly mode: MatchMode;
}

export interface Expectation {
  readonly exitCode: number;
  /** Undefined means the stream is ignored. */
  readonly stdout?: StreamExpectation;
  readonly stderr?: StreamExpectation;
}

export interface PrintPolicy {
  readonly stdout: PrintWhen;
  readonly stderr: PrintWhen;
}

export interface TestCase {
  readonly name: string;
  /** Position in the config file, zero based. */
  readonly index: number;
  readonly launch: Launch;
  readonly cwd?: string;
  readonly env: Readonly<Record<string, string>>;
  readonly stdin?: string;
  readonly timeoutMs?: number;
  readonly expect: Expectation;
  readonly print: PrintPolicy;
}

export interface RunDefaults {
  readonly timeoutMs: number;
  readonly cwd?: string;
}

export interface RunConfig {
  /** Absolute path of the file the config was read from. */
  readonly source: string;
  readonly defaults: RunDefaults;
  readonly tests: readonly TestCase[];
}

// ============================================================================
// Execution
// ============================================================================

export interface CompletedObservation {
  readonly kind: 'completed';
  readonly stdout: string;
  readonly stderr: string;
  /** Null when the process was ended by a signal. */
  readonly exitCode: number | null;
  readonly signal: string | null;
  readonly durationMs: number;
}

export interface ErrorObservation {
  readonly kind: 'error';
  readonly reason: ExecutionErrorReason;
  readonly message: string;
  readonly stdout: string;
  readonly stderr: string;
  readonly durationMs: number;
}

export type ExecutionObservation = CompletedObservation | ErrorObservation;

// ============================================================================
// Matching
// ============================================================================

export type StreamName = 'stdout' | 'stderr';

export type Mismatch =
  | {
      readonly field: StreamName;
      readonly mode: MatchMode;
      readonly expected: string;
      readonly actual: string;
      readonly message: string;
      readonly diff?: string;
    }
  | {
      readonly field: 'exit_code';
      readonly expected: number;
      readonly actual: number | null;
      readonly signal: string | null;
      readonly message: string;
    };

export interface MatchOutcome {
  readonly passed: boolean;
  readonly mismatches: readonly Mismatch[];
}

// ============================================================================
// Results
// ============================================================================

export type CaseResult =
  | {
      readonly outcome: 'PASS';
      readonly testCase: TestCase;
      readonly observation: CompletedObservation;
      readonly durationMs: number;
    }
  | {
      readonly outcome: 'FAIL';
      readonly testCase: TestCase;
      readonly observation: CompletedObservation;
      readonly mismatches: readonly Mismatch[];
      readonly durationMs: number;
    }
  | {
      readonly outcome: 'ERROR';
      readonly testCase: TestCase;
      readonly observation: ErrorObservation;
      readonly durationMs: number;
    }
  | {
      readonly outcome: 'SKIPPED';
      readonly testCase: TestCase;
      readonly reason: SkipReason;
      readonly durationMs: number;
    };

export interface ResultCounts {
  readonly total: number;
  /** Cases that were actually executed (everything but SKIPPED). */
  readonly ran: number;
  readonly passed: number;
  readonly failed: number;
  readonly errored: number;
  readonly skipped: number;
}

export interface ResultSet {
  readonly results: readonly CaseResult[];
  readonly counts: ResultCounts;
  readonly durationMs: number;
}
