/**
 * Matcher
 * Compares an observation against a case's expectations. Pure: no I/O.
 *
 * Normalization: `exact` and `glob` compare both sides with trailing line
 * breaks (`\n`, `\r\n`) removed. Trailing spaces, leading whitespace and
 * inner blank lines are significant. `contains` and `prefix` compare the raw
 * text.
 */

import type {
  CompletedObservation,
  Expectation,
  MatchOutcome,
  Mismatch,
  StreamExpectation,
  StreamName,
} from '../models/index.js';
import { assertNever } from '../models/index.js';
import { unifiedDiff } from './diff.js';
import { matchesGlob } from './glob.js';

export { unifiedDiff, diffLines } from './diff.js';
export { globToRegex, hasGlobSyntax, matchesGlob, unescapeGlob } from './glob.js';

const PREVIEW_LIMIT = 80;

export function stripTrailingNewlines(text: string): string {
  return text.replace(/(?:\r?\n)+$/, '');
}

function preview(text: string): string {
  const quoted = JSON.stringify(text);
  return quoted.length > PREVIEW_LIMIT ? `${quoted.slice(0, PREVIEW_LIMIT - 1)}…` : quoted;
}

function streamMatches(expected: StreamExpectation, actual: string): boolean {
  switch (expected.mode) {
    case 'exact':
      return stripTrailingNewlines(actual) === stripTrailingNewlines(expected.text);
    case 'glob':
      return matchesGlob(stripTrailingNewlines(expected.text), stripTrailingNewlines(actual));
    case 'contains':
      return actual.includes(expected.text);
    case 'prefix':
      return actual.startsWith(expected.text);
    default:
      return assertNever(expected.mode);
  }
}

function describeExpectation(expected: StreamExpectation): string {
  switch (expected.mode) {
    case 'exact':
      return preview(stripTrailingNewlines(expected.text));
    case 'glob':
      return `to match ${preview(stripTrailingNewlines(expected.text))}`;
    case 'contains':
      return `to contain ${preview(expected.text)}`;
    case 'prefix':
      return `to start with ${preview(expected.text)}`;
    default:
      return assertNever(expected.mode);
  }
}

function checkStream(
  field: StreamName,
  expected: StreamExpectation | undefined,
  actual: string
): Mismatch | null {
  if (expected === undefined || streamMatches(expected, actual)) {
    return null;
  }

  const shownActual = expected.mode === 'exact' || expected.mode === 'glob'
    ? stripTrailingNewlines(actual)
    : actual;
  const message = `${field} (${expected.mode}): expected ${describeExpectation(expected)}, got ${preview(shownActual)}`;

  const expectedText = stripTrailingNewlines(expected.text);
  const multiline = expectedText.includes('\n') || shownActual.includes('\n');
  if (multiline && (expected.mode === 'exact' || expected.mode === 'glob')) {
    const diff = expected.mode === 'glob'
      ? unifiedDiff(expectedText, shownActual, (line, text) => line === text || matchesGlob(line, text))
      : unifiedDiff(expectedText, shownActual);
    return { field, mode: expected.mode, expected: expected.text, actual, message, diff };
  }

  return { field, mode: expected.mode, expected: expected.text, actual, message };
}

function checkExitCode(expected: number, observation: CompletedObservation): Mismatch | null {
  if (observation.exitCode === expected) {
    return null;
  }
  const got = observation.exitCode !== null
    ? String(observation.exitCode)
    : `signal ${observation.signal ?? 'unknown'}`;
  return {
    field: 'exit_code',
    expected,
    actual: observation.exitCode,
    signal: observation.signal,
    message: `exit code: expected ${expected}, got ${got}`,
  };
}

/**
 * Checks stdout, stderr and exit code independently and reports every field
 * that disagrees.
 */
export function evaluate(expected: Expectation, observation: CompletedObservation): MatchOutcome {
  const mismatches: Mismatch[] = [];

  const exitMismatch = checkExitCode(expected.exitCode, observation);
  if (exitMismatch) mismatches.push(exitMismatch);

  const stdoutMismatch = checkStream('stdout', expected.stdout, observation.stdout);
  if (stdoutMismatch) mismatches.push(stdoutMismatch);

  const stderrMismatch = checkStream('stderr', expected.stderr, observation.stderr);
  if (stderrMismatch) mismatches.push(stderrMismatch);

  return { passed: mismatches.length === 0, mismatches };
}
