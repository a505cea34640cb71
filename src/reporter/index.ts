/**
 * Reporter
 * Renders a ResultSet for the console and decides the process exit code
 */

import { Chalk, type ChalkInstance } from 'chalk';
import { ExitCodes, Outcomes, shouldEcho, type ExitCode } from '../models/index.js';
import type { CaseResult, Mismatch, ResultSet, StreamName } from '../models/index.js';
import { formatDuration, indent, tailLines } from '../utils/text.js';

export interface RenderOptions {
  /** Print PASS and SKIPPED cases individually instead of only counting them. */
  verbose?: boolean;
  color?: boolean;
}

export interface Report {
  text: string;
  exitCode: ExitCode;
}

// Captured output longer than this is cut to its last lines
export const MAX_ECHO_LINES = 50;

export function exitCodeFor(resultSet: ResultSet): ExitCode {
  const { failed, errored, ran } = resultSet.counts;
  if (failed > 0 || errored > 0) {
    return ExitCodes.FAILURES;
  }
  if (ran === 0) {
    return ExitCodes.USAGE;
  }
  return ExitCodes.SUCCESS;
}

function label(result: CaseResult, paint: ChalkInstance): string {
  switch (result.outcome) {
    case Outcomes.PASS:
      return paint.green('PASS ');
    case Outcomes.FAIL:
      return paint.red('FAIL ');
    case Outcomes.ERROR:
      return paint.red.bold('ERROR');
    case Outcomes.SKIPPED:
      return paint.dim('SKIP ');
  }
}

function caseLine(result: CaseResult, paint: ChalkInstance): string {
  const suffix = result.outcome === Outcomes.SKIPPED
    ? `(${result.reason})`
    : `(${formatDuration(result.durationMs)})`;
  return `${label(result, paint)} ${result.testCase.name} ${paint.dim(suffix)}`;
}

function mismatchLines(mismatch: Mismatch, paint: ChalkInstance): string[] {
  const lines = [indent(mismatch.message, 4)];
  if (mismatch.field !== 'exit_code' && mismatch.diff) {
    const colored = mismatch.diff
      .split('\n')
      .map((line) => (line.startsWith('-') ? paint.red(line) : line.startsWith('+') ? paint.green(line) : line))
      .join('\n');
    lines.push(indent(colored, 6));
  }
  return lines;
}

function echoLines(result: CaseResult, stream: StreamName, paint: ChalkInstance): string[] {
  if (result.outcome === Outcomes.SKIPPED || !shouldEcho(result.testCase.print[stream], result.outcome)) {
    return [];
  }
  const { lines, omitted } = tailLines(result.observation[stream], MAX_ECHO_LINES);
  if (lines.length === 0) {
    return [];
  }
  const out = [indent(paint.blue(`${stream}:`), 4)];
  if (omitted > 0) {
    out.push(indent(paint.dim(`... ${omitted} earlier lines omitted`), 6));
  }
  for (const line of lines) {
    out.push(indent(`>> ${line}`, 6));
  }
  return out;
}

function renderCase(result: CaseResult, verbose: boolean, paint: ChalkInstance): string[] {
  const echoed = [...echoLines(result, 'stdout', paint), ...echoLines(result, 'stderr', paint)];

  switch (result.outcome) {
    case Outcomes.PASS:
      return verbose || echoed.length > 0 ? [caseLine(result, paint), ...echoed] : [];
    case Outcomes.SKIPPED:
      return verbose ? [caseLine(result, paint)] : [];
    case Outcomes.FAIL:
      return [
        caseLine(result, paint),
        ...result.mismatches.flatMap((mismatch) => mismatchLines(mismatch, paint)),
        ...echoed,
      ];
    case Outcomes.ERROR:
      return [
        caseLine(result, paint),
        indent(`${result.observation.reason}: ${result.observation.message}`, 4),
        ...echoed,
      ];
  }
}

function summaryLines(resultSet: ResultSet, paint: ChalkInstance): string[] {
  const { total, ran, passed, failed, errored, skipped } = resultSet.counts;
  const lines: string[] = [];
  if (ran === 0) {
    lines.push(paint.yellow('No test cases ran.'));
  }
  const parts = [
    `Total: ${total}`,
    paint.green(`Passed: ${passed}`),
    (failed > 0 ? paint.red : paint.dim)(`Failed: ${failed}`),
    (errored > 0 ? paint.red : paint.dim)(`Errored: ${errored}`),
    paint.dim(`Skipped: ${skipped}`),
  ];
  lines.push(parts.join(' | '));
  lines.push(`Duration: ${formatDuration(resultSet.durationMs)}`);
  return lines;
}

export function render(resultSet: ResultSet, options: RenderOptions = {}): Report {
  const paint = new Chalk({ level: options.color === true ? 1 : 0 });
  const verbose = options.verbose === true;

  const lines = resultSet.results.flatMap((result) => renderCase(result, verbose, paint));
  if (lines.length > 0) {
    lines.push('');
  }
  lines.push(...summaryLines(resultSet, paint));

  return { text: lines.join('\n'), exitCode: exitCodeFor(resultSet) };
}
