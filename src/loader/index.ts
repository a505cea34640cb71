/**
 * Schema Loader
 * Reads runspec.yaml, validates it and builds the RunConfig
 */

import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { parseDocument } from 'yaml';
import type { ZodIssue } from 'zod';
import {
  ConfigError,
  Err,
  Ok,
  RunFileSchema,
  type ConfigIssue,
  type ExpectEntry,
  type Launch,
  type Result,
  type RunConfig,
  type RunFile,
  type StreamExpectation,
  type TestCase,
  type TestCaseEntry,
} from '../models/index.js';

export const DEFAULT_TIMEOUT_MS = 10_000;

export interface LoadOptions {
  /** Used when neither the case nor `defaults.timeout` sets one. */
  defaultTimeoutMs?: number;
}

export async function loadRunConfig(
  path: string,
  options: LoadOptions = {}
): Promise<Result<RunConfig, ConfigError>> {
  const source = resolve(path);
  let text: string;
  try {
    text = await readFile(source, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return Err(new ConfigError(source, [{ path: '', message: `cannot read file: ${reason}` }]));
  }
  return parseRunConfig(text, source, options);
}

/**
 * Parse and validate config text. `source` is the file the text came from;
 * relative paths inside the config resolve against its directory.
 */
export function parseRunConfig(
  text: string,
  source: string,
  options: LoadOptions = {}
): Result<RunConfig, ConfigError> {
  const absoluteSource = resolve(source);
  const doc = parseDocument(text, { prettyErrors: false });
  if (doc.errors.length > 0) {
    const issues = doc.errors.map((error) => ({ path: '', message: `invalid YAML: ${error.message}` }));
    return Err(new ConfigError(absoluteSource, issues));
  }

  const raw: unknown = doc.toJS();
  if (!isRecord(raw)) {
    return Err(
      new ConfigError(absoluteSource, [{ path: '', message: 'config must be a mapping with a `tests` list' }])
    );
  }

  const parsed = RunFileSchema.safeParse(raw);
  const issues: ConfigIssue[] = parsed.success ? [] : parsed.error.issues.map(toConfigIssue);
  issues.push(...semanticIssues(raw));

  if (!parsed.success || issues.length > 0) {
    return Err(new ConfigError(absoluteSource, issues));
  }

  return Ok(buildRunConfig(parsed.data, absoluteSource, options));
}

// ============================================================================
// Validation
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function formatIssuePath(path: ReadonlyArray<string | number>): string {
  let out = '';
  for (const segment of path) {
    if (typeof segment === 'number') {
      out += `[${segment}]`;
    } else {
      out += out === '' ? segment : `.${segment}`;
    }
  }
  return out;
}

function toConfigIssue(issue: ZodIssue): ConfigIssue {
  return { path: formatIssuePath(issue.path), message: issue.message };
}

/**
 * Cross-field rules. Runs on the raw document so that these problems are
 * reported even when the shape check already failed.
 */
function semanticIssues(doc: Record<string, unknown>): ConfigIssue[] {
  const tests = doc['tests'];
  if (!Array.isArray(tests)) {
    return [];
  }

  const issues: ConfigIssue[] = [];
  const firstIndexByName = new Map<string, number>();

  tests.forEach((entry: unknown, index: number) => {
    if (!isRecord(entry)) {
      return;
    }
    const at = `tests[${index}]`;

    const name = entry['name'];
    if (typeof name === 'string' && name.length > 0) {
      const first = firstIndexByName.get(name);
      if (first === undefined) {
        firstIndexByName.set(name, index);
      } else {
        issues.push({ path: `${at}.name`, message: `duplicate name '${name}' (already used by tests[${first}])` });
      }
    }

    const hasCommand = entry['command'] !== undefined;
    const hasScript = entry['script'] !== undefined;
    if (hasCommand && hasScript) {
      issues.push({ path: at, message: 'command and script are mutually exclusive' });
    } else if (!hasCommand && !hasScript) {
      issues.push({ path: at, message: 'one of command or script is required' });
    }
    if (!hasScript) {
      for (const key of ['runner', 'args']) {
        if (entry[key] !== undefined) {
          issues.push({ path: `${at}.${key}`, message: `${key} only applies to script cases` });
        }
      }
    }

    const expect = entry['expect'];
    if (isRecord(expect)) {
      for (const stream of ['stdout', 'stderr']) {
        if (expect[`${stream}_mode`] !== undefined && expect[stream] === undefined) {
          issues.push({
            path: `${at}.expect.${stream}_mode`,
            message: `${stream}_mode given without ${stream}`,
          });
        }
      }
    }
  });

  return issues;
}

// ============================================================================
// Model construction
// ============================================================================

function secondsToMs(seconds: number): number {
  return Math.max(1, Math.round(seconds * 1000));
}

function buildRunConfig(file: RunFile, source: string, options: LoadOptions): RunConfig {
  const baseDir = dirname(source);
  const defaults = file.defaults ?? {};
  const scriptDir = resolve(baseDir, defaults.dir ?? '.');

  const tests = file.tests.map((entry, index) =>
    Object.freeze(buildTestCase(entry, index, { baseDir, scriptDir, runner: defaults.runner }))
  );

  return Object.freeze({
    source,
    defaults: Object.freeze({
      timeoutMs:
        defaults.timeout !== undefined
          ? secondsToMs(defaults.timeout)
          : options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS,
      ...(defaults.cwd !== undefined ? { cwd: resolve(baseDir, defaults.cwd) } : {}),
    }),
    tests: Object.freeze(tests),
  });
}

interface CaseContext {
  baseDir: string;
  scriptDir: string;
  runner: readonly [string, ...string[]] | undefined;
}

function buildLaunch(entry: TestCaseEntry, context: CaseContext): Launch {
  if (entry.command !== undefined) {
    if (typeof entry.command === 'string') {
      return { kind: 'shell', command: entry.command };
    }
    const [file, ...args] = entry.command;
    return { kind: 'argv', file, args };
  }

  // Both absent or both present is rejected by semanticIssues
  const script = resolve(context.scriptDir, entry.script ?? '');
  const extra = entry.args ?? [];
  const runner = entry.runner ?? context.runner;
  if (runner === undefined) {
    return { kind: 'argv', file: script, args: extra };
  }
  const [file, ...prefix] = runner;
  return { kind: 'argv', file, args: [...prefix, script, ...extra] };
}

function streamExpectation(
  text: string | undefined,
  mode: ExpectEntry['stdout_mode']
): StreamExpectation | undefined {
  return text === undefined ? undefined : { text, mode: mode ?? 'exact' };
}

function buildTestCase(entry: TestCaseEntry, index: number, context: CaseContext): TestCase {
  const expect = entry.expect ?? {};
  const stdout = streamExpectation(expect.stdout, expect.stdout_mode);
  const stderr = streamExpectation(expect.stderr, expect.stderr_mode);

  return {
    name: entry.name,
    index,
    launch: buildLaunch(entry, context),
    ...(entry.cwd !== undefined ? { cwd: resolve(context.baseDir, entry.cwd) } : {}),
    env: Object.freeze({ ...(entry.env ?? {}) }),
    ...(entry.stdin !== undefined ? { stdin: entry.stdin } : {}),
    ...(entry.timeout !== undefined ? { timeoutMs: secondsToMs(entry.timeout) } : {}),
    expect: Object.freeze({
      exitCode: expect.exit_code ?? 0,
      ...(stdout ? { stdout } : {}),
      ...(stderr ? { stderr } : {}),
    }),
    print: Object.freeze({
      stdout: entry.print?.stdout ?? 'fail',
      stderr: entry.print?.stderr ?? 'fail',
    }),
  };
}
