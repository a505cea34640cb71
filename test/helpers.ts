import type { Logger } from 'pino';
import type { Settings } from '../src/config/index.js';
import type {
  CompletedObservation,
  ErrorObservation,
  ExecutionObservation,
  RunDefaults,
  TestCase,
} from '../src/models/index.js';
import type { CaseExecutor } from '../src/executors/index.js';
import { silentLogger } from '../src/utils/logger.js';

export const quietLogger: Logger = silentLogger();

export const testSettings: Settings = {
  runner: { configPath: 'runspec.yaml', defaultTimeoutMs: 10000, killGraceMs: 500 },
  logging: { level: 'silent', pretty: false },
};

export function makeCase(overrides: Partial<TestCase> & { name: string }): TestCase {
  return {
    index: 0,
    launch: { kind: 'shell', command: 'true' },
    env: {},
    expect: { exitCode: 0 },
    print: { stdout: 'fail', stderr: 'fail' },
    ...overrides,
  };
}

export function completed(overrides: Partial<CompletedObservation> = {}): CompletedObservation {
  return { kind: 'completed', stdout: '', stderr: '', exitCode: 0, signal: null, durationMs: 5, ...overrides };
}

export function failedToRun(overrides: Partial<ErrorObservation> = {}): ErrorObservation {
  return {
    kind: 'error',
    reason: 'not-found',
    message: "could not start 'missing': spawn missing ENOENT",
    stdout: '',
    stderr: '',
    durationMs: 1,
    ...overrides,
  };
}

/**
 * In-process stand-in for ProcessExecutor: answers from a table keyed by case
 * name and records the order in which cases were run.
 */
export class FakeExecutor implements CaseExecutor {
  readonly name = 'fake';
  readonly calls: string[] = [];

  constructor(private readonly answers: Record<string, ExecutionObservation | Error>) {}

  async run(testCase: TestCase, _defaults: RunDefaults): Promise<ExecutionObservation> {
    this.calls.push(testCase.name);
    const answer = this.answers[testCase.name] ?? completed();
    if (answer instanceof Error) {
      throw answer;
    }
    return answer;
  }
}
