import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { afterEach, beforeEach, describe, test, expect } from 'vitest';
import { formatIssuePath, loadRunConfig, parseRunConfig } from '../src/loader/index.js';
import type { ConfigError, RunConfig } from '../src/models/index.js';

const SOURCE = '/srv/project/runspec.yaml';

function load(text: string): RunConfig {
  const result = parseRunConfig(text, SOURCE);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

function reject(text: string): ConfigError {
  const result = parseRunConfig(text, SOURCE);
  if (result.ok) {
    throw new Error('expected the config to be rejected');
  }
  return result.error;
}

describe('parseRunConfig', () => {
  test('builds cases in file order with defaults applied', () => {
    const config = load(`
tests:
  - name: echo-hi
    command: echo hi
    expect:
      stdout: hi
  - name: exit-three
    command: exit 3
    expect:
      exit_code: 0
`);

    expect(config.source).toBe(SOURCE);
    expect(config.defaults).toEqual({ timeoutMs: 10000 });
    expect(config.tests.map((t) => t.name)).toEqual(['echo-hi', 'exit-three']);
    expect(config.tests[0]).toEqual({
      name: 'echo-hi',
      index: 0,
      launch: { kind: 'shell', command: 'echo hi' },
      env: {},
      expect: { exitCode: 0, stdout: { text: 'hi', mode: 'exact' } },
      print: { stdout: 'fail', stderr: 'fail' },
    });
    expect(config.tests[1]?.index).toBe(1);
  });

  test('is frozen after load', () => {
    const config = load('tests:\n  - name: a\n    command: "true"\n');
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.tests)).toBe(true);
    expect(Object.isFrozen(config.tests[0])).toBe(true);
  });

  test('a list command runs the program directly', () => {
    const config = load(`
tests:
  - name: version
    command: [node, --version]
`);
    expect(config.tests[0]?.launch).toEqual({ kind: 'argv', file: 'node', args: ['--version'] });
  });

  test('scripts resolve against defaults.dir and run through the runner', () => {
    const config = load(`
defaults:
  dir: scripts
  runner: [node, --no-warnings]
tests:
  - name: greet
    script: greet.js
    args: [--name, world]
  - name: direct
    script: run.sh
    runner: [bash]
  - name: no-runner
    script: /opt/tools/check
`);
    expect(config.tests.map((t) => t.launch)).toEqual([
      {
        kind: 'argv',
        file: 'node',
        args: ['--no-warnings', resolve('/srv/project/scripts/greet.js'), '--name', 'world'],
      },
      { kind: 'argv', file: 'bash', args: [resolve('/srv/project/scripts/run.sh')] },
      { kind: 'argv', file: resolve('/opt/tools/check'), args: [] },
    ]);
  });

  test('optional fields are mapped', () => {
    const config = load(`
defaults:
  timeout: 2
  cwd: work
tests:
  - name: full
    command: cat
    cwd: sub
    env:
      PORT: 8080
      DEBUG: true
      NAME: runspec
    stdin: "hello\\n"
    timeout: 1.5
    expect:
      exit_code: 1
      stdout: hel
      stdout_mode: prefix
      stderr: "*"
      stderr_mode: glob
    print:
      stdout: always
`);
    expect(config.defaults).toEqual({ timeoutMs: 2000, cwd: resolve('/srv/project/work') });
    const full = config.tests[0];
    expect(full?.cwd).toBe(resolve('/srv/project/sub'));
    expect(full?.env).toEqual({ PORT: '8080', DEBUG: 'true', NAME: 'runspec' });
    expect(full?.stdin).toBe('hello\n');
    expect(full?.timeoutMs).toBe(1500);
    expect(full?.expect).toEqual({
      exitCode: 1,
      stdout: { text: 'hel', mode: 'prefix' },
      stderr: { text: '*', mode: 'glob' },
    });
    expect(full?.print).toEqual({ stdout: 'always', stderr: 'fail' });
  });

  test('the default timeout option applies when the file sets none', () => {
    const result = parseRunConfig('tests: []\n', SOURCE, { defaultTimeoutMs: 2500 });
    expect(result.ok && result.value.defaults.timeoutMs).toBe(2500);
  });

  test('an empty test list is accepted', () => {
    expect(load('tests: []\n').tests).toEqual([]);
  });

  test('collects every problem in one error', () => {
    const error = reject(`
tests:
  - command: echo a
  - name: dup
    command: echo b
    timeout: 0
  - name: dup
    command: echo c
    expect:
      stdout_mode: regex
`);
    expect(error.source).toBe(SOURCE);
    expect(error.issues).toEqual([
      { path: 'tests[0].name', message: 'name is required' },
      { path: 'tests[1].timeout', message: 'must be a positive number of seconds' },
      { path: 'tests[2].expect.stdout_mode', message: 'must be one of exact, contains, prefix, glob' },
      { path: 'tests[2].name', message: "duplicate name 'dup' (already used by tests[1])" },
      { path: 'tests[2].expect.stdout_mode', message: 'stdout_mode given without stdout' },
    ]);
  });

  test('rejects a case with neither command nor script', () => {
    expect(reject('tests:\n  - name: nothing\n').issues).toEqual([
      { path: 'tests[0]', message: 'one of command or script is required' },
    ]);
  });

  test('rejects a case with both command and script', () => {
    expect(reject('tests:\n  - name: both\n    command: ls\n    script: a.sh\n').issues).toEqual([
      { path: 'tests[0]', message: 'command and script are mutually exclusive' },
    ]);
  });

  test('rejects runner and args on command cases', () => {
    expect(reject('tests:\n  - name: c\n    command: ls\n    args: [-l]\n').issues).toEqual([
      { path: 'tests[0].args', message: 'args only applies to script cases' },
    ]);
  });

  test('rejects a blank command', () => {
    expect(reject('tests:\n  - name: blank\n    command: "   "\n').issues).toEqual([
      { path: 'tests[0].command', message: 'command must not be empty' },
    ]);
  });

  test('rejects unknown keys so typos are not silently ignored', () => {
    const error = reject('tests:\n  - name: typo\n    command: ls\n    expect:\n      stdot: hi\n');
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]?.path).toBe('tests[0].expect');
    expect(error.issues[0]?.message).toContain("'stdot'");
  });

  test('rejects a negative default timeout', () => {
    expect(reject('defaults:\n  timeout: -1\ntests: []\n').issues).toEqual([
      { path: 'defaults.timeout', message: 'must be a positive number of seconds' },
    ]);
  });

  test('rejects a timeout longer than a timer can hold', () => {
    expect(reject('tests:\n  - name: slow\n    command: sleep 1\n    timeout: 3000000\n').issues).toEqual([
      { path: 'tests[0].timeout', message: 'must be at most 2147483.647 seconds' },
    ]);
  });

  test('accepts the longest timeout a timer can hold', () => {
    const config = load('tests:\n  - name: slow\n    command: sleep 1\n    timeout: 2147483.647\n');
    expect(config.tests[0]?.timeoutMs).toBe(2147483647);
  });

  test('rejects a document without tests', () => {
    expect(reject('defaults:\n  timeout: 1\n').issues).toEqual([{ path: 'tests', message: 'tests is required' }]);
  });

  test('rejects a document that is not a mapping', () => {
    const message = 'config must be a mapping with a `tests` list';
    expect(reject('- a\n- b\n').issues).toEqual([{ path: '', message }]);
    expect(reject('').issues).toEqual([{ path: '', message }]);
  });

  test('rejects malformed YAML', () => {
    const error = reject('tests: [unclosed\n');
    expect(error.issues.length).toBeGreaterThan(0);
    expect(error.issues[0]?.path).toBe('');
    expect(error.issues[0]?.message.startsWith('invalid YAML: ')).toBe(true);
  });
});

describe('formatIssuePath', () => {
  test('renders indexes in brackets', () => {
    expect(formatIssuePath(['tests', 2, 'expect', 'stdout'])).toBe('tests[2].expect.stdout');
    expect(formatIssuePath([])).toBe('');
  });
});

describe('loadRunConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'runspec-loader-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('reads and validates a file', async () => {
    const path = join(dir, 'runspec.yaml');
    await writeFile(path, 'tests:\n  - name: one\n    command: "true"\n', 'utf-8');

    const result = await loadRunConfig(path);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.source).toBe(path);
      expect(result.value.tests).toHaveLength(1);
    }
  });

  test('reports a missing file as a config error', async () => {
    const path = join(dir, 'absent.yaml');
    const result = await loadRunConfig(path);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.source).toBe(path);
      expect(result.error.issues).toHaveLength(1);
      expect(result.error.issues[0]?.message.startsWith('cannot read file: ')).toBe(true);
    }
  });
});
