/**
 * Process executor
 * Runs a case as a child process through execa
 */

import { stat } from 'node:fs/promises';
import { execa } from 'execa';
import type { Logger } from 'pino';
import type { CaseExecutor } from './base.js';
import type {
  ErrorObservation,
  ExecutionErrorReason,
  ExecutionObservation,
  Launch,
  RunDefaults,
  TestCase,
} from '../models/index.js';
import { ExecutionErrorReasons } from '../models/index.js';

export interface ProcessExecutorConfig {
  /** Time between SIGTERM and SIGKILL to the case's process group once it has run past its timeout. */
  killGraceMs: number;
}

// Exit statuses POSIX shells use when they cannot run the command
const SHELL_NOT_FOUND = 127;
const SHELL_NOT_EXECUTABLE = 126;

interface CommandLine {
  file: string;
  args: string[];
  shell: boolean;
}

function commandLine(launch: Launch): CommandLine {
  switch (launch.kind) {
    case 'shell':
      return { file: launch.command, args: [], shell: true };
    case 'argv':
      return { file: launch.file, args: [...launch.args], shell: false };
  }
}

// Error details on a non-rejecting execa result are untyped
function property(source: unknown, key: string): unknown {
  if (typeof source !== 'object' || source === null) {
    return undefined;
  }
  return Reflect.get(source, key);
}

function stringProperty(source: unknown, key: string): string | undefined {
  const value = property(source, key);
  return typeof value === 'string' ? value : undefined;
}

function text(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

function classifySpawnError(code: string | undefined): ExecutionErrorReason {
  switch (code) {
    case 'ENOENT':
      return ExecutionErrorReasons.NOT_FOUND;
    case 'EACCES':
    case 'EPERM':
      return ExecutionErrorReasons.PERMISSION;
    default:
      return ExecutionErrorReasons.LAUNCH;
  }
}

export class ProcessExecutor implements CaseExecutor {
  readonly name = 'process';

  constructor(
    private readonly config: ProcessExecutorConfig,
    private readonly logger: Logger
  ) {}

  async run(testCase: TestCase, defaults: RunDefaults): Promise<ExecutionObservation> {
    const timeoutMs = testCase.timeoutMs ?? defaults.timeoutMs;
    const cwd = testCase.cwd ?? defaults.cwd ?? process.cwd();
    const { file, args, shell } = commandLine(testCase.launch);
    const startedAt = performance.now();
    const elapsed = (): number => Math.round(performance.now() - startedAt);

    const failure = (
      reason: ExecutionErrorReason,
      message: string,
      stdout = '',
      stderr = ''
    ): ErrorObservation => ({ kind: 'error', reason, message, stdout, stderr, durationMs: elapsed() });

    if (!(await isDirectory(cwd))) {
      return failure(ExecutionErrorReasons.LAUNCH, `working directory does not exist: ${cwd}`);
    }

    this.logger.debug({ case: testCase.name, file, args, cwd, timeoutMs }, 'Spawning case');

    try {
      // The case runs as the leader of its own process group so that a
      // timeout reaches the processes a shell started, not only the shell.
      const subprocess = execa(file, args, {
        cwd,
        env: testCase.env,
        extendEnv: true,
        shell,
        input: testCase.stdin ?? '',
        detached: true,
        stripFinalNewline: false,
        reject: false,
      });

      const deadline = { expired: false };
      let forceKill: NodeJS.Timeout | undefined;
      const timer = setTimeout(() => {
        deadline.expired = true;
        this.signalGroup(subprocess.pid, 'SIGTERM');
        forceKill = setTimeout(() => this.signalGroup(subprocess.pid, 'SIGKILL'), this.config.killGraceMs);
      }, timeoutMs);

      const result = await subprocess.finally(() => {
        clearTimeout(timer);
        clearTimeout(forceKill);
        if (deadline.expired) {
          // Members that closed their pipes but ignored SIGTERM
          this.signalGroup(subprocess.pid, 'SIGKILL');
        }
      });

      const stdout = text(result.stdout);
      const stderr = text(result.stderr);

      if (deadline.expired) {
        return failure(ExecutionErrorReasons.TIMEOUT, `timed out after ${timeoutMs}ms`, stdout, stderr);
      }

      const exitCode = result.exitCode ?? null;
      const signal = result.signal ?? null;

      if (exitCode === null && signal === null) {
        const code = stringProperty(result, 'code') ?? stringProperty(property(result, 'cause'), 'code');
        const detail =
          stringProperty(result, 'originalMessage') ?? stringProperty(result, 'shortMessage') ?? 'unknown error';
        return failure(classifySpawnError(code), `could not start '${file}': ${detail}`, stdout, stderr);
      }

      if (shell && exitCode !== testCase.expect.exitCode) {
        if (exitCode === SHELL_NOT_FOUND) {
          return failure(ExecutionErrorReasons.NOT_FOUND, `command not found (shell exited with ${SHELL_NOT_FOUND})`, stdout, stderr);
        }
        if (exitCode === SHELL_NOT_EXECUTABLE) {
          return failure(ExecutionErrorReasons.PERMISSION, `command not executable (shell exited with ${SHELL_NOT_EXECUTABLE})`, stdout, stderr);
        }
      }

      return { kind: 'completed', stdout, stderr, exitCode, signal, durationMs: elapsed() };
    } catch (error) {
      this.logger.warn({ case: testCase.name, error }, 'Executor threw while running case');
      return failure(
        ExecutionErrorReasons.LAUNCH,
        `could not start '${file}': ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  private signalGroup(pid: number | undefined, signal: NodeJS.Signals): void {
    if (pid === undefined) {
      return;
    }
    try {
      process.kill(-pid, signal);
    } catch (error) {
      // ESRCH once every member of the group has exited
      this.logger.debug({ pid, signal, error }, 'Process group already gone');
    }
  }
}
