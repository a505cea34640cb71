/**
 * Command implementations behind the CLI
 * Each returns the exit code instead of exiting so it can be driven from tests
 */

import { readFile, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { Logger } from 'pino';
import type { Settings } from './config/index.js';
import { RunOrchestrator, createNameFilter } from './core/index.js';
import { ProcessExecutor, type CaseExecutor } from './executors/index.js';
import { loadRunConfig } from './loader/index.js';
import { Err, ExitCodes, formatIssue, type ExitCode, type Result, type RunConfig } from './models/index.js';
import { render } from './reporter/index.js';

const TEMPLATE_URL = new URL('../templates/runspec.yaml', import.meta.url);

export interface AppIO {
  out(text: string): void;
  err(text: string): void;
}

export interface AppContext {
  settings: Settings;
  logger: Logger;
  io: AppIO;
  /** Defaults to a ProcessExecutor built from the settings. */
  executor?: CaseExecutor;
}

export interface RunCommandOptions {
  config?: string;
  filter?: string;
  failFast?: boolean;
  verbose?: boolean;
  color?: boolean;
}

async function loadForCommand(configPath: string | undefined, context: AppContext): Promise<Result<RunConfig, ExitCode>> {
  const path = configPath ?? context.settings.runner.configPath;
  const loaded = await loadRunConfig(path, { defaultTimeoutMs: context.settings.runner.defaultTimeoutMs });
  if (!loaded.ok) {
    context.logger.debug({ source: loaded.error.source, issues: loaded.error.issues.map(formatIssue) }, 'Config rejected');
    context.io.err(loaded.error.message);
    return Err(ExitCodes.USAGE);
  }
  return loaded;
}

export async function runCommand(options: RunCommandOptions, context: AppContext): Promise<ExitCode> {
  const loaded = await loadForCommand(options.config, context);
  if (!loaded.ok) {
    return loaded.error;
  }

  const executor =
    context.executor ?? new ProcessExecutor({ killGraceMs: context.settings.runner.killGraceMs }, context.logger);
  const orchestrator = new RunOrchestrator(executor, context.logger);

  const resultSet = await orchestrator.runAll(loaded.value, {
    ...(options.filter !== undefined ? { filter: options.filter } : {}),
    failFast: options.failFast === true,
  });

  const report = render(resultSet, { verbose: options.verbose === true, color: options.color === true });
  context.io.out(report.text);
  return report.exitCode;
}

export async function listCommand(
  options: Pick<RunCommandOptions, 'config' | 'filter'>,
  context: AppContext
): Promise<ExitCode> {
  const loaded = await loadForCommand(options.config, context);
  if (!loaded.ok) {
    return loaded.error;
  }

  const selected = createNameFilter(options.filter);
  const names = loaded.value.tests.map((testCase) => testCase.name).filter(selected);
  if (names.length === 0) {
    context.io.err(options.filter === undefined ? 'No test cases defined.' : `No test cases match '${options.filter}'.`);
    return ExitCodes.USAGE;
  }

  context.io.out(names.join('\n'));
  return ExitCodes.SUCCESS;
}

export async function initCommand(path: string, context: AppContext): Promise<ExitCode> {
  const target = resolve(path);
  try {
    const template = await readFile(TEMPLATE_URL, 'utf-8');
    // 'wx' refuses to overwrite an existing file
    await writeFile(target, template, { encoding: 'utf-8', flag: 'wx' });
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    context.io.err(
      code === 'EEXIST'
        ? `${target} already exists; not overwriting it.`
        : `Could not write ${target}: ${error instanceof Error ? error.message : String(error)}`
    );
    return ExitCodes.USAGE;
  }

  context.logger.info({ target }, 'Wrote starter config');
  context.io.out(`Created ${target}`);
  return ExitCodes.SUCCESS;
}
