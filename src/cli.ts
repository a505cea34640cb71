#!/usr/bin/env node
import chalk from 'chalk';
import { Command, CommanderError } from 'commander';
import { config as loadDotenv } from 'dotenv';
import { initCommand, listCommand, runCommand, type AppContext } from './app.js';
import { loadSettings } from './config/index.js';
import { ExitCodes, type ExitCode } from './models/index.js';
import { createLogger } from './utils/logger.js';

interface RunCliOptions {
  config?: string;
  failFast?: boolean;
  verbose?: boolean;
  color: boolean;
}

interface ListCliOptions {
  config?: string;
}

function createContext(): AppContext | null {
  loadDotenv();

  const settingsResult = loadSettings();
  if (!settingsResult.ok) {
    console.error(settingsResult.error);
    return null;
  }
  const settings = settingsResult.value;

  return {
    settings,
    logger: createLogger(settings.logging),
    io: {
      out: (text) => process.stdout.write(`${text}\n`),
      err: (text) => process.stderr.write(`${text}\n`),
    },
  };
}

async function execute(command: (context: AppContext) => Promise<ExitCode>): Promise<void> {
  const context = createContext();
  if (!context) {
    process.exitCode = ExitCodes.USAGE;
    return;
  }

  try {
    process.exitCode = await command(context);
  } catch (error) {
    context.logger.error({ error }, 'Unexpected failure');
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = ExitCodes.USAGE;
  }
}

const program = new Command();
// Set before adding subcommands so they inherit it
program.exitOverride();
program
  .name('runspec')
  .description('Run the commands declared in a YAML file and check their output and exit codes')
  .version('0.1.0');

program
  .command('run', { isDefault: true })
  .description('Run test cases (the default command)')
  .argument('[filter]', 'only run cases whose name contains this text, or matches it as a glob')
  .option('-c, --config <path>', 'config file (default: $RUNSPEC_CONFIG or runspec.yaml)')
  .option('--fail-fast', 'stop after the first failing case')
  .option('-v, --verbose', 'list passing and skipped cases too')
  .option('--no-color', 'disable colored output')
  .action(async (filter: string | undefined, opts: RunCliOptions) => {
    await execute((context) =>
      runCommand(
        {
          ...opts,
          ...(filter !== undefined ? { filter } : {}),
          color: opts.color && chalk.level > 0,
        },
        context
      )
    );
  });

program
  .command('list')
  .description('List the names of the test cases a filter selects')
  .argument('[filter]', 'substring or glob matched against case names')
  .option('-c, --config <path>', 'config file (default: $RUNSPEC_CONFIG or runspec.yaml)')
  .action(async (filter: string | undefined, opts: ListCliOptions) => {
    await execute((context) =>
      listCommand({ ...opts, ...(filter !== undefined ? { filter } : {}) }, context)
    );
  });

program
  .command('init')
  .description('Write a starter config file')
  .argument('[path]', 'where to write it', 'runspec.yaml')
  .action(async (path: string) => {
    await execute((context) => initCommand(path, context));
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof CommanderError) {
    // Help and version exit 0; usage mistakes map to the usage exit code
    process.exitCode = error.exitCode === 0 ? ExitCodes.SUCCESS : ExitCodes.USAGE;
    return;
  }
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = ExitCodes.USAGE;
});
