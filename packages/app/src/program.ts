/**
 * Command-line program
 *
 * Commands:
 *   datasets                  List registry datasets
 *   fetch <dataset>           Fetch a dataset (live, or cache with --cache)
 *   cache status              List local cache files
 *   cache save <dataset>      Fetch live and write the local cache
 *   cache clear [datasets...] Delete local cache files
 *
 * Results go to stdout, logs to stderr. The exit code is 0 on success,
 * 1 when some series failed or cache entries are stale, 2 on errors.
 */

import { Command as Program } from 'commander';
import { errorMessage, isBrRealtyError } from '@brrealty/contracts';
import type { Command } from './commands/types.js';
import { DatasetsCommand } from './commands/datasets.command.js';
import { FetchCommand } from './commands/fetch.command.js';
import { CacheClearCommand, CacheSaveCommand, CacheStatusCommand } from './commands/cache.command.js';
import type { Services } from './container/index.js';
import type { ExitCode, Output } from './utils/cli-utils.js';
import { errorResult, outputResult } from './utils/cli-utils.js';

export const PROGRAM_NAME = 'brrealty';
export const PROGRAM_VERSION = '0.1.0';

export interface ProgramOptions {
  services: Services;
  /** stdout sink */
  out?: Output;
  /** Receives each command's exit code; sets process.exitCode by default */
  onExit?: (code: ExitCode) => void;
  now?: () => Date;
}

export function buildProgram(options: ProgramOptions): Program {
  const { services } = options;
  const out = options.out ?? console.log;
  const onExit =
    options.onExit ??
    ((code: ExitCode) => {
      process.exitCode = code;
    });
  const config = { services, now: options.now };

  async function run(command: Command, args: string[], commandOptions: Record<string, unknown>): Promise<void> {
    const pretty = commandOptions.pretty === true;
    try {
      const { result, raw } = await command.execute(args, commandOptions);
      if (raw !== undefined) {
        out(raw.trimEnd());
      } else {
        outputResult(result, pretty, out);
      }
      onExit(result.exitCode);
    } catch (error) {
      services.logger.error('Command failed', {
        command: command.name,
        code: isBrRealtyError(error) ? error.code : undefined,
        error: errorMessage(error),
      });
      const result = errorResult(command.name, error, options.now?.());
      outputResult(result, pretty, out);
      onExit(result.exitCode);
    }
  }

  const program = new Program();

  program
    .name(PROGRAM_NAME)
    .description('Fetch Brazilian macroeconomic and real-estate market datasets')
    .version(PROGRAM_VERSION);

  program
    .command('datasets')
    .description('List registry datasets with their categories')
    .option('-c, --category <category>', 'Only datasets with items in this category')
    .option('--source <source>', 'Only datasets served by this source')
    .option('--pretty', 'Colored multi-line output')
    .action(async (commandOptions: Record<string, unknown>) => {
      await run(new DatasetsCommand(config), [], commandOptions);
    });

  program
    .command('fetch')
    .description('Fetch a dataset, from the cache with --cache, live otherwise')
    .argument('<dataset>', 'Dataset name, see `datasets`')
    .option('-c, --category <category>', 'Category to fetch (default: all)')
    .option('-s, --start <date>', 'First date, YYYY-MM-DD')
    .option('-e, --end <date>', 'Last date, YYYY-MM-DD')
    .option('--cache', 'Read the cache instead of downloading')
    .option('-q, --quiet', 'Only log warnings and errors')
    .option('--max-retries <n>', 'Attempts per series (1-10)')
    .option('-f, --format <format>', 'Output format: json or csv')
    .option('-o, --out <file>', 'Write the table to a file')
    .option('--pretty', 'Colored multi-line output')
    .action(async (dataset: string, commandOptions: Record<string, unknown>) => {
      await run(new FetchCommand(config), [dataset], commandOptions);
    });

  const cache = program.command('cache').description('Inspect, refresh and clear the local cache');

  cache
    .command('status')
    .description('List local cache files with their age and staleness')
    .option('--pretty', 'Colored multi-line output')
    .action(async (commandOptions: Record<string, unknown>) => {
      await run(new CacheStatusCommand(config), [], commandOptions);
    });

  cache
    .command('save')
    .description('Fetch a dataset live and store it in the local cache')
    .argument('<dataset>', 'Dataset name, see `datasets`')
    .option('-c, --category <category>', 'Category to fetch (default: all)')
    .option('-s, --start <date>', 'First date, YYYY-MM-DD')
    .option('-e, --end <date>', 'Last date, YYYY-MM-DD')
    .option('-q, --quiet', 'Only log warnings and errors')
    .option('--max-retries <n>', 'Attempts per series (1-10)')
    .option('--pretty', 'Colored multi-line output')
    .action(async (dataset: string, commandOptions: Record<string, unknown>) => {
      await run(new CacheSaveCommand(config), [dataset], commandOptions);
    });

  cache
    .command('clear')
    .description('Delete local cache files, for the named datasets or all of them')
    .argument('[datasets...]', 'Dataset names, see `datasets`')
    .option('--pretty', 'Colored multi-line output')
    .action(async (datasets: string[], commandOptions: Record<string, unknown>) => {
      await run(new CacheClearCommand(config), datasets, commandOptions);
    });

  return program;
}
