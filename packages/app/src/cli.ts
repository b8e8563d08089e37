#!/usr/bin/env node

/**
 * CLI entry point for the brrealty command
 */

// Load environment variables from .env file
import 'dotenv/config';

import chalk from 'chalk';
import { attachGlobalHandlers } from '@brrealty/logger';
import { errorMessage } from '@brrealty/contracts';
import { loadConfig, type Config } from './config/index.js';
import { createServices } from './container/index.js';
import { buildProgram } from './program.js';
import { EXIT_CODES } from './utils/cli-utils.js';

async function main(): Promise<void> {
  let config: Config;
  try {
    config = loadConfig();
  } catch (error) {
    console.error(chalk.red(errorMessage(error)));
    process.exitCode = EXIT_CODES.fatal;
    return;
  }

  const services = createServices(config);
  attachGlobalHandlers(services.logger);

  await buildProgram({ services }).parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(chalk.red(`Fatal error: ${errorMessage(error)}`));
  process.exitCode = EXIT_CODES.fatal;
});
