/**
 * Main exports for @brrealty/app
 */

// Configuration exports
export { loadConfig, getConfigSummary, configSchema, envMapping, DEFAULT_CACHE_DIR } from './config/index.js';
export type { Config } from './config/index.js';

// Service wiring
export { createServices, createAppLogger } from './container/index.js';
export type { Services, ServiceOverrides } from './container/index.js';

// Command exports
export { DatasetsCommand } from './commands/datasets.command.js';
export { FetchCommand, fetchOptionsSchema, failureWarnings, summarize } from './commands/fetch.command.js';
export { CacheStatusCommand, CacheSaveCommand, CacheClearCommand } from './commands/cache.command.js';
export type { Command, CommandConfig, CommandOutput } from './commands/types.js';

// Program and result helpers
export { buildProgram, PROGRAM_NAME, PROGRAM_VERSION } from './program.js';
export type { ProgramOptions } from './program.js';
export { EXIT_CODES, createResult, errorResult, outputResult } from './utils/cli-utils.js';
export type { CliResult, ExitCode, Output } from './utils/cli-utils.js';
