/**
 * Command types and interfaces
 */

import type { Services } from '../container/index.js';
import type { CliResult } from '../utils/cli-utils.js';

/**
 * What a command hands back to the program. `raw` replaces the JSON result
 * on stdout when set (CSV written to the terminal).
 */
export interface CommandOutput {
  result: CliResult;
  raw?: string;
}

/**
 * Base command interface. Options arrive as commander parsed them and are
 * validated by each command.
 */
export interface Command {
  name: string;
  description: string;
  execute(args: string[], options: unknown): Promise<CommandOutput>;
}

export interface CommandConfig {
  services: Services;
  /** Clock for result timestamps */
  now?: () => Date;
}
