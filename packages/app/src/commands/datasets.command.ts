/**
 * `datasets` - list what the registry can fetch, optionally narrowed by
 * `--category` and `--source`
 */

import { z } from 'zod';
import type { Command, CommandConfig, CommandOutput } from './types.js';
import { outputOptionsSchema, parseOptions } from './options.js';
import { createResult } from '../utils/cli-utils.js';
import type { Services } from '../container/index.js';

const datasetsOptionsSchema = outputOptionsSchema.extend({
  category: z.string().min(1).optional(),
  source: z.string().min(1).optional(),
});

export class DatasetsCommand implements Command {
  name = 'datasets';
  description = 'List registry datasets with their categories';

  private services: Services;
  private now: () => Date;

  constructor(config: CommandConfig) {
    this.services = config.services;
    this.now = config.now ?? (() => new Date());
  }

  async execute(_args: string[], options: unknown): Promise<CommandOutput> {
    const { category, source } = parseOptions(datasetsOptionsSchema, options);
    const datasets = this.services.registry.listDatasets({ category, source });
    return { result: createResult(this.name, true, { datasets }, { now: this.now() }) };
  }
}
