/**
 * `fetch <dataset>` - run one dataset request and print or save the table
 *
 * Output rules:
 * - `--out <file>`: table (CSV, or JSON with provenance) goes to the file,
 *   a summary result to stdout
 * - `--format csv` without `--out`: the CSV itself goes to stdout
 * - otherwise: a result holding the table and its provenance
 */

import { writeFile } from 'node:fs/promises';
import { z } from 'zod';
import type { DatasetRequest, FetchResult } from '@brrealty/contracts';
import { failedOutcomes } from '@brrealty/contracts';
import { encodeText } from '@brrealty/dataset-cache';
import type { Command, CommandConfig, CommandOutput } from './types.js';
import { outputOptionsSchema, parseOptions, rangeOptionsSchema } from './options.js';
import { createResult } from '../utils/cli-utils.js';
import type { Services } from '../container/index.js';

export const fetchOptionsSchema = outputOptionsSchema.merge(rangeOptionsSchema).extend({
  cache: z.boolean().default(false),
  format: z.enum(['json', 'csv']).default('json'),
  out: z.string().min(1).optional(),
});

export type FetchOptions = z.infer<typeof fetchOptionsSchema>;

/**
 * One warning line per failed item group, e.g. `2 series failed: 189, 190`.
 */
export function failureWarnings(result: FetchResult): string[] {
  const failed = failedOutcomes(result.provenance);
  if (failed.length === 0) {
    return [];
  }
  return [`${failed.length} series failed: ${failed.map((outcome) => outcome.itemId).join(', ')}`];
}

/**
 * Provenance without the per-item list, plus the failures that matter.
 */
export function summarize(result: FetchResult): Record<string, unknown> {
  const { outcomes, ...provenance } = result.provenance;
  return {
    ...provenance,
    rows: result.table.length,
    items: outcomes.length,
    failed: failedOutcomes(result.provenance).map(({ itemId, status, error }) => ({ itemId, status, error })),
  };
}

export function toRequest(dataset: string, options: z.infer<typeof rangeOptionsSchema>, useCache: boolean): DatasetRequest {
  const request: DatasetRequest = { dataset, useCache, quiet: options.quiet };
  if (options.category !== undefined) request.category = options.category;
  if (options.start !== undefined) request.start = options.start;
  if (options.end !== undefined) request.end = options.end;
  if (options.maxRetries !== undefined) request.maxRetries = options.maxRetries;
  return request;
}

export class FetchCommand implements Command {
  name = 'fetch';
  description = 'Fetch a dataset, from the cache when asked, live otherwise';

  private services: Services;
  private now: () => Date;

  constructor(config: CommandConfig) {
    this.services = config.services;
    this.now = config.now ?? (() => new Date());
  }

  async execute(args: string[], rawOptions: unknown): Promise<CommandOutput> {
    const options = parseOptions(fetchOptionsSchema, rawOptions);
    const dataset = args[0] ?? '';

    const result = await this.services.orchestrator.fetch(toRequest(dataset, options, options.cache));
    const warnings = failureWarnings(result);
    const resultOptions = { warnings: warnings.length > 0 ? warnings : undefined, now: this.now() };

    if (options.out !== undefined) {
      const body =
        options.format === 'csv' ? encodeText(result.table) : `${JSON.stringify(result, null, 2)}\n`;
      await writeFile(options.out, body);
      this.services.logger.debug('Wrote dataset', { dataset, out: options.out, format: options.format });
      return {
        result: createResult(
          this.name,
          true,
          { ...summarize(result), out: options.out, format: options.format },
          resultOptions
        ),
      };
    }

    if (options.format === 'csv') {
      return {
        result: createResult(this.name, true, summarize(result), resultOptions),
        raw: encodeText(result.table),
      };
    }

    return {
      result: createResult(this.name, true, { provenance: result.provenance, table: result.table }, resultOptions),
    };
  }
}
