/**
 * @fileoverview Request validation and defaults.
 *
 * @module @brrealty/acquisition/request
 */

import { z } from 'zod';
import type { DatasetRequest, ResolvedRequest } from '@brrealty/contracts';
import { ValidationError, isIsoDate } from '@brrealty/contracts';
import type { SourceRegistry } from './registry.js';
import { ALL_CATEGORIES } from './registry.js';

/** Upper bound on attempts per item. */
export const MAX_ATTEMPTS_LIMIT = 10;

const isoDate = z.string().refine(isIsoDate, 'must be a YYYY-MM-DD date');

const requestSchema = z
  .object({
    dataset: z.string().trim().min(1, 'is required'),
    category: z.string().trim().min(1).default(ALL_CATEGORIES),
    start: isoDate.optional(),
    end: isoDate.optional(),
    useCache: z.boolean().default(false),
    quiet: z.boolean().default(false),
    maxRetries: z.number().int().min(1).max(MAX_ATTEMPTS_LIMIT).default(3),
  })
  .strict()
  .refine((request) => request.start === undefined || request.end === undefined || request.start <= request.end, {
    message: 'start must not be after end',
    path: ['end'],
  });

/**
 * Applies defaults and checks the request against the registry. Runs before
 * any I/O.
 *
 * @throws ValidationError with one entry in `issues` per problem
 *
 * @example
 * ```typescript
 * resolveRequest({ dataset: 'bcb_series', category: 'price' }, registry);
 * // { dataset: 'bcb_series', category: 'price', range: { start: '2010-01-01' },
 * //   useCache: false, quiet: false, maxRetries: 3 }
 * ```
 */
export function resolveRequest(request: DatasetRequest, registry: SourceRegistry): ResolvedRequest {
  const parsed = requestSchema.safeParse(request);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`);
    throw new ValidationError(`Invalid request: ${issues.join('; ')}`, {
      field: String(parsed.error.issues[0]?.path[0] ?? 'request'),
      issues,
    });
  }

  const { dataset, category, start, end, useCache, quiet, maxRetries } = parsed.data;
  const definition = registry.getDataset(dataset);

  // Throws for unknown categories
  registry.resolveItems(dataset, category);

  const rangeStart = start ?? definition.defaultStart;
  if (end !== undefined && rangeStart > end) {
    throw new ValidationError(`Invalid request: end ${end} is before the default start ${rangeStart}`, {
      field: 'end',
      issues: [`end: must not be before ${rangeStart}`],
    });
  }

  return {
    dataset,
    category,
    range: end === undefined ? { start: rangeStart } : { start: rangeStart, end },
    useCache,
    quiet,
    maxRetries,
  };
}
