/**
 * Option validation shared by the commands
 */

import { z } from 'zod';
import { ValidationError } from '@brrealty/contracts';

/**
 * Validate parsed command-line options against a schema.
 *
 * @throws ValidationError naming every bad flag
 */
export function parseOptions<T extends z.ZodTypeAny>(schema: T, options: unknown): z.infer<T> {
  const result = schema.safeParse(options ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `--${toFlag(issue.path.join('.'))}: ${issue.message}`);
    throw new ValidationError(`Invalid options: ${issues.join('; ')}`, { field: 'options', issues });
  }
  return result.data;
}

function toFlag(option: string): string {
  return option.replace(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`);
}

/** Options every command accepts. */
export const outputOptionsSchema = z.object({
  pretty: z.boolean().default(false),
});

/** Request narrowing shared by `fetch` and `cache save`. */
export const rangeOptionsSchema = z.object({
  category: z.string().optional(),
  start: z.string().optional(),
  end: z.string().optional(),
  quiet: z.boolean().default(false),
  maxRetries: z.coerce.number().int().optional(),
});
