/**
 * @fileoverview Fixture loading and fetch stubs for adapter tests.
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { vi } from 'vitest';

const fixtureDir = join(dirname(fileURLToPath(import.meta.url)), 'fixtures');

export function loadFixture(name: string): string {
  return readFileSync(join(fixtureDir, name), 'utf8');
}

/**
 * A fetch stub answering every call with the given responses in order;
 * the last one repeats.
 */
export function stubFetch(...responses: Array<() => Response | Promise<Response>>) {
  let call = 0;
  return vi.fn(async (_input: string, _init?: RequestInit): Promise<Response> => {
    const next = responses[Math.min(call, responses.length - 1)];
    call += 1;
    if (!next) {
      throw new Error('stubFetch needs at least one response');
    }
    return next();
  });
}

export function jsonResponse(body: string, status = 200): () => Response {
  return () => new Response(body, { status, headers: { 'content-type': 'application/json' } });
}
