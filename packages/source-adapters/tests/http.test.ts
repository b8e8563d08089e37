/**
 * @fileoverview Tests for the shared JSON fetch helper and its error mapping.
 */

import { describe, it, expect } from 'vitest';
import { TransientFetchError, UpstreamResponseError } from '@brrealty/contracts';
import { fetchJson, isTransientStatus } from '../src/http.js';
import type { FetchLike } from '../src/types.js';
import { jsonResponse, stubFetch } from './helpers.js';

function context(fetchImpl: FetchLike, timeoutMs = 1000) {
  return { source: 'bcb_sgs', itemId: '433', timeoutMs, fetchImpl };
}

describe('isTransientStatus', () => {
  it('should treat throttling, timeouts and server errors as transient', () => {
    expect(isTransientStatus(429)).toBe(true);
    expect(isTransientStatus(408)).toBe(true);
    expect(isTransientStatus(503)).toBe(true);
    expect(isTransientStatus(404)).toBe(false);
    expect(isTransientStatus(400)).toBe(false);
  });
});

describe('fetchJson', () => {
  it('should parse JSON bodies', async () => {
    const fetchImpl = stubFetch(jsonResponse('[{"data":"01/01/2024","valor":"1"}]'));

    await expect(fetchJson('https://example.test/a', context(fetchImpl))).resolves.toEqual([
      { data: '01/01/2024', valor: '1' },
    ]);
  });

  it('should map 5xx to a retryable error', async () => {
    const fetchImpl = stubFetch(jsonResponse('upstream down', 503));

    const error = await fetchJson('https://example.test/a', context(fetchImpl)).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransientFetchError);
    expect(error).toMatchObject({ retryable: true, message: 'bcb_sgs returned HTTP 503 for 433' });
  });

  it('should map other 4xx to a non-retryable error', async () => {
    const fetchImpl = stubFetch(jsonResponse('bad request', 400));

    const error = await fetchJson('https://example.test/a', context(fetchImpl)).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(UpstreamResponseError);
    expect(error).toMatchObject({ retryable: false, data: { status: 400, body: 'bad request' } });
  });

  it('should map network failures to a retryable error', async () => {
    const fetchImpl: FetchLike = async () => {
      throw new TypeError('fetch failed');
    };

    await expect(fetchJson('https://example.test/a', context(fetchImpl))).rejects.toThrow(
      'bcb_sgs request failed: fetch failed'
    );
  });

  it('should abort slow requests', async () => {
    const fetchImpl: FetchLike = (_input, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => {
          const abort = new Error('This operation was aborted');
          abort.name = 'AbortError';
          reject(abort);
        });
      });

    const error = await fetchJson('https://example.test/a', context(fetchImpl, 10)).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransientFetchError);
    expect(error).toMatchObject({ message: 'bcb_sgs request timed out after 10ms' });
  });

  it('should reject non-JSON bodies without retry', async () => {
    const fetchImpl = stubFetch(jsonResponse('<html>maintenance</html>'));

    await expect(fetchJson('https://example.test/a', context(fetchImpl))).rejects.toBeInstanceOf(
      UpstreamResponseError
    );
  });
});
