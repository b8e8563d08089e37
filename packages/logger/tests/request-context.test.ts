/**
 * @fileoverview Tests for request context propagation.
 */

import { describe, it, expect } from 'vitest';
import {
  generateRequestId,
  getRequestContext,
  getRequestId,
  setRequestContext,
  withRequestContext,
} from '../src/request-context.js';

describe('request context', () => {
  it('should generate unique UUID v4 ids', () => {
    const id1 = generateRequestId();
    const id2 = generateRequestId();
    const uuid = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

    expect(id1).not.toBe(id2);
    expect(uuid.test(id1)).toBe(true);
  });

  it('should be empty outside a context', () => {
    expect(getRequestContext()).toBeUndefined();
    expect(getRequestId()).toBeUndefined();
  });

  it('should propagate through awaits and timers', async () => {
    await withRequestContext(async () => {
      const id = getRequestId();
      expect(id).toBeDefined();

      await new Promise((resolve) => setTimeout(resolve, 5));
      expect(getRequestId()).toBe(id);
    });
  });

  it('should isolate concurrent contexts', async () => {
    const seen = await Promise.all(
      ['a', 'b', 'c'].map((id) =>
        withRequestContext(async () => {
          await new Promise((resolve) => setTimeout(resolve, 5));
          return getRequestId();
        }, id)
      )
    );

    expect(seen).toEqual(['a', 'b', 'c']);
  });

  it('should carry additional fields', async () => {
    const context = await withRequestContext(() => getRequestContext(), 'req-1', { dataset: 'bcb_series' });

    expect(context).toEqual({ request_id: 'req-1', dataset: 'bcb_series' });
  });

  it('should not let additional fields override the request id', async () => {
    const id = await withRequestContext(() => getRequestId(), 'req-1', { request_id: 'other' });

    expect(id).toBe('req-1');
  });

  it('should merge fields into the active context', async () => {
    await withRequestContext(() => {
      expect(setRequestContext({ origin: 'live' })).toBe(true);
      expect(getRequestContext()?.['origin']).toBe('live');
    });
  });

  it('should refuse to set fields outside a context', () => {
    expect(setRequestContext({ origin: 'live' })).toBe(false);
  });

  it('should propagate rejections', async () => {
    await expect(
      withRequestContext(async () => {
        throw new Error('inside');
      })
    ).rejects.toThrow('inside');
  });
});
