// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect } from 'vitest';
import { withTimeout } from '../src/utils/timeout.js';
import { TimeoutError } from '../src/errors.js';

function never(): Promise<string> {
  return new Promise<string>(() => {});
}

describe('withTimeout', () => {
  it('returns the result of a call that finishes in time', async () => {
    expect(await withTimeout(async () => 'done', 1000, 'fast call')).toBe('done');
  });

  it('rejects with a transient TimeoutError when the bound is hit', async () => {
    const failure = await withTimeout(() => never(), 10, 'slow call').then(
      () => null,
      (error: unknown) => error
    );

    expect(failure).toBeInstanceOf(TimeoutError);
    expect(failure).toMatchObject({
      message: 'slow call timed out after 10ms',
      code: 'TIMEOUT',
      transient: true,
      timeoutMs: 10,
    });
  });

  it('aborts the signal handed to the operation', async () => {
    let received: AbortSignal | undefined;
    await expect(
      withTimeout((signal) => {
        received = signal;
        return never();
      }, 10, 'slow call')
    ).rejects.toThrow(TimeoutError);

    expect(received?.aborted).toBe(true);
  });

  it('passes through failures of the operation', async () => {
    await expect(
      withTimeout(async () => {
        throw new Error('boom');
      }, 1000, 'failing call')
    ).rejects.toThrow('boom');
  });

  it('does not bound the call when the timeout is 0', async () => {
    const result = await withTimeout(
      () => new Promise<string>((resolve) => setTimeout(() => resolve('late'), 20)),
      0,
      'unbounded call'
    );
    expect(result).toBe('late');
  });
});
